import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { CommandRouter } from './routers/command.router';
import { MessageRouter } from './routers/message.router';
import { ChatMemberRouter } from './routers/chat-member.router';
import { TelegramBotErrorHandler } from './telegram-bot.error-handler';
import { BOT_COMMANDS, TELEGRAF_BOT } from './telegram-bot.constants';
import { parseCommand } from './utils/command-parser';
import { getErrorMessage, getErrorStack } from '../common/utils/error.util';

@Injectable()
export class TelegramBotService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(TelegramBotService.name);
  private launched = false;

  constructor(
    @Inject(TELEGRAF_BOT) private readonly bot: Telegraf,
    private readonly commandRouter: CommandRouter,
    private readonly messageRouter: MessageRouter,
    private readonly chatMemberRouter: ChatMemberRouter,
    private readonly errorHandler: TelegramBotErrorHandler,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    this.registerHandlers();
    await this.publishCommands();

    this.bot
      .launch(
        {
          dropPendingUpdates: true,
          allowedUpdates: ['message', 'my_chat_member'],
        },
        () => {
          this.launched = true;
          this.logger.log('Bot launched, waiting for updates...');
        },
      )
      .catch((error: unknown) => {
        this.launched = false;
        this.logger.error(
          `Long polling stopped with error: ${getErrorMessage(error)}`,
          getErrorStack(error),
        );
      });
  }

  onApplicationShutdown(signal?: string): void {
    if (!this.launched) {
      return;
    }

    this.bot.stop(signal);
    this.launched = false;
    this.logger.log('Bot stopped');
  }

  private registerHandlers(): void {
    // "/ hello" и команды чужим ботам командой не считаем
    this.bot.on(message('text'), (ctx) =>
      parseCommand(ctx.message.text, ctx.botInfo.username)
        ? this.commandRouter.route(ctx)
        : this.messageRouter.route(ctx),
    );

    this.bot.on('my_chat_member', (ctx) => this.chatMemberRouter.route(ctx));

    this.bot.catch((error, ctx) => this.errorHandler.handle(error, ctx));
  }

  private async publishCommands(): Promise<void> {
    try {
      await this.bot.telegram.setMyCommands(BOT_COMMANDS);
    } catch (error) {
      this.logger.warn(
        `Failed to publish command list: ${getErrorMessage(error)}`,
      );
    }
  }
}
