import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { NicknameFlow } from '../../modules/feature-modules/nickname/nickname.flow';
import { parseCommand } from '../utils/command-parser';

@Injectable()
export class CommandRouter {
  private readonly logger = new Logger(CommandRouter.name);

  constructor(private readonly nicknameFlow: NicknameFlow) {}

  async route(ctx: Context): Promise<void> {
    const messageText =
      ctx.message && 'text' in ctx.message ? ctx.message.text : '';
    const command = parseCommand(messageText, ctx.botInfo?.username);

    if (!command) {
      return;
    }

    this.logger.debug(`Command /${command.name} from ${ctx.from?.id}`);

    switch (command.name) {
      case 'start':
        return this.nicknameFlow.start(ctx);
      case 'nick':
        return this.nicknameFlow.setNick(ctx, command.args);
      case 'mynick':
        return this.nicknameFlow.myNick(ctx);
      case 'stats':
        return this.nicknameFlow.stats(ctx);
      case 'find':
        return this.nicknameFlow.find(ctx, command.args);
      case 'help':
        return this.nicknameFlow.help(ctx);
      default:
        return;
    }
  }
}
