import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { Message } from 'telegraf/types';
import { UserService } from '../../core-modules/user/user.service';
import { unwrapOr } from '../../core-modules/user/user.types';
import { ReminderSchedulerService } from './reminder-scheduler.service';
import { buildRelayMessage } from './relay-message.util';
import { REMINDER_TTL_MS } from './group-relay.constants';
import { buildReminderText } from '../nickname/nickname.messages';
import {
  getErrorMessage,
  getErrorStack,
} from '../../../common/utils/error.util';

@Injectable()
export class GroupRelayFlow {
  private readonly logger = new Logger(GroupRelayFlow.name);

  constructor(
    private readonly userService: UserService,
    private readonly reminderScheduler: ReminderSchedulerService,
  ) {}

  /**
   * Вызывается из MessageRouter для текста в group/supergroup.
   */
  async handle(ctx: Context): Promise<void> {
    const message = ctx.message;
    const chat = ctx.chat;
    const from = ctx.from;

    if (!message || !('text' in message) || !chat || !from) {
      return;
    }

    if (chat.type !== 'group' && chat.type !== 'supergroup') {
      return;
    }

    if (message.text.startsWith('/')) {
      return;
    }

    // Анонимные админы и автопересылки из канала пишут от имени чата
    if (message.sender_chat || message.is_automatic_forward) {
      return;
    }

    const nick = unwrapOr(await this.userService.getNick(from.id), null);

    if (nick) {
      await this.relay(ctx, chat.id, message, nick);
      return;
    }

    await this.remind(ctx, chat.id, message, from.first_name);
  }

  private async relay(
    ctx: Context,
    chatId: number,
    message: Message.TextMessage,
    nick: string,
  ): Promise<void> {
    const relay = buildRelayMessage(nick, message.text, message.entities);

    const sent = await ctx.telegram.sendMessage(chatId, relay.text, {
      entities: relay.entities,
      ...(message.is_topic_message && message.message_thread_id
        ? { message_thread_id: message.message_thread_id }
        : {}),
    });

    try {
      await ctx.telegram.deleteMessage(chatId, message.message_id);
    } catch (error) {
      this.logger.warn(
        `Failed to delete message ${message.message_id} in chat ${chatId}: ${getErrorMessage(error)}`,
      );

      // Оригинал остался, убираем свой дубль
      try {
        await ctx.telegram.deleteMessage(chatId, sent.message_id);
      } catch (rollbackError) {
        this.logger.debug(
          `Failed to delete relay ${sent.message_id} in chat ${chatId}: ${getErrorMessage(rollbackError)}`,
        );
      }
    }
  }

  private async remind(
    ctx: Context,
    chatId: number,
    message: Message.TextMessage,
    firstName: string,
  ): Promise<void> {
    try {
      const reminder = await ctx.reply(buildReminderText(firstName), {
        parse_mode: 'HTML',
        reply_parameters: { message_id: message.message_id },
      });

      this.reminderScheduler.schedule(
        ctx.telegram,
        chatId,
        reminder.message_id,
        REMINDER_TTL_MS,
      );
    } catch (error) {
      this.logger.error(
        `Failed to send reminder in chat ${chatId}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
    }
  }
}
