import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { ReminderSchedulerService } from '../../modules/feature-modules/group-relay/reminder-scheduler.service';

const REMOVED_STATUSES = ['left', 'kicked'];

@Injectable()
export class ChatMemberRouter {
  private readonly logger = new Logger(ChatMemberRouter.name);

  constructor(private readonly reminderScheduler: ReminderSchedulerService) {}

  /**
   * my_chat_member: если бота убрали из чата, удалять там уже нечего.
   */
  async route(ctx: Context): Promise<void> {
    const update = ctx.myChatMember;
    if (!update) {
      return;
    }

    if (!REMOVED_STATUSES.includes(update.new_chat_member.status)) {
      return;
    }

    const cancelled = this.reminderScheduler.cancelForChat(update.chat.id);
    this.logger.log(
      `Bot removed from chat ${update.chat.id}, cancelled ${cancelled} pending reminders`,
    );
  }
}
