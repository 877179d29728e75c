import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Context } from 'telegraf';
import { REMINDER_TIMEOUT_PREFIX } from './group-relay.constants';
import { getErrorMessage } from '../../../common/utils/error.util';

/**
 * Отложенное удаление напоминаний.
 * Таймеры живут в SchedulerRegistry под именем reminder:{chatId}:{messageId},
 * поэтому их можно отменить по сообщению или по всему чату.
 */
@Injectable()
export class ReminderSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(ReminderSchedulerService.name);

  constructor(private readonly schedulerRegistry: SchedulerRegistry) {}

  schedule(
    telegram: Context['telegram'],
    chatId: number,
    messageId: number,
    delayMs: number,
  ): void {
    const name = this.buildName(chatId, messageId);
    this.cancelByName(name);

    const timeout = setTimeout(() => {
      void this.deleteReminder(telegram, name, chatId, messageId);
    }, delayMs);

    this.schedulerRegistry.addTimeout(name, timeout);
  }

  cancel(chatId: number, messageId: number): boolean {
    return this.cancelByName(this.buildName(chatId, messageId));
  }

  cancelForChat(chatId: number): number {
    const chatPrefix = `${REMINDER_TIMEOUT_PREFIX}:${chatId}:`;
    const names = this.schedulerRegistry
      .getTimeouts()
      .filter((name) => name.startsWith(chatPrefix));

    names.forEach((name) => this.cancelByName(name));
    return names.length;
  }

  pendingCount(): number {
    return this.reminderNames().length;
  }

  onModuleDestroy(): void {
    this.reminderNames().forEach((name) => this.cancelByName(name));
  }

  private async deleteReminder(
    telegram: Context['telegram'],
    name: string,
    chatId: number,
    messageId: number,
  ): Promise<void> {
    this.cancelByName(name);

    try {
      await telegram.deleteMessage(chatId, messageId);
    } catch (error) {
      this.logger.warn(
        `Failed to delete reminder ${messageId} in chat ${chatId}: ${getErrorMessage(error)}`,
      );
    }
  }

  private cancelByName(name: string): boolean {
    if (!this.schedulerRegistry.doesExist('timeout', name)) {
      return false;
    }

    this.schedulerRegistry.deleteTimeout(name);
    return true;
  }

  private reminderNames(): string[] {
    return this.schedulerRegistry
      .getTimeouts()
      .filter((name) => name.startsWith(`${REMINDER_TIMEOUT_PREFIX}:`));
  }

  private buildName(chatId: number, messageId: number): string {
    return `${REMINDER_TIMEOUT_PREFIX}:${chatId}:${messageId}`;
  }
}
