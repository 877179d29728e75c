import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { GENERIC_FAILURE_TEXT } from '../modules/feature-modules/nickname/nickname.messages';
import { getErrorMessage, getErrorStack } from '../common/utils/error.util';

/**
 * Последний рубеж для ошибок из любых обработчиков (bot.catch).
 */
@Injectable()
export class TelegramBotErrorHandler {
  private readonly logger = new Logger(TelegramBotErrorHandler.name);

  async handle(error: unknown, ctx: Context): Promise<void> {
    this.logger.error(
      `Unhandled error in update ${ctx.update.update_id} (${ctx.updateType}): ${getErrorMessage(error)}`,
      getErrorStack(error),
    );

    if (!ctx.from || !ctx.message) {
      return;
    }

    try {
      await ctx.reply(GENERIC_FAILURE_TEXT);
    } catch (notifyError) {
      this.logger.debug(
        `Failed to notify user ${ctx.from.id} about the error: ${getErrorMessage(notifyError)}`,
      );
    }
  }
}
