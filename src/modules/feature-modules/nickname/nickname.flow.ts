import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { UserService } from '../../core-modules/user/user.service';
import { EMPTY_STATS, unwrapOr } from '../../core-modules/user/user.types';
import { validateNickname } from './nickname.validation';
import {
  FIND_USAGE_TEXT,
  HELP_TEXT,
  NICK_SAVE_FAILED_TEXT,
  NO_NICK_TEXT,
  PRIVATE_HINT_TEXT,
  SET_NICK_PROMPT_TEXT,
  buildCurrentNickText,
  buildMyNickText,
  buildNickSavedText,
  buildSearchResultsText,
  buildStartText,
  buildStatsText,
  buildValidationErrorText,
} from './nickname.messages';

/**
 * Обработчики команд бота. Flow ничего не хранит сам:
 * всё состояние лежит в таблице users, доступ через UserService.
 */
@Injectable()
export class NicknameFlow {
  private readonly logger = new Logger(NicknameFlow.name);

  constructor(private readonly userService: UserService) {}

  async start(ctx: Context): Promise<void> {
    const from = ctx.from;
    if (!from) {
      return;
    }

    const nick = unwrapOr(await this.userService.getNick(from.id), null);
    await this.replyHtml(ctx, buildStartText(from.first_name, nick));
  }

  async setNick(ctx: Context, args: string[]): Promise<void> {
    const from = ctx.from;
    if (!from) {
      return;
    }

    if (args.length === 0) {
      const current = unwrapOr(await this.userService.getNick(from.id), null);
      await this.replyHtml(
        ctx,
        current ? buildCurrentNickText(current) : SET_NICK_PROMPT_TEXT,
      );
      return;
    }

    const validation = validateNickname(args.join(' '));
    if (!validation.ok) {
      this.logger.debug(
        `Nick rejected for ${from.id}: ${validation.error.reason}`,
      );
      await ctx.reply(buildValidationErrorText(validation.error));
      return;
    }

    const saved = await this.userService.saveNick({
      telegramId: from.id,
      username: from.username ?? null,
      name: from.first_name,
      nick: validation.nick,
    });

    if (!saved.ok) {
      await ctx.reply(NICK_SAVE_FAILED_TEXT);
      return;
    }

    const stats = unwrapOr(await this.userService.getStats(), EMPTY_STATS);
    await this.replyHtml(
      ctx,
      buildNickSavedText(from.first_name, validation.nick, stats.total),
    );
  }

  async myNick(ctx: Context): Promise<void> {
    const from = ctx.from;
    if (!from) {
      return;
    }

    const nick = unwrapOr(await this.userService.getNick(from.id), null);
    if (!nick) {
      await this.replyHtml(ctx, NO_NICK_TEXT);
      return;
    }

    const registeredAt = unwrapOr(
      await this.userService.getRegisteredAt(from.id),
      null,
    );
    await this.replyHtml(ctx, buildMyNickText(nick, registeredAt));
  }

  async stats(ctx: Context): Promise<void> {
    const stats = unwrapOr(await this.userService.getStats(), EMPTY_STATS);
    await this.replyHtml(ctx, buildStatsText(stats));
  }

  async find(ctx: Context, args: string[]): Promise<void> {
    if (args.length === 0) {
      await this.replyHtml(ctx, FIND_USAGE_TEXT);
      return;
    }

    const query = args.join(' ');
    const result = unwrapOr(await this.userService.search(query), {
      items: [],
      total: 0,
    });

    await this.replyHtml(
      ctx,
      buildSearchResultsText(query, result.items, result.total),
    );
  }

  async help(ctx: Context): Promise<void> {
    await this.replyHtml(ctx, HELP_TEXT);
  }

  async privateHint(ctx: Context): Promise<void> {
    await this.replyHtml(ctx, PRIVATE_HINT_TEXT);
  }

  private async replyHtml(ctx: Context, text: string): Promise<void> {
    await ctx.reply(text, { parse_mode: 'HTML' });
  }
}
