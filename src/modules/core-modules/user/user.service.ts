import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ILike, Repository } from 'typeorm';
import { UserEntity } from './user.entity';
import {
  SaveNickInput,
  SaveNickOutcome,
  UserSearchResult,
  UserStats,
  UserStoreResult,
} from './user.types';
import {
  getErrorMessage,
  getErrorStack,
} from '../../../common/utils/error.util';

export const RECENT_USERS_LIMIT = 5;
export const SEARCH_RESULTS_LIMIT = 10;

/**
 * Экранирует %, _ и \ для ILIKE, чтобы поиск шёл по подстроке буквально.
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Доступ к таблице users.
 * Ошибки базы не пробрасываются: каждый метод логирует их и
 * возвращает { ok: false }, а вызывающий код сам выбирает fallback.
 */
@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
  ) {}

  async getNick(telegramId: number): Promise<UserStoreResult<string | null>> {
    return this.run(`getNick(${telegramId})`, async () => {
      const user = await this.userRepository.findOne({
        where: { telegram_id: telegramId },
        select: { game_nick: true },
      });

      return user?.game_nick ?? null;
    });
  }

  async saveNick(
    input: SaveNickInput,
  ): Promise<UserStoreResult<SaveNickOutcome>> {
    return this.run(`saveNick(${input.telegramId})`, async () => {
      const now = new Date();
      const existing = await this.userRepository.findOne({
        where: { telegram_id: input.telegramId },
      });

      if (existing) {
        existing.telegram_username = input.username;
        existing.telegram_name = input.name;
        existing.game_nick = input.nick;
        existing.updated_at = now;
        await this.userRepository.save(existing);

        this.logger.log(
          `Nick updated for ${input.telegramId}: ${input.nick}`,
        );
        return { created: false };
      }

      const created = this.userRepository.create({
        telegram_id: input.telegramId,
        telegram_username: input.username,
        telegram_name: input.name,
        game_nick: input.nick,
        created_at: now,
        updated_at: now,
      });
      await this.userRepository.save(created);

      this.logger.log(`New user ${input.telegramId}: ${input.nick}`);
      return { created: true };
    });
  }

  async getStats(): Promise<UserStoreResult<UserStats>> {
    return this.run('getStats()', async () => {
      const total = await this.userRepository.count();
      const recent = await this.userRepository.find({
        select: { telegram_name: true, game_nick: true, created_at: true },
        order: { created_at: 'DESC' },
        take: RECENT_USERS_LIMIT,
      });

      return {
        total,
        recent: recent.map((user) => ({
          telegram_name: user.telegram_name,
          game_nick: user.game_nick,
          created_at: user.created_at,
        })),
      };
    });
  }

  async search(text: string): Promise<UserStoreResult<UserSearchResult>> {
    return this.run(`search(${text})`, async () => {
      const pattern = `%${escapeLikePattern(text)}%`;
      const [users, total] = await this.userRepository.findAndCount({
        select: { telegram_name: true, game_nick: true },
        where: [{ game_nick: ILike(pattern) }, { telegram_name: ILike(pattern) }],
        order: { game_nick: 'ASC' },
        take: SEARCH_RESULTS_LIMIT,
      });

      return {
        items: users.map((user) => ({
          telegram_name: user.telegram_name,
          game_nick: user.game_nick,
        })),
        total,
      };
    });
  }

  async getRegisteredAt(
    telegramId: number,
  ): Promise<UserStoreResult<Date | null>> {
    return this.run(`getRegisteredAt(${telegramId})`, async () => {
      const user = await this.userRepository.findOne({
        where: { telegram_id: telegramId },
        select: { created_at: true },
      });

      return user?.created_at ?? null;
    });
  }

  private async run<T>(
    operation: string,
    query: () => Promise<T>,
  ): Promise<UserStoreResult<T>> {
    try {
      return { ok: true, value: await query() };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(
        `Store operation ${operation} failed: ${message}`,
        getErrorStack(error),
      );
      return { ok: false, error: message };
    }
  }
}
