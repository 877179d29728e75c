export type UserStoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export interface SaveNickInput {
  telegramId: number;
  username: string | null;
  name: string;
  nick: string;
}

export interface SaveNickOutcome {
  created: boolean;
}

export interface RecentUser {
  telegram_name: string;
  game_nick: string;
  created_at: Date;
}

export interface UserStats {
  total: number;
  recent: RecentUser[];
}

export interface FoundUser {
  telegram_name: string;
  game_nick: string;
}

export interface UserSearchResult {
  items: FoundUser[];
  /** Сколько всего строк подошло, items обрезан до лимита */
  total: number;
}

export const EMPTY_STATS: UserStats = { total: 0, recent: [] };

export function unwrapOr<T>(result: UserStoreResult<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
