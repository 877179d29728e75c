import {
  NICK_FORBIDDEN_CHARS,
  NICK_MAX_LENGTH,
  NICK_MIN_LENGTH,
} from './nickname.constants';

export type NicknameValidationError =
  | { reason: 'TOO_SHORT' }
  | { reason: 'TOO_LONG' }
  | { reason: 'FORBIDDEN_CHAR'; char: string };

export type NicknameValidationResult =
  | { ok: true; nick: string }
  | { ok: false; error: NicknameValidationError };

/**
 * Длина считается в code points, а не в UTF-16:
 * эмодзи в нике занимает один символ.
 */
export function validateNickname(candidate: string): NicknameValidationResult {
  const nick = candidate.trim();
  const length = [...nick].length;

  if (length < NICK_MIN_LENGTH) {
    return { ok: false, error: { reason: 'TOO_SHORT' } };
  }

  if (length > NICK_MAX_LENGTH) {
    return { ok: false, error: { reason: 'TOO_LONG' } };
  }

  const forbidden = NICK_FORBIDDEN_CHARS.find((char) => nick.includes(char));
  if (forbidden) {
    return { ok: false, error: { reason: 'FORBIDDEN_CHAR', char: forbidden } };
  }

  return { ok: true, nick };
}
