export const REMINDER_TTL_MS = 15_000;

export const REMINDER_TIMEOUT_PREFIX = 'reminder';
