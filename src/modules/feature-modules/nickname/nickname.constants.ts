export const NICK_MIN_LENGTH = 2;
export const NICK_MAX_LENGTH = 32;

/** Порядок важен: в ответе называем первый найденный по этому списку символ */
export const NICK_FORBIDDEN_CHARS = ['<', '>', '&', '"', "'", '`', '\\'];
