import { escapeHtml } from '../../../common/utils/html.util';
import { formatDayMonth } from '../../../common/utils/date.util';
import {
  FoundUser,
  UserStats,
} from '../../core-modules/user/user.types';
import { NicknameValidationError } from './nickname.validation';
import { NICK_MAX_LENGTH, NICK_MIN_LENGTH } from './nickname.constants';

// Все тексты отправляются с parse_mode: 'HTML',
// поэтому любые пользовательские значения проходят через escapeHtml.

export function buildStartText(firstName: string, nick: string | null): string {
  const greeting =
    `👋 <b>Привет, ${escapeHtml(firstName)}!</b>\n\n` +
    `Я подписываю твои сообщения в группах игровым ником.\n\n`;

  const body = nick
    ? `✅ Твой текущий ник: <b>${escapeHtml(nick)}</b>\n\n` +
      `📝 Изменить: <code>/nick НовыйНик</code>\n` +
      `📊 Статистика: <code>/stats</code>\n` +
      `🔍 Найти игрока: <code>/find ник</code>\n\n`
    : `🎮 <b>Чтобы начать:</b>\n` +
      `1. Установи игровой ник: <code>/nick ТвойНик</code>\n` +
      `2. Добавь меня в группу администратором\n` +
      `3. Пиши в группе, а я подпишу твои сообщения\n\n` +
      `📝 Пример: <code>/nick КрутойИгрок</code>\n\n`;

  return greeting + body + `Все команды: <code>/help</code>`;
}

export function buildCurrentNickText(nick: string): string {
  return (
    `🎮 <b>Твой текущий ник:</b> ${escapeHtml(nick)}\n\n` +
    `Чтобы изменить, напиши:\n` +
    `<code>/nick НовыйИгровойНик</code>`
  );
}

export const SET_NICK_PROMPT_TEXT =
  `📝 <b>Установи игровой ник:</b>\n\n` +
  `Напиши: <code>/nick ТвойНик</code>\n\n` +
  `Примеры:\n` +
  `• <code>/nick ProPlayer</code>\n` +
  `• <code>/nick Охотник23</code>\n\n` +
  `⚠️ <b>Требования:</b>\n` +
  `• от ${NICK_MIN_LENGTH} до ${NICK_MAX_LENGTH} символов\n` +
  `• без символов &lt; &gt; &amp; " ' \` \\`;

/** Без parse_mode: в тексте может быть запрещённый символ как есть */
export function buildValidationErrorText(
  error: NicknameValidationError,
): string {
  switch (error.reason) {
    case 'TOO_SHORT':
      return `❌ Слишком короткий ник. Минимум ${NICK_MIN_LENGTH} символа.`;
    case 'TOO_LONG':
      return `❌ Слишком длинный ник. Максимум ${NICK_MAX_LENGTH} символа.`;
    case 'FORBIDDEN_CHAR':
      return `❌ Ник содержит запрещённый символ: ${error.char}`;
  }
}

export function buildNickSavedText(
  firstName: string,
  nick: string,
  total: number,
): string {
  return (
    `✅ <b>Отлично, ${escapeHtml(firstName)}!</b>\n\n` +
    `🎮 Твой игровой ник: <b>${escapeHtml(nick)}</b>\n\n` +
    `📊 Всего игроков в базе: <b>${total}</b>\n\n` +
    `<b>Что дальше:</b>\n` +
    `1. Добавь меня в группу администратором\n` +
    `2. Дай права на удаление сообщений\n` +
    `3. Пиши в группе, а я подпишу твои сообщения\n\n` +
    `🔄 Изменить ник: <code>/nick НовыйНик</code>`
  );
}

export const NICK_SAVE_FAILED_TEXT =
  '❌ Не удалось сохранить ник. Попробуй позже или обратись к администратору.';

export function buildMyNickText(nick: string, registeredAt: Date | null): string {
  const date = formatDayMonth(registeredAt, true);
  const suffix = date ? ` (${date})` : '';

  return (
    `🎮 <b>Твой игровой ник:</b> ${escapeHtml(nick)}${suffix}\n\n` +
    `Изменить: <code>/nick НовыйНик</code>\n` +
    `Статистика: <code>/stats</code>`
  );
}

export const NO_NICK_TEXT =
  `❌ У тебя ещё нет игрового ника.\n\n` +
  `Установи его командой:\n` +
  `<code>/nick ТвойИгровойНик</code>\n\n` +
  `Пример: <code>/nick Игрок007</code>`;

export const UNKNOWN_DATE_TEXT = 'сегодня';

export function buildStatsText(stats: UserStats): string {
  let text = `📊 <b>Статистика бота:</b>\n\n👥 <b>Всего игроков:</b> ${stats.total}\n\n`;

  if (stats.recent.length > 0) {
    text += `🆕 <b>Последние игроки:</b>\n`;
    stats.recent.forEach((user, index) => {
      const date = formatDayMonth(user.created_at) ?? UNKNOWN_DATE_TEXT;
      text += `${index + 1}. ${escapeHtml(user.game_nick)} (${escapeHtml(user.telegram_name)}) - ${date}\n`;
    });
    text += '\n';
  }

  return text + `🔍 Найти игрока: <code>/find ник</code>`;
}

export const FIND_USAGE_TEXT =
  `🔍 <b>Поиск игроков:</b>\n\n` +
  `Напиши: <code>/find ник_или_имя</code>\n\n` +
  `Примеры:\n` +
  `• <code>/find pro</code> найдёт ProPlayer, ProGamer\n` +
  `• <code>/find алекс</code> найдёт Алексей, Александр\n` +
  `• <code>/find 007</code> найдёт по цифрам в нике`;

export function buildSearchResultsText(
  query: string,
  items: FoundUser[],
  total: number,
): string {
  const safeQuery = escapeHtml(query);

  if (items.length === 0) {
    return `❌ По запросу '${safeQuery}' ничего не найдено.\n\nПопробуй другой запрос.`;
  }

  let text = `🔍 <b>Найдено по запросу '${safeQuery}':</b>\n\n`;
  items.forEach((user, index) => {
    text += `${index + 1}. <b>${escapeHtml(user.game_nick)}</b> (${escapeHtml(user.telegram_name)})\n`;
  });

  if (total > items.length) {
    text += `\n... и ещё ${total - items.length} результатов`;
  }

  return text;
}

export const HELP_TEXT =
  `🆘 <b>Доступные команды:</b>\n\n` +
  `<code>/start</code> - начало работы с ботом\n` +
  `<code>/nick [ник]</code> - установить или изменить игровой ник\n` +
  `<code>/mynick</code> - показать текущий ник\n` +
  `<code>/stats</code> - статистика игроков\n` +
  `<code>/find [текст]</code> - поиск игрока по нику или имени\n` +
  `<code>/help</code> - эта справка\n\n` +
  `<b>📖 Как использовать:</b>\n` +
  `1. Установи ник через <code>/nick ТвойНик</code>\n` +
  `2. Добавь бота в группу администратором\n` +
  `3. Дай права на удаление и отправку сообщений\n` +
  `4. Пиши в группе, бот подпишет твои сообщения\n\n` +
  `<b>📞 Поддержка:</b>\n` +
  `Проблемы с ботом? Обратись к администратору.`;

export const PRIVATE_HINT_TEXT =
  `💬 <b>Я бот для игровых ников!</b>\n\n` +
  `Доступные команды:\n` +
  `<code>/start</code> - начало работы\n` +
  `<code>/nick</code> - установить ник\n` +
  `<code>/help</code> - все команды\n\n` +
  `Добавь меня в группу, чтобы я начал работать.`;

export function buildReminderText(firstName: string): string {
  return (
    `👤 ${escapeHtml(firstName)}, чтобы писать в группе, нужен игровой ник!\n\n` +
    `Напиши мне в личные сообщения:\n` +
    `<code>/nick ТвойИгровойНик</code>`
  );
}

export const GENERIC_FAILURE_TEXT =
  '❌ Произошла ошибка при обработке команды.\n' +
  'Попробуй ещё раз или обратись к администратору.';
