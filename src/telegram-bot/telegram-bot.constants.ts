export const TELEGRAF_BOT = 'TELEGRAF_BOT';

export const BOT_COMMANDS = [
  { command: 'start', description: 'Начало работы с ботом' },
  { command: 'nick', description: 'Установить или изменить игровой ник' },
  { command: 'mynick', description: 'Показать текущий ник' },
  { command: 'stats', description: 'Статистика игроков' },
  { command: 'find', description: 'Поиск игрока по нику или имени' },
  { command: 'help', description: 'Справка' },
];
