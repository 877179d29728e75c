import { MessageEntity } from 'telegraf/types';

export interface RelayMessage {
  text: string;
  entities: MessageEntity[];
}

/**
 * Собирает текст "{nick}: {text}".
 * Префикс с ником выделяется жирным, а entities исходного сообщения
 * сдвигаются на длину префикса. Offset в Telegram считается в UTF-16,
 * как и String.length.
 */
export function buildRelayMessage(
  nick: string,
  text: string,
  originalEntities: MessageEntity[] = [],
): RelayMessage {
  const label = `${nick}:`;
  const prefix = `${label} `;

  const shifted = originalEntities.map((entity) => ({
    ...entity,
    offset: entity.offset + prefix.length,
  }));

  return {
    text: prefix + text,
    entities: [{ type: 'bold', offset: 0, length: label.length }, ...shifted],
  };
}
