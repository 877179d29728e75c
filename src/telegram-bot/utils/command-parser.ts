export interface ParsedCommand {
  name: string;
  args: string[];
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;

/**
 * Разбирает "/cmd@bot arg1 arg2".
 * Команда, адресованная другому боту, возвращает null.
 * Имя команды сравнивается с учётом регистра, username бота без.
 */
export function parseCommand(
  text: string,
  botUsername?: string,
): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, name, mention, rest] = match;

  if (
    mention &&
    (!botUsername || mention.toLowerCase() !== botUsername.toLowerCase())
  ) {
    return null;
  }

  const args = rest ? rest.split(/\s+/).filter((arg) => arg.length > 0) : [];
  return { name, args };
}
