const pad = (value: number) => String(value).padStart(2, '0');

/**
 * DD.MM или DD.MM.YYYY в UTC. Для невалидной даты возвращает null.
 */
export function formatDayMonth(
  date: Date | string | null | undefined,
  withYear = false,
): string | null {
  if (date === null || date === undefined) {
    return null;
  }

  const value = date instanceof Date ? date : new Date(date);
  if (Number.isNaN(value.getTime())) {
    return null;
  }

  const dayMonth = `${pad(value.getUTCDate())}.${pad(value.getUTCMonth() + 1)}`;
  return withYear ? `${dayMonth}.${value.getUTCFullYear()}` : dayMonth;
}
