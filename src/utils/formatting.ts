/**
 * Shared formatting utilities
 */

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Format a timezone offset as +HHMM / -HHMM
 * @param offsetMinutes - Value of Date#getTimezoneOffset (positive west of UTC)
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes > 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

/**
 * Format a local timestamp as YYYY-MM-DDTHH:MM:SS+ZZZZ
 */
export function formatGeneratedAt(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day}T${time}${formatUtcOffset(date.getTimezoneOffset())}`;
}

/**
 * Format a count with a singular/plural noun: "1 package", "3 packages"
 */
export function formatCount(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
