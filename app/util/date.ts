// RFC 3339 date-time, as required for STAC temporal extents
const rfc3339Regex = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

/**
 * Returns the number of days in a month
 *
 * @param year - the full year
 * @param month - the month, 1 to 12
 */
function daysInMonth(year: number, month: number): number {
  const leapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, leapYear ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1];
}

/**
 * Parses an RFC 3339 timestamp such as `2024-01-01T00:00:00Z`
 *
 * @param value - The timestamp string
 * @returns the parsed date, or undefined if the string is not a valid timestamp
 */
export function parseTimestamp(value: string): Date | undefined {
  const match = rfc3339Regex.exec(value);
  if (!match) return undefined;
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map((part) => parseInt(part, 10));
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  const fraction = match[7] ? `.${match[7].slice(0, 3)}` : '';
  const zone = match[8].toUpperCase();
  const date = new Date(`${match.slice(1, 4).join('-')}T${match.slice(4, 7).join(':')}${fraction}${zone}`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Digits of the fractional seconds beyond milliseconds, which a Date does not keep
 *
 * @param value - a valid RFC 3339 timestamp
 */
function subMillisecondDigits(value: string): string {
  return rfc3339Regex.exec(value)?.[7]?.slice(3) ?? '';
}

/**
 * Orders two RFC 3339 timestamps by the instant they denote, down to the last
 * fractional digit given
 *
 * @param a - a valid timestamp
 * @param b - a valid timestamp
 * @returns a negative number if a is earlier than b, 0 if they are the same instant,
 * a positive number if a is later
 * @throws Error if either value is not a valid timestamp
 */
export function compareTimestamps(a: string, b: string): number {
  const dateA = parseTimestamp(a);
  const dateB = parseTimestamp(b);
  if (!dateA || !dateB) throw new Error(`Cannot compare '${a}' and '${b}': not RFC 3339 timestamps`);
  const difference = dateA.getTime() - dateB.getTime();
  if (difference !== 0) return difference;
  const digitsA = subMillisecondDigits(a);
  const digitsB = subMillisecondDigits(b);
  const length = Math.max(digitsA.length, digitsB.length);
  const paddedA = digitsA.padEnd(length, '0');
  const paddedB = digitsB.padEnd(length, '0');
  if (paddedA === paddedB) return 0;
  return paddedA < paddedB ? -1 : 1;
}
