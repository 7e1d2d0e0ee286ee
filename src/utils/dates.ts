/**
 * Calendar helpers. Every date in the project is a UTC instant; date-only
 * values (`YYYY-MM-DD`) mean midnight UTC of that day.
 */

export const DATE_ONLY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a strict `YYYY-MM-DD` string.
 *
 * @returns The UTC midnight of that day, or null when the text is malformed or
 * names a day that does not exist (2021-02-30).
 */
export function parseDateOnly(value: string): Date | null {
  const match = DATE_ONLY_REGEX.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/** Formats the UTC calendar day of `date` as `YYYY-MM-DD`. */
export function formatDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Adds one calendar month keeping the day of month. Days past the end of the
 * target month roll into the month after (Jan 31 -> Mar 3 in 2021).
 */
export function addCalendarMonth(date: Date): Date {
  return new Date(
    Date.UTC(
      date.getUTCFullYear(),
      date.getUTCMonth() + 1,
      date.getUTCDate(),
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds(),
    ),
  );
}

export const fromUnixSeconds = (seconds: number): Date => new Date(seconds * 1000);

export const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);
