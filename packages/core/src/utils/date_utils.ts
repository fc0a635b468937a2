/**
 * Date helpers for release records and rendered pages. Everything is UTC so
 * that output does not depend on the host time zone.
 *
 * @module utils/date_utils
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * "YYYY-MM-DD HH:mm UTC" from a timestamp in seconds.
 */
export function formatPublished(tsSeconds: number): string {
  const date = new Date(tsSeconds * 1000);
  return `${formatDay(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}

/**
 * "YYYY-MM-DD" in UTC.
 */
export function formatDay(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Start of a lookback window, in seconds.
 */
export function lookbackStart(now: Date, windowDays: number): number {
  return now.getTime() / 1000 - windowDays * 24 * 60 * 60;
}
