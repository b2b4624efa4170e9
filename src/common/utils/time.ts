export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

/**
 * Monday 00:00 UTC of the week containing `now`.
 */
export function startOfUtcWeek(now: Date): Date {
  const day = startOfUtcDay(now);
  const daysSinceMonday = (day.getUTCDay() + 6) % 7;
  return new Date(day.getTime() - daysSinceMonday * DAY_MS);
}

export function startOfUtcMonth(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

export function truncateToMinute(timestamp: number): number {
  return timestamp - (timestamp % MINUTE_MS);
}

const pad = (value: number) => String(value).padStart(2, '0');

/** `HH:mm` in UTC */
export function formatUtcTime(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

/** `dd/MM` in UTC */
export function formatUtcDayMonth(date: Date): string {
  return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}`;
}

/** `YYYY-MM-DD` in UTC, the same key sqlite's date() produces */
export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}
