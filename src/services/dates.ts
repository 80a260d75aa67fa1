/**
 * UTC calendar helpers. Days are `YYYY-MM-DD` strings, which compare
 * correctly as plain strings.
 */

const MS_PER_HOUR = 60 * 60 * 1000;

export const utcDay = (date: Date): string => date.toISOString().slice(0, 10);

export const addDays = (day: string, days: number): string => {
  const date = new Date(`${day}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return utcDay(date);
};

export const nextUtcMidnight = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + 1));

export const secondsUntilNextUtcDay = (date: Date): number =>
  Math.ceil((nextUtcMidnight(date).getTime() - date.getTime()) / 1000);

export const addHours = (date: Date, hours: number): Date =>
  new Date(date.getTime() + hours * MS_PER_HOUR);

export const addDaysToDate = (date: Date, days: number): Date =>
  new Date(date.getTime() + days * 24 * MS_PER_HOUR);
