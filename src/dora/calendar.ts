/**
 * UTC calendar helpers. A "day" is a YYYY-MM-DD string in UTC.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Number of UTC calendar days touched by [from, to), at least 1. */
export function daysInWindow(from: string, to: string): number {
  const start = Date.parse(`${utcDay(new Date(from))}T00:00:00Z`);
  const end = new Date(to).getTime();
  return Math.max(1, Math.ceil((end - start) / MS_PER_DAY));
}

export function minutesBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 60_000;
}
