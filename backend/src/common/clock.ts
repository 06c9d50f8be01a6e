export interface Clock {
  now: () => number; // milliseconds epoch
  utcNow: () => Date;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
};

const DAY_MS = 24 * 60 * 60 * 1000;

/** YYYY-MM-DD of the UTC calendar day containing `date`. */
export function toUtcDay(date: Date): string {
  const yyyy = date.getUTCFullYear();
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function addUtcDays(day: string, days: number): string {
  return toUtcDay(new Date(Date.parse(`${day}T00:00:00Z`) + days * DAY_MS));
}

/** Whole days from `from` to `to` (both YYYY-MM-DD). */
export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / DAY_MS);
}

export function isUtcDay(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}
