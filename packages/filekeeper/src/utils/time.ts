/**
 * Time Utilities
 */

/** Source of the current time. Injected so sweeps can be driven deterministically. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const MS_PER_DAY = 1000 * 60 * 60 * 24;
const MS_PER_MINUTE = 1000 * 60;

/**
 * Fractional days elapsed from `from` to `to`
 */
export function daysBetween(from: string | Date, to: string | Date): number {
  return (toDate(to).getTime() - toDate(from).getTime()) / MS_PER_DAY;
}

/**
 * Absolute minutes between two instants
 */
export function minutesBetween(a: string | Date, b: string | Date): number {
  return Math.abs(toDate(b).getTime() - toDate(a).getTime()) / MS_PER_MINUTE;
}

/**
 * Add (fractional) days to a date, returning an ISO timestamp
 */
export function addDays(date: string | Date, days: number): string {
  return new Date(toDate(date).getTime() + days * MS_PER_DAY).toISOString();
}

/**
 * Add seconds to a date, returning an ISO timestamp
 */
export function addSeconds(date: string | Date, seconds: number): string {
  return new Date(toDate(date).getTime() + seconds * 1000).toISOString();
}

/**
 * Compact date stamp used in generated file names (YYYYMMDD, UTC)
 */
export function dateStamp(date: string | Date): string {
  return toDate(date).toISOString().slice(0, 10).replace(/-/g, '');
}

function toDate(value: string | Date): Date {
  return typeof value === 'string' ? new Date(value) : value;
}
