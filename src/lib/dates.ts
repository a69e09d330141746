import type { IsoDate } from '../types/market.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parse YYYY-MM-DD into a UTC-midnight epoch, or null when malformed. */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;
  const [, y, m, d] = match;
  const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
  // Reject rollovers such as 2026-02-30
  return new Date(ms).toISOString().slice(0, 10) === value.trim() ? ms : null;
}

/** Calendar date of an instant, in UTC. */
export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(day: IsoDate, days: number): IsoDate {
  const ms = parseIsoDate(day);
  if (ms === null) throw new RangeError(`Invalid ISO date: ${day}`);
  return toIsoDate(new Date(ms + days * MS_PER_DAY));
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(fromMs: number, toMs: number): number {
  return Math.trunc((toMs - fromMs) / MS_PER_DAY);
}
