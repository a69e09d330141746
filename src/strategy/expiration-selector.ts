import { daysBetween, parseIsoDate } from '../lib/dates.js';
import type { IsoDate } from '../types/market.js';
import type { ExpirationSelection } from '../types/strategy.js';

export const DEFAULT_MIN_DAYS = 20;
export const DEFAULT_MAX_DAYS = 40;

/**
 * Pick the nearest expiration whose day count from `referenceDay` falls in
 * the closed window [minDays, maxDays].
 *
 * Candidates are de-duplicated and scanned in ascending date order, so the
 * answer does not depend on the order the provider listed them in.
 * Malformed dates are skipped.
 */
export function selectExpiration(
  available: readonly IsoDate[],
  referenceDay: IsoDate,
  minDays = DEFAULT_MIN_DAYS,
  maxDays = DEFAULT_MAX_DAYS,
): ExpirationSelection {
  if (!Number.isInteger(minDays) || !Number.isInteger(maxDays) || minDays > maxDays) {
    throw new RangeError(`Invalid expiry window [${minDays}, ${maxDays}]`);
  }
  const referenceMs = parseIsoDate(referenceDay);
  if (referenceMs === null) {
    throw new RangeError(`Invalid reference day: ${referenceDay}`);
  }

  const candidates = new Map<IsoDate, number>();
  for (const raw of available) {
    const ms = parseIsoDate(raw);
    if (ms !== null) candidates.set(raw.trim(), ms);
  }

  const ascending = [...candidates.entries()].sort((a, b) => a[1] - b[1]);
  for (const [expiration, ms] of ascending) {
    const days = daysBetween(referenceMs, ms);
    if (days >= minDays && days <= maxDays) {
      return { status: 'found', expiration, daysToExpiration: days };
    }
  }
  return { status: 'not_found' };
}
