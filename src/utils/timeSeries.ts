import { PERIOD_UNITS } from '@/constants/analysis';
import { PeriodDefinition } from '@/models';

const DAY_MS = 86_400_000;

interface Timestamped {
  timestamp: Date;
}

/**
 * Index of the last point at or before `at`, or -1 when every point is later
 * Points must be sorted by timestamp ascending
 */
export function indexAtOrBefore<T extends Timestamped>(points: readonly T[], at: Date): number {
  const target = at.getTime();
  let low = 0;
  let high = points.length - 1;
  let found = -1;

  while (low <= high) {
    const mid = (low + high) >> 1;
    const point = points[mid];
    if (point === undefined) break;

    if (point.timestamp.getTime() <= target) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return found;
}

export function pointAtOrBefore<T extends Timestamped>(points: readonly T[], at: Date): T | null {
  return points[indexAtOrBefore(points, at)] ?? null;
}

/**
 * Move `date` back by `months` calendar months in UTC
 * The day is clamped to the target month's length (Mar 31 - 1 month = Feb 28/29)
 */
function shiftMonthsBack(date: Date, months: number): Date {
  const shifted = new Date(date.getTime());
  const day = shifted.getUTCDate();

  shifted.setUTCDate(1);
  shifted.setUTCMonth(shifted.getUTCMonth() - months);

  const lastDayOfMonth = new Date(
    Date.UTC(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, 0)
  ).getUTCDate();
  shifted.setUTCDate(Math.min(day, lastDayOfMonth));

  return shifted;
}

/**
 * Start boundary of a lookback period ending at `end`
 */
export function periodStart(end: Date, period: PeriodDefinition): Date {
  switch (period.unit) {
    case PERIOD_UNITS.DAY:
      return new Date(end.getTime() - period.count * DAY_MS);
    case PERIOD_UNITS.WEEK:
      return new Date(end.getTime() - period.count * 7 * DAY_MS);
    case PERIOD_UNITS.MONTH:
      return shiftMonthsBack(end, period.count);
    case PERIOD_UNITS.YEAR:
      return shiftMonthsBack(end, period.count * 12);
  }
}

export function daysToMs(days: number): number {
  return days * DAY_MS;
}

/**
 * Describe the first ordering violation in a series, or null when strictly increasing
 */
export function findOrderingViolation<T extends Timestamped>(points: readonly T[]): string | null {
  for (let i = 1; i < points.length; i++) {
    const previous = points[i - 1];
    const current = points[i];
    if (!previous || !current) continue;

    const delta = current.timestamp.getTime() - previous.timestamp.getTime();
    if (delta === 0) {
      return `duplicate timestamp ${current.timestamp.toISOString()}`;
    }
    if (delta < 0) {
      return `timestamp ${current.timestamp.toISOString()} precedes ${previous.timestamp.toISOString()}`;
    }
  }
  return null;
}
