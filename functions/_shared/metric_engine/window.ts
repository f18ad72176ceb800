import { InvalidTimeContext } from './errors.ts';
import type { ContentItemTypeSelection, EligibleWindow, TimeBucket } from './types.ts';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Normalizes a timestamp to its UTC day (`YYYY-MM-DD`).
 */
export function toDay(value: string | Date): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidTimeContext(`Invalid date: ${String(value)}`);
  }
  // Days compare as strings, which only holds for four-digit years.
  const year = date.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new InvalidTimeContext(`Date outside the supported range: ${date.toISOString()}`);
  }
  return date.toISOString().slice(0, 10);
}

export function addDays(day: string, days: number): string {
  const date = new Date(`${toDay(day)}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return toDay(date);
}

function daysBetween(start: string, end: string): number {
  return Math.round((Date.parse(`${end}T00:00:00.000Z`) - Date.parse(`${start}T00:00:00.000Z`)) / MS_PER_DAY);
}

/**
 * Window in which a content item's buckets count: from the day it was created
 * up to, but excluding, `max_age` days later.
 */
export function eligibleWindow(createdAt: string | Date, maxAge: number): EligibleWindow {
  if (!Number.isInteger(maxAge) || maxAge < 0) {
    throw new InvalidTimeContext(`max_age must be a non-negative integer, got ${maxAge}`);
  }
  const start = toDay(createdAt);
  return { start, end: addDays(start, maxAge) };
}

/** Every day of the window, in order. */
export function windowDays(window: EligibleWindow): string[] {
  const days: string[] = [];
  for (let day = window.start; day < window.end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/**
 * Checks a caller-supplied comparison window against the eligible window it
 * is compared with: it must be non-empty and span the same number of days.
 */
export function assertComparableWindow(prior: EligibleWindow, window: EligibleWindow): void {
  if (prior.start >= prior.end) {
    throw new InvalidTimeContext(
      `prior_window must start before it ends, got ${prior.start} to ${prior.end}`,
      'prior_window'
    );
  }
  const expected = daysBetween(window.start, window.end);
  const actual = daysBetween(prior.start, prior.end);
  if (actual !== expected) {
    throw new InvalidTimeContext(
      `prior_window must span ${expected} days like the eligible window, got ${actual}`,
      'prior_window'
    );
  }
}

export function isWithinWindow(timestamp: string | Date, window: EligibleWindow): boolean {
  const day = toDay(timestamp);
  return day >= window.start && day < window.end;
}

/**
 * The equal-length window that ends where `window` starts.
 */
export function priorWindow(window: EligibleWindow): EligibleWindow {
  const length = daysBetween(window.start, window.end);
  return { start: addDays(window.start, -length), end: window.start };
}

export function matchesType(itemType: string, configured: ContentItemTypeSelection): boolean {
  if (configured === 'all') {
    return true;
  }
  return configured.some((type) => type === itemType);
}

export function filterBuckets(buckets: TimeBucket[], window: EligibleWindow): TimeBucket[] {
  return buckets.filter((bucket) => isWithinWindow(bucket.timestamp, window));
}
