/**
 * Disablement Evaluator
 *
 * Decides from the test name alone whether a test must not run, either
 * because it is explicitly disabled or because it carries a skip-until tag
 * whose date has not been reached yet.
 */

import type { TestName } from '../types/suites.js';
import { TAGS, hasTag } from './grammar.js';

const SKIPPED_UNTIL_PATTERN = /\[SkippedUntil:(\d{8}):blocker-bz\/([a-zA-Z0-9]+)\]/;

/**
 * Parsed `[SkippedUntil:MMDDYYYY:blocker-bz/ID]` tag.
 */
export interface SkipUntilTag {
  /** Midnight UTC of the tagged calendar date */
  date: Date;
  /** Tracking identifier of the blocking defect */
  blockerId: string;
}

/**
 * Parse an 8-digit `MMDDYYYY` string into midnight UTC of that day.
 *
 * Returns null for dates that do not exist on the calendar (month 13,
 * February 30th and so on).
 */
function parseMonthDayYear(digits: string): Date | null {
  const month = Number(digits.slice(0, 2));
  const day = Number(digits.slice(2, 4));
  const year = Number(digits.slice(4, 8));

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(0, 0, 0, 0);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Extract the skip-until tag from a test name.
 *
 * Malformed tags (wrong digit count, impossible date, missing or
 * non-alphanumeric blocker id) yield null, exactly as if no tag were
 * present.
 *
 * @example
 * ```typescript
 * parseSkipUntilTag('upgrade works [SkippedUntil:05092022:blocker-bz/123456]');
 * // => { date: 2022-05-09T00:00:00.000Z, blockerId: '123456' }
 * ```
 */
export function parseSkipUntilTag(name: TestName): SkipUntilTag | null {
  const match = SKIPPED_UNTIL_PATTERN.exec(name);
  if (!match) {
    return null;
  }

  const date = parseMonthDayYear(match[1]);
  if (!date) {
    return null;
  }

  return { date, blockerId: match[2] };
}

/**
 * True while the skip-until date of a test lies strictly after `at`.
 *
 * On the tagged instant itself the test runs again. When `at` is omitted
 * the clock is read once for this call; nothing is cached, so the answer
 * flips as soon as the date passes.
 */
export function shouldSkipUntil(name: TestName, at?: Date): boolean {
  const tag = parseSkipUntilTag(name);
  if (!tag) {
    return false;
  }

  const now = at ?? new Date();
  return tag.date.getTime() > now.getTime();
}

/**
 * True if the test must not be selected by any suite.
 */
export function isDisabled(name: TestName, at?: Date): boolean {
  if (hasTag(name, TAGS.DISABLED_PREFIX)) {
    return true;
  }

  return shouldSkipUntil(name, at);
}
