/**
 * Timestamp parsing and --since resolution
 *
 * ARCHITECTURE: Pure functions, the clock is injected for testability
 * Pattern: Unparseable record timestamps are null, never "now" or epoch
 */

import {
  isValid,
  parse,
  parseISO,
  setHours,
  startOfDay,
  subDays,
  subHours,
} from 'date-fns';
import type { Result, TimeExpressionError } from '../types/index.js';
import { Ok, Err } from '../types/index.js';

/** Hour of day (local) used by the default "yesterday" window */
const WORKDAY_START_HOUR = 8;

/** "week" is a fixed span, not seven calendar days across a DST change */
const HOURS_PER_WEEK = 7 * 24;

const EXPLICIT_FORMATS = ['yyyy-MM-dd HH:mm', 'yyyy-MM-dd'] as const;
const EXPLICIT_PATTERNS = [/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/, /^\d{4}-\d{2}-\d{2}$/] as const;

/**
 * Parse a record timestamp into an instant
 *
 * Accepts ISO-8601 with optional fraction and zone ("Z" or offset).
 * Returns null for absent or malformed input.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' || value.trim() === '') return null;

  const date = parseISO(value.trim());
  return isValid(date) ? date : null;
}

/**
 * Resolve a --since expression into a cutoff instant
 *
 * - absent / "yesterday": yesterday at 08:00 local time
 * - "today": local midnight
 * - "week": now minus 168 hours
 * - "YYYY-MM-DD HH:MM" / "YYYY-MM-DD": local time
 */
export function resolveSince(
  expression: string | null | undefined,
  now: Date = new Date()
): Result<Date, TimeExpressionError> {
  const value = (expression ?? '').trim().toLowerCase();

  if (value === '' || value === 'yesterday') {
    return Ok(setHours(startOfDay(subDays(now, 1)), WORKDAY_START_HOUR));
  }
  if (value === 'today') {
    return Ok(startOfDay(now));
  }
  if (value === 'week') {
    return Ok(subHours(now, HOURS_PER_WEEK));
  }

  for (let i = 0; i < EXPLICIT_FORMATS.length; i++) {
    const pattern = EXPLICIT_PATTERNS[i];
    const format = EXPLICIT_FORMATS[i];
    if (!pattern || !format || !pattern.test(value)) continue;

    // Reference date only fills fields the format lacks (seconds, ms)
    const parsed = parse(value, format, startOfDay(now));
    if (isValid(parsed)) {
      return Ok(parsed);
    }
  }

  return Err({
    type: 'invalid_time_expression',
    message: `Cannot parse date: ${expression ?? ''} (use "yesterday", "today", "week", "YYYY-MM-DD" or "YYYY-MM-DD HH:MM")`,
    expression: expression ?? '',
  });
}
