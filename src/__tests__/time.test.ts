/**
 * Time Tests
 *
 * Record timestamp parsing and --since resolution against a fixed clock.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseTimestamp, resolveSince } from '../extract/time.js';

// Monday, local time
const NOW = new Date(2024, 0, 15, 14, 30);

describe('parseTimestamp', () => {
  it('parses UTC timestamps', () => {
    const date = parseTimestamp('2024-01-15T10:00:00Z');
    expect(date?.getTime()).toBe(Date.UTC(2024, 0, 15, 10, 0, 0));
  });

  it('parses fractional seconds with an offset', () => {
    const date = parseTimestamp('2024-01-15T10:00:00.123+02:00');
    expect(date?.getTime()).toBe(Date.UTC(2024, 0, 15, 8, 0, 0, 123));
  });

  it('returns null for malformed or missing values', () => {
    expect(parseTimestamp('not a time')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp(1705312800000)).toBeNull();
  });
});

describe('resolveSince', () => {
  it('defaults to yesterday at 08:00', () => {
    const result = resolveSince(undefined, NOW);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual(new Date(2024, 0, 14, 8, 0));
    }
  });

  it('treats "yesterday" like the default', () => {
    const result = resolveSince('yesterday', NOW);
    expect(result).toEqual({ ok: true, value: new Date(2024, 0, 14, 8, 0) });
  });

  it('resolves "today" to local midnight, case-insensitively', () => {
    const result = resolveSince('Today', NOW);
    expect(result).toEqual({ ok: true, value: new Date(2024, 0, 15, 0, 0) });
  });

  it('resolves "week" to seven days before now', () => {
    const result = resolveSince('week', NOW);
    expect(result).toEqual({ ok: true, value: new Date(2024, 0, 8, 14, 30) });
  });

  describe('across a DST change', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('resolves "week" to exactly 168 hours back', () => {
      vi.stubEnv('TZ', 'America/New_York');
      // Two days after clocks sprang forward on 2024-03-10
      const now = new Date('2024-03-12T16:00:00Z');

      const result = resolveSince('week', now);

      expect(result).toEqual({ ok: true, value: new Date(now.getTime() - 168 * 60 * 60 * 1000) });
    });
  });

  it('parses explicit dates', () => {
    expect(resolveSince('2024-01-10', NOW)).toEqual({ ok: true, value: new Date(2024, 0, 10) });
  });

  it('parses explicit date and time', () => {
    expect(resolveSince('2024-01-10 09:15', NOW)).toEqual({
      ok: true,
      value: new Date(2024, 0, 10, 9, 15),
    });
  });

  it('rejects unknown expressions', () => {
    const result = resolveSince('last tuesday', NOW);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('invalid_time_expression');
      expect(result.error.expression).toBe('last tuesday');
      expect(result.error.message).toMatch(/^Cannot parse date: last tuesday/);
    }
  });

  it('rejects impossible calendar dates', () => {
    const result = resolveSince('2024-13-45', NOW);
    expect(result.ok).toBe(false);
  });
});
