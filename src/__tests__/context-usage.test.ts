/**
 * Context Usage Tests
 */

import { describe, it, expect } from 'vitest';
import {
  contextPercentage,
  countThresholdCrossings,
  createContextSample,
  currentUsage,
  summarizeContext,
  usageTokens,
} from '../extract/context-usage.js';
import type { UsageSnapshot } from '../types/session.js';

function usage(input: number, cacheRead = 0, cacheCreation = 0): UsageSnapshot {
  return {
    input_tokens: input,
    output_tokens: 0,
    cache_read_tokens: cacheRead,
    cache_creation_tokens: cacheCreation,
  };
}

const samplesOf = (percentages: number[]) => percentages.map(percentage => ({ percentage }));

describe('usageTokens', () => {
  it('sums input, cache read and cache creation, but not output', () => {
    expect(usageTokens({ input_tokens: 100, output_tokens: 999, cache_read_tokens: 20, cache_creation_tokens: 3 })).toBe(123);
  });
});

describe('contextPercentage', () => {
  it('computes the share of the window', () => {
    expect(contextPercentage(50_000, 200_000)).toBe(25);
  });

  it('rounds to one decimal', () => {
    expect(contextPercentage(1, 3)).toBe(33.3);
  });

  it('is zero for a missing window', () => {
    expect(contextPercentage(1000, 0)).toBe(0);
  });
});

describe('countThresholdCrossings', () => {
  it('counts rising edges only', () => {
    expect(countThresholdCrossings(samplesOf([50, 85, 90, 70, 95]), 80)).toBe(2);
  });

  it('counts a first sample already above the threshold', () => {
    expect(countThresholdCrossings(samplesOf([99, 100, 98, 99]), 99)).toBe(2);
  });

  it('treats the threshold itself as reached', () => {
    expect(countThresholdCrossings(samplesOf([79.9, 80]), 80)).toBe(1);
  });

  it('is zero for an empty series', () => {
    expect(countThresholdCrossings([], 80)).toBe(0);
  });
});

describe('currentUsage', () => {
  it('is empty without a reading', () => {
    expect(currentUsage(null)).toEqual({ tokens: 0, percentage: 0, window: 0 });
  });

  it('derives tokens and percentage from the last reading', () => {
    expect(currentUsage({ usage: usage(40_000, 10_000), window: 200_000 })).toEqual({
      tokens: 50_000,
      percentage: 25,
      window: 200_000,
    });
  });
});

describe('summarizeContext', () => {
  it('combines last reading with the sample series', () => {
    const instant = new Date('2024-01-15T10:00:00Z');
    const samples = [
      createContextSample(instant, { usage: usage(170_000), window: 200_000 }),
      createContextSample(instant, { usage: usage(199_000), window: 200_000 }),
      createContextSample(instant, { usage: usage(60_000), window: 200_000 }),
    ];

    const summary = summarizeContext({ usage: usage(60_000), window: 200_000 }, samples);

    expect(summary).toEqual({
      pct: 30,
      tokens: 60_000,
      window: 200_000,
      max_pct: 99.5,
      rot_hits: 1,
      smash_hits: 1,
    });
  });

  it('honors custom thresholds', () => {
    const instant = new Date('2024-01-15T10:00:00Z');
    const samples = [createContextSample(instant, { usage: usage(120_000), window: 200_000 })];

    const summary = summarizeContext(null, samples, { rot: 50, smash: 60 });

    expect(summary.rot_hits).toBe(1);
    expect(summary.smash_hits).toBe(1);
    expect(summary.pct).toBe(0);
  });
});
