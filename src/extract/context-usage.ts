/**
 * Context-Usage Tracker
 *
 * ARCHITECTURE: Pure derivations over usage snapshots and samples
 * Pattern: tokens = input + cache read + cache creation, pct rounded to one decimal
 *
 * Threshold hits are rising edges: a sample at or above the threshold counts
 * only when the previous sample was below it.
 */

import type {
  ContextSample,
  ContextSummary,
  ContextThresholds,
  UsageSnapshot,
} from '../types/session.js';

export const DEFAULT_THRESHOLDS: ContextThresholds = {
  rot: 80,
  smash: 99,
};

export interface CurrentUsage {
  readonly tokens: number;
  readonly percentage: number;
  readonly window: number;
}

/**
 * A usage snapshot together with the window it should be measured against
 */
export interface UsageReading {
  readonly usage: UsageSnapshot;
  readonly window: number;
}

/**
 * Tokens occupying the context window for one request
 */
export function usageTokens(usage: UsageSnapshot): number {
  return usage.input_tokens + usage.cache_read_tokens + usage.cache_creation_tokens;
}

export function contextPercentage(tokens: number, window: number): number {
  if (window <= 0) return 0;
  return Math.round((tokens / window) * 1000) / 10;
}

export function createContextSample(instant: Date, reading: UsageReading): ContextSample {
  const tokens = usageTokens(reading.usage);
  return {
    instant,
    tokens,
    window: reading.window,
    percentage: contextPercentage(tokens, reading.window),
  };
}

export function currentUsage(last: UsageReading | null): CurrentUsage {
  if (!last) {
    return { tokens: 0, percentage: 0, window: 0 };
  }
  const tokens = usageTokens(last.usage);
  return {
    tokens,
    window: last.window,
    percentage: contextPercentage(tokens, last.window),
  };
}

export function countThresholdCrossings(
  samples: readonly Pick<ContextSample, 'percentage'>[],
  threshold: number
): number {
  let hits = 0;
  let above = false;

  for (const sample of samples) {
    const now = sample.percentage >= threshold;
    if (now && !above) {
      hits++;
    }
    above = now;
  }

  return hits;
}

export function maxPercentage(samples: readonly ContextSample[]): number {
  return samples.reduce((max, s) => Math.max(max, s.percentage), 0);
}

export function summarizeContext(
  last: UsageReading | null,
  samples: readonly ContextSample[],
  thresholds: ContextThresholds = DEFAULT_THRESHOLDS
): ContextSummary {
  const current = currentUsage(last);
  return {
    pct: current.percentage,
    tokens: current.tokens,
    window: current.window,
    max_pct: maxPercentage(samples),
    rot_hits: countThresholdCrossings(samples, thresholds.rot),
    smash_hits: countThresholdCrossings(samples, thresholds.smash),
  };
}
