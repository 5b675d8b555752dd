/**
 * Session Types for log extraction
 *
 * ARCHITECTURE: Raw log records are decoded into a closed set of normalized events
 * Pattern: Source adapters map records -> SessionEvent, the aggregator only sees events
 *
 * Event kinds:
 * - meta: canonical session id / working directory
 * - user_message / assistant_message: conversation turns
 * - compaction: automatic summary of earlier history
 * - token_count: context telemetry carrying its own window size
 * - command / files_touched: tool activity
 */

// ============================================================================
// Raw Records
// ============================================================================

/**
 * One parsed JSON line. Shape depends on the log convention,
 * so every field is probed through the helpers in sources/record.ts.
 */
export type LogRecord = Readonly<Record<string, unknown>>;

// ============================================================================
// Normalized Events
// ============================================================================

/**
 * Token counters in a convention-neutral shape
 */
export interface UsageSnapshot {
  readonly input_tokens: number;
  readonly output_tokens: number;
  readonly cache_read_tokens: number;
  readonly cache_creation_tokens: number;
}

export type SessionEvent =
  | { readonly kind: 'meta'; readonly sessionId?: string; readonly cwd?: string }
  | { readonly kind: 'user_message'; readonly text: string }
  | { readonly kind: 'assistant_message'; readonly text: string; readonly usage?: UsageSnapshot }
  | { readonly kind: 'compaction'; readonly text: string }
  | {
      readonly kind: 'token_count';
      readonly usage: UsageSnapshot;
      readonly window: number;
      /** Cumulative session totals, when the telemetry reports them */
      readonly totals?: UsageSnapshot;
    }
  | { readonly kind: 'command'; readonly command: string }
  | { readonly kind: 'files_touched'; readonly paths: readonly string[] };

// ============================================================================
// Context Usage
// ============================================================================

/**
 * One point of the context-usage time series
 *
 * percentage = round(tokens / window * 100, 1)
 */
export interface ContextSample {
  readonly instant: Date;
  readonly percentage: number;
  readonly tokens: number;
  readonly window: number;
}

export interface ContextThresholds {
  /** Context rot alarm level in percent (default: 80) */
  readonly rot: number;
  /** Context smash alarm level in percent (default: 99) */
  readonly smash: number;
}

export interface ContextSummary {
  readonly pct: number;
  readonly tokens: number;
  readonly window: number;
  readonly max_pct: number;
  readonly rot_hits: number;
  readonly smash_hits: number;
}

export interface TokenTotals {
  readonly input: number;
  readonly output: number;
  readonly cache_read: number;
  readonly cache_creation: number;
}

// ============================================================================
// Commits
// ============================================================================

export interface Commit {
  /** First 8 characters of the commit hash */
  readonly hash: string;
  /** Subject line */
  readonly message: string;
  /** Author date as printed by git */
  readonly date: string;
}

// ============================================================================
// Session Summary
// ============================================================================

export type SourceName = 'codex' | 'claude';

export interface SessionSummary {
  readonly session_id: string;
  readonly source: SourceName;
  readonly source_path: string;
  readonly cwd: string | null;
  readonly title: string | null;
  readonly first_instant: Date | null;
  readonly last_instant: Date | null;
  readonly user_messages: number;
  readonly assistant_messages: number;
  readonly topics: readonly string[];
  readonly compactions: readonly string[];
  readonly commands: readonly string[];
  readonly files_touched: readonly string[];
  readonly context: ContextSummary;
  readonly context_samples: readonly ContextSample[];
  readonly tokens: TokenTotals;
  readonly git_commits: readonly Commit[];
}

/**
 * Quick per-file statistics for the listing mode
 */
export interface SessionStats {
  readonly summary: SessionSummary;
  readonly file_size: number;
  readonly mtime: Date;
}
