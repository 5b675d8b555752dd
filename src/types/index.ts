/**
 * Core type definitions for the Worklog system
 *
 * ARCHITECTURE: All types use Result pattern for error handling
 * Pattern: Operations return Result<T, E> instead of throwing
 */

// ============================================================================
// Result Type - Explicit error handling
// ============================================================================

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const Ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const Err = <E>(error: E): Err<E> => ({ ok: false, error });

// ============================================================================
// Configuration Types
// ============================================================================

export interface WorklogConfig {
  readonly codex_sessions_dir: string;
  readonly claude_projects_dir: string;
  readonly context_rot_pct: number;
  readonly context_smash_pct: number;
  readonly claude_context_window: number;
  readonly max_topics: number;
  readonly topic_excerpt_length: number;
  readonly git_timeout_ms: number;
}

// ============================================================================
// Error Types
// ============================================================================

export type TimeExpressionError = {
  readonly type: 'invalid_time_expression';
  readonly message: string;
  readonly expression: string;
};

export type StorageError =
  | { readonly type: 'read_error'; readonly message: string; readonly path: string }
  | { readonly type: 'write_error'; readonly message: string; readonly path: string }
  | { readonly type: 'parse_error'; readonly message: string; readonly path: string };

export type CommitLookupError =
  | { readonly type: 'spawn_failed'; readonly message: string }
  | { readonly type: 'timeout'; readonly message: string }
  | { readonly type: 'exit_status'; readonly message: string; readonly code: number | null };

export type LookupError = {
  readonly type: 'session_not_found';
  readonly message: string;
  readonly session: string;
};

export type WorklogError = TimeExpressionError | StorageError | LookupError;

/**
 * Error message helper shared by every catch block
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
