/**
 * JSON serialization of session summaries
 *
 * Datetimes are ISO-8601 with the local UTC offset.
 */

import { formatISO } from 'date-fns';
import type { WorklogError } from '../types/index.js';
import type { Commit, ContextSummary, SessionSummary, SourceName, TokenTotals } from '../types/session.js';

export interface SessionJson {
  readonly session_id: string;
  readonly source: SourceName;
  readonly filepath: string;
  readonly cwd: string | null;
  readonly title: string | null;
  readonly started: string | null;
  readonly ended: string | null;
  readonly turns: {
    readonly user: number;
    readonly assistant: number;
  };
  readonly topics: readonly string[];
  readonly compactions: readonly string[];
  readonly commands: readonly string[];
  readonly files_touched: readonly string[];
  readonly context: ContextSummary;
  readonly tokens: TokenTotals;
  readonly git_commits: readonly Commit[];
}

export interface ExtractionDocument {
  readonly extracted_at: string;
  readonly since: string | null;
  readonly sessions: readonly SessionJson[];
}

export function formatInstant(instant: Date | null): string | null {
  return instant ? formatISO(instant) : null;
}

export function toSessionJson(summary: SessionSummary): SessionJson {
  return {
    session_id: summary.session_id,
    source: summary.source,
    filepath: summary.source_path,
    cwd: summary.cwd,
    title: summary.title,
    started: formatInstant(summary.first_instant),
    ended: formatInstant(summary.last_instant),
    turns: {
      user: summary.user_messages,
      assistant: summary.assistant_messages,
    },
    topics: summary.topics,
    compactions: summary.compactions,
    commands: summary.commands,
    files_touched: summary.files_touched,
    context: summary.context,
    tokens: summary.tokens,
    git_commits: summary.git_commits,
  };
}

export function buildExtractionDocument(
  sessions: readonly SessionSummary[],
  since: Date | null,
  now: Date = new Date()
): ExtractionDocument {
  return {
    extracted_at: formatISO(now),
    since: formatInstant(since),
    sessions: sessions.map(toSessionJson),
  };
}

export function stringifyJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

/**
 * Error-shaped document for JSON mode
 */
export function formatErrorJson(error: WorklogError): { readonly error: { readonly type: string; readonly message: string } } {
  return { error: { type: error.type, message: error.message } };
}
