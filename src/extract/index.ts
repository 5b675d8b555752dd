/**
 * Session Extraction
 *
 * ARCHITECTURE: Locator -> Aggregator -> Commit Correlator, per source
 * Pattern: Files are independent; one unreadable log is logged and skipped
 */

import { promises as fs } from 'node:fs';
import type { LookupError, Result, WorklogConfig } from '../types/index.js';
import { Ok, Err, errorMessage } from '../types/index.js';
import type { SessionStats, SessionSummary } from '../types/session.js';
import type { LogSource } from '../sources/types.js';
import { getThresholds } from '../paths.js';
import { getCommits, type GitRunner } from '../git/commits.js';
import { aggregateSession, type AggregateOptions } from './aggregator.js';
import { findSessionFile, findSessionFiles, listRecentSessionFiles } from './locator.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('extract');

export interface ExtractOptions {
  readonly sources: readonly LogSource[];
  readonly config: WorklogConfig;
  /** Cutoff for both the mtime pre-filter and the record window */
  readonly since?: Date | null;
  readonly session?: string | null;
  /** Root override per source (tests, alternate installs) */
  readonly roots?: Partial<Record<LogSource['name'], string>>;
  readonly gitRunner?: GitRunner;
}

export function rootFor(source: LogSource, options: Pick<ExtractOptions, 'config' | 'roots'>): string {
  return options.roots?.[source.name] ?? source.defaultRoot(options.config);
}

export function aggregateOptions(
  config: WorklogConfig,
  cutoff: Date | null,
  gitRunner?: GitRunner
): AggregateOptions {
  return {
    cutoff,
    thresholds: getThresholds(config),
    maxTopics: config.max_topics,
    topicExcerptLength: config.topic_excerpt_length,
    resolveCommits: (dir, since, until) =>
      getCommits(dir, since, until, {
        timeoutMs: config.git_timeout_ms,
        ...(gitRunner ? { runner: gitRunner } : {}),
      }),
  };
}

/**
 * Undated sessions first, then by first instant
 */
type StartKey = Pick<SessionSummary, 'first_instant' | 'source_path'>;

export function compareByStart(a: StartKey, b: StartKey): number {
  const aTime = a.first_instant?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bTime = b.first_instant?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (aTime === bTime) return a.source_path.localeCompare(b.source_path);
  return aTime < bTime ? -1 : 1;
}

/**
 * Extract summaries for every session active since the cutoff
 */
export async function extractSessions(options: ExtractOptions): Promise<SessionSummary[]> {
  const since = options.since ?? null;
  const summaries: SessionSummary[] = [];

  for (const source of options.sources) {
    const root = rootFor(source, options);
    const files = await findSessionFiles(source, root, { since, session: options.session ?? null });
    const aggregate = aggregateOptions(options.config, since, options.gitRunner);

    for (const path of files) {
      const result = await aggregateSession(path, source, aggregate);
      if (!result.ok) {
        debugLog('Skipping unreadable session', { path, error: result.error.message });
        continue;
      }
      if (result.value) {
        summaries.push(result.value);
      }
    }
  }

  return summaries.sort(compareByStart);
}

// ============================================================================
// Quick Stats
// ============================================================================

const noCommits = async (): Promise<readonly never[]> => [];

/**
 * Whole-file statistics (no cutoff) plus file size and mtime; git is not consulted
 */
export async function getSessionStats(
  path: string,
  source: LogSource,
  config: WorklogConfig
): Promise<Result<SessionStats, LookupError>> {
  let size: number;
  let mtime: Date;
  try {
    const stat = await fs.stat(path);
    size = stat.size;
    mtime = stat.mtime;
  } catch (error) {
    return Err({ type: 'session_not_found', message: `Cannot stat ${path}: ${errorMessage(error)}`, session: path });
  }

  const result = await aggregateSession(path, source, {
    ...aggregateOptions(config, null),
    resolveCommits: noCommits,
  });
  if (!result.ok || !result.value) {
    return Err({
      type: 'session_not_found',
      message: result.ok ? `No data in ${path}` : result.error.message,
      session: path,
    });
  }

  return Ok({ summary: result.value, file_size: size, mtime });
}

export interface LocatedSession {
  readonly path: string;
  readonly source: LogSource;
}

/**
 * Locate a session log by id across sources
 */
export async function locateSession(
  sessionId: string,
  options: Pick<ExtractOptions, 'sources' | 'config' | 'roots'>
): Promise<Result<LocatedSession, LookupError>> {
  for (const source of options.sources) {
    const path = await findSessionFile(source, rootFor(source, options), sessionId);
    if (path) {
      return Ok({ path, source });
    }
  }

  return Err({
    type: 'session_not_found',
    message: `Session ${sessionId} not found`,
    session: sessionId,
  });
}

/**
 * Stats for sessions modified in the last N days, newest first
 */
export async function listRecentSessions(
  days: number,
  options: Pick<ExtractOptions, 'sources' | 'config' | 'roots'>,
  now: Date = new Date()
): Promise<SessionStats[]> {
  const stats: SessionStats[] = [];

  for (const source of options.sources) {
    const files = await listRecentSessionFiles(source, rootFor(source, options), days, now);
    for (const file of files) {
      const result = await getSessionStats(file.path, source, options.config);
      if (result.ok) {
        stats.push(result.value);
      } else {
        debugLog('Skipping session in listing', { path: file.path, error: result.error.message });
      }
    }
  }

  return stats.sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
}
