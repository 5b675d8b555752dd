/**
 * Worklog - summaries of AI coding assistant sessions
 *
 * Main exports for programmatic usage
 */

// Types
export type {
  Result,
  WorklogConfig,
  WorklogError,
  TimeExpressionError,
  StorageError,
  CommitLookupError,
  LookupError,
} from './types/index.js';

export type {
  LogRecord,
  UsageSnapshot,
  SessionEvent,
  ContextSample,
  ContextThresholds,
  ContextSummary,
  TokenTotals,
  Commit,
  SourceName,
  SessionSummary,
  SessionStats,
} from './types/session.js';

// Result type constructors
export { Ok, Err, errorMessage } from './types/index.js';

// Paths and configuration
export {
  getGlobalDir,
  getGlobalConfigPath,
  getCodexSessionsDir,
  getClaudeProjectsDir,
  getDefaultConfig,
  readWorklogConfig,
  getThresholds,
  displayPath,
} from './paths.js';

// Sources
export { getSource, getSources, isSourceSelection, SOURCE_NAMES, type SourceSelection, type LogSource } from './sources/index.js';
export { codexSource, parsePatchFiles, parseExecCommand } from './sources/codex.js';
export { createClaudeSource, decodeProjectDir, type ClaudeSourceOptions } from './sources/claude.js';

// Extraction
export { parseTimestamp, resolveSince } from './extract/time.js';
export { isNoiseText } from './extract/noise.js';
export {
  DEFAULT_THRESHOLDS,
  contextPercentage,
  countThresholdCrossings,
  summarizeContext,
} from './extract/context-usage.js';
export { SessionAccumulator, aggregateSession, type AggregateOptions } from './extract/aggregator.js';
export { findSessionFiles, findSessionFile, listRecentSessionFiles } from './extract/locator.js';
export {
  extractSessions,
  getSessionStats,
  locateSession,
  listRecentSessions,
  type ExtractOptions,
} from './extract/index.js';

// Git
export { getCommits, parseGitLog, type GitRunner } from './git/commits.js';

// Reports
export { buildExtractionDocument, toSessionJson, type SessionJson, type ExtractionDocument } from './report/json.js';
export { renderRecap, renderSession, summarizeWindow } from './report/recap.js';
export { renderRecapMarkdown, writeRecapMarkdown } from './report/markdown.js';
export { formatStatsRow, formatStatsDetail } from './report/stats.js';
