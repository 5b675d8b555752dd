/**
 * Record-Stream Aggregator
 *
 * ARCHITECTURE: Single forward pass over one session log, one JSON record per line
 * Pattern: SessionAccumulator owns all running state for exactly one file;
 * source adapters turn records into events, the accumulator folds the events.
 *
 * Window rule: with a cutoff, only records stamped at or after it count toward
 * turns, samples, current usage, commands and files. Timestamps, session metadata and
 * compactions are tracked for every record.
 */

import { createReadStream, promises as fs } from 'node:fs';
import { createInterface } from 'node:readline';
import { homedir } from 'node:os';
import type { Result, StorageError } from '../types/index.js';
import { Ok, Err, errorMessage } from '../types/index.js';
import type {
  Commit,
  ContextSample,
  ContextThresholds,
  LogRecord,
  SessionEvent,
  SessionSummary,
  UsageSnapshot,
} from '../types/session.js';
import type { LogSource } from '../sources/types.js';
import { fileStem } from '../sources/types.js';
import { parseRecordLine } from '../sources/record.js';
import { displayPath } from '../paths.js';
import { parseTimestamp } from './time.js';
import { isNoiseText } from './noise.js';
import { shorten, truncate } from './text.js';
import {
  DEFAULT_THRESHOLDS,
  createContextSample,
  summarizeContext,
  type UsageReading,
} from './context-usage.js';
import { getCommits } from '../git/commits.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('aggregator');

// ============================================================================
// Types
// ============================================================================

export type CommitResolver = (
  dir: string | null,
  since: Date | null,
  until: Date | null
) => Promise<readonly Commit[]>;

export interface AggregateOptions {
  /** Only activity at or after this instant counts; null summarizes everything */
  readonly cutoff?: Date | null;
  readonly thresholds?: ContextThresholds;
  /** Maximum number of user messages kept as topics (default: 10) */
  readonly maxTopics?: number;
  /** Maximum characters per topic excerpt (default: 300) */
  readonly topicExcerptLength?: number;
  /** Home directory replaced by "~" in displayed paths */
  readonly home?: string;
  readonly resolveCommits?: CommitResolver;
}

const DEFAULT_MAX_TOPICS = 10;
const DEFAULT_TOPIC_EXCERPT_LENGTH = 300;
const TITLE_LENGTH = 120;

const EMPTY_USAGE: UsageSnapshot = {
  input_tokens: 0,
  output_tokens: 0,
  cache_read_tokens: 0,
  cache_creation_tokens: 0,
};

function addUsage(a: UsageSnapshot, b: UsageSnapshot): UsageSnapshot {
  return {
    input_tokens: a.input_tokens + b.input_tokens,
    output_tokens: a.output_tokens + b.output_tokens,
    cache_read_tokens: a.cache_read_tokens + b.cache_read_tokens,
    cache_creation_tokens: a.cache_creation_tokens + b.cache_creation_tokens,
  };
}

/**
 * Title: first topic, else first command, else first touched file
 */
export function deriveTitle(
  topics: readonly string[],
  commands: readonly string[],
  sortedFiles: readonly string[]
): string | null {
  const [topic] = topics;
  if (topic) return shorten(topic, TITLE_LENGTH);

  const [command] = commands;
  if (command) return shorten(`cmd: ${command}`, TITLE_LENGTH);

  const [file] = sortedFiles;
  if (file) return shorten(`files: ${file}`, TITLE_LENGTH);

  return null;
}

// ============================================================================
// Accumulator
// ============================================================================

/**
 * Summary fields computed from the log alone, before commit lookup
 */
export interface AccumulatedSession {
  readonly summary: Omit<SessionSummary, 'git_commits'>;
  /** Working directory as recorded (not shortened), used for git */
  readonly rawCwd: string | null;
}

export class SessionAccumulator {
  private sessionId: string | null = null;
  private cwd: string | null = null;
  private firstInstant: Date | null = null;
  private lastInstant: Date | null = null;

  private userMessages = 0;
  private assistantMessages = 0;
  private readonly topics: string[] = [];
  private readonly compactions: string[] = [];
  private readonly commands: string[] = [];
  private readonly files = new Set<string>();

  private lastReading: UsageReading | null = null;
  private readonly samples: ContextSample[] = [];
  private summedUsage: UsageSnapshot = EMPTY_USAGE;
  private reportedTotals: UsageSnapshot | null = null;

  private readonly cutoff: Date | null;
  private readonly maxTopics: number;
  private readonly topicExcerptLength: number;

  constructor(
    private readonly source: LogSource,
    private readonly path: string,
    private readonly options: AggregateOptions = {}
  ) {
    this.cutoff = options.cutoff ?? null;
    this.maxTopics = options.maxTopics ?? DEFAULT_MAX_TOPICS;
    this.topicExcerptLength = options.topicExcerptLength ?? DEFAULT_TOPIC_EXCERPT_LENGTH;
  }

  /**
   * Fold one parsed line: track its timestamp, then apply its events
   */
  addRecord(record: LogRecord): void {
    const instant = parseTimestamp(record['timestamp']);
    this.observeInstant(instant);

    for (const event of this.source.decodeRecord(record)) {
      this.apply(event, instant);
    }
  }

  observeInstant(instant: Date | null): void {
    if (!instant) return;

    if (!this.firstInstant || instant < this.firstInstant) {
      this.firstInstant = instant;
    }
    if (!this.lastInstant || instant > this.lastInstant) {
      this.lastInstant = instant;
    }
  }

  private inWindow(instant: Date | null): boolean {
    if (!this.cutoff) return true;
    return instant !== null && instant >= this.cutoff;
  }

  apply(event: SessionEvent, instant: Date | null): void {
    const inWindow = this.inWindow(instant);

    switch (event.kind) {
      case 'meta':
        // First writer wins
        this.sessionId ??= event.sessionId ?? null;
        this.cwd ??= event.cwd ?? null;
        break;

      case 'user_message':
        if (!inWindow || isNoiseText(event.text)) break;
        this.userMessages++;
        if (this.topics.length < this.maxTopics) {
          this.topics.push(truncate(event.text, this.topicExcerptLength));
        }
        break;

      case 'assistant_message':
        if (!inWindow) break;
        if (event.text.trim() || event.usage) {
          this.assistantMessages++;
        }
        if (event.usage) {
          this.summedUsage = addUsage(this.summedUsage, event.usage);
        }
        break;

      case 'token_count': {
        if (!inWindow) break;
        if (instant) {
          // Current usage is the last sample inside the window
          const reading: UsageReading = { usage: event.usage, window: event.window };
          this.lastReading = reading;
          this.samples.push(createContextSample(instant, reading));
        }
        if (event.totals) {
          this.reportedTotals = event.totals;
        }
        break;
      }

      case 'compaction':
        this.compactions.push(event.text);
        break;

      case 'command':
        if (inWindow) this.commands.push(event.command);
        break;

      case 'files_touched':
        if (!inWindow) break;
        for (const path of event.paths) {
          this.files.add(path);
        }
        break;

      default: {
        const unreachable: never = event;
        debugLog('Ignoring unknown event', { event: unreachable });
      }
    }
  }

  /**
   * True when nothing inside the window was observed
   */
  isEmptyWindow(): boolean {
    return (
      this.userMessages === 0 &&
      this.assistantMessages === 0 &&
      this.commands.length === 0 &&
      this.files.size === 0
    );
  }

  finish(): AccumulatedSession | null {
    if (this.cutoff && this.isEmptyWindow()) {
      return null;
    }

    const home = this.options.home ?? homedir();
    const filesTouched = [...this.files].sort();
    const totals = this.reportedTotals ?? this.summedUsage;

    return {
      rawCwd: this.cwd,
      summary: {
        session_id: this.sessionId ?? fileStem(this.path),
        source: this.source.name,
        source_path: this.path,
        cwd: displayPath(this.cwd, home) ?? this.source.projectFromPath(this.path),
        title: deriveTitle(this.topics, this.commands, filesTouched),
        first_instant: this.firstInstant,
        last_instant: this.lastInstant,
        user_messages: this.userMessages,
        assistant_messages: this.assistantMessages,
        topics: [...this.topics],
        compactions: [...new Set(this.compactions)],
        commands: [...this.commands],
        files_touched: filesTouched,
        context: summarizeContext(this.lastReading, this.samples, this.options.thresholds ?? DEFAULT_THRESHOLDS),
        context_samples: [...this.samples],
        tokens: {
          input: totals.input_tokens,
          output: totals.output_tokens,
          cache_read: totals.cache_read_tokens,
          cache_creation: totals.cache_creation_tokens,
        },
      },
    };
  }
}

// ============================================================================
// File Aggregation
// ============================================================================

const defaultCommitResolver: CommitResolver = (dir, since, until) => getCommits(dir, since, until);

/**
 * Read one session log line by line and fold it into a summary
 *
 * Ok(null) means the session had no activity inside the cutoff window.
 */
export async function aggregateSession(
  path: string,
  source: LogSource,
  options: AggregateOptions = {}
): Promise<Result<SessionSummary | null, StorageError>> {
  try {
    const stat = await fs.stat(path);
    if (!stat.isFile()) {
      return Err({ type: 'read_error', message: 'Session log is not a file', path });
    }
  } catch (error) {
    return Err({
      type: 'read_error',
      message: `Failed to open session log: ${errorMessage(error)}`,
      path,
    });
  }

  const accumulator = new SessionAccumulator(source, path, options);
  const stream = createReadStream(path, { encoding: 'utf-8' });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  let skipped = 0;
  try {
    for await (const line of lines) {
      const record = parseRecordLine(line);
      if (!record) {
        if (line.trim()) skipped++;
        continue;
      }
      accumulator.addRecord(record);
    }
  } catch (error) {
    return Err({
      type: 'read_error',
      message: `Failed to read session log: ${errorMessage(error)}`,
      path,
    });
  } finally {
    lines.close();
    stream.destroy();
  }

  if (skipped > 0) {
    debugLog('Skipped malformed lines', { path, skipped });
  }

  const accumulated = accumulator.finish();
  if (!accumulated) {
    return Ok(null);
  }

  const { summary, rawCwd } = accumulated;
  const resolveCommits = options.resolveCommits ?? defaultCommitResolver;
  const commits = await resolveCommits(rawCwd, summary.first_instant, summary.last_instant);

  return Ok({ ...summary, git_commits: commits });
}
