/**
 * Log source adapter contract
 *
 * ARCHITECTURE: One adapter per assistant log convention
 * Pattern: Conventions differ in layout, file naming and record shapes;
 * the locator, aggregator and renderers are written once against this interface.
 */

import { basename } from 'node:path';
import type { WorklogConfig } from '../types/index.js';
import type { LogRecord, SessionEvent, SourceName } from '../types/session.js';

export interface LogSource {
  readonly name: SourceName;

  /** Root directory holding this convention's logs */
  defaultRoot(config: WorklogConfig): string;

  /** True for primary session logs (name and extension match) */
  isSessionFile(path: string): boolean;

  /** True for sub-agent / auxiliary logs, which are never summarized */
  isAuxiliary(path: string): boolean;

  /** Session id filter: substring or exact match depending on convention */
  matchesSession(path: string, filter: string): boolean;

  /** Map one raw record to normalized events; unknown records yield [] */
  decodeRecord(record: LogRecord): readonly SessionEvent[];

  /** Working directory recoverable from the file location alone */
  projectFromPath(path: string): string | null;
}

/**
 * File name without directory and .jsonl extension
 */
export function fileStem(path: string): string {
  return basename(path, '.jsonl');
}
