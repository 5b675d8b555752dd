/**
 * Session Locator
 *
 * ARCHITECTURE: Directory walk below a source root, filtered by naming convention
 * Pattern: mtime is a cheap pre-filter only; the aggregator re-checks every
 * record timestamp, so a file admitted here may still produce no summary
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { subDays } from 'date-fns';
import type { LogSource } from '../sources/types.js';
import { errorMessage } from '../types/index.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('locator');

export interface FindOptions {
  /** Skip files last modified before this instant */
  readonly since?: Date | null;
  /** Session id filter (substring or exact, per source) */
  readonly session?: string | null;
}

export interface LocatedFile {
  readonly path: string;
  readonly mtime: Date;
}

async function walk(dir: string, out: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      debugLog('Cannot read directory', { dir, error: errorMessage(error) });
    }
    return;
  }

  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, out);
    } else if (entry.isFile()) {
      out.push(path);
    }
  }
}

async function statMtime(path: string): Promise<Date | null> {
  try {
    const stat = await fs.stat(path);
    return stat.mtime;
  } catch {
    return null;
  }
}

async function locate(source: LogSource, root: string, options: FindOptions): Promise<LocatedFile[]> {
  const candidates: string[] = [];
  await walk(root, candidates);

  const located: LocatedFile[] = [];
  for (const path of candidates) {
    if (!source.isSessionFile(path) || source.isAuxiliary(path)) continue;
    if (options.session && !source.matchesSession(path, options.session)) continue;

    const mtime = await statMtime(path);
    if (!mtime) continue;
    if (options.since && mtime < options.since) continue;

    located.push({ path, mtime });
  }

  debugLog('Located session files', { source: source.name, root, count: located.length });
  return located;
}

/**
 * Find session logs under root, sorted by path
 */
export async function findSessionFiles(
  source: LogSource,
  root: string,
  options: FindOptions = {}
): Promise<string[]> {
  const located = await locate(source, root, options);
  return located.map(f => f.path).sort();
}

/**
 * First session log matching an id, or null
 */
export async function findSessionFile(
  source: LogSource,
  root: string,
  sessionId: string
): Promise<string | null> {
  const [first] = await findSessionFiles(source, root, { session: sessionId });
  return first ?? null;
}

/**
 * Session logs modified within the last N days, newest first
 */
export async function listRecentSessionFiles(
  source: LogSource,
  root: string,
  days: number,
  now: Date = new Date()
): Promise<LocatedFile[]> {
  const located = await locate(source, root, { since: subDays(now, days) });
  return located.sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
}
