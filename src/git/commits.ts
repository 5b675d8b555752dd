/**
 * Commit Correlator
 *
 * ARCHITECTURE: git log over the session's time range, run in its working directory
 * Pattern: Every failure (missing dir, spawn error, timeout, non-zero exit)
 * degrades to an empty list - commits are context, never a reason to fail
 */

import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import { format } from 'date-fns';
import type { CommitLookupError, Result } from '../types/index.js';
import { Ok, Err } from '../types/index.js';
import type { Commit } from '../types/session.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('git');

export const DEFAULT_GIT_TIMEOUT_MS = 10_000;
const HASH_LENGTH = 8;
const GIT_DATE_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export interface GitRunOptions {
  readonly cwd: string;
  readonly timeoutMs: number;
}

/**
 * Runs git with the given arguments and resolves with its stdout
 */
export type GitRunner = (
  args: readonly string[],
  options: GitRunOptions
) => Promise<Result<string, CommitLookupError>>;

export interface CommitLookupOptions {
  readonly timeoutMs?: number;
  readonly runner?: GitRunner;
}

/**
 * Default runner: spawns the git binary
 */
export const spawnGit: GitRunner = (args, options) =>
  new Promise((resolve) => {
    const child = spawn('git', [...args], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs,
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code, signal) => {
      if (signal) {
        resolve(Err({ type: 'timeout', message: `git killed by ${signal} after ${options.timeoutMs}ms` }));
        return;
      }
      if (code !== 0) {
        resolve(Err({ type: 'exit_status', message: `git exited with code ${code}: ${stderr.trim()}`, code }));
        return;
      }
      resolve(Ok(stdout));
    });

    child.on('error', (error) => {
      resolve(Err({ type: 'spawn_failed', message: `Failed to spawn git: ${error.message}` }));
    });
  });

/**
 * Parse `git log --format=%H|%s|%ai` output
 *
 * Lines with fewer than three pipe-separated fields are ignored.
 */
export function parseGitLog(stdout: string): Commit[] {
  const commits: Commit[] = [];

  for (const line of stdout.trim().split('\n')) {
    if (!line) continue;

    const first = line.indexOf('|');
    const second = first === -1 ? -1 : line.indexOf('|', first + 1);
    if (second === -1) continue;

    commits.push({
      hash: line.slice(0, first).slice(0, HASH_LENGTH),
      message: line.slice(first + 1, second),
      date: line.slice(second + 1),
    });
  }

  return commits;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    const stat = await fs.stat(path);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * List commits on all refs between since and until (inclusive, local time)
 */
export async function getCommits(
  dir: string | null | undefined,
  since: Date | null,
  until: Date | null,
  options: CommitLookupOptions = {}
): Promise<readonly Commit[]> {
  if (!dir || !since || !until) return [];
  if (!(await isDirectory(dir))) {
    debugLog('Skipping commit lookup, directory missing', { dir });
    return [];
  }

  const runner = options.runner ?? spawnGit;
  const args = [
    'log',
    `--since=${format(since, GIT_DATE_FORMAT)}`,
    `--until=${format(until, GIT_DATE_FORMAT)}`,
    '--format=%H|%s|%ai',
    '--all',
  ];

  const result = await runner(args, {
    cwd: dir,
    timeoutMs: options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
  });

  if (!result.ok) {
    debugLog('Commit lookup failed', { dir, type: result.error.type, error: result.error.message });
    return [];
  }

  return parseGitLog(result.value);
}
