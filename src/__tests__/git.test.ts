/**
 * Commit Correlator Tests
 *
 * git itself is never run: every lookup goes through an in-process runner.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { getCommits, parseGitLog, type GitRunOptions } from '../git/commits.js';
import { Err, Ok } from '../types/index.js';

const SINCE = new Date('2024-01-15T09:00:00Z');
const UNTIL = new Date('2024-01-15T11:00:00Z');

describe('parseGitLog', () => {
  it('parses hash, subject and date', () => {
    const stdout = [
      '0123456789abcdef0123|Add retry policy|2024-01-15 10:00:00 +0100',
      'fedcba9876543210fedc|Fix login redirect|2024-01-15 10:30:00 +0100',
      '',
    ].join('\n');

    expect(parseGitLog(stdout)).toEqual([
      { hash: '01234567', message: 'Add retry policy', date: '2024-01-15 10:00:00 +0100' },
      { hash: 'fedcba98', message: 'Fix login redirect', date: '2024-01-15 10:30:00 +0100' },
    ]);
  });

  it('ignores lines without three fields', () => {
    expect(parseGitLog('warning: something\nabc|only two\n')).toEqual([]);
  });

  it('returns nothing for empty output', () => {
    expect(parseGitLog('')).toEqual([]);
  });
});

describe('getCommits', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `worklog-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('skips the lookup without a directory or time range', async () => {
    const runner = vi.fn(async (_args: readonly string[], _options: GitRunOptions) => Ok(''));

    expect(await getCommits(null, SINCE, UNTIL, { runner })).toEqual([]);
    expect(await getCommits(testDir, null, UNTIL, { runner })).toEqual([]);
    expect(await getCommits(testDir, SINCE, null, { runner })).toEqual([]);
    expect(runner).not.toHaveBeenCalled();
  });

  it('skips a directory that no longer exists', async () => {
    const runner = vi.fn(async (_args: readonly string[], _options: GitRunOptions) => Ok(''));

    expect(await getCommits(join(testDir, 'gone'), SINCE, UNTIL, { runner })).toEqual([]);
    expect(runner).not.toHaveBeenCalled();
  });

  it('runs git log on all refs in the session directory', async () => {
    const runner = vi.fn(async (_args: readonly string[], _options: GitRunOptions) =>
      Ok('0123456789abcdef|Add retry policy|2024-01-15 10:00:00 +0000\n')
    );

    const commits = await getCommits(testDir, SINCE, UNTIL, { runner, timeoutMs: 500 });

    expect(commits).toEqual([{ hash: '01234567', message: 'Add retry policy', date: '2024-01-15 10:00:00 +0000' }]);
    const [args, options] = runner.mock.calls[0] ?? [];
    expect(args?.[0]).toBe('log');
    expect(args).toContain('--format=%H|%s|%ai');
    expect(args).toContain('--all');
    expect(args?.find(a => a.startsWith('--since='))).toMatch(/^--since=\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(options).toEqual({ cwd: testDir, timeoutMs: 500 });
  });

  it('degrades to an empty list when git fails', async () => {
    const timeout = async () => Err({ type: 'timeout' as const, message: 'git killed by SIGTERM after 500ms' });
    const exit = async () => Err({ type: 'exit_status' as const, message: 'not a git repository', code: 128 });

    expect(await getCommits(testDir, SINCE, UNTIL, { runner: timeout })).toEqual([]);
    expect(await getCommits(testDir, SINCE, UNTIL, { runner: exit })).toEqual([]);
  });
});
