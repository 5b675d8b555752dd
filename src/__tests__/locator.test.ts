/**
 * Locator Tests
 *
 * Directory walks over temporary log trees.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { findSessionFile, findSessionFiles, listRecentSessionFiles } from '../extract/locator.js';
import { codexSource } from '../sources/codex.js';
import { createClaudeSource } from '../sources/claude.js';

const claudeSource = createClaudeSource({ contextWindow: 200_000, home: '/home/u' });

describe('locator', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `worklog-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function touch(relative: string, mtime?: Date): Promise<string> {
    const path = join(testDir, relative);
    await fs.mkdir(join(path, '..'), { recursive: true });
    await fs.writeFile(path, '{}\n', 'utf-8');
    if (mtime) {
      await fs.utimes(path, mtime, mtime);
    }
    return path;
  }

  describe('findSessionFiles', () => {
    it('skips sub-agent logs and non-log files', async () => {
      const main = await touch('-home-u-proj/aaa.jsonl');
      await touch('-home-u-proj/agent-123.jsonl');
      await touch('-home-u-proj/aaa/subagents/sub-1.jsonl');
      await touch('-home-u-proj/notes.txt');

      const files = await findSessionFiles(claudeSource, testDir);

      expect(files).toEqual([main]);
    });

    it('only accepts rollout files for codex', async () => {
      const rollout = await touch('2024/01/15/rollout-2024-01-15T10-00-00-abc123.jsonl');
      await touch('history.jsonl');

      const files = await findSessionFiles(codexSource, testDir);

      expect(files).toEqual([rollout]);
    });

    it('drops files last modified before the cutoff', async () => {
      const fresh = await touch('-srv-app/new.jsonl', new Date('2024-06-01T00:00:00Z'));
      await touch('-srv-app/old.jsonl', new Date('2020-01-01T00:00:00Z'));

      const files = await findSessionFiles(claudeSource, testDir, { since: new Date('2024-01-01T00:00:00Z') });

      expect(files).toEqual([fresh]);
    });

    it('returns files sorted by path', async () => {
      const b = await touch('-srv-app/bbb.jsonl');
      const a = await touch('-srv-app/aaa.jsonl');

      expect(await findSessionFiles(claudeSource, testDir)).toEqual([a, b]);
    });

    it('returns nothing for a missing root', async () => {
      expect(await findSessionFiles(codexSource, join(testDir, 'missing'))).toEqual([]);
    });
  });

  describe('findSessionFile', () => {
    it('matches codex ids by substring', async () => {
      const rollout = await touch('2024/01/15/rollout-2024-01-15T10-00-00-abc123.jsonl');

      expect(await findSessionFile(codexSource, testDir, 'abc1')).toBe(rollout);
      expect(await findSessionFile(codexSource, testDir, 'zzz')).toBeNull();
    });

    it('matches claude ids exactly', async () => {
      const session = await touch('-srv-app/aaa.jsonl');

      expect(await findSessionFile(claudeSource, testDir, 'aaa')).toBe(session);
      expect(await findSessionFile(claudeSource, testDir, 'aa')).toBeNull();
    });
  });

  describe('listRecentSessionFiles', () => {
    it('lists files within the window, newest first', async () => {
      const now = new Date('2024-06-10T12:00:00Z');
      const dayOld = await touch('-srv-app/a.jsonl', new Date('2024-06-09T12:00:00Z'));
      const hoursOld = await touch('-srv-app/b.jsonl', new Date('2024-06-10T09:00:00Z'));
      await touch('-srv-app/c.jsonl', new Date('2024-05-31T12:00:00Z'));

      const files = await listRecentSessionFiles(claudeSource, testDir, 7, now);

      expect(files.map(f => f.path)).toEqual([hoursOld, dayOld]);
    });
  });
});
