/**
 * Paths and Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  displayPath,
  getClaudeProjectsDir,
  getCodexSessionsDir,
  getDefaultConfig,
  getGlobalConfigPath,
  readWorklogConfig,
} from '../paths.js';
import { parseArgs } from '../args.js';
import { createDebugLogger } from '../debug.js';

describe('displayPath', () => {
  it('abbreviates paths below home', () => {
    expect(displayPath('/home/u/proj', '/home/u')).toBe('~/proj');
    expect(displayPath('/home/u', '/home/u')).toBe('~');
  });

  it('leaves other paths alone', () => {
    expect(displayPath('/srv/app', '/home/u')).toBe('/srv/app');
    expect(displayPath('/home/user2/app', '/home/u')).toBe('/home/user2/app');
    expect(displayPath(null, '/home/u')).toBeNull();
  });
});

describe('environment overrides', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads log roots and the global dir from the environment', () => {
    vi.stubEnv('CODEX_HOME', '/opt/codex');
    vi.stubEnv('CLAUDE_CONFIG_DIR', '/opt/claude');
    vi.stubEnv('WORKLOG_HOME', '/opt/worklog');

    expect(getCodexSessionsDir()).toBe(join('/opt/codex', 'sessions'));
    expect(getClaudeProjectsDir()).toBe(join('/opt/claude', 'projects'));
    expect(getGlobalConfigPath()).toBe(join('/opt/worklog', 'config.json'));
  });
});

describe('readWorklogConfig', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `worklog-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
    configPath = join(testDir, 'config.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no config exists', async () => {
    const result = await readWorklogConfig(configPath);
    expect(result).toEqual({ ok: true, value: getDefaultConfig() });
  });

  it('overlays valid values and ignores the rest', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ context_rot_pct: 70, max_topics: 'lots', git_timeout_ms: -1, claude_projects_dir: '/data/claude' })
    );

    const result = await readWorklogConfig(configPath);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.context_rot_pct).toBe(70);
      expect(result.value.max_topics).toBe(10);
      expect(result.value.git_timeout_ms).toBe(10_000);
      expect(result.value.claude_projects_dir).toBe('/data/claude');
    }
  });

  it('rejects malformed JSON', async () => {
    await fs.writeFile(configPath, '{ "context_rot_pct": ');

    const result = await readWorklogConfig(configPath);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('parse_error');
      expect(result.error.path).toBe(configPath);
    }
  });

  it('rejects a non-object document', async () => {
    await fs.writeFile(configPath, '[1, 2, 3]');

    const result = await readWorklogConfig(configPath);

    expect(result).toEqual({
      ok: false,
      error: { type: 'parse_error', message: 'Config must be a JSON object', path: configPath },
    });
  });
});

describe('parseArgs', () => {
  it('separates values, flags and positionals', () => {
    const args = parseArgs(['abc', '--since', 'today', '--pretty', '--source=codex']);

    expect(args.positional).toEqual(['abc']);
    expect([...args.flags]).toEqual(['--pretty']);
    expect(args.values.get('--since')).toBe('today');
    expect(args.values.get('--source')).toBe('codex');
  });

  it('keeps a value containing spaces and equals signs', () => {
    const args = parseArgs(['--since=2024-01-10 09:15']);
    expect(args.values.get('--since')).toBe('2024-01-10 09:15');
  });

  it('ignores a value flag at the end of the line', () => {
    const args = parseArgs(['--days']);
    expect(args.values.has('--days')).toBe(false);
  });
});

describe('createDebugLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('stays silent unless enabled', () => {
    vi.stubEnv('WORKLOG_DEBUG', '');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    createDebugLogger('test')('hidden');

    expect(spy).not.toHaveBeenCalled();
  });

  it('writes scoped lines to stderr when enabled', () => {
    vi.stubEnv('WORKLOG_DEBUG', '1');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    createDebugLogger('test')('Located files', { count: 2, root: '/logs' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[DEBUG\] \[test\] Located files \(count=2, root=\/logs\)$/);
  });
});
