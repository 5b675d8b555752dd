/**
 * Global Paths and Configuration
 *
 * ARCHITECTURE: Centralized path management
 * Pattern: All paths computed from well-known locations, no hardcoded paths elsewhere
 *
 * Global structure (~/.worklog/):
 *   config.json          - Global configuration
 *
 * Log roots read by the extractors:
 *   ~/.codex/sessions/   - Codex rollout logs (CODEX_HOME override)
 *   ~/.claude/projects/  - Claude project logs (CLAUDE_CONFIG_DIR override)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { promises as fs } from 'node:fs';
import type { Result, StorageError, WorklogConfig } from './types/index.js';
import { Ok, Err, errorMessage } from './types/index.js';
import type { ContextThresholds } from './types/session.js';
import { asRecord } from './sources/record.js';

// ============================================================================
// Global Paths
// ============================================================================

const GLOBAL_DIR_NAME = '.worklog';
const CONFIG_FILE = 'config.json';

/**
 * Get the global worklog directory (~/.worklog/)
 */
export function getGlobalDir(): string {
  return process.env['WORKLOG_HOME'] ?? join(homedir(), GLOBAL_DIR_NAME);
}

/**
 * Get the global config file path (~/.worklog/config.json)
 */
export function getGlobalConfigPath(): string {
  return join(getGlobalDir(), CONFIG_FILE);
}

/**
 * Default Codex sessions directory ($CODEX_HOME/sessions)
 */
export function getCodexSessionsDir(): string {
  const codexHome = process.env['CODEX_HOME'] ?? join(homedir(), '.codex');
  return join(codexHome, 'sessions');
}

/**
 * Default Claude projects directory ($CLAUDE_CONFIG_DIR/projects)
 */
export function getClaudeProjectsDir(): string {
  const claudeHome = process.env['CLAUDE_CONFIG_DIR'] ?? join(homedir(), '.claude');
  return join(claudeHome, 'projects');
}

/**
 * Replace the home directory prefix with "~" for display
 */
export function displayPath(path: string | null | undefined, home: string = homedir()): string | null {
  if (!path) return null;
  if (!path.startsWith(home)) return path;

  const rest = path.slice(home.length);
  if (!rest) return '~';
  // "/home/user2" is not below "/home/u"
  return rest.startsWith('/') ? `~${rest}` : path;
}

// ============================================================================
// Global Configuration
// ============================================================================

export function getDefaultConfig(): WorklogConfig {
  return {
    codex_sessions_dir: getCodexSessionsDir(),
    claude_projects_dir: getClaudeProjectsDir(),
    context_rot_pct: 80,
    context_smash_pct: 99,
    claude_context_window: 200_000,
    max_topics: 10,
    topic_excerpt_length: 300,
    git_timeout_ms: 10_000,
  };
}

/**
 * Read global configuration, merged over defaults
 */
export async function readWorklogConfig(
  configPath: string = getGlobalConfigPath()
): Promise<Result<WorklogConfig, StorageError>> {
  const defaults = getDefaultConfig();

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return Ok(defaults);
    }
    return Err({
      type: 'read_error',
      message: `Failed to read config: ${errorMessage(error)}`,
      path: configPath,
    });
  }

  try {
    const parsed = asRecord(JSON.parse(content));
    if (!parsed) {
      return Err({ type: 'parse_error', message: 'Config must be a JSON object', path: configPath });
    }
    return Ok(mergeConfig(defaults, parsed));
  } catch (error) {
    return Err({
      type: 'parse_error',
      message: `Failed to parse config: ${errorMessage(error)}`,
      path: configPath,
    });
  }
}

/**
 * Overlay known keys of the right type; anything else keeps its default
 */
function mergeConfig(defaults: WorklogConfig, overrides: Readonly<Record<string, unknown>>): WorklogConfig {
  const str = (key: keyof WorklogConfig, fallback: string): string => {
    const value = overrides[key];
    return typeof value === 'string' && value.length > 0 ? value : fallback;
  };
  const num = (key: keyof WorklogConfig, fallback: number): number => {
    const value = overrides[key];
    return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
  };

  return {
    codex_sessions_dir: str('codex_sessions_dir', defaults.codex_sessions_dir),
    claude_projects_dir: str('claude_projects_dir', defaults.claude_projects_dir),
    context_rot_pct: num('context_rot_pct', defaults.context_rot_pct),
    context_smash_pct: num('context_smash_pct', defaults.context_smash_pct),
    claude_context_window: num('claude_context_window', defaults.claude_context_window),
    max_topics: num('max_topics', defaults.max_topics),
    topic_excerpt_length: num('topic_excerpt_length', defaults.topic_excerpt_length),
    git_timeout_ms: num('git_timeout_ms', defaults.git_timeout_ms),
  };
}

export function getThresholds(config: WorklogConfig): ContextThresholds {
  return { rot: config.context_rot_pct, smash: config.context_smash_pct };
}
