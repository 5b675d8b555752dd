/**
 * Markdown recap export
 *
 * ARCHITECTURE: Markdown file with YAML frontmatter
 * Pattern: Frontmatter carries the machine-readable window facts, body is the recap
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { formatISO } from 'date-fns';
import { stringify as stringifyYaml } from 'yaml';
import type { Result, StorageError } from '../types/index.js';
import { Ok, Err, errorMessage } from '../types/index.js';
import type { SessionSummary } from '../types/session.js';
import { renderRecap } from './recap.js';

export interface RecapFrontmatter {
  readonly generated_at: string;
  readonly since: string;
  readonly sessions: number;
  readonly projects: readonly string[];
}

export function buildFrontmatter(
  sessions: readonly SessionSummary[],
  since: Date,
  now: Date
): RecapFrontmatter {
  const projects = [...new Set(sessions.map(s => s.cwd).filter((cwd): cwd is string => cwd !== null))].sort();
  return {
    generated_at: formatISO(now),
    since: formatISO(since),
    sessions: sessions.length,
    projects,
  };
}

export function renderRecapMarkdown(
  sessions: readonly SessionSummary[],
  since: Date,
  now: Date = new Date()
): string {
  const frontmatter = stringifyYaml(buildFrontmatter(sessions, since, now));
  return `---\n${frontmatter}---\n\n${renderRecap(sessions, since, now)}\n`;
}

export async function writeRecapMarkdown(
  path: string,
  sessions: readonly SessionSummary[],
  since: Date,
  now: Date = new Date()
): Promise<Result<void, StorageError>> {
  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, renderRecapMarkdown(sessions, since, now), 'utf-8');
    return Ok(undefined);
  } catch (error) {
    return Err({
      type: 'write_error',
      message: `Failed to write recap: ${errorMessage(error)}`,
      path,
    });
  }
}
