/**
 * Log source registry
 */

import type { WorklogConfig } from '../types/index.js';
import type { SourceName } from '../types/session.js';
import type { LogSource } from './types.js';
import { codexSource } from './codex.js';
import { createClaudeSource } from './claude.js';

export type SourceSelection = SourceName | 'all';

export const SOURCE_NAMES: readonly SourceName[] = ['codex', 'claude'];

export function isSourceSelection(value: string): value is SourceSelection {
  return value === 'all' || SOURCE_NAMES.some(name => name === value);
}

export function getSource(name: SourceName, config: WorklogConfig): LogSource {
  switch (name) {
    case 'codex':
      return codexSource;
    case 'claude':
      return createClaudeSource({ contextWindow: config.claude_context_window });
  }
}

export function getSources(selection: SourceSelection, config: WorklogConfig): readonly LogSource[] {
  const names = selection === 'all' ? SOURCE_NAMES : [selection];
  return names.map(name => getSource(name, config));
}

export type { LogSource } from './types.js';
