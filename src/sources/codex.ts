/**
 * Codex log source
 *
 * Layout:  $CODEX_HOME/sessions/YYYY/MM/DD/rollout-<timestamp>-<uuid>.jsonl
 * Records: { timestamp, type, payload }
 *
 *   session_meta   payload.id / payload.cwd
 *   response_item  payload.type = message | function_call | custom_tool_call
 *   event_msg      payload.type = token_count (context telemetry)
 *   compacted      payload.message (history compaction)
 */

import { basename } from 'node:path';
import type { WorklogConfig } from '../types/index.js';
import type { LogRecord, SessionEvent, UsageSnapshot } from '../types/session.js';
import type { LogSource } from './types.js';
import { fileStem } from './types.js';
import {
  asRecord,
  extractBlockText,
  getArray,
  getNumber,
  getRecord,
  getString,
  readUsage,
} from './record.js';

const ROLLOUT_PREFIX = 'rollout-';
const TEXT_BLOCK_TYPES = ['input_text', 'output_text', 'text'] as const;
const EXEC_TOOL_NAMES = ['exec_command', 'shell', 'local_shell'] as const;

const PATCH_FILE_MARKERS = [
  '*** Add File: ',
  '*** Update File: ',
  '*** Delete File: ',
  '*** Move to: ',
] as const;

const CODEX_USAGE_KEYS = {
  input: 'input_tokens',
  output: 'output_tokens',
  cacheRead: 'cached_input_tokens',
} as const;

/**
 * Extract touched paths from an apply_patch body, one per file marker line
 */
export function parsePatchFiles(patchText: string): string[] {
  const files: string[] = [];

  for (const line of patchText.split('\n')) {
    const marker = PATCH_FILE_MARKERS.find(m => line.startsWith(m));
    if (!marker) continue;

    const path = line.slice(marker.length).trim();
    if (path) files.push(path);
  }

  return files;
}

/**
 * Command string from exec-style function call arguments
 *
 * Arguments arrive JSON-encoded: { cmd: "..." } or { command: ["bash", "-lc", "..."] }
 */
export function parseExecCommand(rawArguments: string | undefined): string | undefined {
  if (!rawArguments) return undefined;

  let args: LogRecord | undefined;
  try {
    args = asRecord(JSON.parse(rawArguments));
  } catch {
    return undefined;
  }

  const cmd = getString(args, 'cmd') ?? getString(args, 'command');
  if (cmd) return cmd;

  const argv = getArray(args, 'command').filter((part): part is string => typeof part === 'string');
  if (argv.length === 0) return undefined;

  // Shell wrapper: ["bash", "-lc", "<script>"]
  const script = argv[2];
  if (argv.length === 3 && argv[1] === '-lc' && script) {
    return script;
  }
  return argv.join(' ');
}

function decodeTokenCount(payload: LogRecord | undefined): SessionEvent[] {
  const info = getRecord(payload, 'info');
  const window = getNumber(info, 'model_context_window');
  const last = getRecord(info, 'last_token_usage');
  const total = getRecord(info, 'total_token_usage');

  const usage: UsageSnapshot | undefined = readUsage(last ?? total, CODEX_USAGE_KEYS);
  if (!usage || !window || window <= 0) return [];

  const totals = readUsage(total, CODEX_USAGE_KEYS);
  return [{ kind: 'token_count', usage, window, ...(totals ? { totals } : {}) }];
}

function decodeResponseItem(payload: LogRecord | undefined): SessionEvent[] {
  const itemType = getString(payload, 'type');
  const name = getString(payload, 'name');

  switch (itemType) {
    case 'message': {
      const text = extractBlockText(payload?.['content'], TEXT_BLOCK_TYPES, '');
      const role = getString(payload, 'role');
      if (role === 'user') return [{ kind: 'user_message', text }];
      if (role === 'assistant') return [{ kind: 'assistant_message', text }];
      return [];
    }

    case 'function_call': {
      if (!name || !EXEC_TOOL_NAMES.some(n => n === name)) return [];
      const command = parseExecCommand(getString(payload, 'arguments'));
      return command ? [{ kind: 'command', command }] : [];
    }

    case 'custom_tool_call': {
      if (name !== 'apply_patch') return [];
      const paths = parsePatchFiles(getString(payload, 'input') ?? '');
      return paths.length > 0 ? [{ kind: 'files_touched', paths }] : [];
    }

    default:
      return [];
  }
}

export const codexSource: LogSource = {
  name: 'codex',

  defaultRoot(config: WorklogConfig): string {
    return config.codex_sessions_dir;
  },

  isSessionFile(path: string): boolean {
    const base = basename(path);
    return base.startsWith(ROLLOUT_PREFIX) && base.endsWith('.jsonl');
  },

  isAuxiliary(): boolean {
    return false;
  },

  matchesSession(path: string, filter: string): boolean {
    return fileStem(path).includes(filter);
  },

  decodeRecord(record: LogRecord): readonly SessionEvent[] {
    const payload = getRecord(record, 'payload');

    switch (getString(record, 'type')) {
      case 'session_meta': {
        const sessionId = getString(payload, 'id');
        const cwd = getString(payload, 'cwd');
        return [{ kind: 'meta', ...(sessionId ? { sessionId } : {}), ...(cwd ? { cwd } : {}) }];
      }

      case 'event_msg':
        return getString(payload, 'type') === 'token_count' ? decodeTokenCount(payload) : [];

      case 'response_item':
        return decodeResponseItem(payload);

      case 'compacted': {
        const text = getString(payload, 'message');
        return text ? [{ kind: 'compaction', text }] : [];
      }

      case 'summary': {
        const text = getString(record, 'summary') ?? getString(payload, 'summary');
        return text ? [{ kind: 'compaction', text }] : [];
      }

      default:
        return [];
    }
  },

  projectFromPath(): string | null {
    return null;
  },
};
