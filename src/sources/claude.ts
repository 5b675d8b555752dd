/**
 * Claude log source
 *
 * Layout:  $CLAUDE_CONFIG_DIR/projects/<encoded-project-dir>/<session-uuid>.jsonl
 *          agent-*.jsonl and subagents/ hold sub-agent logs and are skipped
 * Records: { type, timestamp, sessionId, cwd, message }
 *
 *   user       message.content is a string or content blocks
 *   assistant  message.content blocks (text, tool_use) + message.usage
 *   summary    summary text written when history is compacted
 *
 * Usage is piggybacked on assistant messages, so the context window is a
 * fixed model constant rather than telemetry.
 */

import { basename, dirname, sep } from 'node:path';
import { homedir } from 'node:os';
import type { WorklogConfig } from '../types/index.js';
import type { LogRecord, SessionEvent } from '../types/session.js';
import type { LogSource } from './types.js';
import { fileStem } from './types.js';
import {
  asRecord,
  extractBlockText,
  getRecord,
  getString,
  readUsage,
} from './record.js';

const AGENT_FILE_PREFIX = 'agent-';
const SUBAGENT_DIR = `${sep}subagents${sep}`;

const COMMAND_TOOLS = ['Bash'] as const;
const FILE_TOOLS: Readonly<Record<string, string>> = {
  Edit: 'file_path',
  MultiEdit: 'file_path',
  Write: 'file_path',
  NotebookEdit: 'notebook_path',
};

export interface ClaudeSourceOptions {
  /** Context window used for every usage reading */
  readonly contextWindow: number;
  /** Home directory used when decoding project directory names */
  readonly home?: string;
}

/**
 * Decode a project directory name back into a display path
 *
 * The encoding replaces "/" and "." with "-":
 *   -home-u-proj            -> ~/proj
 *   -home-u--config-nvim    -> ~/.config/nvim
 *   -srv-app                -> /srv/app
 */
export function decodeProjectDir(name: string, home: string = homedir()): string | null {
  if (!name) return null;

  const encodedHome = home.replace(/[/.]/g, '-');
  if (name === encodedHome) return '~';

  if (name.startsWith(`${encodedHome}-`)) {
    let rest = name.slice(encodedHome.length + 1);
    if (rest.startsWith('-')) {
      rest = `.${rest.slice(1)}`;
    }
    return `~/${rest.replace(/-/g, '/')}`;
  }

  return name.replace(/-/g, '/');
}

function metaEvent(sessionId: string | undefined, cwd: string | undefined): SessionEvent[] {
  if (!sessionId && !cwd) return [];
  return [{ kind: 'meta', ...(sessionId ? { sessionId } : {}), ...(cwd ? { cwd } : {}) }];
}

function decodeToolUses(content: unknown): SessionEvent[] {
  const events: SessionEvent[] = [];

  for (const item of Array.isArray(content) ? content : []) {
    const block = asRecord(item);
    if (getString(block, 'type') !== 'tool_use') continue;

    const name = getString(block, 'name') ?? '';
    const input = getRecord(block, 'input');

    if (COMMAND_TOOLS.some(tool => tool === name)) {
      const command = getString(input, 'command');
      if (command) events.push({ kind: 'command', command });
      continue;
    }

    const pathKey = FILE_TOOLS[name];
    const path = pathKey ? getString(input, pathKey) : undefined;
    if (path) {
      events.push({ kind: 'files_touched', paths: [path] });
    }
  }

  return events;
}

export function createClaudeSource(options: ClaudeSourceOptions): LogSource {
  const home = options.home ?? homedir();

  const decodeUser = (message: LogRecord | undefined, record: LogRecord): SessionEvent[] => {
    // Injected caveats and slash-command expansions carry isMeta
    const text = record['isMeta'] === true ? '' : extractBlockText(message?.['content'], ['text'], '\n');
    return [{ kind: 'user_message', text }];
  };

  const decodeAssistant = (message: LogRecord | undefined): SessionEvent[] => {
    const content = message?.['content'];
    const text = extractBlockText(content, ['text'], '\n');
    const usage = readUsage(getRecord(message, 'usage'), {
      input: 'input_tokens',
      output: 'output_tokens',
      cacheRead: 'cache_read_input_tokens',
      cacheCreation: 'cache_creation_input_tokens',
    });

    const events: SessionEvent[] = [
      { kind: 'assistant_message', text, ...(usage ? { usage } : {}) },
    ];
    if (usage) {
      events.push({ kind: 'token_count', usage, window: options.contextWindow });
    }
    return [...events, ...decodeToolUses(content)];
  };

  return {
    name: 'claude',

    defaultRoot(config: WorklogConfig): string {
      return config.claude_projects_dir;
    },

    isSessionFile(path: string): boolean {
      return path.endsWith('.jsonl');
    },

    isAuxiliary(path: string): boolean {
      return basename(path).startsWith(AGENT_FILE_PREFIX) || path.includes(SUBAGENT_DIR);
    },

    matchesSession(path: string, filter: string): boolean {
      return fileStem(path) === filter;
    },

    decodeRecord(record: LogRecord): readonly SessionEvent[] {
      const type = getString(record, 'type');

      if (type === 'summary') {
        const text = getString(record, 'summary');
        return text ? [{ kind: 'compaction', text }] : [];
      }

      if (type === 'session_meta') {
        const payload = getRecord(record, 'payload') ?? record;
        return metaEvent(
          getString(payload, 'id') ?? getString(payload, 'sessionId'),
          getString(payload, 'cwd')
        );
      }

      if (type !== 'user' && type !== 'assistant') return [];

      const meta = metaEvent(getString(record, 'sessionId'), getString(record, 'cwd'));
      // Sidechain turns belong to sub-agents
      if (record['isSidechain'] === true) return meta;

      const message = getRecord(record, 'message');
      const turn = type === 'user' ? decodeUser(message, record) : decodeAssistant(message);
      return [...meta, ...turn];
    },

    projectFromPath(path: string): string | null {
      return decodeProjectDir(basename(dirname(path)), home);
    },
  };
}

