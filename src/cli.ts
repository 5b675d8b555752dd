#!/usr/bin/env node
/**
 * Worklog CLI
 *
 * Summarize AI coding assistant sessions from their local logs.
 *
 * Usage:
 *   worklog extract [options]  - Session summaries as JSON
 *   worklog recap [options]    - Human-readable recap of the window
 *   worklog stats [id]         - Quick stats for one session or a listing
 *   worklog config             - Show current configuration
 */

import { readWorklogConfig, getGlobalConfigPath } from './paths.js';
import { resolveSince } from './extract/time.js';
import {
  extractSessions,
  getSessionStats,
  listRecentSessions,
  locateSession,
} from './extract/index.js';
import { getSources, isSourceSelection, type SourceSelection } from './sources/index.js';
import { buildExtractionDocument, formatErrorJson, stringifyJson } from './report/json.js';
import { renderRecap } from './report/recap.js';
import { writeRecapMarkdown } from './report/markdown.js';
import { formatStatsDetail, formatStatsRow } from './report/stats.js';
import type { WorklogConfig, WorklogError } from './types/index.js';
import { parseArgs, type ParsedArgs } from './args.js';

// ============================================================================
// Argument Helpers
// ============================================================================

function reportError(error: WorklogError, json: boolean, pretty: boolean): void {
  if (json) {
    console.log(stringifyJson(formatErrorJson(error), pretty));
  } else {
    console.error(error.message);
  }
}

function selectSource(args: ParsedArgs): SourceSelection | null {
  const value = args.values.get('--source') ?? 'all';
  return isSourceSelection(value) ? value : null;
}

async function loadConfig(): Promise<WorklogConfig | null> {
  const result = await readWorklogConfig();
  if (!result.ok) {
    console.error(`Failed to read config: ${result.error.message}`);
    return null;
  }
  return result.value;
}

// ============================================================================
// Commands
// ============================================================================

async function runExtract(args: ParsedArgs, mode: 'json' | 'recap'): Promise<number> {
  const json = mode === 'json' || args.flags.has('--json');
  const pretty = args.flags.has('--pretty');

  const sinceResult = resolveSince(args.values.get('--since'));
  if (!sinceResult.ok) {
    reportError(sinceResult.error, json, pretty);
    return 1;
  }

  const selection = selectSource(args);
  if (!selection) {
    console.error('Invalid source. Use: codex, claude, or all');
    return 1;
  }

  const config = await loadConfig();
  if (!config) return 1;

  const since = sinceResult.value;
  const sessions = await extractSessions({
    sources: getSources(selection, config),
    config,
    since,
    session: args.values.get('--session') ?? null,
  });

  if (sessions.length === 0) {
    console.log('No sessions found matching criteria');
    return 1;
  }

  if (json) {
    console.log(stringifyJson(buildExtractionDocument(sessions, since), pretty));
    return 0;
  }

  const output = args.values.get('--output');
  if (output) {
    const writeResult = await writeRecapMarkdown(output, sessions, since);
    if (!writeResult.ok) {
      console.error(writeResult.error.message);
      return 1;
    }
    console.log(`Recap written to ${output}`);
    return 0;
  }

  console.log(renderRecap(sessions, since));
  return 0;
}

async function runStats(args: ParsedArgs): Promise<number> {
  const selection = selectSource(args);
  if (!selection) {
    console.error('Invalid source. Use: codex, claude, or all');
    return 1;
  }

  const config = await loadConfig();
  if (!config) return 1;
  const sources = getSources(selection, config);

  if (args.flags.has('--list') || args.flags.has('--today')) {
    const days = args.flags.has('--today') ? 1 : parseInt(args.values.get('--days') ?? '7', 10);
    if (isNaN(days) || days <= 0) {
      console.error('Invalid --days value. Use a positive number.');
      return 1;
    }

    const sessions = await listRecentSessions(days, { sources, config });
    if (sessions.length === 0) {
      console.log(`No sessions found in the last ${days} day(s)`);
      return 1;
    }

    console.log(`Sessions from last ${days} day(s):\n`);
    for (const stats of sessions) {
      console.log(formatStatsRow(stats));
    }
    return 0;
  }

  const [sessionId] = args.positional;
  if (!sessionId) {
    printUsage();
    return 1;
  }

  const located = await locateSession(sessionId, { sources, config });
  if (!located.ok) {
    console.log(located.error.message);
    return 1;
  }

  const stats = await getSessionStats(located.value.path, located.value.source, config);
  if (!stats.ok) {
    console.log(stats.error.message);
    return 1;
  }

  console.log(formatStatsDetail(stats.value));
  return 0;
}

async function showConfig(): Promise<number> {
  console.log(`Config file: ${getGlobalConfigPath()}\n`);

  const config = await loadConfig();
  if (!config) return 1;

  console.log('Current configuration:');
  console.log(JSON.stringify(config, null, 2));
  return 0;
}

function printUsage(): void {
  console.log(`
Worklog - Summaries of AI coding assistant sessions

Usage:
  worklog <command> [options]

Commands:
  extract              Session summaries as JSON
  recap                Human-readable recap of the window
  stats [id]           Quick stats for one session
  config               Show current configuration

Options:
  --since <expr>       "yesterday" (default, 08:00), "today", "week",
                       "YYYY-MM-DD" or "YYYY-MM-DD HH:MM"
  --session <id>       Only the session with this id
  --source <name>      codex, claude or all (default: all)
  --pretty             Indent JSON output
  --json               Print the recap as JSON
  --output <file>      Write the recap as Markdown to a file
  --list               (stats) List sessions from the last --days days
  --today              (stats) List today's sessions
  --days <n>           (stats) Days to look back (default: 7)
  --debug              Verbose diagnostics on stderr

Environment Variables:
  WORKLOG_HOME         Override global directory (default: ~/.worklog)
  WORKLOG_DEBUG        Enable debug logging (set to 1 or use --debug flag)
  CODEX_HOME           Codex home (default: ~/.codex)
  CLAUDE_CONFIG_DIR    Claude home (default: ~/.claude)
`);
}

// ============================================================================
// Main
// ============================================================================

async function main(argv: readonly string[]): Promise<number> {
  const [command, ...rest] = argv;
  const args = parseArgs(rest);

  if (args.flags.has('--debug') || args.flags.has('-d')) {
    process.env['WORKLOG_DEBUG'] = '1';
  }

  switch (command) {
    case 'extract':
      return runExtract(args, 'json');

    case 'recap':
      return runExtract(args, 'recap');

    case 'stats':
      return runStats(args);

    case 'config':
      return showConfig();

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      printUsage();
      return 0;

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      return 1;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  });
