/**
 * Recap Renderer
 *
 * ARCHITECTURE: Human-readable worklog from computed summaries
 * Pattern: Pure string building; sessions are rendered in start order,
 * undated sessions first
 */

import { differenceInMinutes, format } from 'date-fns';
import type { SessionSummary } from '../types/session.js';
import { compareByStart } from '../extract/index.js';
import { shorten } from '../extract/text.js';

const HEADER_FORMAT = 'MMM dd HH:mm';
const MAX_SUMMARY_TOPICS = 3;
const MAX_SESSION_TOPICS = 3;
const MAX_FILES_SHOWN = 6;

export function formatLocal(instant: Date | null): string {
  return instant ? format(instant, HEADER_FORMAT) : 'unknown';
}

export function formatDuration(start: Date | null, end: Date | null): string {
  if (!start || !end) return 'unknown';

  const totalMinutes = differenceInMinutes(end, start);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

/**
 * 12345 -> "12,345"
 */
export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * One-paragraph overview of the whole window
 */
export function summarizeWindow(sessions: readonly SessionSummary[]): string {
  if (sessions.length === 0) {
    return 'No sessions in this window.';
  }

  const projects = new Set(sessions.map(s => s.cwd ?? 'unknown'));
  const rotHits = sessions.reduce((sum, s) => sum + s.context.rot_hits, 0);
  const smashHits = sessions.reduce((sum, s) => sum + s.context.smash_hits, 0);
  const userTurns = sessions.reduce((sum, s) => sum + s.user_messages, 0);
  const assistantTurns = sessions.reduce((sum, s) => sum + s.assistant_messages, 0);

  const topics: string[] = [];
  for (const session of sessions) {
    const [first] = session.topics;
    if (!first) continue;
    const topic = shorten(first, 80);
    if (!topics.includes(topic)) topics.push(topic);
    if (topics.length >= MAX_SUMMARY_TOPICS) break;
  }

  const parts = [
    `${sessions.length} session(s) across ${projects.size} project(s).`,
    `Turns: ${userTurns} user / ${assistantTurns} assistant.`,
    `Context stress: ${rotHits} rot hit(s), ${smashHits} smash hit(s).`,
  ];
  if (topics.length > 0) {
    parts.push(`Main topics: ${topics.join('; ')}.`);
  }
  return parts.join(' ');
}

function discussionBullets(session: SessionSummary): string[] {
  const bullets = session.topics.slice(0, MAX_SESSION_TOPICS).map(t => shorten(t, 120));

  if (session.files_touched.length > 0) {
    const shown = session.files_touched.slice(0, MAX_FILES_SHOWN).join(', ');
    const suffix = session.files_touched.length > MAX_FILES_SHOWN ? ', ...' : '';
    bullets.push(`Files touched: ${shown}${suffix}`);
  }

  const [firstCommand] = session.commands;
  if (bullets.length === 0 && firstCommand) {
    bullets.push(`Commands run: ${shorten(firstCommand, 120)}`);
  }

  if (bullets.length === 0) {
    bullets.push('No user prompts captured; activity was mostly tool-driven.');
  }
  return bullets;
}

export function renderSession(session: SessionSummary): string {
  const { context } = session;
  const lines: string[] = [];

  lines.push(`"${shorten(session.title ?? '(no title)', 120)}"`);
  lines.push(session.cwd ?? '(no working folder recorded)');
  lines.push('');
  lines.push(`- Session: ${session.session_id} (${session.source})`);
  lines.push(
    `- Time: ${formatLocal(session.first_instant)} -> ${formatLocal(session.last_instant)} ` +
      `(${formatDuration(session.first_instant, session.last_instant)})`
  );
  lines.push(`- Turns: ${session.user_messages} user / ${session.assistant_messages} assistant`);
  lines.push(`- Context: ${context.pct.toFixed(1)}% (${formatCount(context.tokens)} tokens), peak ${context.max_pct.toFixed(1)}%`);
  lines.push(`- Context hits: rot ${context.rot_hits}, smash ${context.smash_hits}`);

  if (session.compactions.length > 0) {
    lines.push(`- Compactions: ${session.compactions.length}`);
  }

  lines.push('');
  lines.push('What was discussed:');
  for (const bullet of discussionBullets(session)) {
    lines.push(`- ${bullet}`);
  }

  lines.push('');
  lines.push('Git commits:');
  if (session.git_commits.length === 0) {
    lines.push('- None');
  } else {
    for (const commit of session.git_commits) {
      lines.push(`- ${commit.hash} ${commit.message}`);
    }
  }

  return lines.join('\n');
}

/**
 * Full recap: header, window summary, one block per session
 */
export function renderRecap(
  sessions: readonly SessionSummary[],
  since: Date,
  now: Date = new Date()
): string {
  const ordered = [...sessions].sort(compareByStart);
  const head = [
    `Worklog: ${formatLocal(since)} -> ${formatLocal(now)}`,
    '## Summary',
    summarizeWindow(ordered),
    '## Sessions',
  ].join('\n\n');

  if (ordered.length === 0) return head;
  return `${head}\n\n${ordered.map(renderSession).join('\n\n---\n\n')}`;
}
