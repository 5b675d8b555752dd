/**
 * Quick stats output
 */

import { format } from 'date-fns';
import type { SessionStats } from '../types/session.js';
import { formatCount } from './recap.js';

const ID_PREFIX_LENGTH = 8;

/**
 * One row of the recent-session listing:
 *   <id prefix>...   42.0%  rot  1 smash  0    3u/  5a  01-15 09:30  ~/proj
 */
export function formatStatsRow(stats: SessionStats): string {
  const { summary } = stats;
  const id = summary.session_id.slice(0, ID_PREFIX_LENGTH);
  const pct = summary.context.pct.toFixed(1).padStart(5);
  const rot = String(summary.context.rot_hits).padStart(2);
  const smash = String(summary.context.smash_hits).padStart(2);
  const user = String(summary.user_messages).padStart(3);
  const assistant = String(summary.assistant_messages).padStart(3);
  const modified = format(stats.mtime, 'MM-dd HH:mm');

  return `${id}...  ${pct}%  rot ${rot} smash ${smash}  ${user}u/${assistant}a  ${modified}  ${summary.cwd ?? 'unknown'}`;
}

export function formatStatsDetail(stats: SessionStats): string {
  const { summary } = stats;
  const when = (instant: Date | null): string => (instant ? format(instant, 'yyyy-MM-dd HH:mm') : 'unknown');

  return [
    `Session: ${summary.session_id}`,
    `Source:  ${summary.source}`,
    `Project: ${summary.cwd ?? 'unknown'}`,
    `Started: ${when(summary.first_instant)}`,
    `Last:    ${when(summary.last_instant)}`,
    `Turns:   ${summary.user_messages} user / ${summary.assistant_messages} assistant`,
    `Context: ${summary.context.pct.toFixed(1)}% (${formatCount(summary.context.tokens)} tokens)`,
    `Context hits: rot ${summary.context.rot_hits}, smash ${summary.context.smash_hits}`,
    `Compactions: ${summary.compactions.length}`,
    `File size: ${formatCount(stats.file_size)} bytes`,
  ].join('\n');
}
