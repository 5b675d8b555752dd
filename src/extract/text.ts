/**
 * Text shortening helpers shared by extraction and rendering
 */

const ELLIPSIS = '...';

/**
 * Trim and cut to at most `limit` characters, ellipsis included
 */
export function truncate(text: string, limit: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= limit) return trimmed;
  return trimmed.slice(0, Math.max(0, limit - ELLIPSIS.length)) + ELLIPSIS;
}

/**
 * Collapse whitespace runs to single spaces, then truncate
 */
export function shorten(text: string, limit: number = 120): string {
  return truncate(text.split(/\s+/).filter(Boolean).join(' '), limit);
}
