/**
 * Debug Logging
 *
 * ARCHITECTURE: Opt-in diagnostic output, activated by WORKLOG_DEBUG=1
 * Pattern: Scoped logger factory, writes to stderr so JSON on stdout stays clean
 */

export type DebugLogger = (msg: string, data?: Record<string, unknown>) => void;

const MAX_VALUE_LENGTH = 100;

/**
 * Check if debug mode is enabled
 */
export function isDebugEnabled(): boolean {
  return process.env['WORKLOG_DEBUG'] === '1';
}

function formatData(data?: Record<string, unknown>): string {
  if (!data) return '';

  const pairs = Object.entries(data).map(([k, v]) => {
    const str = typeof v === 'string' ? v : JSON.stringify(v) ?? String(v);
    return `${k}=${str.length > MAX_VALUE_LENGTH ? str.slice(0, MAX_VALUE_LENGTH - 3) + '...' : str}`;
  });
  return pairs.length > 0 ? ` (${pairs.join(', ')})` : '';
}

/**
 * Create a debug logger for a module
 *
 * Output: [HH:MM:SS] [DEBUG] [scope] message (key=value, ...)
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (msg, data) => {
    if (!isDebugEnabled()) return;

    const timestamp = new Date().toTimeString().slice(0, 8);
    console.error(`[${timestamp}] [DEBUG] [${scope}] ${msg}${formatData(data)}`);
  };
}
