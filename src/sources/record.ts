/**
 * Field access helpers for loosely shaped JSON records
 *
 * A recognized record with missing or mistyped fields is absent data,
 * so every accessor returns undefined instead of throwing.
 */

import type { LogRecord, UsageSnapshot } from '../types/session.js';

export function asRecord(value: unknown): LogRecord | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  return value as LogRecord;
}

export function getRecord(record: LogRecord | undefined, key: string): LogRecord | undefined {
  return asRecord(record?.[key]);
}

export function getString(record: LogRecord | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(record: LogRecord | undefined, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getArray(record: LogRecord | undefined, key: string): readonly unknown[] {
  const value = record?.[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Parse one log line into a JSON object, or undefined for anything else
 */
export function parseRecordLine(line: string): LogRecord | undefined {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  try {
    return asRecord(JSON.parse(trimmed));
  } catch {
    // Malformed line - skipped by the caller
    return undefined;
  }
}

/**
 * Concatenate the text blocks of a message content array
 */
export function extractBlockText(
  content: unknown,
  textTypes: readonly string[],
  separator: string
): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';

  const parts: string[] = [];
  for (const item of content) {
    const block = asRecord(item);
    const type = getString(block, 'type');
    const text = getString(block, 'text');
    if (type && textTypes.includes(type) && text !== undefined) {
      parts.push(text);
    }
  }
  return parts.join(separator);
}

/**
 * Build a usage snapshot from named counters (missing counters are 0)
 */
export function readUsage(
  record: LogRecord | undefined,
  keys: {
    readonly input: string;
    readonly output: string;
    readonly cacheRead: string;
    readonly cacheCreation?: string;
  }
): UsageSnapshot | undefined {
  if (!record) return undefined;

  return {
    input_tokens: getNumber(record, keys.input) ?? 0,
    output_tokens: getNumber(record, keys.output) ?? 0,
    cache_read_tokens: getNumber(record, keys.cacheRead) ?? 0,
    cache_creation_tokens: keys.cacheCreation ? getNumber(record, keys.cacheCreation) ?? 0 : 0,
  };
}
