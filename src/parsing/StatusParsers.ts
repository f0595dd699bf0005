// src/parsing/StatusParsers.ts - Parsers for the '|'-joined status scripts

import { type UnreadCounts } from './types.js';

const ITEM_SEPARATOR = '|';

/** `Work|Personal` → ['Work', 'Personal']; empty output → []. */
export function parseAccountNames(output: string): string[] {
  const trimmed = output.trim();
  if (!trimmed) return [];
  return trimmed.split(ITEM_SEPARATOR);
}

/**
 * `Work:3|Personal:ERROR` → { Work: 3, Personal: -1 }.
 * Account names may themselves contain ':', so only the last one splits.
 */
export function parseUnreadCounts(output: string): UnreadCounts {
  const counts: UnreadCounts = {};
  for (const item of output.trim().split(ITEM_SEPARATOR)) {
    const separator = item.lastIndexOf(':');
    if (separator <= 0) continue;

    const account = item.slice(0, separator);
    const value = item.slice(separator + 1).trim();
    const count = Number.parseInt(value, 10);
    counts[account] = value === 'ERROR' || Number.isNaN(count) ? -1 : count;
  }
  return counts;
}
