/**
 * Entry classification for the strip rewrite.
 * Prefix matching is plain string matching: `ext_data/mb2/char` also matches
 * `ext_data/mb2/character/foo.cfg`.
 */
import { PLACEHOLDER_NAME } from './constants/exclusion-prefixes.js';

export interface StripPlan {
  readonly kept: readonly string[];
  readonly removed: readonly string[];
  readonly placeholders: readonly string[];
}

export function isExcluded(name: string, prefixes: readonly string[]): boolean {
  return prefixes.some(prefix => name.startsWith(prefix));
}

export function placeholderName(prefix: string): string {
  return `${prefix}${PLACEHOLDER_NAME}`;
}

/**
 * Computes what a strip would do to a list of entry names without touching disk.
 */
export function planStrip(names: readonly string[], prefixes: readonly string[]): StripPlan {
  const kept: string[] = [];
  const removed: string[] = [];
  for (const name of names) {
    (isExcluded(name, prefixes) ? removed : kept).push(name);
  }
  return { kept, removed, placeholders: prefixes.map(placeholderName) };
}
