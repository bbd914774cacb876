/**
 * Utility functions for working with parsed records
 */

import type { KeyValueMap } from '../types/index.js';

/**
 * Empty key/value map without a prototype, so keys such as
 * `__proto__` or `constructor` are stored as plain data
 */
export function createKeyValueMap(): KeyValueMap {
  const map: KeyValueMap = Object.create(null);
  return map;
}

/**
 * Ordinary UTF-16 code unit ordering, independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Add every key of each map to the target set
 */
export function collectKeys(target: Set<string>, ...maps: KeyValueMap[]): Set<string> {
  for (const map of maps) {
    for (const key of Object.keys(map)) {
      target.add(key);
    }
  }
  return target;
}

/**
 * Sorted copy of a key set
 */
export function sortedKeys(keys: Iterable<string>): string[] {
  return Array.from(keys).sort(compareCodeUnits);
}
