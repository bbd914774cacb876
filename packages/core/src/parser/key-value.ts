/**
 * Tokenizer shared by tag sets and field sets: `k1=v1,k2=v2`
 */

import type { DiagnosticSink, KeyValueMap } from '../types/index.js';
import { createKeyValueMap } from '../utils/index.js';
import { indexOfUnescaped, splitUnescaped, unescapeKeyValue } from './escape.js';

export interface KeyValueParseOptions {
  /** Receives one MALFORMED_KEY_VALUE diagnostic per dropped fragment */
  onDiagnostic?: DiagnosticSink;
  /** Line the text came from, copied into diagnostics */
  line?: string;
  lineNumber?: number;
}

/**
 * Parse comma-separated `key=value` pairs.
 *
 * Fragments without an unescaped '=' are dropped and reported; the rest of
 * the text is still parsed. A repeated key keeps its last value.
 */
export function parseKeyValuePairs(
  text: string,
  options: KeyValueParseOptions = {}
): KeyValueMap {
  const pairs = createKeyValueMap();

  for (const fragment of splitUnescaped(text, ',')) {
    if (fragment === '') continue;

    const eq = indexOfUnescaped(fragment, '=');
    if (eq === -1) {
      options.onDiagnostic?.({
        code: 'MALFORMED_KEY_VALUE',
        message: `Malformed key-value pair (no unescaped '='): ${fragment}`,
        line: options.line ?? text,
        lineNumber: options.lineNumber,
        fragment,
      });
      continue;
    }

    const key = unescapeKeyValue(fragment.slice(0, eq));
    pairs[key] = unescapeKeyValue(fragment.slice(eq + 1));
  }

  return pairs;
}
