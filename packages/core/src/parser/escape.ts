/**
 * Backslash-escape scanning for line protocol.
 *
 * A backslash in the normal state moves the scanner into the escaping state;
 * the following character is taken literally and the scanner returns to
 * normal. Only characters seen in the normal state can act as delimiters.
 */

const BACKSLASH = '\\';

const MEASUREMENT_ESCAPES: ReadonlySet<string> = new Set([',', ' ']);
const KEY_VALUE_ESCAPES: ReadonlySet<string> = new Set([',', '=', ' ']);

type ScanState = 'normal' | 'escaping';

/**
 * Index of the first occurrence of `target` not preceded by an active
 * escape, or -1. `from` must not point into the middle of an escape.
 */
export function indexOfUnescaped(text: string, target: string, from = 0): number {
  let state: ScanState = 'normal';

  for (let i = from; i < text.length; i++) {
    const ch = text.charAt(i);

    if (state === 'escaping') {
      state = 'normal';
      continue;
    }

    if (ch === BACKSLASH) {
      state = 'escaping';
      continue;
    }

    if (ch === target) {
      return i;
    }
  }

  return -1;
}

/**
 * Split on every unescaped `delimiter`. Escape sequences are kept as-is
 * in the returned fragments.
 */
export function splitUnescaped(text: string, delimiter: string): string[] {
  const parts: string[] = [];
  let start = 0;

  for (;;) {
    const index = indexOfUnescaped(text, delimiter, start);
    if (index === -1) {
      parts.push(text.slice(start));
      return parts;
    }
    parts.push(text.slice(start, index));
    start = index + 1;
  }
}

/**
 * Whether the character at `index` is escaped, i.e. preceded by an odd
 * run of backslashes
 */
export function isEscapedAt(text: string, index: number): boolean {
  let backslashes = 0;
  for (let i = index - 1; i >= 0 && text.charAt(i) === BACKSLASH; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

function unescapeWith(text: string, escapable: ReadonlySet<string>): string {
  if (!text.includes(BACKSLASH)) {
    return text;
  }

  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (ch !== BACKSLASH || i + 1 >= text.length) {
      out += ch;
      continue;
    }

    const next = text.charAt(i + 1);
    // Unknown sequences (including \\) are kept verbatim as a pair
    out += escapable.has(next) ? next : ch + next;
    i++;
  }

  return out;
}

/** Resolve `\,` and `\ ` in a measurement name */
export function unescapeMeasurement(text: string): string {
  return unescapeWith(text, MEASUREMENT_ESCAPES);
}

/** Resolve `\,`, `\=` and `\ ` in a tag/field key or value */
export function unescapeKeyValue(text: string): string {
  return unescapeWith(text, KEY_VALUE_ESCAPES);
}
