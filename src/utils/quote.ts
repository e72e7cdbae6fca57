import type { UnquoteResult } from '../types.js';

const QUOTE = '"';
const BACKSLASH = '\\';

export function quote(value: string): string {
  let escaped = QUOTE;
  for (const c of value) {
    if (c === QUOTE || c === BACKSLASH) {
      escaped += BACKSLASH;
    }
    escaped += c;
  }
  return escaped + QUOTE;
}

function unquoteImpl(value: string, strictQuotes: boolean): UnquoteResult {
  if (value.length < 2 || value[0] !== QUOTE || value[value.length - 1] !== QUOTE) {
    return { valid: false };
  }

  const inner = value.slice(1, -1);
  let prevEscape = false;
  let unescaped = '';
  for (const c of inner) {
    if (c === BACKSLASH && !prevEscape) {
      prevEscape = true;
      continue;
    }
    if (strictQuotes && !prevEscape && c === QUOTE) {
      return { valid: false };
    }
    prevEscape = false;
    unescaped += c;
  }

  // closing quote was escaped
  if (strictQuotes && prevEscape) {
    return { valid: false };
  }

  return { valid: true, value: unescaped };
}

/**
 * Removes surrounding quotes and processes quoted-pairs. Anything that is not a
 * quoted string is returned as is.
 */
export function unquote(value: string): string {
  const result = unquoteImpl(value, false);
  return result.valid ? result.value : value;
}

export function strictUnquote(value: string): UnquoteResult {
  return unquoteImpl(value, true);
}
