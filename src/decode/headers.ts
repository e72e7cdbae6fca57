import { InvalidHeaderNameError } from '../errors.js';
import { DEFAULT_HEADERS_ITERATOR_OPTIONS } from '../specs.js';
import type { HeaderEntry, HeadersIteratorOptions } from '../types.js';
import { isLWS, isToken, lowerCaseEquals, toAsciiLowerCase, trimLWS } from '../utils/chars.js';
import {
  createStringTokenizer,
  nextToken,
  type StringTokenizerState,
} from '../utils/string-tokenizer.js';

export enum HeadersIteratorPhase {
  LINE = 'line',
  FINISHED = 'finished',
}

export interface HeadersIteratorState {
  lines: StringTokenizerState;
  phase: HeadersIteratorPhase;
  current: HeaderEntry | null;
}

/**
 * Splits one logical header line into name and value. Returns `null` for a line
 * that is not a well-formed `name: value` pair.
 */
export function decodeHeaderLine(line: string): HeaderEntry | null {
  const colon = line.indexOf(':');
  if (colon < 0) {
    return null;
  }

  // leading LWS would mean an unjoined continuation
  if (colon === 0 || isLWS(line.charCodeAt(0))) {
    return null;
  }

  const name = trimLWS(line.slice(0, colon));
  if (!isToken(name)) {
    return null;
  }

  return {
    name,
    value: trimLWS(line.slice(colon + 1)),
  };
}

export function createHeadersIterator(
  block: string,
  options: Partial<HeadersIteratorOptions> = {},
): HeadersIteratorState {
  const { lineDelimiters, hasStatusLine } = {
    ...DEFAULT_HEADERS_ITERATOR_OPTIONS,
    ...options,
  };

  let headers = block;
  if (hasStatusLine) {
    let statusLineEnd = 0;
    while (statusLineEnd < block.length && !lineDelimiters.includes(block.charAt(statusLineEnd))) {
      statusLineEnd++;
    }
    headers = block.slice(statusLineEnd);
  }

  return {
    lines: createStringTokenizer(headers, lineDelimiters),
    phase: HeadersIteratorPhase.LINE,
    current: null,
  };
}

/**
 * Moves to the next well-formed header, silently skipping malformed lines.
 */
export function nextHeader(state: HeadersIteratorState): HeaderEntry | null {
  if (state.phase === HeadersIteratorPhase.FINISHED) {
    return null;
  }

  for (let line = nextToken(state.lines); line !== null; line = nextToken(state.lines)) {
    const entry = decodeHeaderLine(line);
    if (entry) {
      state.current = entry;
      return entry;
    }
  }

  state.phase = HeadersIteratorPhase.FINISHED;
  state.current = null;
  return null;
}

/**
 * Advances until a header called `name` (matched case-insensitively) is
 * current. `name` must be given in lower case.
 */
export function advanceToHeader(state: HeadersIteratorState, name: string): boolean {
  if (toAsciiLowerCase(name) !== name) {
    throw new InvalidHeaderNameError(`header name must be lower case: ${name}`);
  }

  for (let entry = nextHeader(state); entry !== null; entry = nextHeader(state)) {
    if (lowerCaseEquals(entry.name, name)) {
      return true;
    }
  }
  return false;
}

export function* iterateHeaders(
  block: string,
  options?: Partial<HeadersIteratorOptions>,
): Generator<HeaderEntry, void, undefined> {
  const state = createHeadersIterator(block, options);
  for (let entry = nextHeader(state); entry !== null; entry = nextHeader(state)) {
    yield entry;
  }
}
