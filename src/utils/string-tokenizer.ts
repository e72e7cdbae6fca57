import type { StringTokenizerOptions } from '../types.js';

export interface StringTokenizerState {
  input: string;
  delimiters: string;
  quoteChars: string;
  returnEmptyTokens: boolean;
  tokenBegin: number;
  tokenEnd: number;
  tokenIsDelim: boolean;
}

interface AdvanceState {
  inQuote: boolean;
  inEscape: boolean;
  quoteChar: string;
}

export function createStringTokenizer(
  input: string,
  delimiters: string,
  options: StringTokenizerOptions = {},
): StringTokenizerState {
  return {
    input,
    delimiters,
    quoteChars: options.quoteChars ?? '',
    returnEmptyTokens: options.returnEmptyTokens ?? false,
    tokenBegin: 0,
    tokenEnd: 0,
    // the start of input behaves like a delimiter was just consumed
    tokenIsDelim: true,
  };
}

function advanceOne(state: StringTokenizerState, advance: AdvanceState, c: string): boolean {
  if (advance.inQuote) {
    if (advance.inEscape) {
      advance.inEscape = false;
    } else if (c === '\\') {
      advance.inEscape = true;
    } else if (c === advance.quoteChar) {
      advance.inQuote = false;
    }
    return true;
  }

  if (state.delimiters.includes(c)) {
    return false;
  }
  advance.quoteChar = c;
  advance.inQuote = state.quoteChars.includes(c);
  return true;
}

/**
 * Returns the next token, or `null` once the input is exhausted. Delimiters
 * inside a quoted span do not split.
 */
export function nextToken(state: StringTokenizerState): string | null {
  const { input } = state;
  const end = input.length;
  const advance: AdvanceState = { inQuote: false, inEscape: false, quoteChar: '' };

  for (;;) {
    if (state.tokenIsDelim) {
      state.tokenIsDelim = false;
      state.tokenBegin = state.tokenEnd;

      while (state.tokenEnd < end && advanceOne(state, advance, input.charAt(state.tokenEnd))) {
        state.tokenEnd++;
      }

      if (state.tokenBegin !== state.tokenEnd || state.returnEmptyTokens) {
        return input.slice(state.tokenBegin, state.tokenEnd);
      }
    }

    if (state.tokenEnd === end) {
      return null;
    }

    // step over the delimiter
    state.tokenIsDelim = true;
    state.tokenBegin = state.tokenEnd;
    state.tokenEnd++;
  }
}

export function* tokenize(
  input: string,
  delimiters: string,
  options?: StringTokenizerOptions,
): Generator<string, void, undefined> {
  const state = createStringTokenizer(input, delimiters, options);
  let token = nextToken(state);
  while (token !== null) {
    yield token;
    token = nextToken(state);
  }
}
