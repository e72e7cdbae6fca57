import {
  DEFAULT_NAME_VALUE_PAIRS_OPTIONS,
  DEFAULT_VALUES_ITERATOR_OPTIONS,
} from '../specs.js';
import type {
  NameValuePair,
  NameValuePairsOptions,
  ValuesIteratorOptions,
} from '../types.js';
import { trimLWS } from '../utils/chars.js';
import { strictUnquote, unquote } from '../utils/quote.js';
import {
  createStringTokenizer,
  nextToken,
  type StringTokenizerState,
} from '../utils/string-tokenizer.js';

const QUOTE = '"';

export interface ValuesIteratorState {
  values: StringTokenizerState;
  ignoreEmptyValues: boolean;
}

export interface NameValuePairsIteratorState {
  props: ValuesIteratorState;
  valuesRequired: boolean;
  strictQuotes: boolean;
  // false once a malformed pair was met; no further pairs are produced
  valid: boolean;
  current: NameValuePair | null;
}

export function createValuesIterator(
  value: string,
  delimiter: string,
  options: Partial<ValuesIteratorOptions> = {},
): ValuesIteratorState {
  const { ignoreEmptyValues } = { ...DEFAULT_VALUES_ITERATOR_OPTIONS, ...options };
  return {
    values: createStringTokenizer(value, delimiter, {
      quoteChars: QUOTE,
      returnEmptyTokens: !ignoreEmptyValues,
    }),
    ignoreEmptyValues,
  };
}

export function nextValue(state: ValuesIteratorState): string | null {
  for (let token = nextToken(state.values); token !== null; token = nextToken(state.values)) {
    const value = trimLWS(token);
    if (!state.ignoreEmptyValues || value !== '') {
      return value;
    }
  }
  return null;
}

export function* iterateValues(
  value: string,
  delimiter: string,
  ignoreEmptyValues: boolean = true,
): Generator<string, void, undefined> {
  const state = createValuesIterator(value, delimiter, { ignoreEmptyValues });
  for (let item = nextValue(state); item !== null; item = nextValue(state)) {
    yield item;
  }
}

export function createNameValuePairsIterator(
  value: string,
  delimiter: string,
  options: Partial<NameValuePairsOptions> = {},
): NameValuePairsIteratorState {
  const { valuesRequired, strictQuotes } = { ...DEFAULT_NAME_VALUE_PAIRS_OPTIONS, ...options };
  return {
    props: createValuesIterator(value, delimiter),
    valuesRequired,
    strictQuotes,
    valid: true,
    current: null,
  };
}

function invalidate(state: NameValuePairsIteratorState): null {
  state.valid = false;
  state.current = null;
  return null;
}

/**
 * Accepts `name=value`, `name = value`, `name="quoted value"` and, when values
 * are optional, a bare `name`. A value missing its closing quote is tolerated
 * unless quotes are strict.
 */
export function nextNameValuePair(state: NameValuePairsIteratorState): NameValuePair | null {
  if (!state.valid) {
    return null;
  }

  const prop = nextValue(state.props);
  if (prop === null) {
    state.current = null;
    return null;
  }

  const equals = prop.indexOf('=');
  if (equals === 0) {
    return invalidate(state);
  }
  if (equals < 0 && state.valuesRequired) {
    return invalidate(state);
  }
  if (equals > 0 && prop.slice(0, equals).includes(QUOTE)) {
    return invalidate(state);
  }

  const name = trimLWS(equals < 0 ? prop : prop.slice(0, equals));
  let rawValue = equals < 0 ? '' : trimLWS(prop.slice(equals + 1));

  if (equals > 0 && rawValue === '') {
    return invalidate(state);
  }

  let value = rawValue;
  let isQuoted = false;

  if (rawValue.startsWith(QUOTE)) {
    isQuoted = true;
    if (state.strictQuotes) {
      const unquoted = strictUnquote(rawValue);
      if (!unquoted.valid) {
        return invalidate(state);
      }
      value = unquoted.value;
    } else if (rawValue.length === 1 || !rawValue.endsWith(QUOTE)) {
      // no closing quote: drop the opening one and keep the rest verbatim
      isQuoted = false;
      rawValue = rawValue.slice(1);
      value = rawValue;
    } else {
      value = unquote(rawValue);
    }
  }

  state.current = { name, rawValue, value, isQuoted };
  return state.current;
}

export function* iterateNameValuePairs(
  state: NameValuePairsIteratorState,
): Generator<NameValuePair, void, undefined> {
  for (let pair = nextNameValuePair(state); pair !== null; pair = nextNameValuePair(state)) {
    yield pair;
  }
}
