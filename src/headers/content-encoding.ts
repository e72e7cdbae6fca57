import { ENCODING_ALIASES } from '../specs.js';
import type { EncodingSetResult, ValidationError } from '../types.js';
import { containsLWS, isAsciiDigit, lowerCaseEquals, toAsciiLowerCase, trimLWS } from '../utils/chars.js';
import { iterateValues } from '../decode/values.js';

const ACCEPTED_ONE_QVALUES = ['1', '1.0', '1.00', '1.000'] as const;
const CONTENT_ENCODING_FORBIDDEN = '"=;*';
const ANY_ENCODING = '*';
const IDENTITY = 'identity';

const createError = (reason: string): ValidationError => ({ valid: false, reason });

function hasAnyOf(value: string, chars: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (chars.includes(value.charAt(i))) {
      return true;
    }
  }
  return false;
}

/**
 * qvalue = ( "0" [ "." 0*3DIGIT ] ) / ( "1" [ "." 0*3("0") ] )
 * Returns whether the coding is acceptable, or `null` when the value is malformed.
 */
function isAcceptableQValue(qvalue: string): boolean | null {
  if (qvalue.charAt(0) === '1') {
    return ACCEPTED_ONE_QVALUES.some((accepted) => accepted === qvalue) ? true : null;
  }
  if (qvalue === '0') {
    return false;
  }
  if (qvalue.length < 3 || qvalue.length > 5 || !qvalue.startsWith('0.')) {
    return null;
  }

  let nonZero = false;
  for (let i = 2; i < qvalue.length; i++) {
    const code = qvalue.charCodeAt(i);
    if (!isAsciiDigit(code)) {
      return null;
    }
    if (qvalue.charAt(i) !== '0') {
      nonZero = true;
    }
  }
  return nonZero;
}

function addAliases(encodings: Set<string>): void {
  for (const [name, alias] of ENCODING_ALIASES) {
    if (encodings.has(name)) {
      encodings.add(alias);
    } else if (encodings.has(alias)) {
      encodings.add(name);
    }
  }
}

/**
 * Collects the codings an Accept-Encoding header allows. Codings with a zero
 * q-value are left out. An empty header allows anything, and `identity` is
 * always allowed otherwise.
 */
export function parseAcceptEncoding(value: string): EncodingSetResult {
  if (value.includes('"')) {
    return createError('quoted strings are not supported');
  }

  const encodings = new Set<string>();

  for (const token of iterateValues(value, ',')) {
    const semicolon = token.indexOf(';');
    if (semicolon < 0) {
      if (containsLWS(token)) {
        return createError(`invalid content-coding: ${token}`);
      }
      encodings.add(toAsciiLowerCase(token));
      continue;
    }

    const coding = trimLWS(token.slice(0, semicolon));
    if (coding === '' || containsLWS(coding)) {
      return createError(`invalid content-coding: ${coding}`);
    }

    const params = trimLWS(token.slice(semicolon + 1));
    const equals = params.indexOf('=');
    if (equals < 0 || !lowerCaseEquals(trimLWS(params.slice(0, equals)), 'q')) {
      return createError(`unexpected parameter for ${coding}: ${params}`);
    }

    const acceptable = isAcceptableQValue(trimLWS(params.slice(equals + 1)));
    if (acceptable === null) {
      return createError(`invalid qvalue for ${coding}`);
    }
    if (acceptable) {
      encodings.add(toAsciiLowerCase(coding));
    }
  }

  if (encodings.size === 0) {
    encodings.add(ANY_ENCODING);
    return { valid: true, encodings };
  }

  encodings.add(IDENTITY);
  addAliases(encodings);
  return { valid: true, encodings };
}

/**
 * Collects the codings listed by a Content-Encoding header, lower-cased.
 */
export function parseContentEncoding(value: string): EncodingSetResult {
  if (hasAnyOf(value, CONTENT_ENCODING_FORBIDDEN)) {
    return createError('content-coding parameters are not allowed');
  }

  const encodings = new Set<string>();
  for (const token of iterateValues(value, ',')) {
    if (containsLWS(token)) {
      return createError(`invalid content-coding: ${token}`);
    }
    encodings.add(toAsciiLowerCase(token));
  }

  return { valid: true, encodings };
}
