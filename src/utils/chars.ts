import { HTAB, SP, TOKEN_SEPARATORS } from '../specs.js';

export function isLWS(code: number): boolean {
  return code === SP || code === HTAB;
}

export function trimLWS(value: string): string {
  let begin = 0;
  let end = value.length;
  while (begin < end && isLWS(value.charCodeAt(begin))) {
    begin++;
  }
  while (begin < end && isLWS(value.charCodeAt(end - 1))) {
    end--;
  }
  return begin === 0 && end === value.length ? value : value.slice(begin, end);
}

export function trimLeadingLWS(value: string): string {
  let begin = 0;
  while (begin < value.length && isLWS(value.charCodeAt(begin))) {
    begin++;
  }
  return value.slice(begin);
}

export function containsLWS(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (isLWS(value.charCodeAt(i))) {
      return true;
    }
  }
  return false;
}

export function isTokenChar(code: number): boolean {
  if (code >= 0x7f || code <= 0x20) {
    return false;
  }
  return !TOKEN_SEPARATORS.includes(String.fromCharCode(code));
}

/**
 * RFC 7230 section 3.2.6 `token`.
 */
export function isToken(value: string): boolean {
  if (value.length === 0) {
    return false;
  }
  for (let i = 0; i < value.length; i++) {
    if (!isTokenChar(value.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

/**
 * RFC 5987 section 3.2.1 `parmname`: a token without `*`, `'` or `%`.
 */
export function isParamName(value: string): boolean {
  if (value.length === 0) {
    return false;
  }
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (!isTokenChar(code) || code === 0x2a || code === 0x27 || code === 0x25) {
      return false;
    }
  }
  return true;
}

export function isAsciiDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

const ASCII_UPPER_REGEX = /[A-Z]+/g;

/**
 * Lower-cases A-Z only; characters such as U+212A KELVIN SIGN are left as is.
 */
export function toAsciiLowerCase(value: string): string {
  return value.replace(ASCII_UPPER_REGEX, (upper) => upper.toLowerCase());
}

export function lowerCaseEquals(value: string, lowercase: string): boolean {
  return value.length === lowercase.length && toAsciiLowerCase(value) === lowercase;
}
