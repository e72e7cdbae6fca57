import {
  FORBIDDEN_HEADER_FIELDS,
  FORBIDDEN_HEADER_PREFIXES,
  IDEMPOTENT_METHODS,
  NON_COALESCING_HEADERS,
  SAFE_METHODS,
} from '../specs.js';
import { isToken, toAsciiLowerCase } from '../utils/chars.js';

const FORBIDDEN_HEADER_SET = new Set<string>(FORBIDDEN_HEADER_FIELDS);
const NON_COALESCING_HEADER_SET = new Set<string>(NON_COALESCING_HEADERS);
const SAFE_METHOD_SET = new Set<string>(SAFE_METHODS);
const IDEMPOTENT_METHOD_SET = new Set<string>(IDEMPOTENT_METHODS);

const INVALID_VALUE_CHARS = /[\0\r\n]/;

/**
 * Whether a caller may set this request header, following the Fetch
 * forbidden request-header list.
 */
export function isSafeHeaderName(name: string): boolean {
  const lowerName = toAsciiLowerCase(name);
  if (FORBIDDEN_HEADER_PREFIXES.some((prefix) => lowerName.startsWith(prefix))) {
    return false;
  }
  return !FORBIDDEN_HEADER_SET.has(lowerName);
}

/**
 * Headers whose values may contain commas and so cannot be folded into one
 * comma-separated line.
 */
export function isNonCoalescingHeader(name: string): boolean {
  return NON_COALESCING_HEADER_SET.has(toAsciiLowerCase(name));
}

export function isMethodSafe(method: string): boolean {
  return SAFE_METHOD_SET.has(method);
}

export function isMethodIdempotent(method: string): boolean {
  return IDEMPOTENT_METHOD_SET.has(method);
}

export function isValidHeaderName(name: string): boolean {
  return isToken(name);
}

export function isValidHeaderValue(value: string): boolean {
  return !INVALID_VALUE_CHARS.test(value);
}
