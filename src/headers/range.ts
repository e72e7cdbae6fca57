import createHttpError, { createRangeNotSatisfiable } from '../createHttpError.js';
import { iterateValues } from '../decode/values.js';
import type { ByteRange, RangeHeaderResult, ValidationError } from '../types.js';
import { lowerCaseEquals, trimLWS } from '../utils/chars.js';
import { parseSafeUint } from '../utils/number.js';

type ResolvedRange = [first: number, last: number];

const BYTES_UNIT = 'bytes';

const createError = (reason: string): ValidationError => ({ valid: false, reason });

export const createBoundedRange = (first: number, last: number): ByteRange => ({
  firstBytePosition: first,
  lastBytePosition: last,
});

export const createRightUnboundedRange = (first: number): ByteRange => ({
  firstBytePosition: first,
});

export const createSuffixRange = (suffixLength: number): ByteRange => ({
  suffixLength,
});

export function isSuffixByteRange(range: ByteRange): boolean {
  return range.suffixLength !== undefined;
}

export function isValidByteRange(range: ByteRange): boolean {
  const { firstBytePosition: first, lastBytePosition: last, suffixLength } = range;

  if (suffixLength !== undefined) {
    return suffixLength > 0 && first === undefined && last === undefined;
  }

  return first !== undefined && first >= 0 && (last === undefined || last >= first);
}

function parseByteRangeSpec(spec: string): ByteRange | string {
  const minus = spec.indexOf('-');
  if (minus < 0) {
    return `missing "-" in range: ${spec}`;
  }

  const range: ByteRange = {};

  const firstStr = trimLWS(spec.slice(0, minus));
  if (firstStr !== '') {
    const first = parseSafeUint(firstStr);
    if (!first.valid) {
      return `invalid first-byte-pos: ${firstStr}`;
    }
    range.firstBytePosition = first.value;
  }

  const lastStr = trimLWS(spec.slice(minus + 1));
  if (lastStr !== '') {
    const last = parseSafeUint(lastStr);
    if (!last.valid) {
      return `invalid last-byte-pos: ${lastStr}`;
    }
    if (range.firstBytePosition !== undefined) {
      range.lastBytePosition = last.value;
    } else {
      range.suffixLength = last.value;
    }
  } else if (range.firstBytePosition === undefined) {
    return 'range has neither first-byte-pos nor suffix-length';
  }

  if (!isValidByteRange(range)) {
    return `invalid range: ${spec}`;
  }

  return range;
}

/**
 * Parses `bytes=spec[,spec]*`. One malformed spec fails the whole header.
 */
export function parseRangeHeader(value: string): RangeHeaderResult {
  const equals = value.indexOf('=');
  if (equals < 0) {
    return createError('missing "=" after range unit');
  }

  if (!lowerCaseEquals(trimLWS(value.slice(0, equals)), BYTES_UNIT)) {
    return createError('unsupported range unit');
  }

  const ranges: ByteRange[] = [];
  for (const spec of iterateValues(value.slice(equals + 1), ',')) {
    const range = parseByteRangeSpec(spec);
    if (typeof range === 'string') {
      return createError(range);
    }
    ranges.push(range);
  }

  if (ranges.length === 0) {
    return createError('empty byte-range-set');
  }

  return { valid: true, ranges };
}

/**
 * Computes the inclusive bounds of `range` within a resource of `contentSize`
 * bytes. A range with no positions at all covers the whole resource.
 */
export function resolveByteRange(range: ByteRange, contentSize: number): ResolvedRange {
  if (!Number.isSafeInteger(contentSize) || contentSize < 0) {
    throw new TypeError('Content size must be a non-negative integer');
  }

  if (contentSize === 0) {
    throw createRangeNotSatisfiable(contentSize, 'Range not satisfiable: empty content');
  }

  const maxIndex = contentSize - 1;
  const { firstBytePosition: first, lastBytePosition: last, suffixLength } = range;

  if (first === undefined && last === undefined && suffixLength === undefined) {
    return [0, maxIndex];
  }

  if (!isValidByteRange(range)) {
    throw createHttpError(400, 'Invalid range');
  }

  if (suffixLength !== undefined) {
    return [contentSize - Math.min(contentSize, suffixLength), maxIndex];
  }

  if (first !== undefined && first < contentSize) {
    return [first, last === undefined ? maxIndex : Math.min(maxIndex, last)];
  }

  throw createRangeNotSatisfiable(contentSize, 'Range not satisfiable: start beyond content size');
}

export function formatByteRange(range: ByteRange): string {
  if (!isValidByteRange(range)) {
    throw new TypeError('Cannot format an invalid byte range');
  }

  const { firstBytePosition: first, lastBytePosition: last, suffixLength } = range;
  if (suffixLength !== undefined) {
    return `${BYTES_UNIT}=-${suffixLength}`;
  }
  return `${BYTES_UNIT}=${first ?? 0}-${last ?? ''}`;
}
