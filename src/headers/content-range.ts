import type { ContentRangeResult, ContentRangeSpec } from '../types.js';
import { lowerCaseEquals, trimLWS } from '../utils/chars.js';
import { parseSafeUint } from '../utils/number.js';

const BYTES_UNIT = 'bytes';

const createError = (reason: string): ContentRangeResult => ({
  valid: false,
  reason,
  firstBytePosition: -1,
  lastBytePosition: -1,
  instanceLength: -1,
});

function parsePosition(value: string): number | null {
  const result = parseSafeUint(trimLWS(value));
  return result.valid ? result.value : null;
}

/**
 * Parses `bytes first-last/length` as sent with a 206 response. The `*`
 * forms are not accepted since a partial response must state both.
 */
export function parseContentRangeFor206(value: string): ContentRangeResult {
  const spec = trimLWS(value);

  const space = spec.indexOf(' ');
  if (space < 0) {
    return createError('missing space after unit');
  }
  if (!lowerCaseEquals(trimLWS(spec.slice(0, space)), BYTES_UNIT)) {
    return createError('unsupported unit');
  }

  const minus = spec.indexOf('-', space + 1);
  if (minus < 0) {
    return createError('missing "-" in byte range');
  }
  const slash = spec.indexOf('/', minus + 1);
  if (slash < 0) {
    return createError('missing "/" before instance length');
  }

  const firstBytePosition = parsePosition(spec.slice(space + 1, minus));
  if (firstBytePosition === null) {
    return createError('invalid first-byte-pos');
  }
  const lastBytePosition = parsePosition(spec.slice(minus + 1, slash));
  if (lastBytePosition === null) {
    return createError('invalid last-byte-pos');
  }
  const instanceLength = parsePosition(spec.slice(slash + 1));
  if (instanceLength === null) {
    return createError('invalid instance-length');
  }

  if (lastBytePosition < firstBytePosition) {
    return createError('last-byte-pos precedes first-byte-pos');
  }
  if (instanceLength <= lastBytePosition) {
    return createError('instance-length must exceed last-byte-pos');
  }

  return {
    valid: true,
    firstBytePosition,
    lastBytePosition,
    instanceLength,
  };
}

export function formatContentRange(spec: ContentRangeSpec): string {
  const { firstBytePosition: first, lastBytePosition: last, instanceLength } = spec;
  if (
    !Number.isSafeInteger(first)
    || !Number.isSafeInteger(last)
    || !Number.isSafeInteger(instanceLength)
    || first < 0
    || last < first
    || instanceLength <= last
  ) {
    throw new TypeError(`Invalid content range: ${first}-${last}/${instanceLength}`);
  }
  return `${BYTES_UNIT} ${first}-${last}/${instanceLength}`;
}

export const formatUnsatisfiedContentRange = (instanceLength: number): string =>
  `${BYTES_UNIT} */${instanceLength}`;
