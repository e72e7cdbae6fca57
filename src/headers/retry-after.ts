import { parseHttpDate } from '../date/index.js';
import type { RetryAfterResult } from '../types.js';
import { isAsciiDigit, trimLWS } from '../utils/chars.js';
import { parseUint32 } from '../utils/number.js';

/**
 * Retry-After is either delay-seconds or an HTTP-date. A date is turned into
 * the whole seconds left until it, rounded up; a date before `now` is rejected.
 */
export function parseRetryAfterHeader(value: string, now: Date = new Date()): RetryAfterResult {
  const retryAfter = trimLWS(value);

  if (isAsciiDigit(retryAfter.charCodeAt(0))) {
    const seconds = parseUint32(retryAfter);
    if (!seconds.valid) {
      return { valid: false, reason: `invalid delay-seconds: ${seconds.error}` };
    }
    return { valid: true, delaySeconds: seconds.value };
  }

  const date = parseHttpDate(retryAfter);
  if (!date) {
    return { valid: false, reason: 'expected delay-seconds or an HTTP-date' };
  }

  const delayMs = date.getTime() - now.getTime();
  if (delayMs < 0) {
    return { valid: false, reason: 'retry date is in the past' };
  }

  return { valid: true, delaySeconds: Math.ceil(delayMs / 1000) };
}
