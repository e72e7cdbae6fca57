import { INT32_MAX, INT32_MIN, UINT32_MAX } from '../specs.js';
import { isAsciiDigit } from './chars.js';

export enum ParseIntFormat {
  NON_NEGATIVE = 'non_negative',
  OPTIONALLY_NEGATIVE = 'optionally_negative',
}

export enum ParseIntError {
  FAILED_PARSE = 'failed_parse',
  FAILED_OVERFLOW = 'failed_overflow',
  FAILED_UNDERFLOW = 'failed_underflow',
}

export type ParseIntResult =
  | {
      valid: true;
      value: number;
    }
  | {
      valid: false;
      error: ParseIntError;
    };

const MINUS = 0x2d;

function isAllDigits(value: string): boolean {
  if (value.length === 0) {
    return false;
  }
  for (let i = 0; i < value.length; i++) {
    if (!isAsciiDigit(value.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

function convert(input: string, min: number, max: number): number | null {
  const negative = input.charCodeAt(0) === MINUS;
  if (!isAllDigits(negative ? input.slice(1) : input)) {
    return null;
  }
  const value = BigInt(input);
  if (value < BigInt(min) || value > BigInt(max)) {
    return null;
  }
  // avoid handing out -0
  return Number(value) || 0;
}

function parseIntWithin(
  input: string,
  format: ParseIntFormat,
  min: number,
  max: number,
): ParseIntResult {
  if (input.length === 0) {
    return { valid: false, error: ParseIntError.FAILED_PARSE };
  }

  const startsWithNegative = input.charCodeAt(0) === MINUS;
  if (!isAsciiDigit(input.charCodeAt(0))) {
    if (format === ParseIntFormat.NON_NEGATIVE || !startsWithNegative) {
      return { valid: false, error: ParseIntError.FAILED_PARSE };
    }
  }

  const value = convert(input, min, max);
  if (value !== null) {
    return { valid: true, value };
  }

  // the conversion failed: digits only means the value was out of range
  const numericPortion = startsWithNegative ? input.slice(1) : input;
  if (isAllDigits(numericPortion)) {
    return {
      valid: false,
      error: startsWithNegative ? ParseIntError.FAILED_UNDERFLOW : ParseIntError.FAILED_OVERFLOW,
    };
  }

  return { valid: false, error: ParseIntError.FAILED_PARSE };
}

export function parseInt32(
  input: string,
  format: ParseIntFormat = ParseIntFormat.OPTIONALLY_NEGATIVE,
): ParseIntResult {
  return parseIntWithin(input, format, INT32_MIN, INT32_MAX);
}

export function parseUint32(input: string): ParseIntResult {
  return parseIntWithin(input, ParseIntFormat.NON_NEGATIVE, 0, UINT32_MAX);
}

/**
 * Parses a decimal integer within `Number.MIN_SAFE_INTEGER..Number.MAX_SAFE_INTEGER`.
 */
export function parseSafeInt(
  input: string,
  format: ParseIntFormat = ParseIntFormat.OPTIONALLY_NEGATIVE,
): ParseIntResult {
  return parseIntWithin(input, format, Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
}

export function parseSafeUint(input: string): ParseIntResult {
  return parseIntWithin(input, ParseIntFormat.NON_NEGATIVE, 0, Number.MAX_SAFE_INTEGER);
}
