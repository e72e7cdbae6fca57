import { Buffer } from 'node:buffer';

import {
  CR,
  CRLF,
  HEADER_BLOCK_SENTINEL,
  LF,
  STATUS_LINE_SLOP,
} from '../specs.js';
import { isLWS, toAsciiLowerCase, trimLeadingLWS } from '../utils/chars.js';
import { tokenize } from '../utils/string-tokenizer.js';

const HTTP = 'http';
const LINE_BREAK = '\n';
const SENTINEL_REGEX = /\0/g;
const LINE_BREAK_REGEX = /\n/g;
const CR_OR_LF_REGEX = /[\r\n]/;

function toLatin1(input: string | Uint8Array): string {
  return typeof input === 'string' ? input : Buffer.from(input).toString('latin1');
}

/**
 * Finds "http" (any case) within the first few bytes of a status line.
 * Returns -1 when it is not there.
 */
export function locateStartOfStatusLine(input: string | Uint8Array): number {
  const str = toLatin1(input);
  if (str.length < HTTP.length) {
    return -1;
  }
  const maxOffset = Math.min(str.length - HTTP.length, STATUS_LINE_SLOP);
  for (let i = 0; i <= maxOffset; i++) {
    if (toAsciiLowerCase(str.slice(i, i + HTTP.length)) === HTTP) {
      return i;
    }
  }
  return -1;
}

function locateEndOfHeadersHelper(
  buf: Uint8Array,
  offset: number,
  acceptEmptyHeaderList: boolean,
): number {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new TypeError('offset must be a non-negative integer');
  }

  // an empty header list ends with a single line break at the start
  let lastByte = acceptEmptyHeaderList ? LF : 0;
  let wasLF = acceptEmptyHeaderList;

  for (let i = offset; i < buf.length; i++) {
    const byte = buf[i];
    if (byte === LF) {
      if (wasLF) {
        return i + 1;
      }
      wasLF = true;
    } else if (byte !== CR || lastByte !== LF) {
      wasLF = false;
    }
    lastByte = byte ?? 0;
  }
  return -1;
}

/**
 * Returns the index just past the blank line ending a header section, or -1
 * when more data is needed. Accepts both CRLF and bare LF line endings.
 */
export function locateEndOfHeaders(buf: Uint8Array, offset: number = 0): number {
  return locateEndOfHeadersHelper(buf, offset, false);
}

/**
 * Like {@link locateEndOfHeaders}, for header sections that may be empty such as
 * trailers or the additional headers of a 1xx response.
 */
export function locateEndOfAdditionalHeaders(buf: Uint8Array, offset: number = 0): number {
  return locateEndOfHeadersHelper(buf, offset, true);
}

// Continuations are for values only; a header name may not span lines.
function isLineSegmentContinuable(line: string): boolean {
  if (line.length === 0) {
    return false;
  }
  const colon = line.indexOf(':');
  if (colon <= 0) {
    return false;
  }
  return !isLWS(line.charCodeAt(0));
}

function findStatusLineEnd(str: string): number {
  const match = CR_OR_LF_REGEX.exec(str);
  return match ? match.index : str.length;
}

// NUL-delimited text: lines already split on NUL, no CR or LF left
function isNulDelimited(str: string): boolean {
  return str.endsWith(HEADER_BLOCK_SENTINEL + HEADER_BLOCK_SENTINEL) && !CR_OR_LF_REGEX.test(str);
}

/**
 * Turns a raw status line plus header section into a canonical block: the
 * status line and every logical header line (continuations joined) are
 * terminated by NUL, and the block ends with an extra NUL.
 *
 * NUL-delimited input is read as lines split on NUL, so an assembled block
 * comes back unchanged. Otherwise NUL bytes are dropped before anything else.
 */
export function assembleHeaderBlock(raw: string | Uint8Array): string {
  let input = toLatin1(raw);

  if (isNulDelimited(input)) {
    // only the status line itself is searched for slop here
    const statusBegin = locateStartOfStatusLine(input.slice(0, input.indexOf(HEADER_BLOCK_SENTINEL)));
    input = input.slice(Math.max(statusBegin, 0)).replace(SENTINEL_REGEX, LINE_BREAK);
  } else {
    input = input.replace(SENTINEL_REGEX, '');
    const statusBegin = locateStartOfStatusLine(input);
    if (statusBegin > 0) {
      input = input.slice(statusBegin);
    }
  }

  const statusLineEnd = findStatusLineEnd(input);
  let assembled = input.slice(0, statusLineEnd);

  let prevLineContinuable = false;
  for (const line of tokenize(input.slice(statusLineEnd), '\r\n')) {
    if (prevLineContinuable && isLWS(line.charCodeAt(0))) {
      assembled += ` ${trimLeadingLWS(line)}`;
    } else {
      assembled += LINE_BREAK + line;
      prevLineContinuable = isLineSegmentContinuable(line);
    }
  }

  assembled += LINE_BREAK + LINE_BREAK;

  return assembled.replace(LINE_BREAK_REGEX, HEADER_BLOCK_SENTINEL);
}

/**
 * Whether `str` is exactly what {@link assembleHeaderBlock} produces for it.
 */
export function isCanonicalHeaderBlock(str: string): boolean {
  return isNulDelimited(str) && assembleHeaderBlock(str) === str;
}

export function headerBlockToWireFormat(block: string): string {
  let wire = '';
  for (const line of tokenize(block, HEADER_BLOCK_SENTINEL)) {
    wire += line + CRLF;
  }
  return wire + CRLF;
}
