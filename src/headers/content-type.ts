import { HTTP_LWS } from '../specs.js';
import type { ContentTypeOptions, ContentTypeState } from '../types.js';
import { isLWS, lowerCaseEquals, toAsciiLowerCase, trimLWS } from '../utils/chars.js';

// '(' catches media-type comments, which are not standard but do occur
const TYPE_END_CHARS = `${HTTP_LWS};(`;
const MEANINGLESS_TYPE = '*/*';

interface ContentTypeParameters {
  charset: string | null;
  boundary: string | null;
}

function findFirstOf(str: string, chars: string, from: number): number {
  for (let i = from; i < str.length; i++) {
    if (chars.includes(str.charAt(i))) {
      return i;
    }
  }
  return -1;
}

function findFirstNotOf(str: string, chars: string, from: number): number {
  for (let i = from; i < str.length; i++) {
    if (!chars.includes(str.charAt(i))) {
      return i;
    }
  }
  return -1;
}

export function createContentTypeState(): ContentTypeState {
  return {
    mimeType: '',
    charset: '',
    hadCharset: false,
    boundary: null,
  };
}

function readQuotedValue(str: string, offset: number): { value: string; end: number } {
  let cursor = offset + 1;
  let value = '';
  while (cursor < str.length && str.charAt(cursor) !== '"') {
    // a trailing backslash is kept literally
    if (str.charAt(cursor) === '\\' && cursor + 1 < str.length) {
      cursor++;
    }
    value += str.charAt(cursor);
    cursor++;
  }
  return { value: trimLWS(value), end: cursor };
}

/**
 * Quoted strings may contain ';', so the parameters cannot be split up front.
 * Names run to ';' or '=' with trailing spaces kept; spaces after '=' are skipped.
 */
function parseParameters(str: string, from: number, wantBoundary: boolean): ContentTypeParameters {
  const parameters: ContentTypeParameters = { charset: null, boundary: null };
  const len = str.length;

  let offset = findFirstOf(str, ';', from);
  while (offset >= 0 && offset < len) {
    offset = findFirstNotOf(str, HTTP_LWS, offset + 1);
    if (offset < 0) {
      break;
    }

    const nameStart = offset;
    offset = findFirstOf(str, ';=', offset);
    // names without values are not allowed
    if (offset < 0 || str.charAt(offset) === ';') {
      continue;
    }
    const name = str.slice(nameStart, offset);

    offset = findFirstNotOf(str, HTTP_LWS, offset + 1);
    if (offset < 0 || str.charAt(offset) === ';') {
      continue;
    }

    let value: string;
    if (str.charAt(offset) !== '"') {
      const valueStart = offset;
      offset = findFirstOf(str, ';', offset);
      let valueEnd = offset < 0 ? len : offset;
      while (valueEnd > valueStart && isLWS(str.charCodeAt(valueEnd - 1))) {
        valueEnd--;
      }
      value = str.slice(valueStart, valueEnd);
    } else {
      const quoted = readQuotedValue(str, offset);
      value = quoted.value;
      offset = findFirstOf(str, ';', quoted.end);
    }

    if (parameters.charset === null && lowerCaseEquals(name, 'charset')) {
      parameters.charset = value;
      continue;
    }
    if (wantBoundary && parameters.boundary === null && lowerCaseEquals(name, 'boundary')) {
      parameters.boundary = value;
    }
  }

  return parameters;
}

/**
 * Folds one Content-Type header value into `prev`. Repeated headers can be
 * applied one after another: a new media type replaces the old one along with
 * its charset, while the same media type without a charset keeps the charset
 * already recorded. Returns `prev` itself when the value is rejected.
 */
export function parseContentType(
  prev: ContentTypeState,
  value: string,
  options: ContentTypeOptions = {},
): ContentTypeState {
  let typeBegin = findFirstNotOf(value, HTTP_LWS, 0);
  if (typeBegin < 0) {
    typeBegin = value.length;
  }
  let typeEnd = findFirstOf(value, TYPE_END_CHARS, typeBegin);
  if (typeEnd < 0) {
    typeEnd = value.length;
  }

  const mediaType = value.slice(typeBegin, typeEnd);

  if (value.length === 0 || value === MEANINGLESS_TYPE || !mediaType.includes('/')) {
    return prev;
  }

  const { charset, boundary } = parseParameters(value, typeEnd, options.boundary === true);
  const mimeType = toAsciiLowerCase(mediaType);
  const sameType = prev.mimeType !== '' && prev.mimeType === mimeType;

  const next: ContentTypeState = { ...prev };
  if (!sameType) {
    next.mimeType = mimeType;
  }
  if ((!sameType && prev.hadCharset) || charset !== null) {
    next.hadCharset = true;
    next.charset = toAsciiLowerCase(charset ?? '');
  }
  if (boundary !== null) {
    next.boundary = boundary;
  }

  return next;
}
