import type {
  HeadersIteratorOptions,
  NameValuePairsOptions,
  ValuesIteratorOptions,
} from './types.js';

export const HTTP_LWS = ' \t';

export const CR = 0x0d;
export const LF = 0x0a;
export const SP = 0x20;
export const HTAB = 0x09;
export const CRLF = '\r\n';

// canonical line terminator inside an assembled header block
export const HEADER_BLOCK_SENTINEL = '\0';

// leading junk tolerated before "HTTP" in a status line
export const STATUS_LINE_SLOP = 4;

export const TOKEN_SEPARATORS = '()<>@,;:\\"/[]?={}';

export const FORBIDDEN_HEADER_FIELDS = [
  'accept-charset',
  'accept-encoding',
  'access-control-request-headers',
  'access-control-request-method',
  'connection',
  'content-length',
  'cookie',
  'cookie2',
  'date',
  'dnt',
  'expect',
  'host',
  'keep-alive',
  'origin',
  'referer',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'user-agent',
  'via',
] as const;

export const FORBIDDEN_HEADER_PREFIXES = ['proxy-', 'sec-'] as const;

export const NON_COALESCING_HEADERS = [
  'date',
  'expires',
  'last-modified',
  'location',
  'retry-after',
  'set-cookie',
  // auth challenges mix space separated tokens with comma separated properties
  'www-authenticate',
  'proxy-authenticate',
  // only the first STS header is honoured
  'strict-transport-security',
] as const;

export const SAFE_METHODS = ['GET', 'HEAD', 'OPTIONS', 'TRACE'] as const;

export const IDEMPOTENT_METHODS = [...SAFE_METHODS, 'PUT', 'DELETE'] as const;

export const ENCODING_ALIASES = [
  ['gzip', 'x-gzip'],
  ['compress', 'x-compress'],
] as const;

// q-values expressed in tenths
export const QVALUE_MAX_TENTHS = 10;
export const QVALUE_DECREMENT_TENTHS = 1;

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;

export const DEFAULT_HEADERS_ITERATOR_OPTIONS: Readonly<HeadersIteratorOptions> = {
  lineDelimiters: HEADER_BLOCK_SENTINEL,
  hasStatusLine: true,
} as const;

export const DEFAULT_VALUES_ITERATOR_OPTIONS: Readonly<ValuesIteratorOptions> = {
  ignoreEmptyValues: true,
} as const;

export const DEFAULT_NAME_VALUE_PAIRS_OPTIONS: Readonly<NameValuePairsOptions> = {
  valuesRequired: true,
  strictQuotes: false,
} as const;
