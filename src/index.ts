export {
  assembleHeaderBlock,
  headerBlockToWireFormat,
  isCanonicalHeaderBlock,
  locateEndOfAdditionalHeaders,
  locateEndOfHeaders,
  locateStartOfStatusLine,
} from './decode/header-block.js';
export {
  advanceToHeader,
  createHeadersIterator,
  decodeHeaderLine,
  HeadersIteratorPhase,
  iterateHeaders,
  nextHeader,
  type HeadersIteratorState,
} from './decode/headers.js';
export {
  createNameValuePairsIterator,
  createValuesIterator,
  iterateNameValuePairs,
  iterateValues,
  nextNameValuePair,
  nextValue,
  type NameValuePairsIteratorState,
  type ValuesIteratorState,
} from './decode/values.js';
export { parseHttpDate } from './date/index.js';
export { expandLanguageList, generateAcceptLanguageHeader } from './headers/accept-language.js';
export { parseAcceptEncoding, parseContentEncoding } from './headers/content-encoding.js';
export {
  formatContentRange,
  formatUnsatisfiedContentRange,
  parseContentRangeFor206,
} from './headers/content-range.js';
export { createContentTypeState, parseContentType } from './headers/content-type.js';
export {
  isMethodIdempotent,
  isMethodSafe,
  isNonCoalescingHeader,
  isSafeHeaderName,
  isValidHeaderName,
  isValidHeaderValue,
} from './headers/header-predicates.js';
export {
  createBoundedRange,
  createRightUnboundedRange,
  createSuffixRange,
  formatByteRange,
  isSuffixByteRange,
  isValidByteRange,
  parseRangeHeader,
  resolveByteRange,
} from './headers/range.js';
export { parseRetryAfterHeader } from './headers/retry-after.js';
export { default as createHttpError, createRangeNotSatisfiable, HttpError } from './createHttpError.js';
export { InvalidHeaderNameError, InvalidLanguageTagError } from './errors.js';
export {
  isAsciiDigit,
  isLWS,
  isParamName,
  isToken,
  isTokenChar,
  lowerCaseEquals,
  toAsciiLowerCase,
  trimLWS,
} from './utils/chars.js';
export {
  ParseIntError,
  ParseIntFormat,
  parseInt32,
  parseSafeInt,
  parseSafeUint,
  parseUint32,
  type ParseIntResult,
} from './utils/number.js';
export { quote, strictUnquote, unquote } from './utils/quote.js';
export {
  createStringTokenizer,
  nextToken,
  tokenize,
  type StringTokenizerState,
} from './utils/string-tokenizer.js';
export type * from './types.js';
export * from './specs.js';
