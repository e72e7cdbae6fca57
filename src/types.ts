export interface HeaderEntry {
  name: string;
  value: string;
}

export interface NameValuePair {
  name: string;
  // value as it appears on the wire, surrounding quotes included
  rawValue: string;
  // unescaped value when quoted, otherwise the raw value
  value: string;
  isQuoted: boolean;
}

export interface HeadersIteratorOptions {
  lineDelimiters: string;
  hasStatusLine: boolean;
}

export interface ValuesIteratorOptions {
  ignoreEmptyValues: boolean;
}

export interface NameValuePairsOptions {
  valuesRequired: boolean;
  strictQuotes: boolean;
}

export interface StringTokenizerOptions {
  quoteChars?: string;
  returnEmptyTokens?: boolean;
}

export interface ByteRange {
  firstBytePosition?: number;
  lastBytePosition?: number;
  suffixLength?: number;
}

export interface ContentRangeSpec {
  firstBytePosition: number;
  lastBytePosition: number;
  instanceLength: number;
}

export interface ContentTypeState {
  mimeType: string;
  charset: string;
  hadCharset: boolean;
  boundary: string | null;
}

export interface ContentTypeOptions {
  boundary?: boolean;
}

export interface ValidationError {
  valid: false;
  reason: string;
}

export type RangeHeaderResult =
  | {
      valid: true;
      ranges: ByteRange[];
    }
  | ValidationError;

export type ContentRangeResult =
  | ({ valid: true } & ContentRangeSpec)
  | (ValidationError & {
      firstBytePosition: -1;
      lastBytePosition: -1;
      instanceLength: -1;
    });

export type EncodingSetResult =
  | {
      valid: true;
      encodings: Set<string>;
    }
  | ValidationError;

export type RetryAfterResult =
  | {
      valid: true;
      delaySeconds: number;
    }
  | ValidationError;

export type UnquoteResult =
  | {
      valid: true;
      value: string;
    }
  | {
      valid: false;
    };
