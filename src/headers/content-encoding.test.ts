import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import { parseAcceptEncoding, parseContentEncoding } from './content-encoding.js';

describe('parseAcceptEncoding', () => {
  it('should drop codings with q=0 and add identity', () => {
    assert.deepStrictEqual(parseAcceptEncoding('gzip;q=0, br'), {
      valid: true,
      encodings: new Set(['br', 'identity']),
    });
  });

  it('should allow anything for an empty header', () => {
    assert.deepStrictEqual(parseAcceptEncoding(''), {
      valid: true,
      encodings: new Set(['*']),
    });
    assert.deepStrictEqual(parseAcceptEncoding(' , '), {
      valid: true,
      encodings: new Set(['*']),
    });
  });

  it('should allow anything when every coding is excluded', () => {
    assert.deepStrictEqual(parseAcceptEncoding('gzip;q=0.000'), {
      valid: true,
      encodings: new Set(['*']),
    });
  });

  it('should mirror the gzip and compress aliases', () => {
    assert.deepStrictEqual(parseAcceptEncoding('gzip, deflate'), {
      valid: true,
      encodings: new Set(['gzip', 'x-gzip', 'deflate', 'identity']),
    });
    assert.deepStrictEqual(parseAcceptEncoding('x-compress'), {
      valid: true,
      encodings: new Set(['x-compress', 'compress', 'identity']),
    });
  });

  it('should lower-case the codings', () => {
    assert.deepStrictEqual(parseAcceptEncoding('BR'), {
      valid: true,
      encodings: new Set(['br', 'identity']),
    });
  });

  it('should accept the q-value forms of one', () => {
    for (const qvalue of ['1', '1.0', '1.00', '1.000']) {
      const result = parseAcceptEncoding(`br;q=${qvalue}`);
      assert.deepStrictEqual(result, { valid: true, encodings: new Set(['br', 'identity']) });
    }
  });

  it('should accept non-zero fractional q-values', () => {
    assert.deepStrictEqual(parseAcceptEncoding('br;Q=0.5 , deflate ; q = 0.001'), {
      valid: true,
      encodings: new Set(['br', 'deflate', 'identity']),
    });
  });

  it('should reject malformed q-values', () => {
    for (const qvalue of ['', '1.', '1.5', '1.0000', '2', '0.', '0.0001', '0.a', '.5', '-0']) {
      assert.strictEqual(parseAcceptEncoding(`br;q=${qvalue}`).valid, false, qvalue);
    }
  });

  it('should reject parameters other than q', () => {
    assert.deepStrictEqual(parseAcceptEncoding('gzip;level=1'), {
      valid: false,
      reason: 'unexpected parameter for gzip: level=1',
    });
    assert.strictEqual(parseAcceptEncoding('gzip;q').valid, false);
  });

  it('should reject quoted strings', () => {
    assert.deepStrictEqual(parseAcceptEncoding('gzip;q="1"'), {
      valid: false,
      reason: 'quoted strings are not supported',
    });
  });

  it('should reject codings containing whitespace', () => {
    assert.deepStrictEqual(parseAcceptEncoding('g zip'), {
      valid: false,
      reason: 'invalid content-coding: g zip',
    });
    assert.strictEqual(parseAcceptEncoding('g zip;q=1').valid, false);
  });

  it('should reject a parameter without a coding', () => {
    assert.strictEqual(parseAcceptEncoding(';q=1').valid, false);
  });
});

describe('parseContentEncoding', () => {
  it('should collect codings in lower case', () => {
    assert.deepStrictEqual(parseContentEncoding('GZIP, br'), {
      valid: true,
      encodings: new Set(['gzip', 'br']),
    });
  });

  it('should return an empty set for an empty header', () => {
    assert.deepStrictEqual(parseContentEncoding(''), {
      valid: true,
      encodings: new Set(),
    });
  });

  it('should reject parameters, quotes and wildcards', () => {
    for (const value of ['gzip;q=1', 'gzip=1', '"gzip"', '*']) {
      assert.deepStrictEqual(
        parseContentEncoding(value),
        { valid: false, reason: 'content-coding parameters are not allowed' },
        value,
      );
    }
  });

  it('should reject codings containing whitespace', () => {
    assert.deepStrictEqual(parseContentEncoding('gzip, de flate'), {
      valid: false,
      reason: 'invalid content-coding: de flate',
    });
  });
});
