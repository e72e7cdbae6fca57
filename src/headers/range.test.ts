import * as assert from 'node:assert';
import { describe, test } from 'node:test';

import { HttpError } from '../createHttpError.js';
import {
  createBoundedRange,
  createRightUnboundedRange,
  createSuffixRange,
  formatByteRange,
  isSuffixByteRange,
  isValidByteRange,
  parseRangeHeader,
  resolveByteRange,
} from './range.js';

describe('parseRangeHeader', () => {
  describe('正常情况', () => {
    test('解析完整范围 "bytes=0-499"', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=0-499'), {
        valid: true,
        ranges: [{ firstBytePosition: 0, lastBytePosition: 499 }],
      });
    });

    test('解析开始范围 "bytes=500-"', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=500-'), {
        valid: true,
        ranges: [{ firstBytePosition: 500 }],
      });
    });

    test('解析后缀范围 "bytes=-500"', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=-500'), {
        valid: true,
        ranges: [{ suffixLength: 500 }],
      });
    });

    test('处理空格 " bytes = 200 - 300 "', () => {
      assert.deepStrictEqual(parseRangeHeader(' bytes = 200 - 300 '), {
        valid: true,
        ranges: [{ firstBytePosition: 200, lastBytePosition: 300 }],
      });
    });

    test('大小写不敏感 "BYTES=0-100"', () => {
      const result = parseRangeHeader('BYTES=0-100');
      assert.strictEqual(result.valid, true);
    });

    test('解析多个范围', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=0-0,-500, 1000-'), {
        valid: true,
        ranges: [
          { firstBytePosition: 0, lastBytePosition: 0 },
          { suffixLength: 500 },
          { firstBytePosition: 1000 },
        ],
      });
    });

    test('忽略空的范围项', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=0-1,,2-3'), {
        valid: true,
        ranges: [
          { firstBytePosition: 0, lastBytePosition: 1 },
          { firstBytePosition: 2, lastBytePosition: 3 },
        ],
      });
    });
  });

  describe('无效格式', () => {
    test('结束位置小于开始位置', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=500-200'), {
        valid: false,
        reason: 'invalid range: 500-200',
      });
    });

    test('缺少 "="', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes 0-1'), {
        valid: false,
        reason: 'missing "=" after range unit',
      });
    });

    test('不支持的单位', () => {
      assert.deepStrictEqual(parseRangeHeader('items=0-1'), {
        valid: false,
        reason: 'unsupported range unit',
      });
    });

    test('空的范围集合', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes='), {
        valid: false,
        reason: 'empty byte-range-set',
      });
      assert.strictEqual(parseRangeHeader('bytes= , ').valid, false);
    });

    test('缺少 "-"', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=100'), {
        valid: false,
        reason: 'missing "-" in range: 100',
      });
    });

    test('开始和结束都为空', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=-'), {
        valid: false,
        reason: 'range has neither first-byte-pos nor suffix-length',
      });
    });

    test('后缀长度为 0', () => {
      assert.strictEqual(parseRangeHeader('bytes=-0').valid, false);
    });

    test('非数字的位置', () => {
      assert.deepStrictEqual(parseRangeHeader('bytes=a-1'), {
        valid: false,
        reason: 'invalid first-byte-pos: a',
      });
      assert.deepStrictEqual(parseRangeHeader('bytes=1-b'), {
        valid: false,
        reason: 'invalid last-byte-pos: b',
      });
      assert.strictEqual(parseRangeHeader('bytes=+1-2').valid, false);
      assert.strictEqual(parseRangeHeader('bytes=1.5-2').valid, false);
    });

    test('超出安全整数范围', () => {
      assert.strictEqual(parseRangeHeader('bytes=9007199254740992-').valid, false);
      assert.strictEqual(parseRangeHeader('bytes=9007199254740991-').valid, true);
    });

    test('一个无效的范围使整个头无效', () => {
      assert.strictEqual(parseRangeHeader('bytes=0-1, 5-2').valid, false);
    });
  });
});

describe('isValidByteRange', () => {
  test('should accept the three range shapes', () => {
    assert.strictEqual(isValidByteRange(createBoundedRange(0, 0)), true);
    assert.strictEqual(isValidByteRange(createRightUnboundedRange(10)), true);
    assert.strictEqual(isValidByteRange(createSuffixRange(1)), true);
  });

  test('should reject malformed ranges', () => {
    assert.strictEqual(isValidByteRange({}), false);
    assert.strictEqual(isValidByteRange(createBoundedRange(5, 4)), false);
    assert.strictEqual(isValidByteRange(createSuffixRange(0)), false);
    assert.strictEqual(isValidByteRange({ firstBytePosition: 0, suffixLength: 3 }), false);
    assert.strictEqual(isValidByteRange({ lastBytePosition: 3 }), false);
  });

  test('isSuffixByteRange', () => {
    assert.strictEqual(isSuffixByteRange(createSuffixRange(3)), true);
    assert.strictEqual(isSuffixByteRange(createRightUnboundedRange(3)), false);
  });
});

describe('resolveByteRange', () => {
  test('解析完整范围', () => {
    assert.deepStrictEqual(resolveByteRange(createBoundedRange(0, 499), 1000), [0, 499]);
  });

  test('解析后缀范围', () => {
    assert.deepStrictEqual(resolveByteRange(createSuffixRange(500), 1000), [500, 999]);
    assert.deepStrictEqual(resolveByteRange(createSuffixRange(2000), 1000), [0, 999]);
  });

  test('解析开始范围', () => {
    assert.deepStrictEqual(resolveByteRange(createRightUnboundedRange(500), 1000), [500, 999]);
  });

  test('结束位置超出内容大小时截断', () => {
    assert.deepStrictEqual(resolveByteRange(createBoundedRange(0, 5000), 1000), [0, 999]);
  });

  test('空范围覆盖整个内容', () => {
    assert.deepStrictEqual(resolveByteRange({}, 1000), [0, 999]);
  });

  test('开始位置超出内容大小', () => {
    assert.throws(
      () => resolveByteRange(createRightUnboundedRange(1000), 1000),
      (error: unknown) => {
        assert.ok(error instanceof HttpError);
        assert.strictEqual(error.statusCode, 416);
        assert.deepStrictEqual(error.headers, { 'content-range': 'bytes */1000' });
        return true;
      },
    );
  });

  test('内容大小为 0', () => {
    assert.throws(
      () => resolveByteRange(createBoundedRange(0, 0), 0),
      { statusCode: 416, message: 'Range not satisfiable: empty content' },
    );
  });

  test('无效的范围', () => {
    assert.throws(
      () => resolveByteRange(createBoundedRange(5, 2), 1000),
      { statusCode: 400, message: 'Invalid range' },
    );
  });

  test('无效的内容大小', () => {
    assert.throws(() => resolveByteRange({}, -1), TypeError);
    assert.throws(() => resolveByteRange({}, 1.5), TypeError);
  });
});

describe('formatByteRange', () => {
  test('should format each range shape', () => {
    assert.strictEqual(formatByteRange(createBoundedRange(0, 499)), 'bytes=0-499');
    assert.strictEqual(formatByteRange(createRightUnboundedRange(500)), 'bytes=500-');
    assert.strictEqual(formatByteRange(createSuffixRange(500)), 'bytes=-500');
  });

  test('should round-trip through parseRangeHeader', () => {
    const range = createBoundedRange(10, 20);
    assert.deepStrictEqual(parseRangeHeader(formatByteRange(range)), {
      valid: true,
      ranges: [range],
    });
  });

  test('should throw on an invalid range', () => {
    assert.throws(() => formatByteRange(createBoundedRange(3, 1)), TypeError);
  });
});
