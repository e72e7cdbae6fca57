import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import { parseRetryAfterHeader } from './retry-after.js';

const NOW = new Date('1994-11-06T08:49:00.000Z');

describe('parseRetryAfterHeader', () => {
  describe('delay-seconds', () => {
    it('应该解析秒数', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('120', NOW), { valid: true, delaySeconds: 120 });
      assert.deepStrictEqual(parseRetryAfterHeader('0', NOW), { valid: true, delaySeconds: 0 });
      assert.deepStrictEqual(parseRetryAfterHeader(' 30 ', NOW), { valid: true, delaySeconds: 30 });
    });

    it('应该接受 uint32 上限', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('4294967295', NOW), {
        valid: true,
        delaySeconds: 4294967295,
      });
    });

    it('应该拒绝溢出的秒数', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('4294967296', NOW), {
        valid: false,
        reason: 'invalid delay-seconds: failed_overflow',
      });
    });

    it('应该拒绝非数字字符', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('12a', NOW), {
        valid: false,
        reason: 'invalid delay-seconds: failed_parse',
      });
    });
  });

  describe('HTTP-date', () => {
    it('应该计算到该日期的秒数', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('Sun, 06 Nov 1994 08:49:37 GMT', NOW), {
        valid: true,
        delaySeconds: 37,
      });
    });

    it('应该向上取整', () => {
      const now = new Date('1994-11-06T08:49:00.500Z');
      assert.deepStrictEqual(parseRetryAfterHeader('Sun, 06 Nov 1994 08:49:37 GMT', now), {
        valid: true,
        delaySeconds: 37,
      });
    });

    it('应该接受当前时间', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('Sun, 06 Nov 1994 08:49:00 GMT', NOW), {
        valid: true,
        delaySeconds: 0,
      });
    });

    it('应该拒绝过去的日期', () => {
      assert.deepStrictEqual(parseRetryAfterHeader('Sun, 06 Nov 1994 08:48:59 GMT', NOW), {
        valid: false,
        reason: 'retry date is in the past',
      });
    });
  });

  it('应该拒绝其他值', () => {
    for (const value of ['', '-1', 'soon', '1.5e3 seconds later']) {
      assert.strictEqual(parseRetryAfterHeader(value, NOW).valid, false, value);
    }
    assert.deepStrictEqual(parseRetryAfterHeader('-1', NOW), {
      valid: false,
      reason: 'expected delay-seconds or an HTTP-date',
    });
  });
});
