/**
 * error-helpers.test.ts
 * Tests for error utility functions
 */

import { describe, it, expect } from 'vitest';
import { getErrorCode, getErrorMessage } from '../../src/utils/error-helpers.js';

describe('error-helpers', () => {
  describe('getErrorMessage', () => {
    it('should extract message from Error object', () => {
      expect(getErrorMessage(new Error('test error'))).toBe('test error');
    });

    it('should return string error as-is', () => {
      expect(getErrorMessage('string error')).toBe('string error');
    });

    it('should convert unknown to string', () => {
      expect(getErrorMessage(123)).toBe('123');
      expect(getErrorMessage(null)).toBe('null');
      expect(getErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('getErrorCode', () => {
    it('should read the code of the error itself', () => {
      const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });
      expect(getErrorCode(error)).toBe('ECONNREFUSED');
    });

    it('should follow the cause chain', () => {
      const root = Object.assign(new Error('timeout'), { code: 'UND_ERR_HEADERS_TIMEOUT' });
      const wrapped = new Error('fetch failed', { cause: new Error('inner', { cause: root }) });
      expect(getErrorCode(wrapped)).toBe('UND_ERR_HEADERS_TIMEOUT');
    });

    it('should ignore non-string codes and non-errors', () => {
      expect(getErrorCode(Object.assign(new Error('x'), { code: 42 }))).toBeUndefined();
      expect(getErrorCode({ code: 'ECONNREFUSED' })).toBeUndefined();
      expect(getErrorCode(new Error('plain'))).toBeUndefined();
    });
  });
});
