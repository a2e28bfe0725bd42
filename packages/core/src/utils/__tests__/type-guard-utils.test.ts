import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrorWithMessage, isRecord } from '../type-guard-utils.js';

describe('Type Guard Utilities', () => {
  describe('isErrorWithMessage', () => {
    it('should return true for Error instances and subclasses', () => {
      expect(isErrorWithMessage(new Error('Test error'))).toBe(true);
      expect(isErrorWithMessage(new RangeError('Range error'))).toBe(true);
      expect(isErrorWithMessage(new Error(''))).toBe(true);
    });

    it('should return false for objects that only look like errors', () => {
      expect(isErrorWithMessage({ message: 'not an error', name: 'FakeError' })).toBe(false);
      expect(isErrorWithMessage('error string')).toBe(false);
      expect(isErrorWithMessage(null)).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should extract message from Error instances', () => {
      expect(getErrorMessage(new TypeError('bad cell'))).toBe('bad cell');
    });

    it('should stringify non-errors', () => {
      expect(getErrorMessage('plain string')).toBe('plain string');
      expect(getErrorMessage(42)).toBe('42');
    });

    it('should prefer the default message for non-errors', () => {
      expect(getErrorMessage(undefined, 'Unknown failure')).toBe('Unknown failure');
    });
  });

  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });
});
