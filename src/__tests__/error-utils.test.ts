/**
 * Unit tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import { getErrorMessage } from '../shared/utils/error.js';
import { SinkOverflowError } from '../runtime-format/index.js';

describe('getErrorMessage', () => {
  it('should extract message from Error instances', () => {
    expect(getErrorMessage(new Error('test error'))).toBe('test error');
  });

  it('should extract message from library errors', () => {
    expect(getErrorMessage(new SinkOverflowError(1, 2))).toBe('Sink capacity exceeded: 2 > 1');
  });

  it('should convert non-Error values with String()', () => {
    expect(getErrorMessage('string error')).toBe('string error');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(null)).toBe('null');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});
