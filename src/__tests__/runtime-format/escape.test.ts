/**
 * Unit tests for brace escaping.
 */

import { describe, it, expect } from 'vitest';
import { escapeBraces, formatString } from '../../runtime-format/index.js';

describe('escapeBraces', () => {
  it('should double every curly brace', () => {
    expect(escapeBraces('{hello}')).toBe('{{hello}}');
    expect(escapeBraces('}{')).toBe('}}{{');
  });

  it('should return unchanged string when no braces', () => {
    expect(escapeBraces('no braces here')).toBe('no braces here');
    expect(escapeBraces('')).toBe('');
  });

  it('should make arbitrary text render verbatim', () => {
    const samples = ['{', '}', '{}', '}{', '{{', 'a{1:2', 'x{y}z', 'function foo() { return { a: 1 }; }'];
    for (const sample of samples) {
      expect(formatString(escapeBraces(sample), [1, 2])).toBe(sample);
    }
  });

  it('should keep escaped user content apart from real placeholders', () => {
    const template = `Hello ${escapeBraces('{name}')}, you are {}`;
    expect(formatString(template, [30])).toBe('Hello {name}, you are 30');
  });
});
