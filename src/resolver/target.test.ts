/**
 * Unit tests for target parsing.
 */

import { describe, it, expect } from 'vitest';
import { isIdentifier, parseTarget } from './target.js';

describe('isIdentifier', () => {
  it('accepts 17 to 20 digit strings', () => {
    expect(isIdentifier('12345678901234567')).toBe(true);
    expect(isIdentifier('123456789012345678')).toBe(true);
    expect(isIdentifier('12345678901234567890')).toBe(true);
  });

  it('rejects digit strings outside the length range', () => {
    expect(isIdentifier('1234567890123456')).toBe(false);
    expect(isIdentifier('123456789012345678901')).toBe(false);
    expect(isIdentifier('18005551234')).toBe(false);
    expect(isIdentifier('')).toBe(false);
  });

  it('rejects anything that is not all digits', () => {
    expect(isIdentifier('12345678901234567a')).toBe(false);
    expect(isIdentifier(' 123456789012345678')).toBe(false);
    expect(isIdentifier('-123456789012345678')).toBe(false);
    expect(isIdentifier('general')).toBe(false);
  });
});

describe('parseTarget', () => {
  it('returns a bare name without scope', () => {
    expect(parseTarget('general')).toEqual({ reference: 'general' });
  });

  it('splits a scoped target on the separator', () => {
    expect(parseTarget('MyServer/general')).toEqual({ scope: 'MyServer', reference: 'general' });
  });

  it('trims whitespace around both parts', () => {
    expect(parseTarget('  My Server / general  ')).toEqual({ scope: 'My Server', reference: 'general' });
  });

  it('splits on the first separator only', () => {
    expect(parseTarget('MyServer/dev/ops')).toEqual({ scope: 'MyServer', reference: 'dev/ops' });
  });

  it('keeps an identifier whole', () => {
    expect(parseTarget('123456789012345678')).toEqual({ reference: '123456789012345678' });
  });

  it('trims an unscoped reference', () => {
    expect(parseTarget('  @alice ')).toEqual({ reference: '@alice' });
  });
});
