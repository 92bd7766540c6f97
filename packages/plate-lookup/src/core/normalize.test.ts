import { describe, it, expect } from 'vitest';
import { isValidPrefix, normalizeCityName, parseInteger, parsePrefix } from './normalize.js';

describe('normalizeCityName', () => {
  it('lower-cases and collapses whitespace', () => {
    expect(normalizeCityName('  White   Sulphur\tSprings ')).toBe('white sulphur springs');
  });

  it('returns an empty key for blank input', () => {
    expect(normalizeCityName(' \t ')).toBe('');
  });
});

describe('parsePrefix', () => {
  it('parses decimal digits with surrounding whitespace', () => {
    expect(parsePrefix('6')).toBe(6);
    expect(parsePrefix(' 49 ')).toBe(49);
    expect(parsePrefix('007')).toBe(7);
  });

  it('returns null for anything else', () => {
    for (const input of ['', 'q', '-1', '4.5', '1e3', '12abc', '+3']) {
      expect(parsePrefix(input)).toBeNull();
    }
  });

  it('returns null past the safe integer range', () => {
    expect(parsePrefix('99999999999999999999')).toBeNull();
  });
});

describe('parseInteger', () => {
  it('accepts an optional minus sign', () => {
    expect(parseInteger(' -5 ')).toBe(-5);
    expect(parseInteger('-1')).toBe(-1);
    expect(parseInteger('49')).toBe(49);
  });

  it('returns null for non-integers', () => {
    for (const input of ['', 'q', '--1', '4.5', '+3', '- 2']) {
      expect(parseInteger(input)).toBeNull();
    }
  });
});

describe('isValidPrefix', () => {
  it('accepts non-negative safe integers only', () => {
    expect(isValidPrefix(0)).toBe(true);
    expect(isValidPrefix(56)).toBe(true);
    expect(isValidPrefix(-1)).toBe(false);
    expect(isValidPrefix(2.5)).toBe(false);
    expect(isValidPrefix(Number.POSITIVE_INFINITY)).toBe(false);
  });
});
