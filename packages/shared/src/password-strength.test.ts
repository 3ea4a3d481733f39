import { describe, expect, it } from 'vitest';
import {
  assessStrength,
  calculateEntropy,
  scorePassword,
  strengthForEntropy,
} from './password-strength';

describe('calculateEntropy', () => {
  it('returns 0 for an empty string', () => {
    expect(calculateEntropy('')).toBe(0);
  });

  it('sizes the alphabet from lowercase letters only', () => {
    expect(calculateEntropy('abcd')).toBeCloseTo(Math.log2(26) * 4, 10);
    expect(calculateEntropy('abcd')).toBeCloseTo(18.8, 1);
  });

  it('adds every class present in the string', () => {
    expect(calculateEntropy('aB3!')).toBeCloseTo(Math.log2(94) * 4, 10);
    expect(calculateEntropy('AB12')).toBeCloseTo(Math.log2(36) * 4, 10);
  });

  it('counts symbols from the full punctuation set', () => {
    expect(calculateEntropy('!!!!!!')).toBe(30);
    expect(calculateEntropy('~`\\"')).toBe(20);
  });

  it('returns 0 when no glyph belongs to a known class', () => {
    expect(calculateEntropy('    ')).toBe(0);
  });

  it('counts code points rather than UTF-16 units', () => {
    expect(calculateEntropy('ab\u{1F511}')).toBeCloseTo(Math.log2(26) * 3, 10);
  });
});

describe('strengthForEntropy', () => {
  it('maps each band with an inclusive lower bound', () => {
    expect(strengthForEntropy(0)).toBe('Very Weak');
    expect(strengthForEntropy(29.99)).toBe('Very Weak');
    expect(strengthForEntropy(30)).toBe('Weak');
    expect(strengthForEntropy(49.99)).toBe('Weak');
    expect(strengthForEntropy(50)).toBe('Fair');
    expect(strengthForEntropy(70)).toBe('Strong');
    expect(strengthForEntropy(89.99)).toBe('Strong');
    expect(strengthForEntropy(90)).toBe('Very Strong');
    expect(strengthForEntropy(512)).toBe('Very Strong');
  });
});

describe('assessStrength', () => {
  it('returns the higher band at an exact boundary', () => {
    expect(assessStrength('!!!!!!')).toBe('Weak');
  });

  it('labels an empty string as very weak', () => {
    expect(assessStrength('')).toBe('Very Weak');
  });

  it('labels a long mixed password as very strong', () => {
    expect(assessStrength('aB3!aB3!aB3!aB3!')).toBe('Very Strong');
  });
});

describe('scorePassword', () => {
  it('returns entropy and label together', () => {
    expect(scorePassword('!!!!!!!!!!')).toEqual({ entropyBits: 50, label: 'Fair' });
  });
});
