import { describe, it, expect } from 'vitest';
import { ComplexMath } from '../src/core/complex.js';
import { formatComplex, formatReal } from '../src/core/format.js';

const math = new ComplexMath(32);

describe('formatComplex', () => {
  it.each([
    [0, 0, '0'],
    [0, 1, 'i'],
    [0, -1, '-i'],
    [0, -2.5, '-2.5i'],
    [3, 1, '3+i'],
    [3, -1, '3-i'],
    [1, 2, '1+2i'],
    [-4, -0.5, '-4-0.5i'],
  ])('prints %s + %si as %s', (re, im, text) => {
    expect(formatComplex(math.of(re, im), 32)).toBe(text);
  });
});

describe('formatReal', () => {
  it('uses plain notation inside [0.0001, 1000000)', () => {
    expect(formatReal(math.dec('0.0001'), 32)).toBe('0.0001');
    expect(formatReal(math.dec('999999.5'), 32)).toBe('999999.5');
  });

  it('switches to scientific notation outside that band', () => {
    expect(formatReal(math.dec('1234567'), 32)).toBe('1.234567e+6');
    expect(formatReal(math.dec('0.00009'), 32)).toBe('9e-5');
  });

  it('rounds to the precision before choosing a notation', () => {
    expect(formatReal(math.dec('3.14159'), 3)).toBe('3.14');
    expect(formatReal(math.dec('999999'), 3)).toBe('1e+6');
  });

  it('prints the full value in auto precision', () => {
    expect(formatReal(math.dec('0.25'), 'auto')).toBe('0.25');
    expect(formatReal(math.dec('1e30'), 'auto')).toBe('1e+30');
  });
});
