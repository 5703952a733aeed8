import type { Decimal } from 'decimal.js';
import type { Complex } from './complex.js';
import type { Precision } from './decimal.js';

// Magnitudes in [LOWER, UPPER) print in plain decimal notation.
const LOWER = '0.0001';
const UPPER = '1000000';

export function formatReal(x: Decimal, precision: Precision): string {
  if (x.isZero()) return '0';
  if (precision === 'auto') return x.toString();
  const v = x.toSignificantDigits(precision);
  const abs = v.abs();
  if (abs.gte(LOWER) && abs.lt(UPPER)) return v.toFixed();
  return v.toExponential();
}

function formatImaginary(im: Decimal, precision: Precision): string {
  if (im.eq(1)) return 'i';
  if (im.eq(-1)) return '-i';
  return `${formatReal(im, precision)}i`;
}

/**
 * Prints `a`, `bi` or `a+bi` / `a-bi`; a unit imaginary coefficient prints
 * as a bare `i`.
 */
export function formatComplex(z: Complex, precision: Precision): string {
  if (z.im.isZero()) return formatReal(z.re, precision);
  const imag = formatImaginary(z.im, precision);
  if (z.re.isZero()) return imag;
  return `${formatReal(z.re, precision)}${z.im.isNeg() ? '' : '+'}${imag}`;
}
