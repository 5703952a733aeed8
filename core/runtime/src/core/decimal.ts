import { Decimal } from 'decimal.js';

export type DecimalCtor = Decimal.Constructor;

/** Working digits used when precision is `auto`. */
export const AUTO_DIGITS = 100;

/** Largest digit count accepted for the precision and for `pi[d]` / `e[d]`. */
export const MAX_PRECISION = 10_000;

export type Precision = number | 'auto';

export function workingDigits(p: Precision): number {
  return p === 'auto' ? AUTO_DIGITS : p;
}

/**
 * A Decimal constructor private to one session, so that changing the
 * precision of one calculator never leaks into another.
 */
export function makeDecimal(digits: number): DecimalCtor {
  return Decimal.clone({
    precision: digits,
    rounding: Decimal.ROUND_HALF_EVEN,
    modulo: Decimal.ROUND_DOWN,
  });
}

export { Decimal };
