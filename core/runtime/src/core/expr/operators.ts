import type { Complex, ComplexMath } from '../complex.js';
import type { OperatorSymbol } from './types.js';

const MULTIPLICATIVE: ReadonlySet<OperatorSymbol> = new Set(['*', '/', '%']);

/**
 * True when `a` binds tighter than `b` already on the stack. Equal
 * precedence is never true, so operators reduce left to right; this holds
 * for `^` as well, making `2^3^2` equal 64.
 */
export function precedes(a: OperatorSymbol, b: OperatorSymbol): boolean {
  if (a === '^' || b === '^') return a === '^' && b !== '^';
  return MULTIPLICATIVE.has(a) && !MULTIPLICATIVE.has(b);
}

export function applyOperator(op: OperatorSymbol, left: Complex, right: Complex, math: ComplexMath): Complex {
  switch (op) {
    case '+':
      return math.add(left, right);
    case '-':
      return math.sub(left, right);
    case '*':
      return math.mul(left, right);
    case '/':
      return math.div(left, right);
    case '%':
      return math.mod(left, right);
    case '^':
      return math.pow(left, right);
  }
}
