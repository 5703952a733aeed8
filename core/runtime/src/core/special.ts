import type { Decimal } from 'decimal.js';
import type { DecimalCtor } from './decimal.js';
import { evalError } from './errors.js';

// Above this, positive integers go through Spouge like everything else.
const FACTORIAL_LIMIT = 1000;

export function factorial(n: number, D: DecimalCtor): Decimal {
  let acc = new D(1);
  for (let k = 2; k <= n; k++) acc = acc.times(k);
  return acc;
}

/**
 * Gamma function for real arguments, correct to the constructor's precision.
 * Positive integers are exact factorials; arguments below 1/2 use the
 * reflection formula.
 */
export function gamma(x: Decimal, D: DecimalCtor): Decimal {
  if (x.isInteger()) {
    if (x.lte(0)) throw evalError(`gamma is undefined at non-positive integer ${x.toString()}`);
    if (x.lte(FACTORIAL_LIMIT)) return factorial(x.toNumber() - 1, D);
  }
  if (x.lt(0.5)) {
    const pi = D.acos(-1);
    const s = pi.times(x).sin();
    return pi.div(s.times(gamma(new D(1).minus(x), D)));
  }
  return spouge(x, D);
}

// Spouge: Γ(z+1) = (z+a)^(z+1/2) e^-(z+a) [c0 + Σ ck/(z+k)], with relative
// error below (2π)^-(a+1/2).
function spouge(x: Decimal, D: DecimalCtor): Decimal {
  const digits = D.precision;
  const a = Math.ceil((digits * Math.LN10) / Math.log(2 * Math.PI)) + 1;
  const W = D.clone({ precision: 2 * digits + 10 });
  const z = new W(x).minus(1);

  let series = W.acos(-1).times(2).sqrt();
  let fact = new W(1);
  for (let k = 1; k < a; k++) {
    const ak = new W(a - k);
    let c = ak.pow(k - 0.5).times(ak.exp()).div(fact);
    if (k % 2 === 0) c = c.neg();
    series = series.plus(c.div(z.plus(k)));
    fact = fact.times(k);
  }

  const za = z.plus(a);
  const result = za.pow(z.plus(0.5)).times(za.neg().exp()).times(series);
  return new D(result.toSignificantDigits(digits));
}

/** Binomial coefficient; zero when k exceeds n. */
export function choose(n: Decimal, k: Decimal, D: DecimalCtor): Decimal {
  if (k.gt(n)) return new D(0);
  const m = smaller(k, n.minus(k)).toNumber();
  let acc = new D(1);
  for (let j = 1; j <= m; j++) acc = acc.times(n.minus(m).plus(j)).div(j);
  return acc;
}

/** Number of ordered selections of k items from n; zero when k exceeds n. */
export function perm(n: Decimal, k: Decimal, D: DecimalCtor): Decimal {
  if (k.gt(n)) return new D(0);
  let acc = new D(1);
  for (let j = n.minus(k).plus(1); j.lte(n); j = j.plus(1)) acc = acc.times(j);
  return acc;
}

function smaller(a: Decimal, b: Decimal): Decimal {
  return a.lt(b) ? a : b;
}
