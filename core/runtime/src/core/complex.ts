import type { Decimal } from 'decimal.js';
import { makeDecimal, type DecimalCtor } from './decimal.js';
import { evalError } from './errors.js';
import { gamma } from './special.js';

/**
 * An immutable complex value with arbitrary-precision parts. Both parts are
 * always instances of the owning session's Decimal constructor.
 */
export class Complex {
  constructor(
    readonly re: Decimal,
    readonly im: Decimal,
  ) {}

  isReal(): boolean {
    return this.im.isZero();
  }

  isZero(): boolean {
    return this.re.isZero() && this.im.isZero();
  }

  isInteger(): boolean {
    return this.im.isZero() && this.re.isInteger();
  }

  equals(other: Complex): boolean {
    return this.re.eq(other.re) && this.im.eq(other.im);
  }

  /** Equal values always produce equal keys, whatever their source text. */
  key(): string {
    return `${this.re.toString()}|${this.im.toString()}`;
  }
}

/**
 * Complex arithmetic and transcendental functions over one configurable
 * Decimal constructor.
 */
export class ComplexMath {
  private readonly D: DecimalCtor;
  private roundNumerals: boolean;

  /** With `roundNumerals`, numerals are rounded to `digits` as they are read. */
  constructor(digits: number, roundNumerals = true) {
    this.D = makeDecimal(digits);
    this.roundNumerals = roundNumerals;
  }

  get ctor(): DecimalCtor {
    return this.D;
  }

  get digits(): number {
    return this.D.precision;
  }

  setDigits(digits: number, roundNumerals = true): void {
    this.D.set({ precision: digits });
    this.roundNumerals = roundNumerals;
  }

  dec(x: Decimal.Value): Decimal {
    return new this.D(x);
  }

  of(re: Decimal.Value, im: Decimal.Value): Complex {
    return new Complex(this.dec(re), this.dec(im));
  }

  real(x: Decimal.Value): Complex {
    return this.of(x, 0);
  }

  get zero(): Complex {
    return this.of(0, 0);
  }

  get one(): Complex {
    return this.of(1, 0);
  }

  get i(): Complex {
    return this.of(0, 1);
  }

  /** Reads a numeral; a trailing `i` makes it purely imaginary. */
  parse(text: string): Complex {
    const imaginary = text.endsWith('i');
    let value = this.dec(imaginary ? text.slice(0, -1) : text);
    if (this.roundNumerals) value = value.toSignificantDigits(this.digits);
    return imaginary ? this.of(0, value) : this.real(value);
  }

  pi(digits?: number): Decimal {
    return digits === undefined ? this.D.acos(-1) : this.dec(makeDecimal(digits).acos(-1));
  }

  e(digits?: number): Decimal {
    return digits === undefined ? this.D.exp(1) : this.dec(makeDecimal(digits).exp(1));
  }

  random(): Decimal {
    return this.D.random();
  }

  gamma(x: Decimal): Decimal {
    return gamma(x, this.D);
  }

  neg(z: Complex): Complex {
    return new Complex(z.re.neg(), z.im.neg());
  }

  conj(z: Complex): Complex {
    return new Complex(z.re, z.im.neg());
  }

  add(a: Complex, b: Complex): Complex {
    return new Complex(a.re.plus(b.re), a.im.plus(b.im));
  }

  sub(a: Complex, b: Complex): Complex {
    return new Complex(a.re.minus(b.re), a.im.minus(b.im));
  }

  mul(a: Complex, b: Complex): Complex {
    if (a.isReal() && b.isReal()) return this.real(a.re.times(b.re));
    return new Complex(
      a.re.times(b.re).minus(a.im.times(b.im)),
      a.re.times(b.im).plus(a.im.times(b.re)),
    );
  }

  div(a: Complex, b: Complex): Complex {
    if (b.isZero()) throw evalError('division by zero');
    if (b.isReal()) return new Complex(a.re.div(b.re), a.im.div(b.re));
    const den = b.re.times(b.re).plus(b.im.times(b.im));
    return new Complex(
      a.re.times(b.re).plus(a.im.times(b.im)).div(den),
      a.im.times(b.re).minus(a.re.times(b.im)).div(den),
    );
  }

  /** Real remainder; the result takes the sign of the dividend. */
  mod(a: Complex, b: Complex): Complex {
    if (!a.isReal() || !b.isReal())
      throw evalError('cannot apply remainder operator to complex numbers.');
    if (b.re.isZero()) throw evalError('division by zero');
    return this.real(a.re.mod(b.re));
  }

  pow(base: Complex, exponent: Complex): Complex {
    if (exponent.isInteger()) return this.intPow(base, exponent.re);
    if (base.isZero()) {
      if (exponent.re.isPos()) return this.zero;
      throw evalError('zero cannot be raised to a power with a non-positive real part');
    }
    if (base.isReal() && base.re.isPos() && exponent.isReal())
      return this.real(base.re.pow(exponent.re));
    return this.exp(this.mul(exponent, this.ln(base)));
  }

  /** Exponentiation by squaring, exact up to the working precision. */
  intPow(base: Complex, n: Decimal): Complex {
    if (n.isZero()) return this.one;
    if (n.eq(1)) return base;
    if (n.eq(-1)) return this.div(this.one, base);
    const half = this.intPow(base, n.divToInt(2));
    const squared = this.mul(half, half);
    const rem = n.mod(2);
    if (rem.eq(1)) return this.mul(squared, base);
    if (rem.eq(-1)) return this.div(squared, base);
    return squared;
  }

  abs(z: Complex): Decimal {
    if (z.isReal()) return z.re.abs();
    return this.D.hypot(z.re, z.im);
  }

  arg(z: Complex): Decimal {
    return this.D.atan2(z.im, z.re);
  }

  exp(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.exp());
    const m = z.re.exp();
    return new Complex(m.times(z.im.cos()), m.times(z.im.sin()));
  }

  ln(z: Complex): Complex {
    if (z.isZero()) throw evalError('logarithm of zero is undefined');
    if (z.isReal() && z.re.isPos()) return this.real(z.re.ln());
    return new Complex(this.abs(z).ln(), this.arg(z));
  }

  log(base: Complex, z: Complex): Complex {
    return this.div(this.ln(z), this.ln(base));
  }

  sqrt(z: Complex): Complex {
    if (z.isReal()) {
      if (z.re.isNeg()) return this.of(0, z.re.neg().sqrt());
      return this.real(z.re.sqrt());
    }
    const r = this.abs(z);
    const x = r.plus(z.re).div(2).sqrt();
    const y = r.minus(z.re).div(2).sqrt();
    return new Complex(x, z.im.isNeg() ? y.neg() : y);
  }

  sin(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.sin());
    return new Complex(z.re.sin().times(z.im.cosh()), z.re.cos().times(z.im.sinh()));
  }

  cos(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.cos());
    return new Complex(z.re.cos().times(z.im.cosh()), z.re.sin().times(z.im.sinh()).neg());
  }

  tan(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.tan());
    return this.div(this.sin(z), this.cos(z));
  }

  sinh(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.sinh());
    return new Complex(z.re.sinh().times(z.im.cos()), z.re.cosh().times(z.im.sin()));
  }

  cosh(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.cosh());
    return new Complex(z.re.cosh().times(z.im.cos()), z.re.sinh().times(z.im.sin()));
  }

  tanh(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.tanh());
    return this.div(this.sinh(z), this.cosh(z));
  }

  // asin z = -i ln(iz + sqrt(1 - z^2))
  asin(z: Complex): Complex {
    if (z.isReal() && z.re.abs().lte(1)) return this.real(z.re.asin());
    const w = this.ln(this.add(this.mul(this.i, z), this.sqrt(this.sub(this.one, this.mul(z, z)))));
    return new Complex(w.im, w.re.neg());
  }

  acos(z: Complex): Complex {
    if (z.isReal() && z.re.abs().lte(1)) return this.real(z.re.acos());
    return this.sub(this.real(this.pi().div(2)), this.asin(z));
  }

  // atan z = (i/2) ln((i + z) / (i - z))
  atan(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.atan());
    if (z.re.isZero() && z.im.abs().eq(1)) throw evalError('atan is undefined at ±i');
    const w = this.ln(this.div(this.add(this.i, z), this.sub(this.i, z)));
    return new Complex(w.im.neg().div(2), w.re.div(2));
  }

  asinh(z: Complex): Complex {
    if (z.isReal()) return this.real(z.re.asinh());
    return this.ln(this.add(z, this.sqrt(this.add(this.mul(z, z), this.one))));
  }

  acosh(z: Complex): Complex {
    if (z.isReal() && z.re.gte(1)) return this.real(z.re.acosh());
    const roots = this.mul(this.sqrt(this.add(z, this.one)), this.sqrt(this.sub(z, this.one)));
    return this.ln(this.add(z, roots));
  }

  atanh(z: Complex): Complex {
    if (z.isReal() && z.re.abs().lt(1)) return this.real(z.re.atanh());
    if (z.isReal() && z.re.abs().eq(1)) throw evalError('atanh is undefined at ±1');
    const w = this.ln(this.div(this.add(this.one, z), this.sub(this.one, z)));
    return new Complex(w.re.div(2), w.im.div(2));
  }

  sinc(z: Complex): Complex {
    if (z.isZero()) return this.one;
    return this.div(this.sin(z), z);
  }
}
