import { describe, it, expect } from 'vitest';
import { ComplexMath } from '../src/core/complex.js';
import { choose, perm } from '../src/core/special.js';

const math = new ComplexMath(32);
const D = math.ctor;

describe('ComplexMath', () => {
  it('divides complex numbers', () => {
    const q = math.div(math.of(1, 1), math.of(1, -1));
    expect(q.re.toString()).toBe('0');
    expect(q.im.toString()).toBe('1');
  });

  it('takes the remainder with the sign of the dividend', () => {
    expect(math.mod(math.real(-7), math.real(3)).re.toString()).toBe('-1');
    expect(math.mod(math.real(7), math.real(-3)).re.toString()).toBe('1');
  });

  it('raises to integer powers by squaring, negative odd ones included', () => {
    expect(math.pow(math.real(2), math.real(10)).re.toString()).toBe('1024');
    expect(math.pow(math.real(2), math.real(-3)).re.toString()).toBe('0.125');
    expect(math.pow(math.i, math.real(2)).equals(math.real(-1))).toBe(true);
  });

  it('handles zero bases', () => {
    expect(math.pow(math.zero, math.real(0)).equals(math.one)).toBe(true);
    expect(math.pow(math.zero, math.real(0.5)).isZero()).toBe(true);
    expect(() => math.pow(math.zero, math.real(-1))).toThrow('Eval error: division by zero');
  });

  it('refuses the logarithm of zero', () => {
    expect(() => math.ln(math.zero)).toThrow('Eval error: logarithm of zero is undefined');
  });

  it('takes principal square roots', () => {
    const r = math.sqrt(math.of(3, 4));
    expect([r.re.toString(), r.im.toString()]).toEqual(['2', '1']);
    expect(math.sqrt(math.real(-9)).im.toString()).toBe('3');
  });

  it('satisfies e^(i pi) = -1 to working precision', () => {
    const z = math.exp(math.of(0, math.pi()));
    expect(z.re.plus(1).abs().lt('1e-30')).toBe(true);
    expect(z.im.abs().lt('1e-30')).toBe(true);
  });

  it('keys equal values identically', () => {
    expect(math.parse('2.50').key()).toBe(math.parse('2.5').key());
    expect(math.parse('3i').key()).not.toBe(math.parse('3').key());
  });

  it('rounds numerals to the working precision as they are read', () => {
    const five = new ComplexMath(5);
    expect(five.parse('1.0000001').key()).toBe(five.parse('1').key());
    expect(five.parse('2.345678i').im.toString()).toBe('2.3457');

    const exact = new ComplexMath(5, false);
    expect(exact.parse('1.0000001').key()).not.toBe(exact.parse('1').key());
  });
});

describe('special functions', () => {
  it('gives exact factorials at positive integers', () => {
    expect(math.gamma(math.dec(5)).toString()).toBe('24');
    expect(math.gamma(math.dec(1)).toString()).toBe('1');
  });

  it('matches sqrt(pi) at one half and reflects below it', () => {
    const pi = math.pi();
    const half = math.gamma(math.dec(0.5));
    expect(half.times(half).minus(pi).abs().lt('1e-25')).toBe(true);
    expect(math.gamma(math.dec(-0.5)).plus(pi.sqrt().times(2)).abs().lt('1e-25')).toBe(true);
  });

  it('is undefined at non-positive integers', () => {
    expect(() => math.gamma(math.dec(0))).toThrow('Eval error: gamma is undefined at non-positive integer 0');
  });

  it('counts combinations and permutations', () => {
    expect(choose(math.dec(5), math.dec(2), D).toString()).toBe('10');
    expect(choose(math.dec(2), math.dec(5), D).toString()).toBe('0');
    expect(perm(math.dec(5), math.dec(2), D).toString()).toBe('20');
    expect(perm(math.dec(4), math.dec(0), D).toString()).toBe('1');
  });
});
