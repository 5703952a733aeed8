import type { Decimal } from 'decimal.js';
import type { Complex } from '../complex.js';
import type { Env } from '../env.js';
import { MAX_PRECISION } from '../decimal.js';
import { evalError, InternalError } from '../errors.js';
import { choose, perm } from '../special.js';
import type { BuiltinFunction, Restriction } from './function.js';

type Compute = BuiltinFunction['compute'];

function builtin(name: string, arity: number, restriction: Restriction, docs: string, compute: Compute): BuiltinFunction {
  return { kind: 'builtin', name, arity, restriction, docs, compute };
}

const unary = (name: string, docs: string, f: (z: Complex, env: Env) => Complex, restriction: Restriction = 'none') =>
  builtin(name, 1, restriction, docs, ([z], env) => f(z, env));

function nonNegative(name: string, values: Decimal[]): void {
  if (values.some((v) => v.isNeg())) throw evalError(`function "${name}" requires non-negative integer argument(s)`);
}

function digitsArg(name: string, d: Decimal): number {
  if (d.lt(1) || d.gt(MAX_PRECISION))
    throw evalError(`function "${name}" requires a number of digits between 1 and ${MAX_PRECISION}`);
  return d.toNumber();
}

// Counter, start, end and body are bound lazily by the evaluator.
const seriesForm = (name: string, docs: string) =>
  builtin(name, 4, 'none', docs, () => {
    throw new InternalError(`"${name}" reached the builtin table instead of the series evaluator`);
  });

export const BUILTINS: readonly BuiltinFunction[] = [
  unary('sin', 'sine', (z, { math }) => math.sin(z)),
  unary('cos', 'cosine', (z, { math }) => math.cos(z)),
  unary('tan', 'tangent', (z, { math }) => math.tan(z)),
  unary('asin', 'inverse sine', (z, { math }) => math.asin(z)),
  unary('acos', 'inverse cosine', (z, { math }) => math.acos(z)),
  unary('atan', 'inverse tangent', (z, { math }) => math.atan(z)),
  unary('sinh', 'hyperbolic sine', (z, { math }) => math.sinh(z)),
  unary('cosh', 'hyperbolic cosine', (z, { math }) => math.cosh(z)),
  unary('tanh', 'hyperbolic tangent', (z, { math }) => math.tanh(z)),
  unary('asinh', 'inverse hyperbolic sine', (z, { math }) => math.asinh(z)),
  unary('acosh', 'inverse hyperbolic cosine', (z, { math }) => math.acosh(z)),
  unary('atanh', 'inverse hyperbolic tangent', (z, { math }) => math.atanh(z)),
  unary('sinc', 'sin(x)/x, 1 at 0', (z, { math }) => math.sinc(z)),
  unary('sqrt', 'principal square root', (z, { math }) => math.sqrt(z)),
  unary('exp', 'e to the power x', (z, { math }) => math.exp(z)),
  unary('abs', 'absolute value or modulus', (z, { math }) => math.real(math.abs(z))),
  unary('ln', 'natural logarithm', (z, { math }) => math.ln(z)),
  unary('log10', 'base 10 logarithm', (z, { math }) => math.log(math.real(10), z)),
  builtin('log', 2, 'real', 'logarithm of x in base b', ([b, x], { math }) => math.log(b, x)),
  unary('gamma', 'gamma function', (z, { math }) => math.real(math.gamma(z.re)), 'real'),
  unary('rad', 'degrees to radians', (z, { math }) => math.real(z.re.times(math.pi()).div(180)), 'real'),
  unary('deg', 'radians to degrees', (z, { math }) => math.real(z.re.times(180).div(math.pi())), 'real'),
  unary('sign', 'sign of x: -1, 0 or 1', (z, { math }) => math.real(z.re.isZero() ? 0 : z.re.isNeg() ? -1 : 1), 'real'),
  unary('ceil', 'smallest integer not below x', (z, { math }) => math.real(z.re.ceil()), 'real'),
  unary('floor', 'largest integer not above x', (z, { math }) => math.real(z.re.floor()), 'real'),
  builtin('min', 2, 'real', 'smaller of a and b', ([a, b]) => (a.re.lte(b.re) ? a : b)),
  builtin('max', 2, 'real', 'larger of a and b', ([a, b]) => (a.re.gte(b.re) ? a : b)),
  unary('conj', 'complex conjugate', (z, { math }) => math.conj(z)),
  unary('re', 'real part', (z, { math }) => math.real(z.re)),
  unary('im', 'imaginary part', (z, { math }) => math.real(z.im)),
  unary('int', 'integer part, truncated toward zero', (z, { math }) => math.of(z.re.trunc(), z.im.trunc())),
  unary('pi', 'pi to d digits', (z, { math }) => math.real(math.pi(digitsArg('pi', z.re))), 'integer'),
  unary('e', 'e to d digits', (z, { math }) => math.real(math.e(digitsArg('e', z.re))), 'integer'),
  builtin('rand', 0, 'none', 'uniform random number in [0, 1)', (_args, { math }) => math.real(math.random())),
  builtin('randint', 2, 'integer', 'uniform random integer between a and b inclusive', ([a, b], { math }) => {
    const lo = a.re.lte(b.re) ? a.re : b.re;
    const span = a.re.minus(b.re).abs().plus(1);
    return math.real(lo.plus(math.random().times(span).floor()));
  }),
  builtin('choose', 2, 'integer', 'binomial coefficient n choose k', ([n, k], { math }) => {
    nonNegative('choose', [n.re, k.re]);
    return math.real(choose(n.re, k.re, math.ctor));
  }),
  builtin('perm', 2, 'integer', 'ordered selections of k from n', ([n, k], { math }) => {
    nonNegative('perm', [n.re, k.re]);
    return math.real(perm(n.re, k.re, math.ctor));
  }),
  seriesForm('sum', 'sum[k, a, b, body]: sum of body for k from a to b'),
  seriesForm('prod', 'prod[k, a, b, body]: product of body for k from a to b'),
];

export const BUILTIN_NAMES: ReadonlySet<string> = new Set(BUILTINS.map((b) => b.name));

export function callBuiltin(fn: BuiltinFunction, args: Complex[], env: Env): Complex {
  if (args.length !== fn.arity)
    throw evalError(
      `invalid function call to "${fn.name}": expected ${fn.arity} argument(s) but found ${args.length} instead`,
    );
  if (fn.restriction === 'real' && !args.every((a) => a.isReal()))
    throw evalError(`function "${fn.name}" requires real argument(s)`);
  if (fn.restriction === 'integer' && !args.every((a) => a.isInteger()))
    throw evalError(`function "${fn.name}" requires integer argument(s)`);
  return fn.compute(args, env);
}

/** `name[_0,_1]: docs`, as listed by `env` and `help`. */
export function signature(fn: BuiltinFunction): string {
  const params = Array.from({ length: fn.arity }, (_, i) => `_${i}`).join(',');
  return `${fn.name}[${params}]: ${fn.docs}`;
}
