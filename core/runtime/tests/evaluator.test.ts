import { describe, it, expect } from 'vitest';
import { Session } from '../src/core/session.js';
import { precedes } from '../src/core/expr/operators.js';

function calc(line: string, session = new Session()): string {
  const result = session.execute(line);
  return result.t === 'ok' ? result.v.text : result.msg;
}

describe('operator precedence', () => {
  it('ranks ^ over * / % over + -', () => {
    expect(precedes('^', '*')).toBe(true);
    expect(precedes('*', '+')).toBe(true);
    expect(precedes('%', '-')).toBe(true);
    expect(precedes('+', '*')).toBe(false);
    expect(precedes('^', '^')).toBe(false);
    expect(precedes('*', '/')).toBe(false);
  });
});

describe('expressions', () => {
  it.each([
    ['2+3*4', '14'],
    ['(2+3)*4', '20'],
    ['2*3^2', '18'],
    ['2^3^2', '64'],
    ['--3', '3'],
    ['-2^2', '-4'],
    ['-3+2', '-1'],
    ['+3', '3'],
    ['-7%3', '-1'],
    ['2^-1', '0.5'],
    ['2^-3', '0.125'],
    ['1/4', '0.25'],
    ['1 + 2', '3'],
    ['1e7*1.5', '1.5e+7'],
    ['0.00001', '1e-5'],
  ])('%s = %s', (line, expected) => {
    expect(calc(line)).toBe(expected);
  });

  it('rounds to the working precision', () => {
    expect(calc('1/3')).toBe(`0.${'3'.repeat(32)}`);
    expect(calc('pi')).toBe('3.1415926535897932384626433832795');
    expect(calc('1/3', new Session({ precision: 5 }))).toBe('0.33333');
  });

  it('works with complex numbers', () => {
    expect(calc('1+2i')).toBe('1+2i');
    expect(calc('-i')).toBe('-i');
    expect(calc('i*i')).toBe('-1');
    expect(calc('i^2')).toBe('-1');
    expect(calc('2-3i')).toBe('2-3i');
  });

  it.each([
    ['1/0', 'Eval error: division by zero'],
    ['5%0', 'Eval error: division by zero'],
    ['i%2', 'Eval error: cannot apply remainder operator to complex numbers.'],
    ['5%2i', 'Eval error: cannot apply remainder operator to complex numbers.'],
    ['y', 'Eval error: "y" is not defined as a variable (functions require brackets [])'],
    ['foo[1]', 'Eval error: function "foo" is not defined'],
    ['1+', 'Compile error: not enough operands.'],
  ])('%s fails with %s', (line, message) => {
    expect(calc(line)).toBe(message);
  });
});

describe('built-in functions', () => {
  it.each([
    ['sqrt[-4]', '2i'],
    ['abs[3+4i]', '5'],
    ['exp[0]', '1'],
    ['floor[-2.5]', '-3'],
    ['ceil[2.1]', '3'],
    ['sign[-7]', '-1'],
    ['min[3,-1]', '-1'],
    ['max[2,2.5]', '2.5'],
    ['conj[1+2i]', '1-2i'],
    ['re[3-4i]', '3'],
    ['im[3-4i]', '-4'],
    ['int[-2.7]', '-2'],
    ['int[log[2,8]+0.5]', '3'],
    ['gamma[5]', '24'],
    ['choose[5,2]', '10'],
    ['choose[2,5]', '0'],
    ['perm[5,2]', '20'],
    ['pi[5]', '3.1416'],
    ['sin[0]', '0'],
  ])('%s = %s', (line, expected) => {
    expect(calc(line)).toBe(expected);
  });

  it.each([
    ['floor[i]', 'Eval error: function "floor" requires real argument(s)'],
    ['choose[2.5,1]', 'Eval error: function "choose" requires integer argument(s)'],
    ['choose[-1,1]', 'Eval error: function "choose" requires non-negative integer argument(s)'],
    ['sin[1,2]', 'Eval error: invalid function call to "sin": expected 1 argument(s) but found 2 instead'],
    ['gamma[0]', 'Eval error: gamma is undefined at non-positive integer 0'],
    ['ln[0]', 'Eval error: logarithm of zero is undefined'],
  ])('%s fails with %s', (line, message) => {
    expect(calc(line)).toBe(message);
  });

  it('draws random integers inside the bounds', () => {
    const session = new Session();
    for (let n = 0; n < 20; n++) {
      expect(['3', '4', '5']).toContain(calc('randint[5,3]', session));
    }
  });
});

describe('sum and prod', () => {
  it('accumulate over an inclusive integer range', () => {
    expect(calc('sum[k,1,4,k^2]')).toBe('30');
    expect(calc('prod[k,1,5,k]')).toBe('120');
    expect(calc('sum[k,2,2,k]')).toBe('2');
  });

  it('validate their bounds and counter', () => {
    expect(calc('sum[k,3,1,k]')).toBe('Eval error: sum start bound "3" is greater than end bound "1"');
    expect(calc('sum[k,1,2.5,k]')).toBe('Eval error: sum end bound "2.5" is not an integer');
    const session = new Session();
    calc('x=1', session);
    expect(calc('sum[x,1,2,x]', session)).toBe('Eval error: sum counter "x" is already defined');
  });

  it('leave the counter unbound afterwards', () => {
    const session = new Session();
    calc('sum[k,1,3,k]', session);
    expect(calc('k', session)).toBe('Eval error: "k" is not defined as a variable (functions require brackets [])');
  });
});
