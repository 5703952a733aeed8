import { describe, it, expect } from 'vitest';
import { ComplexMath } from '../src/core/complex.js';
import { compile, splitArguments } from '../src/core/expr/compiler.js';
import { references } from '../src/core/expr/references.js';
import { render } from '../src/core/expr/types.js';

const math = new ComplexMath(32);

describe('compile', () => {
  it('returns a lone operand unwrapped', () => {
    const num = compile('42', math);
    expect(num.t).toBe('num');
    expect(render(num)).toBe('42');
    expect(compile('x', math)).toEqual({ t: 'var', name: 'x' });
  });

  it('builds calls with compiled arguments', () => {
    const call = compile('f[1,x]', math);
    if (call.t !== 'call') throw new Error(`expected a call, got ${call.t}`);
    expect(call.name).toBe('f');
    expect(call.args.map((a) => a.t)).toEqual(['num', 'var']);
    expect(compile('g[]', math)).toEqual({ t: 'call', name: 'g', args: [] });
  });

  it('ignores whitespace and renders back to source', () => {
    expect(render(compile('f[ 1 , g[x] ]*(2-y)', math))).toBe('f[1,g[x]]*(2-y)');
  });

  it('splits arguments only at top-level commas', () => {
    expect(splitArguments('a,f[b,c],d')).toEqual(['a', 'f[b,c]', 'd']);
  });

  it.each([
    ['1+', 'Compile error: not enough operands.'],
    ['2x', 'Compile error: unexpected operand "x".'],
    ['(1+2', 'Compile error: unmatched grouping symbol "(".'],
    ['1+2)', 'Compile error: unmatched closing symbol ")".'],
    [')(', 'Compile error: unexpected closing symbol ")".'],
    ['*2', 'Compile error: unexpected operator "*".'],
    ['+', 'Compile error: "+" is not a valid calculator expression'],
    ['a$b', 'Compile error: "$" is not a valid token'],
    ['f[1,,2]', 'Compile error: empty argument in call "f[1,,2]"'],
    ['sum[1,2,3]', 'Compile error: function "sum" must have exactly four arguments'],
    ['prod[2,1,3,k]', 'Compile error: first argument of "prod" must be a variable, found "2"'],
  ])('rejects %s', (source, message) => {
    expect(() => compile(source, math)).toThrow(message);
  });
});

describe('references', () => {
  it('collects variables and function names', () => {
    expect([...references(compile('f[x]+y*g[2]', math))].sort()).toEqual(['f', 'g', 'x', 'y']);
  });

  it('leaves a series counter out of its body', () => {
    expect([...references(compile('sum[k,1,n,k*z]', math))].sort()).toEqual(['n', 'sum', 'z']);
  });
});
