import { describe, it, expect } from 'vitest';
import { lex } from '../src/core/expr/lexer.js';
import { CalcError } from '../src/core/errors.js';

describe('lex', () => {
  it('splits numerals, operators and names', () => {
    expect(lex('2+x*3')).toEqual([
      { tag: 'numeral', text: '2' },
      { tag: 'operator', text: '+' },
      { tag: 'variable', text: 'x' },
      { tag: 'operator', text: '*' },
      { tag: 'numeral', text: '3' },
    ]);
  });

  it('keeps outermost calls whole, nested calls included', () => {
    expect(lex('f[g[1],2]*x')).toEqual([
      { tag: 'call', text: 'f[g[1],2]' },
      { tag: 'operator', text: '*' },
      { tag: 'variable', text: 'x' },
    ]);
  });

  it('keeps a call nested in its own arguments whole', () => {
    expect(lex('f[f[1,2],3]')).toEqual([{ tag: 'call', text: 'f[f[1,2],3]' }]);
  });

  it('restores several calls in order', () => {
    expect(lex('a[1]-b[2]').map((l) => l.text)).toEqual(['a[1]', '-', 'b[2]']);
  });

  it('reads exponents and imaginary suffixes as part of a numeral', () => {
    expect(lex('1.5e3i')).toEqual([{ tag: 'numeral', text: '1.5e3i' }]);
    expect(lex('2x').map((l) => l.tag)).toEqual(['numeral', 'variable']);
    expect(lex('xi')).toEqual([{ tag: 'variable', text: 'xi' }]);
  });

  it('marks unknown characters as invalid', () => {
    expect(lex('2$3')).toEqual([
      { tag: 'numeral', text: '2' },
      { tag: 'invalid', text: '$' },
      { tag: 'numeral', text: '3' },
    ]);
  });

  it('rejects empty input', () => {
    expect(() => lex('')).toThrow('Compile error: empty expression');
  });

  it('reports an unclosed call with the scan position', () => {
    expect(() => lex('f[1')).toThrow('Compile error: "f[1" missing closing function bracket ] at position 3');
  });

  it('rejects the reserved placeholder character', () => {
    const attempt = () => lex('a\u001ab');
    expect(attempt).toThrow(CalcError);
    expect(attempt).toThrow('Compile error: "a\u001ab" is not a valid calculator expression');
  });
});
