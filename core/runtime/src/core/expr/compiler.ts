import type { ComplexMath } from '../complex.js';
import { compileError } from '../errors.js';
import { IDENT_RE } from './grammar.js';
import { lex, type Lexeme } from './lexer.js';
import {
  isOperand,
  render,
  type FunctionCall,
  type GroupSymbol,
  type Operand,
  type OperatorSymbol,
  type Token,
} from './types.js';

/** Functions whose first argument names a counter rather than a value. */
export const SERIES_FORMS: ReadonlySet<string> = new Set(['sum', 'prod']);

/** Splits call arguments on commas that are not inside nested brackets. */
export function splitArguments(inner: string): string[] {
  const args: string[] = [];
  let depth = 0;
  let from = 0;
  for (let i = 0; i < inner.length; i++) {
    const c = inner[i];
    if (c === '[') depth++;
    else if (c === ']') depth--;
    else if (c === ',' && depth === 0) {
      args.push(inner.slice(from, i));
      from = i + 1;
    }
  }
  args.push(inner.slice(from));
  return args;
}

function compileCall(text: string, math: ComplexMath): FunctionCall {
  const open = text.indexOf('[');
  const name = text.slice(0, open);
  if (open < 0 || !text.endsWith(']') || !IDENT_RE.test(name))
    throw compileError(`"${text}" is not a valid function call`);
  const inner = text.slice(open + 1, -1);
  const args =
    inner === ''
      ? []
      : splitArguments(inner).map((arg) => {
          if (arg === '') throw compileError(`empty argument in call "${text}"`);
          return compile(arg, math);
        });

  if (SERIES_FORMS.has(name)) {
    if (args.length !== 4) throw compileError(`function "${name}" must have exactly four arguments`);
    if (args[0].t !== 'var')
      throw compileError(`first argument of "${name}" must be a variable, found "${render(args[0])}"`);
  }
  return { t: 'call', name, args };
}

function compileLexeme(lexeme: Lexeme, math: ComplexMath): Token {
  const { text } = lexeme;
  switch (lexeme.tag) {
    case 'call':
      return compileCall(text, math);
    case 'numeral':
      return { t: 'num', value: math.parse(text), text };
    case 'variable':
      return { t: 'var', name: text };
    case 'operator':
      return { t: 'op', op: toOperator(text) };
    case 'grouper':
      return { t: 'group', symbol: toGroup(text) };
    case 'invalid':
      throw compileError(`"${text}" is not a valid token`);
  }
}

function toOperator(text: string): OperatorSymbol {
  switch (text) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
    case '^':
      return text;
  }
  throw compileError(`"${text}" is not a valid operator`);
}

function toGroup(text: string): GroupSymbol {
  if (text === '(' || text === ')') return text;
  throw compileError(`"${text}" is not a valid grouping symbol`);
}

/**
 * Walks the token sequence with the evaluator's expecting-operand state so
 * that malformed expressions fail before anything is evaluated.
 */
export function checkShape(tokens: readonly Token[]): void {
  let expectingOperand = true;
  let depth = 0;
  for (const token of tokens) {
    if (isOperand(token)) {
      if (!expectingOperand) throw compileError(`unexpected operand "${render(token)}".`);
      expectingOperand = false;
    } else if (token.t === 'group') {
      if (token.symbol === '(') {
        if (!expectingOperand) throw compileError('unexpected opening symbol "(".');
        depth++;
      } else {
        if (expectingOperand) throw compileError('unexpected closing symbol ")".');
        if (depth === 0) throw compileError('unmatched closing symbol ")".');
        depth--;
      }
    } else if (expectingOperand) {
      if (token.op !== '-' && token.op !== '+')
        throw compileError(`unexpected operator "${token.op}".`);
    } else {
      expectingOperand = true;
    }
  }
  if (depth > 0) throw compileError('unmatched grouping symbol "(".');
  if (expectingOperand) throw compileError('not enough operands.');
}

/**
 * Compiles source text into an operand. Whitespace is ignored; numerals are
 * read with the given math context's precision settings.
 */
export function compile(source: string, math: ComplexMath): Operand {
  const lexemes = lex(source.replace(/\s+/g, ''));
  if (lexemes.length === 1) {
    const token = compileLexeme(lexemes[0], math);
    if (!isOperand(token))
      throw compileError(`"${lexemes[0].text}" is not a valid calculator expression`);
    return token;
  }
  const tokens = lexemes.map((lexeme) => compileLexeme(lexeme, math));
  checkShape(tokens);
  return { t: 'expr', tokens };
}
