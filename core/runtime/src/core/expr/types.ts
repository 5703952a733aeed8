import type { Complex } from '../complex.js';

export type OperatorSymbol = '+' | '-' | '*' | '/' | '%' | '^';
export type GroupSymbol = '(' | ')';

export type Numeral = { t: 'num'; value: Complex; text: string };
export type Variable = { t: 'var'; name: string };
export type Expression = { t: 'expr'; tokens: Token[] };
export type FunctionCall = { t: 'call'; name: string; args: Operand[] };

export type Operand = Numeral | Variable | Expression | FunctionCall;

export type BinaryOperator = { t: 'op'; op: OperatorSymbol };
export type Grouper = { t: 'group'; symbol: GroupSymbol };

export type SymbolToken = BinaryOperator | Grouper;
export type Token = Operand | SymbolToken;

export function isOperand(token: Token): token is Operand {
  return token.t !== 'op' && token.t !== 'group';
}

/** Prints a token back in source form, without whitespace. */
export function render(token: Token): string {
  switch (token.t) {
    case 'num':
      return token.text;
    case 'var':
      return token.name;
    case 'expr':
      return token.tokens.map(render).join('');
    case 'call':
      return `${token.name}[${token.args.map(render).join(',')}]`;
    case 'op':
      return token.op;
    case 'group':
      return token.symbol;
  }
}
