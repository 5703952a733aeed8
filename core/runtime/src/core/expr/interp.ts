import { Complex } from '../complex.js';
import type { Env } from '../env.js';
import { RESERVED_COMMANDS } from '../env.js';
import { evalError, InternalError } from '../errors.js';
import { callBuiltin } from '../functions/builtins.js';
import type { UserFunction } from '../functions/function.js';
import { SERIES_FORMS } from './compiler.js';
import { applyOperator, precedes } from './operators.js';
import { render, type FunctionCall, type Operand, type SymbolToken, type Token } from './types.js';

type Pending = Operand | Complex;

export function evaluate(operand: Operand, env: Env): Complex {
  switch (operand.t) {
    case 'num':
      return operand.value;
    case 'var': {
      const value = env.lookup(operand.name);
      if (value === undefined)
        throw evalError(`"${operand.name}" is not defined as a variable (functions require brackets [])`);
      return value;
    }
    case 'expr':
      return reduce(operand.tokens, env);
    case 'call':
      return evaluateCall(operand, env);
  }
}

function force(value: Pending, env: Env): Complex {
  return value instanceof Complex ? value : evaluate(value, env);
}

/**
 * Two-stack reduction. Operands are evaluated only when an operator is
 * applied to them, left operand first.
 */
function reduce(tokens: readonly Token[], env: Env): Complex {
  const values: Pending[] = [];
  const symbols: SymbolToken[] = [];
  let expectingOperand = true;

  const apply = (op: SymbolToken): void => {
    if (op.t === 'group') throw evalError(`unmatched grouping symbol "${op.symbol}".`);
    const right = values.pop();
    const left = values.pop();
    if (left === undefined || right === undefined)
      throw evalError(`not enough operands for operator "${op.op}".`);
    const l = force(left, env);
    const r = force(right, env);
    values.push(applyOperator(op.op, l, r, env.math));
  };

  for (const token of tokens) {
    switch (token.t) {
      case 'num':
      case 'var':
      case 'expr':
      case 'call':
        if (!expectingOperand) throw evalError(`unexpected operand "${render(token)}".`);
        values.push(token);
        expectingOperand = false;
        break;
      case 'group':
        if (token.symbol === '(') {
          if (!expectingOperand) throw evalError('unexpected opening symbol "(".');
          symbols.push(token);
          break;
        }
        if (expectingOperand) throw evalError('unexpected closing symbol ")".');
        for (;;) {
          const top = symbols.pop();
          if (top === undefined) throw evalError('unmatched closing symbol ")".');
          if (top.t === 'group') break;
          apply(top);
        }
        break;
      case 'op':
        if (expectingOperand) {
          // unary minus is 0 - x; unary plus is dropped
          if (token.op === '-') {
            values.push(env.math.zero);
            symbols.push(token);
          } else if (token.op !== '+') {
            throw evalError(`unexpected operator "${token.op}".`);
          }
          break;
        }
        for (let top = symbols.at(-1); top?.t === 'op' && !precedes(token.op, top.op); top = symbols.at(-1)) {
          symbols.pop();
          apply(top);
        }
        symbols.push(token);
        expectingOperand = true;
        break;
    }
  }

  for (let top = symbols.pop(); top !== undefined; top = symbols.pop()) apply(top);
  const [result, ...rest] = values;
  if (result === undefined || rest.length > 0)
    throw evalError(`expression "${tokens.map(render).join('')}" does not evaluate to a single value.`);
  return force(result, env);
}

function evaluateCall(call: FunctionCall, env: Env): Complex {
  if (SERIES_FORMS.has(call.name)) return evaluateSeries(call, env);
  const fn = env.funcs.get(call.name);
  if (fn === undefined) throw evalError(`function "${call.name}" is not defined`);
  const args = call.args.map((arg) => evaluate(arg, env));
  return fn.kind === 'builtin' ? callBuiltin(fn, args, env) : callUser(fn, args, env);
}

/**
 * Arity, then base cases, then the cache; only a miss evaluates the body,
 * with parameters bound in a fresh frame.
 */
export function callUser(fn: UserFunction, args: Complex[], env: Env): Complex {
  if (args.length !== fn.params.length)
    throw evalError(
      `invalid function call to "${fn.name}": expected ${fn.params.length} argument(s) but found ${args.length} instead`,
    );
  const known = fn.lookup(args);
  if (known !== undefined) return known;

  const { body } = fn;
  if (body === undefined)
    throw evalError(`function "${fn.name}" has no definition for [${args.map((a) => env.format(a)).join(',')}]`);

  const bindings = new Map(fn.params.map((p, i): [string, Complex] => [p, args[i]]));
  const result = env.descend(() => env.withBindings(bindings, () => evaluate(body, env)));
  fn.remember(args, result);
  return result;
}

function integerBound(name: string, which: string, arg: Operand, env: Env): Complex {
  const value = evaluate(arg, env);
  if (!value.isInteger()) throw evalError(`${name} ${which} bound "${render(arg)}" is not an integer`);
  return value;
}

// sum[k, a, b, body] and prod[k, a, b, body]
function evaluateSeries(call: FunctionCall, env: Env): Complex {
  const { name } = call;
  if (call.args.length !== 4) throw evalError(`function "${name}" must have exactly four arguments`);
  const [counter, startArg, endArg, body] = call.args;
  if (counter.t !== 'var') throw new InternalError(`${name} counter compiled as "${counter.t}"`);
  if (env.isBound(counter.name) || env.funcs.has(counter.name) || RESERVED_COMMANDS.has(counter.name))
    throw evalError(`${name} counter "${counter.name}" is already defined`);

  const start = integerBound(name, 'start', startArg, env);
  const end = integerBound(name, 'end', endArg, env);
  if (start.re.gt(end.re))
    throw evalError(`${name} start bound "${env.format(start)}" is greater than end bound "${env.format(end)}"`);

  const { math } = env;
  const isSum = name === 'sum';
  let acc = isSum ? math.zero : math.one;
  for (let k = start.re; k.lte(end.re); k = k.plus(1)) {
    const term = env.withBindings(new Map([[counter.name, math.real(k)]]), () => evaluate(body, env));
    acc = isSum ? math.add(acc, term) : math.mul(acc, term);
  }
  return acc;
}
