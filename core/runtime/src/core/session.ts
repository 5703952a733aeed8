import type { Complex } from './complex.js';
import { PrecisionSchema, RuntimeOptions, type RuntimeOptionsInput } from './config.js';
import { MAX_PRECISION, type Precision } from './decimal.js';
import { Env, RESERVED_COMMANDS, RESERVED_VARIABLES } from './env.js';
import { CalcError, compileError, evalError, isDecimalError, isStackOverflow, recursionError } from './errors.js';
import { compile } from './expr/compiler.js';
import { BASE_CASE, FUNCTION_DEFINITION, VARIABLE_DEFINITION } from './expr/grammar.js';
import { evaluate } from './expr/interp.js';
import { render } from './expr/types.js';
import { signature } from './functions/builtins.js';
import { ArgumentTrie } from './functions/cache.js';
import { UserFunction } from './functions/function.js';
import { err, ok, type Result } from './result.js';

export type Outcome =
  | { kind: 'empty'; text: '' }
  | { kind: 'value'; value: Complex; text: string }
  | { kind: 'variable'; name: string; value: Complex; text: string }
  | { kind: 'function'; name: string; text: string }
  | { kind: 'base-case'; name: string; text: string };

export interface Listing {
  precision: Precision;
  constants: string[];
  variables: string[];
  functions: string[];
  builtins: string[];
}

/**
 * One calculator: its own environment, precision and caches. `execute` is
 * the only place where errors raised while compiling or evaluating a line
 * are caught.
 */
export class Session {
  readonly env: Env;

  constructor(options: RuntimeOptionsInput = {}) {
    this.env = new Env(RuntimeOptions.parse(options));
  }

  get precision(): Precision {
    return this.env.precision;
  }

  /** Runs `body`, turning calculator failures into an error result. */
  private guard<T>(body: () => T): Result<T> {
    try {
      return ok(body());
    } catch (e) {
      if (e instanceof CalcError) return err(e.kind, e.message);
      if (isDecimalError(e)) return err('eval', `Eval error: ${e.message}`);
      if (isStackOverflow(e)) {
        this.env.resetStack();
        const overflow = recursionError();
        return err(overflow.kind, overflow.message);
      }
      throw e;
    }
  }

  execute(line: string): Result<Outcome> {
    return this.guard(() => this.dispatch(line.replace(/\s+/g, '')));
  }

  /** Evaluates an expression without touching `ans`. */
  evaluate(text: string): Result<Complex> {
    return this.guard(() => evaluate(compile(text, this.env.math), this.env));
  }

  format(value: Complex): string {
    return this.env.format(value);
  }

  private dispatch(line: string): Outcome {
    if (line === '') return { kind: 'empty', text: '' };

    const fn = FUNCTION_DEFINITION.exec(line);
    if (fn) return this.defineFunction(fn[1], fn[2], fn[3]);

    const base = BASE_CASE.exec(line);
    if (base) return this.addBaseCase(base[1], base[2], base[3]);

    const assignment = VARIABLE_DEFINITION.exec(line);
    if (assignment) return this.defineVariable(assignment[1], assignment[2]);

    const { env } = this;
    const value = evaluate(compile(line, env.math), env);
    env.vars.set('ans', value);
    env.invalidate('ans');
    return { kind: 'value', value, text: env.format(value) };
  }

  private defineVariable(name: string, source: string): Outcome {
    const { env } = this;
    if (RESERVED_VARIABLES.has(name) || RESERVED_COMMANDS.has(name))
      throw compileError(`"${name}" is a reserved keyword and cannot be reassigned`);
    const value = evaluate(compile(source, env.math), env);
    env.vars.set(name, value);
    env.vars.set('ans', value);
    env.invalidate(name, 'ans');
    return { kind: 'variable', name, value, text: `${name} = ${env.format(value)}` };
  }

  private defineFunction(name: string, paramList: string, source: string): Outcome {
    const { env } = this;
    if (env.isBuiltin(name) || RESERVED_COMMANDS.has(name))
      throw compileError(`"${name}" is a reserved function name and cannot be redefined`);

    const params = paramList === '' ? [] : paramList.split(',');
    const seen = new Set<string>();
    for (const p of params) {
      if (env.vars.has(p) || env.funcs.has(p) || RESERVED_COMMANDS.has(p))
        throw compileError(`"${p}" is already defined and cannot be used as a function argument`);
      if (seen.has(p)) throw compileError(`duplicate argument "${p}" in definition of "${name}"`);
      seen.add(p);
    }

    const body = compile(source, env.math);
    const previous = env.funcs.get(name);
    const baseCases =
      previous?.kind === 'user' && previous.params.length === params.length
        ? previous.baseCases.clone()
        : new ArgumentTrie<Complex>();
    const fn = new UserFunction(name, params, body, baseCases);
    env.funcs.set(name, fn);
    env.invalidate(name);
    return { kind: 'function', name, text: this.describe(fn) };
  }

  private addBaseCase(name: string, argList: string, valueText: string): Outcome {
    const { env } = this;
    if (env.isBuiltin(name) || RESERVED_COMMANDS.has(name))
      throw compileError(`"${name}" is a reserved function name and cannot be given base cases`);

    const args = argList.split(',').map((a) => env.math.parse(a));
    const value = env.math.parse(valueText);
    let fn = env.funcs.get(name);
    if (fn === undefined) {
      fn = new UserFunction(name, args.map((_, i) => `_${i}`), undefined);
      env.funcs.set(name, fn);
    }
    if (fn.kind !== 'user') throw compileError(`"${name}" is a reserved function name and cannot be given base cases`);
    if (fn.params.length !== args.length)
      throw compileError(
        `function "${name}" takes ${fn.params.length} argument(s) but the base case has ${args.length}`,
      );
    fn.baseCases.set(args, value);
    env.invalidate(name);
    return { kind: 'base-case', name, text: this.describe(fn) };
  }

  /** `f[n] = n*f[n-1]` followed by one indented line per base case. */
  describe(fn: UserFunction): string {
    const head = `${fn.name}[${fn.params.join(',')}]`;
    const lines = [fn.body ? `${head} = ${render(fn.body)}` : head];
    for (const { args, value } of fn.baseCases.entries())
      lines.push(`  ${fn.name}[${args.map((a) => this.format(a)).join(',')}] = ${this.format(value)}`);
    return lines.join('\n');
  }

  /** Deletes a user variable or function. Reserved names are refused. */
  remove(name: string): Result<'variable' | 'function'> {
    return this.guard<'variable' | 'function'>(() => {
      const { env } = this;
      if (RESERVED_VARIABLES.has(name)) throw evalError(`cannot delete reserved variable "${name}"`);
      if (env.isBuiltin(name)) throw evalError(`cannot delete built-in function "${name}"`);
      if (env.vars.delete(name)) {
        env.invalidate(name);
        return 'variable';
      }
      if (env.funcs.delete(name)) {
        env.invalidate(name);
        return 'function';
      }
      throw evalError(`"${name}" is not defined`);
    });
  }

  /** Drops every user variable and function. Precision and `ans` are kept. */
  reset(): void {
    const { env } = this;
    for (const name of [...env.vars.keys()]) if (!RESERVED_VARIABLES.has(name)) env.vars.delete(name);
    for (const [name, fn] of [...env.funcs]) if (fn.kind === 'user') env.funcs.delete(name);
  }

  setPrecision(precision: unknown): Result<Precision> {
    return this.guard(() => {
      const parsed = PrecisionSchema.safeParse(precision);
      if (!parsed.success)
        throw evalError(`precision must be a positive integer up to ${MAX_PRECISION} or "auto"`);
      this.env.setPrecision(parsed.data);
      return parsed.data;
    });
  }

  listing(): Listing {
    const { env } = this;
    const constants: string[] = [];
    const variables: string[] = [];
    for (const [name, value] of env.vars) {
      const line = `${name} = ${env.format(value)}`;
      if (RESERVED_VARIABLES.has(name)) constants.push(line);
      else variables.push(line);
    }
    const functions: string[] = [];
    const builtins: string[] = [];
    for (const fn of env.funcs.values()) {
      if (fn.kind === 'user') functions.push(this.describe(fn));
      else builtins.push(signature(fn));
    }
    return { precision: env.precision, constants, variables, functions, builtins };
  }
}
