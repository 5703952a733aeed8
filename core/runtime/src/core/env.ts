import type { Complex } from './complex.js';
import { ComplexMath } from './complex.js';
import type { RuntimeOptions } from './config.js';
import { workingDigits, type Precision } from './decimal.js';
import { recursionError } from './errors.js';
import { formatComplex } from './format.js';
import { BUILTINS } from './functions/builtins.js';
import type { Callable } from './functions/function.js';

export const RESERVED_COMMANDS: ReadonlySet<string> = new Set(['reset', 'exit', 'help', 'env', 'del', 'precision']);
export const RESERVED_VARIABLES: ReadonlySet<string> = new Set(['i', 'pi', 'e', 'ans']);

type Frame = ReadonlyMap<string, Complex>;

/**
 * Everything a computation can see: global variables and functions, the
 * precision, and a stack of binding frames for parameters and series
 * counters. A name resolves in the innermost frame that binds it, then
 * globally, so a function body sees its caller's bindings.
 */
export class Env {
  readonly vars = new Map<string, Complex>();
  readonly funcs = new Map<string, Callable>();
  readonly math: ComplexMath;
  readonly maxDepth: number;
  private frames: Frame[] = [];
  private depth = 0;
  private _precision: Precision;

  constructor(options: RuntimeOptions) {
    this._precision = options.precision;
    this.maxDepth = options.maxDepth;
    this.math = new ComplexMath(workingDigits(options.precision), options.precision !== 'auto');
    for (const b of BUILTINS) this.funcs.set(b.name, b);
    this.installConstants();
  }

  get precision(): Precision {
    return this._precision;
  }

  get callDepth(): number {
    return this.depth;
  }

  setPrecision(precision: Precision): void {
    this._precision = precision;
    this.math.setDigits(workingDigits(precision), precision !== 'auto');
    this.installConstants();
    this.invalidateAll();
  }

  /** `i`, `pi` and `e` at the current precision; `ans` starts at zero. */
  installConstants(): void {
    const { math } = this;
    this.vars.set('i', math.i);
    this.vars.set('pi', math.real(math.pi()));
    this.vars.set('e', math.real(math.e()));
    if (!this.vars.has('ans')) this.vars.set('ans', math.zero);
  }

  lookup(name: string): Complex | undefined {
    for (let f = this.frames.length - 1; f >= 0; f--) {
      const v = this.frames[f].get(name);
      if (v !== undefined) return v;
    }
    return this.vars.get(name);
  }

  isBound(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  isBuiltin(name: string): boolean {
    return this.funcs.get(name)?.kind === 'builtin';
  }

  /**
   * Runs `body` with `bindings` visible as the innermost frame. Binding and
   * unbinding both invalidate caches that depend on the bound names.
   */
  withBindings<T>(bindings: Frame, body: () => T): T {
    const names = [...bindings.keys()];
    this.frames.push(bindings);
    this.invalidate(...names);
    try {
      return body();
    } finally {
      this.frames.pop();
      this.invalidate(...names);
    }
  }

  /** Runs one level of user-function evaluation under the depth ceiling. */
  descend<T>(body: () => T): T {
    if (this.depth >= this.maxDepth) throw recursionError();
    this.depth++;
    try {
      return body();
    } finally {
      this.depth--;
    }
  }

  /**
   * Drops every binding frame and the call depth. Used after the host stack
   * overflowed, when `finally` blocks may not have run to completion.
   */
  resetStack(): void {
    this.frames = [];
    this.depth = 0;
    this.invalidateAll();
  }

  /**
   * Clears the cache of every user function that refers to one of `names`,
   * then of every function that refers to those, and so on.
   */
  invalidate(...names: string[]): void {
    const seen = new Set<string>();
    const pending = [...names];
    while (pending.length > 0) {
      const name = pending.pop();
      if (name === undefined || seen.has(name)) continue;
      seen.add(name);
      for (const fn of this.funcs.values()) {
        if (fn.kind === 'user' && fn.references.has(name)) {
          fn.resetCache();
          pending.push(fn.name);
        }
      }
    }
  }

  invalidateAll(): void {
    for (const fn of this.funcs.values()) if (fn.kind === 'user') fn.resetCache();
  }

  format(value: Complex): string {
    return formatComplex(value, this._precision);
  }
}
