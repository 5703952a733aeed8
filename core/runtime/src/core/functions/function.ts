import type { Complex } from '../complex.js';
import type { Env } from '../env.js';
import { references } from '../expr/references.js';
import type { Operand } from '../expr/types.js';
import { ArgumentTrie } from './cache.js';

export type Restriction = 'none' | 'real' | 'integer';

export interface BuiltinFunction {
  readonly kind: 'builtin';
  readonly name: string;
  readonly arity: number;
  readonly restriction: Restriction;
  readonly docs: string;
  readonly compute: (args: Complex[], env: Env) => Complex;
}

/**
 * A function defined at the prompt. `body` is absent while the function has
 * only base cases. The cache is the only state that changes after
 * construction, apart from base cases added later.
 */
export class UserFunction {
  readonly kind = 'user';
  readonly references: ReadonlySet<string>;
  private cache = new ArgumentTrie<Complex>();

  constructor(
    readonly name: string,
    readonly params: readonly string[],
    readonly body: Operand | undefined,
    readonly baseCases: ArgumentTrie<Complex> = new ArgumentTrie<Complex>(),
  ) {
    const refs = body ? references(body) : new Set<string>();
    for (const p of params) refs.delete(p);
    this.references = refs;
  }

  /** A base case wins over a cached result. */
  lookup(args: readonly Complex[]): Complex | undefined {
    return this.baseCases.get(args) ?? this.cache.get(args);
  }

  remember(args: readonly Complex[], value: Complex): void {
    this.cache.set(args, value);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  resetCache(): void {
    this.cache = new ArgumentTrie<Complex>();
  }
}

export type Callable = UserFunction | BuiltinFunction;
