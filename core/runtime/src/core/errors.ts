export type ErrorKind = 'compile' | 'eval' | 'recursion';

const PREFIX: Record<ErrorKind, string> = {
  compile: 'Compile error',
  eval: 'Eval error',
  recursion: 'Eval error',
};

/**
 * A recoverable, user-facing failure. Every component throws one of these on
 * the first violated precondition; only the session boundary catches them.
 */
export class CalcError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, detail: string) {
    super(`${PREFIX[kind]}: ${detail}`);
    this.name = 'CalcError';
    this.kind = kind;
  }
}

export const compileError = (detail: string) => new CalcError('compile', detail);
export const evalError = (detail: string) => new CalcError('eval', detail);
export const recursionError = () =>
  new CalcError('recursion', 'function recursion too deep');

/** A broken invariant inside the runtime. Never converted to a result. */
export class InternalError extends Error {
  constructor(detail: string) {
    super(`INTERNAL ERROR: ${detail}`);
    this.name = 'InternalError';
  }
}

/** decimal.js reports bad arguments and exhausted precision this way. */
export function isDecimalError(e: unknown): e is Error {
  return e instanceof Error && e.message.startsWith('[DecimalError]');
}

export function isStackOverflow(e: unknown): boolean {
  return e instanceof RangeError && /call stack/i.test(e.message);
}
