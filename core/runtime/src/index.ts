/**
 * @bracketcalc/runtime - the calculator core
 *
 * Compiles formulas into operand trees and evaluates them over
 * arbitrary-precision complex numbers, with memoised recursive user
 * functions. `Session` is the entry point; everything else is exported for
 * hosts that need the pieces.
 */

export { Session, type Outcome, type Listing } from './core/session.js';
export { Env, RESERVED_COMMANDS, RESERVED_VARIABLES } from './core/env.js';
export { Complex, ComplexMath } from './core/complex.js';
export { AUTO_DIGITS, MAX_PRECISION, makeDecimal, workingDigits, type Precision } from './core/decimal.js';
export { RuntimeOptions, PrecisionSchema, optionsFromEnv, type RuntimeOptionsInput } from './core/config.js';
export { CalcError, InternalError, type ErrorKind } from './core/errors.js';
export { ok, err, isOk, isErr, match, type Result, type Ok, type Err } from './core/result.js';
export { formatComplex, formatReal } from './core/format.js';

export { lex, type Lexeme, type LexTag } from './core/expr/lexer.js';
export { compile } from './core/expr/compiler.js';
export { evaluate } from './core/expr/interp.js';
export { references } from './core/expr/references.js';
export { render, type Operand, type Token } from './core/expr/types.js';

export { BUILTINS, signature } from './core/functions/builtins.js';
export { UserFunction, type BuiltinFunction, type Callable, type Restriction } from './core/functions/function.js';
export { ArgumentTrie } from './core/functions/cache.js';

export const RUNTIME_VERSION = '0.1.0';
