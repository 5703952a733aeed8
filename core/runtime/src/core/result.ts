// Result type returned by the session boundary

import type { ErrorKind } from './errors.js';

export type Ok<T> = { t: 'ok'; v: T };
export type Err = { t: 'err'; code: ErrorKind; msg: string };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(v: T): Ok<T> => ({ t: 'ok', v });
export const err = (code: ErrorKind, msg: string): Err => ({ t: 'err', code, msg });

export const isOk = <T>(r: Result<T>): r is Ok<T> => r.t === 'ok';
export const isErr = <T>(r: Result<T>): r is Err => r.t === 'err';

export const match = <T, R>(r: Result<T>, arms: { ok: (v: T) => R; err: (e: Err) => R }): R =>
  isOk(r) ? arms.ok(r.v) : arms.err(r);
