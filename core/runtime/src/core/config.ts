import { z } from 'zod';
import { MAX_PRECISION } from './decimal.js';

export const PrecisionSchema = z.union([z.number().int().positive().max(MAX_PRECISION), z.literal('auto')]);

export const RuntimeOptions = z.object({
  precision: PrecisionSchema.default(32),
  maxDepth: z.number().int().positive().default(1000),
});

export type RuntimeOptions = z.infer<typeof RuntimeOptions>;
export type RuntimeOptionsInput = z.input<typeof RuntimeOptions>;

/** Reads `BRACKETCALC_PRECISION` and `BRACKETCALC_MAX_DEPTH`; unset ones stay at their defaults. */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeOptionsInput {
  const out: RuntimeOptionsInput = {};
  const precision = env.BRACKETCALC_PRECISION;
  if (precision) out.precision = precision === 'auto' ? 'auto' : Number(precision);
  const maxDepth = env.BRACKETCALC_MAX_DEPTH;
  if (maxDepth) out.maxDepth = Number(maxDepth);
  return out;
}
