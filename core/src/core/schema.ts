import { z } from "zod";
import { PrecisionSchema } from "../../runtime/src/index.js";

/**
 * Session options accepted per request
 */
export const EvalOptions = z.object({
  precision: PrecisionSchema.optional(),
  maxDepth: z.number().int().positive().max(100_000).optional()
});

/**
 * Input for evaluation requests: lines run in order in one fresh session
 */
export const EvalInput = z.object({
  lines: z.array(z.string()).min(1),
  options: EvalOptions.optional()
});

export const Diagnostic = z.object({
  code: z.enum(["compile_error", "eval_error", "recursion_error", "schema_error"]),
  message: z.string(),
  line: z.number().int().nonnegative().optional(),
  severity: z.enum(["error", "warning", "info"]).optional()
});

/**
 * One entry per input line; null where the line failed
 */
export const EvalOutput = z.object({
  results: z.array(z.string().nullable()),
  diagnostics: z.array(Diagnostic),
  perf: z.object({ durationMs: z.number() }).optional()
});

export type EvalOptionsT = z.infer<typeof EvalOptions>;
export type EvalInputT = z.infer<typeof EvalInput>;
export type DiagnosticT = z.infer<typeof Diagnostic>;
export type EvalOutputT = z.infer<typeof EvalOutput>;
