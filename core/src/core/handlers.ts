import { randomUUID } from "crypto";
import { BUILTINS, Session, signature, type ErrorKind } from "../../runtime/src/index.js";
import { EvalInput, EvalOutput, type DiagnosticT, type EvalOutputT } from "./schema.js";

/**
 * Options for handler execution
 */
export interface HandlerOptions {
  reqId?: string;
}

const CODES: Record<ErrorKind, DiagnosticT["code"]> = {
  compile: "compile_error",
  eval: "eval_error",
  recursion: "recursion_error"
};

/**
 * Core evaluation handler - transport-agnostic
 *
 * Rules:
 * - Never throws; always returns diagnostics
 * - A failing line does not stop the lines after it
 * - Logs audit trail
 */
export async function evaluate(input: unknown, opts?: HandlerOptions): Promise<EvalOutputT> {
  const reqId = opts?.reqId ?? randomUUID();
  const started = Date.now();

  const parsed = EvalInput.safeParse(input);
  if (!parsed.success) {
    const diagnostics: DiagnosticT[] = [{
      code: "schema_error",
      message: parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "),
      severity: "error"
    }];
    return { results: [], diagnostics, perf: { durationMs: Date.now() - started } };
  }

  const { lines, options } = parsed.data;
  const session = new Session(options ?? {});
  const results: Array<string | null> = [];
  const diagnostics: DiagnosticT[] = [];

  lines.forEach((line, index) => {
    const result = session.execute(line);
    if (result.t === "ok") {
      results.push(result.v.text);
      return;
    }
    results.push(null);
    diagnostics.push({ code: CODES[result.code], message: result.msg, line: index, severity: "error" });
  });

  const output = { results, diagnostics, perf: { durationMs: Date.now() - started } };

  logAudit({
    reqId,
    tool: "evaluate",
    lines: lines.length,
    durationMs: output.perf.durationMs,
    diagCounts: countDiagnostics(diagnostics)
  });

  return EvalOutput.parse(output);
}

/**
 * Signatures of the built-in functions, as `name[_0,_1]: description`
 */
export function builtins(): string[] {
  return BUILTINS.map(signature);
}

/**
 * Count diagnostics by code
 */
function countDiagnostics(diagnostics: DiagnosticT[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const diag of diagnostics) {
    counts[diag.code] = (counts[diag.code] ?? 0) + 1;
  }
  return counts;
}

function logAudit(entry: {
  reqId: string;
  tool: string;
  lines: number;
  durationMs: number;
  diagCounts: Record<string, number>;
}) {
  const log = {
    ts: new Date().toISOString(),
    ...entry
  };
  console.error(`[AUDIT] ${JSON.stringify(log)}`);
}
