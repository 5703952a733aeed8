import { describe, it, expect, vi, afterEach } from "vitest";
import { builtins, evaluate } from "../src/core/handlers.js";
import { BUILTINS } from "../runtime/src/index.js";

describe("evaluate handler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs lines in one session and reports failures per line", async () => {
    const out = await evaluate({ lines: ["x=2", "x^10", "1/0", "x+1"] });

    expect(out.results).toEqual(["x = 2", "1024", null, "3"]);
    expect(out.diagnostics).toEqual([
      { code: "eval_error", message: "Eval error: division by zero", line: 2, severity: "error" }
    ]);
    expect(out.perf?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("maps compile and recursion failures to their codes", async () => {
    const out = await evaluate({
      lines: ["1+", "r[n]=r[n+1]", "r[0]"],
      options: { maxDepth: 5 }
    });

    expect(out.results).toEqual([null, "r[n] = r[n+1]", null]);
    expect(out.diagnostics.map((d) => [d.code, d.line])).toEqual([
      ["compile_error", 0],
      ["recursion_error", 2]
    ]);
  });

  it("applies the requested precision", async () => {
    const out = await evaluate({ lines: ["1/3"], options: { precision: 5 } });
    expect(out.results).toEqual(["0.33333"]);
  });

  it("returns a schema error instead of throwing on bad input", async () => {
    const out = await evaluate({ lines: [] });

    expect(out.results).toEqual([]);
    expect(out.diagnostics).toHaveLength(1);
    expect(out.diagnostics[0].code).toBe("schema_error");
  });

  it("rejects a precision beyond the ceiling as a schema error", async () => {
    const out = await evaluate({ lines: ["pi"], options: { precision: 2000000000 } });

    expect(out.results).toEqual([]);
    expect(out.diagnostics).toHaveLength(1);
    expect(out.diagnostics[0].code).toBe("schema_error");
  });

  it("writes one audit line per request", async () => {
    const audit = vi.spyOn(console, "error").mockImplementation(() => {});
    await evaluate({ lines: ["1+1"] });

    expect(audit).toHaveBeenCalledTimes(1);
    expect(String(audit.mock.calls[0][0])).toMatch(/^\[AUDIT\] \{"ts":/);
  });
});

describe("builtins handler", () => {
  it("lists every built-in signature", () => {
    const list = builtins();
    expect(list).toHaveLength(BUILTINS.length);
    expect(list).toContain("log[_0,_1]: logarithm of x in base b");
    expect(list).toContain("rand[]: uniform random number in [0, 1)");
  });
});
