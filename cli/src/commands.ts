import { match, type Outcome, type Session } from "../../core/runtime/src/index.js";

export interface CommandResult {
  output: string;
  error?: boolean;
  exit?: boolean;
}

export const HELP = [
  "Enter an expression, or define:",
  "  x=<expr>            variable",
  "  f[a,b]=<expr>       function (may call itself)",
  "  f[0]=1              base case for a function",
  "Operators: + - * / % ^ and parentheses. Calls use brackets: sin[pi/2].",
  "Numbers may be imaginary: 2i, 1.5e3i.",
  "Commands:",
  "  env                 list constants, variables and functions",
  "  del <name>          delete a variable or function",
  "  precision [n|auto]  show or set significant digits",
  "  reset               delete every variable and function",
  "  help                this text",
  "  exit                quit"
].join("\n");

function parsePrecision(arg: string): number | "auto" | undefined {
  if (arg === "auto") return "auto";
  if (!/^\d+$/.test(arg)) return undefined;
  return Number(arg);
}

function showEnv(session: Session): string {
  const { precision, constants, variables, functions, builtins } = session.listing();
  const section = (title: string, lines: string[]) =>
    lines.length === 0 ? [] : [`${title}:`, ...lines.map((l) => `  ${l.replace(/\n/g, "\n  ")}`)];
  return [
    `precision: ${precision}`,
    ...section("constants", constants),
    ...section("variables", variables),
    ...section("functions", functions),
    ...section("built-ins", builtins)
  ].join("\n");
}

/**
 * Runs one shell line: a command if its first word names one, otherwise a
 * calculator line. Failures are reported in the result, never thrown.
 */
export function runCommand(session: Session, line: string): CommandResult {
  const [word = "", ...rest] = line.trim().split(/\s+/);
  const arg = rest.join(" ");

  switch (word) {
    case "exit":
      return { output: "", exit: true };
    case "help":
      return { output: HELP };
    case "env":
      return { output: showEnv(session) };
    case "reset":
      session.reset();
      return { output: "environment reset" };
    case "del": {
      if (arg === "") return { output: "usage: del <name>", error: true };
      const removed = session.remove(arg);
      if (removed.t === "err") return { output: removed.msg, error: true };
      return { output: `deleted ${removed.v} "${arg}"` };
    }
    case "precision": {
      if (arg === "") return { output: `precision: ${session.precision}` };
      const requested = parsePrecision(arg);
      const set = session.setPrecision(requested);
      if (set.t === "err") return { output: set.msg, error: true };
      return { output: `precision: ${set.v}` };
    }
  }

  return match<Outcome, CommandResult>(session.execute(line), {
    ok: (outcome) => ({ output: outcome.text }),
    err: (e) => ({ output: e.msg, error: true })
  });
}
