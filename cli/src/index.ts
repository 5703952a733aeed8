#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline";
import { optionsFromEnv, Session, type RuntimeOptionsInput } from "../../core/runtime/src/index.js";
import { runCommand } from "./commands.js";

function usage() {
  console.log("bracketcalc [--precision N|auto] [--max-depth N] [-e LINE]... [-f FILE]");
  console.log("without -e or -f, starts an interactive session");
}

interface CliArgs {
  options: RuntimeOptionsInput;
  lines: string[];
  files: string[];
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { options: optionsFromEnv(), lines: [], files: [], help: false };
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if (flag === "-h" || flag === "--help") {
      out.help = true;
      continue;
    }
    if (value === undefined) throw new Error(`missing value for ${flag}`);
    i++;
    if (flag === "-e" || flag === "--eval") out.lines.push(value);
    else if (flag === "-f" || flag === "--file") out.files.push(value);
    else if (flag === "--precision") out.options.precision = value === "auto" ? "auto" : Number(value);
    else if (flag === "--max-depth") out.options.maxDepth = Number(value);
    else throw new Error(`unknown option ${flag}`);
  }
  return out;
}

/** Runs lines in order; returns false if any of them failed. */
function runBatch(session: Session, lines: string[]): boolean {
  let allOk = true;
  for (const line of lines) {
    if (line.trim() === "") continue;
    const { output, error, exit } = runCommand(session, line);
    if (error) {
      allOk = false;
      console.error(output);
    } else if (output !== "") {
      console.log(output);
    }
    if (exit) break;
  }
  return allOk;
}

function repl(session: Session): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });
  console.error(`bracketcalc, precision ${session.precision}. Type "help" for help.`);
  rl.prompt();
  rl.on("line", (line) => {
    const { output, exit } = runCommand(session, line);
    if (exit) {
      rl.close();
      return;
    }
    if (output !== "") console.log(output);
    rl.prompt();
  });
  return new Promise((done) => rl.on("close", done));
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) return usage();

  const session = new Session(args.options);
  if (args.lines.length === 0 && args.files.length === 0) return repl(session);

  const scripts = args.files.flatMap((f) => readFileSync(resolve(process.cwd(), f), "utf8").split(/\r?\n/));
  const passed = runBatch(session, [...scripts, ...args.lines]);
  process.exit(passed ? 0 : 1);
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
