import { FastMCP } from "fastmcp";
import { z } from "zod";
import { EvalOptions } from "./schema.js";
import { builtins, evaluate } from "./handlers.js";

/**
 * Register all tools with the MCP server
 * MCP tools are thin wrappers around core handlers - no business logic here
 *
 * @param server The FastMCP server instance
 */
export function registerTools(server: FastMCP) {
  server.addTool({
    name: "calc.evaluate",
    description:
      "Run calculator lines in a fresh session: expressions like 2^100, variables x=3, recursive functions f[n]=n*f[n-1] with base cases f[0]=1",
    parameters: z.object({
      lines: z.array(z.string()).min(1).describe("Lines to run in order"),
      options: EvalOptions.optional().describe("Precision in significant digits (or \"auto\") and recursion ceiling")
    }),
    execute: async (params) => {
      const result = await evaluate(params);
      return JSON.stringify(result, null, 2);
    }
  });

  server.addTool({
    name: "calc.builtins",
    description: "List the built-in functions with their arity",
    parameters: z.object({}),
    execute: async () => builtins().join("\n")
  });
}
