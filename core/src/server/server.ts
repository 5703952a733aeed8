/**
 * MCP Server - thin adapter over core handlers
 * Wires tools and resources to the FastMCP host
 */
import { FastMCP } from "fastmcp";
import { registerResources } from "../core/resources.js";
import { registerTools } from "../core/tools.js";

/**
 * Create and configure the MCP server
 * This is a thin adapter - all business logic lives in core/handlers.ts
 */
export async function startMcpHost() {
  try {
    const server = new FastMCP({
      name: "bracketcalc",
      version: "1.0.0"
    });

    registerResources(server);
    registerTools(server);

    await server.start({ transportType: "stdio" });
    console.error("MCP Server running on stdio");

    return server;
  } catch (error) {
    console.error("Failed to initialize MCP server:", error);
    throw error;
  }
}
