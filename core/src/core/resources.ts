import { FastMCP } from "fastmcp";
import { builtins } from "./handlers.js";

/**
 * Register all resources with the MCP server
 *
 * @param server The FastMCP server instance
 */
export function registerResources(server: FastMCP) {
  server.addResource({
    uri: "calc://builtins",
    name: "Calculator built-ins",
    mimeType: "application/json",
    async load() {
      return {
        text: JSON.stringify(builtins(), null, 2)
      };
    }
  });
}
