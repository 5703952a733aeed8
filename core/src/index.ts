/**
 * MCP server entry point (stdio)
 */
import { startMcpHost } from "./server/server.js";

async function main() {
  console.error("Starting calculator MCP server...");
  await startMcpHost();
}

process.on("SIGINT", () => {
  console.error("\nShutting down...");
  process.exit(0);
});

process.on("SIGTERM", () => {
  console.error("\nShutting down...");
  process.exit(0);
});

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
