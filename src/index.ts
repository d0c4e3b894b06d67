#!/usr/bin/env node
/**
 * MCP server entry point (Streamable HTTP).
 */

import { loadConfig } from "./config.js";
import { createMcpServer } from "./server.js";
import { setupStreamableHttpServer } from "./streamable-http.js";
import { createLogger } from "./tuna-pipeline/logger.js";

/**
 * Main function to start the server
 */
function main(): void {
  const config = loadConfig();
  const logger = createLogger("tuna-value-mcp", config.logLevel);
  try {
    setupStreamableHttpServer(() => createMcpServer({ config, logger }), config.port, logger);
  } catch (error) {
    logger.error("Error setting up StreamableHTTP server:", error);
    process.exit(1);
  }
}

/**
 * Cleanup function for graceful shutdown
 */
function cleanup(): void {
  console.error("Shutting down MCP server...");
  process.exit(0);
}

process.on("SIGINT", cleanup);
process.on("SIGTERM", cleanup);

try {
  main();
} catch (error) {
  console.error("Fatal error in main execution:", error);
  process.exit(1);
}
