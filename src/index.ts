#!/usr/bin/env node

/**
 * Owner API remote MCP server.
 *
 * Exposes vehicle listing, vehicle state and remote commands of the vehicle
 * owner API as MCP tools over stdio.
 *
 * Authentication: set OWNER_API_TOKEN, or OWNER_API_EMAIL, OWNER_API_PASSWORD,
 * OWNER_API_CLIENT_ID and OWNER_API_CLIENT_SECRET for a password grant.
 * See src/config.ts for the remaining variables.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { createServer, SERVER_VERSION } from "./server.js";

async function main() {
  const config = loadConfig();
  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Owner API remote MCP server v${SERVER_VERSION} running on stdio`, {
    apiBase: config.apiBase,
    auth: config.credentials.kind,
  });
}

main().catch((err) => {
  logger.error("Fatal error", { error: err });
  process.exit(1);
});
