#!/usr/bin/env node

/**
 * Pocket MCP Server - Entry Point
 *
 * Runs over stdio for IDE and desktop integrations. Credentials come from
 * POCKET_CONSUMER_KEY and POCKET_ACCESS_TOKEN.
 */

import { PocketClient } from "./client/pocket-client.js";
import { loadConfig } from "./config.js";
import { startStdioTransport } from "./transports/stdio.js";
import { PocketConfigError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

const HELP = `
Pocket MCP Server

Usage: pocket-actions [options]

Options:
  -h, --help              Show this help message

Environment Variables:
  POCKET_CONSUMER_KEY     Your Pocket application consumer key (required)
  POCKET_ACCESS_TOKEN     The user's Pocket access token (required)
  POCKET_BASE_URL         Pocket API base URL (default: https://getpocket.com)
  POCKET_TIMEOUT_MS       Request timeout in milliseconds (default: 30000)
  LOG_LEVEL               debug, info, warn or error (default: info)

Example:
  POCKET_CONSUMER_KEY=your-key POCKET_ACCESS_TOKEN=your-token pocket-actions
`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes("--help") || args.includes("-h")) {
    console.log(HELP);
    process.exit(0);
  }

  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const client = PocketClient.fromConfig(config);
  const connection = await startStdioTransport({ client });

  process.on("SIGINT", () => {
    connection
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Failed to close stdio transport", error);
        process.exit(1);
      });
  });
}

main().catch((error: unknown) => {
  if (error instanceof PocketConfigError) {
    console.error(`Error: ${error.message}`);
    console.error("Create an application at https://getpocket.com/developer/apps/ to get a consumer key");
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
