/**
 * Stdio Transport Handler
 * Uses standard input/output for MCP communication
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PocketClient } from "../client/pocket-client.js";
import { createPocketServer } from "../server.js";
import { logger } from "../utils/logger.js";

export interface StdioTransportOptions {
  client: PocketClient;
}

export interface StdioTransportConnection {
  server: McpServer;
  transport: StdioServerTransport;
  close: () => Promise<void>;
}

/**
 * Create and start stdio transport
 */
export async function startStdioTransport(
  options: StdioTransportOptions
): Promise<StdioTransportConnection> {
  const log = logger.child("stdio");
  const { client } = options;

  const server = createPocketServer(client);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  log.info("Stdio transport connected");

  return {
    server,
    transport,
    close: async () => {
      log.info("Closing stdio transport");
      await transport.close();
    },
  };
}
