/**
 * Pocket MCP Server
 * Exposes the retrieve, add and modify endpoints as Model Context Protocol tools
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PocketClient } from "./client/pocket-client.js";
import { addSchema, retrieveSchema, sendActionsSchema } from "./tools/schemas.js";
import { handleAdd, handleRetrieve, handleSendActions } from "./tools/handlers.js";

export const SERVER_NAME = "pocket-actions";
export const SERVER_VERSION = "1.0.0";

export const TOOL_NAMES = ["pocket_retrieve", "pocket_add", "pocket_send_actions"] as const;

function jsonContent(data: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

export function createPocketServer(client: PocketClient): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.tool(
    "pocket_retrieve",
    "Retrieve saved Pocket items, optionally filtered by state, tag, content type, domain or search text",
    retrieveSchema.shape,
    { readOnlyHint: true, destructiveHint: false },
    async (args) => jsonContent(await handleRetrieve(client, args))
  );

  server.tool(
    "pocket_add",
    "Save a new url to Pocket with an optional title and tags",
    addSchema.shape,
    { readOnlyHint: false, destructiveHint: false },
    async (args) => jsonContent(await handleAdd(client, args))
  );

  server.tool(
    "pocket_send_actions",
    "Apply an ordered batch of actions (archive, readd, favorite, unfavorite, delete, " +
      "tags_add, tags_remove, tags_replace, tags_clear, tag_rename, tag_delete, add) to Pocket items. " +
      "Returns the per-action results reported by Pocket.",
    sendActionsSchema.shape,
    { readOnlyHint: false, destructiveHint: true },
    async (args) => jsonContent(await handleSendActions(client, args))
  );

  return server;
}
