/**
 * Tool handlers
 *
 * Each handler turns validated tool arguments into one client call and
 * returns the raw result. A failed ApiResult is thrown so the MCP server
 * reports it as a tool error.
 */

import type { PocketClient } from "../client/pocket-client.js";
import { buildRetrieveOptions } from "../client/retrieve-options.js";
import { pairActionResults, unwrap, type ActionOutcome } from "../client/response.js";
import { UNTAGGED, normalizeTags } from "../client/tags.js";
import type { Action, AddResponse, RetrieveResponse } from "../client/types.js";
import type {
  ActionToolArgs,
  AddToolArgs,
  RetrieveToolArgs,
  SendActionsToolArgs,
} from "./schemas.js";

export async function handleRetrieve(
  client: PocketClient,
  args: RetrieveToolArgs
): Promise<RetrieveResponse> {
  const { untagged, tag, ...filter } = args;
  const options = buildRetrieveOptions({ ...filter, tag: untagged ? UNTAGGED : tag });
  return client.retrieveOrThrow(options);
}

export async function handleAdd(client: PocketClient, args: AddToolArgs): Promise<AddResponse> {
  return unwrap(await client.add(args));
}

export function toAction(args: ActionToolArgs): Action {
  const { tags, ...fields } = args;
  const action: Action = { action: fields.action };

  for (const key of [
    "item_id",
    "url",
    "title",
    "time",
    "ref_id",
    "old_tag",
    "new_tag",
    "tag",
  ] as const) {
    const value = fields[key];
    if (value !== undefined) action[key] = value;
  }
  if (tags !== undefined) action.tags = normalizeTags(tags);

  return action;
}

export interface SendActionsSummary {
  status: number;
  timestamp: string;
  results: ActionOutcome[];
}

export async function handleSendActions(
  client: PocketClient,
  args: SendActionsToolArgs
): Promise<SendActionsSummary> {
  const { batch, result } = await client.dispatch(args.actions.map(toAction));
  const response = unwrap(result);
  return {
    status: response.status,
    timestamp: batch.timestamp,
    results: pairActionResults(batch, response),
  };
}
