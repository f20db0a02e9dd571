/**
 * Public API of the Pocket client
 */

export { PocketClient } from "./pocket-client.js";
export type { PocketClientOptions, SendInput, SendOutcome } from "./pocket-client.js";
export {
  ActionBatch,
  add,
  archive,
  deleteItem,
  deleteTag,
  favorite,
  readd,
  renameTag,
  tagsAdd,
  tagsClear,
  tagsRemove,
  tagsReplace,
  unfavorite,
} from "./actions.js";
export type { AddTarget, IdInput, StampedBatch, TimeInput } from "./actions.js";
export { createCredentials } from "./credentials.js";
export type { CredentialsInput } from "./credentials.js";
export { buildRetrieveOptions } from "./retrieve-options.js";
export type { RetrieveFilter } from "./retrieve-options.js";
export type { AddOptions } from "./request.js";
export { classifyResponse, pairActionResults, unwrap } from "./response.js";
export type { ActionOutcome } from "./response.js";
export { ANY_TAG, UNTAGGED, normalizeTags } from "./tags.js";
export type { TagInput } from "./tags.js";
export { createFetchTransport } from "./transport.js";
export type { RawResponse, Transport, TransportRequest } from "./transport.js";
export * from "./types.js";
export * from "../utils/errors.js";
