/**
 * Request body assembly for the three v3 endpoints
 */

import type { StampedBatch } from "./actions.js";
import {
  ADD_OPTION_KEYS,
  type AddOptionKey,
  type Credentials,
  type OptionValue,
  type RetrieveOptions,
  type StampedAction,
} from "./types.js";
import { ANY_TAG, UNTAGGED, normalizeTags, type TagInput } from "./tags.js";

export interface AuthFields {
  consumer_key: string;
  access_token: string;
}

export type RetrieveBody = AuthFields & Record<string, OptionValue>;

export interface AddOptions {
  url: string;
  tags?: TagInput;
  title?: string;
  tweet_id?: string;
  /** Anything else is dropped before sending */
  [key: string]: unknown;
}

export type AddBody = AuthFields & Partial<Record<AddOptionKey, string>>;

export interface SendBody extends AuthFields {
  actions: readonly Readonly<StampedAction>[];
}

export const ENDPOINTS = {
  retrieve: "/v3/get",
  add: "/v3/add",
  send: "/v3/send",
} as const;

export type Endpoint = keyof typeof ENDPOINTS;

export function endpointUrl(credentials: Credentials, endpoint: Endpoint): string {
  return `${credentials.siteBaseUrl}${ENDPOINTS[endpoint]}`;
}

function authFields(credentials: Credentials): AuthFields {
  return {
    consumer_key: credentials.consumerKey,
    access_token: credentials.accessToken,
  };
}

/**
 * Credentials are merged last so options can never replace them.
 */
export function buildRetrieveBody(
  credentials: Credentials,
  options: RetrieveOptions = {}
): RetrieveBody {
  return { ...options, ...authFields(credentials) };
}

function isAddOptionKey(key: string): key is AddOptionKey {
  return ADD_OPTION_KEYS.some((allowed) => allowed === key);
}

function isTagInput(value: unknown): value is TagInput {
  if (typeof value === "string" || value === UNTAGGED || value === ANY_TAG) return true;
  return Array.isArray(value) && value.every((tag) => typeof tag === "string");
}

/**
 * Keep only url, tags, title and tweet_id; normalize tags.
 */
export function filterAddOptions(options: AddOptions): Partial<Record<AddOptionKey, string>> {
  const filtered: Partial<Record<AddOptionKey, string>> = {};

  for (const [key, value] of Object.entries(options)) {
    if (!isAddOptionKey(key) || value === undefined || value === null) continue;

    if (key === "tags" && isTagInput(value)) {
      filtered.tags = normalizeTags(value);
    } else {
      filtered[key] = String(value);
    }
  }

  return filtered;
}

export function buildAddBody(credentials: Credentials, options: AddOptions): AddBody {
  return { ...filterAddOptions(options), ...authFields(credentials) };
}

export function buildSendBody(credentials: Credentials, batch: StampedBatch): SendBody {
  return { actions: batch.actions, ...authFields(credentials) };
}
