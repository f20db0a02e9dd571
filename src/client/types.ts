/**
 * Pocket API Types
 * Based on the Pocket v3 API documentation: https://getpocket.com/developer/docs/overview
 */

import type { PocketError } from "../utils/errors.js";

// ============ Credentials ============

export interface Credentials {
  readonly consumerKey: string;
  readonly accessToken: string;
  readonly siteBaseUrl: string;
}

export const DEFAULT_SITE_BASE_URL = "https://getpocket.com";

// ============ Actions ============

export const ACTION_KINDS = [
  "add",
  "archive",
  "readd",
  "favorite",
  "unfavorite",
  "delete",
  "tags_add",
  "tags_remove",
  "tags_replace",
  "tags_clear",
  "tag_rename",
  "tag_delete",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/**
 * One modify-endpoint action. Field names are the wire names.
 */
export interface Action {
  action: ActionKind;
  item_id?: string;
  url?: string;
  tags?: string;
  time?: string;
  title?: string;
  ref_id?: string;
  old_tag?: string;
  new_tag?: string;
  tag?: string;
}

export interface StampedAction extends Action {
  /** Unix epoch seconds shared by every action of one dispatch */
  timestamp: string;
}

// ============ Options ============

export type OptionValue = string | number | boolean;

/** Wire options for /v3/get, sent verbatim */
export type RetrieveOptions = Readonly<Record<string, OptionValue>>;

export const ADD_OPTION_KEYS = ["url", "tags", "title", "tweet_id"] as const;

export type AddOptionKey = (typeof ADD_OPTION_KEYS)[number];

// ============ Responses ============

export interface PocketImage {
  item_id: string;
  image_id?: string;
  src: string;
  width?: string;
  height?: string;
  caption?: string;
  credit?: string;
}

export interface PocketItem {
  item_id: string;
  resolved_id?: string;
  given_url?: string;
  resolved_url?: string;
  given_title?: string;
  resolved_title?: string;
  title?: string;
  excerpt?: string;
  favorite?: "0" | "1";
  status?: "0" | "1" | "2";
  is_article?: "0" | "1";
  has_image?: "0" | "1" | "2";
  has_video?: "0" | "1" | "2";
  word_count?: string;
  time_added?: string;
  time_updated?: string;
  time_read?: string;
  time_favorited?: string;
  tags?: Record<string, { item_id: string; tag: string }>;
  images?: Record<string, PocketImage>;
  [key: string]: unknown;
}

export interface RetrieveResponse {
  status: number;
  complete?: number;
  /** Pocket sends an empty array instead of an empty object */
  list: Record<string, PocketItem> | [];
  since?: number;
  error?: string | null;
  search_meta?: { search_type: string };
  [key: string]: unknown;
}

export interface AddResponse {
  status: number;
  item: PocketItem;
  [key: string]: unknown;
}

export interface ActionError {
  message: string;
  type: string;
  code: number;
}

export interface SendResponse {
  status: number;
  action_results: Array<boolean | PocketItem>;
  action_errors?: Array<ActionError | null>;
  [key: string]: unknown;
}

// ============ Results ============

export type ApiResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PocketError };
