/**
 * Typed filters for /v3/get
 *
 * buildRetrieveOptions validates a filter object and maps it onto the wire
 * option names and values Pocket expects. Keys it does not know are dropped.
 *
 * @see https://getpocket.com/developer/docs/v3/retrieve
 */

import { z } from "zod";
import { ANY_TAG, UNTAGGED, normalizeTags } from "./tags.js";
import { toEpochSeconds } from "./actions.js";
import type { OptionValue, RetrieveOptions } from "./types.js";
import { PocketValidationError } from "../utils/errors.js";

export const retrieveFilterSchema = z.object({
  state: z.enum(["unread", "archive", "all"]).optional(),
  favorite: z.boolean().optional(),
  tag: z
    .union([z.string(), z.array(z.string()), z.literal(UNTAGGED), z.literal(ANY_TAG)])
    .optional(),
  contentType: z.enum(["article", "video", "image"]).optional(),
  sort: z.enum(["newest", "oldest", "title", "site"]).optional(),
  detailType: z.enum(["simple", "complete"]).optional(),
  search: z.string().optional(),
  domain: z.string().optional(),
  /** Date, or Unix epoch seconds */
  since: z.union([z.date(), z.number().int().nonnegative()]).optional(),
  count: z.number().int().positive().optional(),
  offset: z.number().int().nonnegative().optional(),
});

export type RetrieveFilter = z.input<typeof retrieveFilterSchema>;

/**
 * @throws PocketValidationError when a value is out of range or of the wrong kind
 */
export function buildRetrieveOptions(filter: RetrieveFilter): RetrieveOptions {
  const parsed = retrieveFilterSchema.safeParse(filter);
  if (!parsed.success) {
    throw new PocketValidationError(
      "Invalid retrieve options",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { favorite, tag, since, ...plain } = parsed.data;
  const options: Record<string, OptionValue> = {};

  for (const [key, value] of Object.entries(plain)) {
    if (value !== undefined) options[key] = value;
  }
  if (favorite !== undefined) options.favorite = favorite ? 1 : 0;
  if (tag !== undefined) options.tag = normalizeTags(tag);
  if (since !== undefined) {
    options.since = typeof since === "number" ? since : Number(toEpochSeconds(since));
  }

  return options;
}
