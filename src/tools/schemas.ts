/**
 * Zod schemas for MCP tool parameters
 */

import { z } from "zod";
import { ACTION_KINDS } from "../client/types.js";

const tagsSchema = z
  .union([z.string(), z.array(z.string())])
  .describe("A single tag, a comma separated list, or an array of tags");

export const itemIdSchema = z.string().describe("The Pocket item ID");

// ============ Retrieve ============

export const retrieveSchema = z.object({
  state: z
    .enum(["unread", "archive", "all"])
    .optional()
    .describe("Only return unread, archived or all items"),
  favorite: z.boolean().optional().describe("Only return favorited (true) or unfavorited (false) items"),
  tag: z.string().optional().describe("Only return items with this tag"),
  untagged: z.boolean().optional().describe("Only return items without tags (overrides tag)"),
  contentType: z.enum(["article", "video", "image"]).optional().describe("Filter by content type"),
  sort: z.enum(["newest", "oldest", "title", "site"]).optional().describe("Sort order"),
  detailType: z
    .enum(["simple", "complete"])
    .optional()
    .describe("Return basic item data or all data including tags, images and authors"),
  search: z.string().optional().describe("Only return items whose title or url contain this text"),
  domain: z.string().optional().describe("Only return items from this domain"),
  since: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe("Only return items modified since this Unix timestamp"),
  count: z.number().int().positive().optional().describe("Number of items to return"),
  offset: z.number().int().nonnegative().optional().describe("Offset for pagination, used with count"),
});

// ============ Add ============

export const addSchema = z.object({
  url: z.string().url().describe("The url of the item to save"),
  title: z.string().optional().describe("Title used if Pocket cannot parse one from the page"),
  tags: tagsSchema.optional(),
  tweet_id: z.string().optional().describe("ID of the tweet that linked to the url"),
});

// ============ Modify ============

export const actionSchema = z.object({
  action: z.enum(ACTION_KINDS).describe("The action to perform"),
  item_id: itemIdSchema.optional(),
  url: z.string().optional().describe("Url to save (add only)"),
  tags: tagsSchema.optional(),
  title: z.string().optional().describe("Title of the item (add only)"),
  time: z.string().optional().describe("Unix timestamp of when the action happened"),
  ref_id: z.string().optional().describe("Tweet ID (add only)"),
  old_tag: z.string().optional().describe("Current tag name (tag_rename only)"),
  new_tag: z.string().optional().describe("New tag name (tag_rename only)"),
  tag: z.string().optional().describe("Tag to delete (tag_delete only)"),
});

export const sendActionsSchema = z.object({
  actions: z
    .array(actionSchema)
    .min(1)
    .describe("Actions to apply, in order. They share one timestamp."),
});

export type RetrieveToolArgs = z.infer<typeof retrieveSchema>;
export type AddToolArgs = z.infer<typeof addSchema>;
export type ActionToolArgs = z.infer<typeof actionSchema>;
export type SendActionsToolArgs = z.infer<typeof sendActionsSchema>;
