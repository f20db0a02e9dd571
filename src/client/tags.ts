/**
 * Tag normalization
 *
 * Pocket takes tags as one comma separated string. Two reserved markers stand
 * for "items without tags" and "items with any tag".
 */

export const UNTAGGED = Symbol("pocket.untagged");
export const ANY_TAG = Symbol("pocket.anyTag");

export const UNTAGGED_TOKEN = "_untagged_";
export const ANY_TAG_TOKEN = "*";

export type TagSentinel = typeof UNTAGGED | typeof ANY_TAG;

export type TagInput = string | readonly string[] | TagSentinel;

export const TAG_SEPARATOR = ", ";

/**
 * Convert a tag value into the string Pocket expects.
 * Tags are passed through verbatim: no trimming, no deduplication.
 */
export function normalizeTags(input: TagInput): string {
  if (input === UNTAGGED) return UNTAGGED_TOKEN;
  if (input === ANY_TAG) return ANY_TAG_TOKEN;
  if (typeof input === "string") return input;
  return input.join(TAG_SEPARATOR);
}
