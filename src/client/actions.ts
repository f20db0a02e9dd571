/**
 * Modify endpoint actions
 *
 * Factories build single actions (one id) or fanned-out lists (one action
 * per id). ActionBatch accumulates them into an ordered, immutable batch:
 * every method returns a new batch and leaves the receiver untouched.
 *
 * @see https://getpocket.com/developer/docs/v3/modify
 */

import type { Action, ActionKind, StampedAction } from "./types.js";
import { normalizeTags, type TagInput } from "./tags.js";

export type IdInput = string | readonly string[];

export type TimeInput = string | Date;

export type AddTarget = ({ url: string; itemId?: never } | { itemId: string; url?: never }) & {
  title?: string;
  tags?: TagInput;
  time?: TimeInput;
  /** Tweet id to associate the item with */
  refId?: string;
};

export function toEpochSeconds(date: Date): string {
  return String(Math.floor(date.getTime() / 1000));
}

function toTime(time: TimeInput): string {
  return typeof time === "string" ? time : toEpochSeconds(time);
}

interface ItemActionFactory {
  (id: string): Action;
  (ids: readonly string[]): Action[];
  (ids: IdInput): Action | Action[];
}

interface TagsActionFactory {
  (id: string, tags: TagInput): Action;
  (ids: readonly string[], tags: TagInput): Action[];
  (ids: IdInput, tags: TagInput): Action | Action[];
}

function itemAction(kind: ActionKind): ItemActionFactory {
  function create(id: string): Action;
  function create(ids: readonly string[]): Action[];
  function create(ids: IdInput): Action | Action[];
  function create(ids: IdInput): Action | Action[] {
    if (typeof ids === "string") return { action: kind, item_id: ids };
    return ids.map((id) => ({ action: kind, item_id: id }));
  }
  return create;
}

// Bulk mode applies the same tags to every id; there is no per-id pairing.
function tagsAction(kind: ActionKind): TagsActionFactory {
  function create(id: string, tags: TagInput): Action;
  function create(ids: readonly string[], tags: TagInput): Action[];
  function create(ids: IdInput, tags: TagInput): Action | Action[];
  function create(ids: IdInput, tags: TagInput): Action | Action[] {
    const normalized = normalizeTags(tags);
    if (typeof ids === "string") return { action: kind, item_id: ids, tags: normalized };
    return ids.map((id) => ({ action: kind, item_id: id, tags: normalized }));
  }
  return create;
}

/**
 * Add an existing item (by id) or a new url to the list
 */
export function add(target: AddTarget): Action {
  const action: Action =
    target.url !== undefined
      ? { action: "add", url: target.url }
      : { action: "add", item_id: target.itemId };
  if (target.title !== undefined) action.title = target.title;
  if (target.tags !== undefined) action.tags = normalizeTags(target.tags);
  if (target.time !== undefined) action.time = toTime(target.time);
  if (target.refId !== undefined) action.ref_id = target.refId;
  return action;
}

export const archive = itemAction("archive");
export const readd = itemAction("readd");
export const favorite = itemAction("favorite");
export const unfavorite = itemAction("unfavorite");
/** `delete` is reserved, hence the longer name */
export const deleteItem = itemAction("delete");
export const tagsClear = itemAction("tags_clear");

export const tagsAdd = tagsAction("tags_add");
export const tagsRemove = tagsAction("tags_remove");
export const tagsReplace = tagsAction("tags_replace");

/**
 * Rename a tag. Single action only: an old/new pair is specific to one item.
 */
export function renameTag(id: string, oldTag: string, newTag: string): Action {
  return { action: "tag_rename", item_id: id, old_tag: oldTag, new_tag: newTag };
}

export function deleteTag(id: string, tag: string): Action {
  return { action: "tag_delete", item_id: id, tag };
}

/**
 * Snapshot of a batch taken at dispatch time
 */
export interface StampedBatch {
  readonly timestamp: string;
  readonly actions: readonly Readonly<StampedAction>[];
}

/**
 * Ordered, immutable sequence of actions for one /v3/send request.
 *
 * @example
 * const batch = ActionBatch.empty()
 *   .favorite(["1234", "2345"])
 *   .unfavorite("9876");
 */
export class ActionBatch implements Iterable<Readonly<Action>> {
  private readonly actions: readonly Readonly<Action>[];

  private constructor(actions: readonly Action[]) {
    this.actions = Object.freeze(actions.map((action) => Object.freeze({ ...action })));
  }

  static empty(): ActionBatch {
    return new ActionBatch([]);
  }

  static from(actions: Action | readonly Action[]): ActionBatch {
    return new ActionBatch(isActionList(actions) ? actions : [actions]);
  }

  get size(): number {
    return this.actions.length;
  }

  get isEmpty(): boolean {
    return this.actions.length === 0;
  }

  [Symbol.iterator](): Iterator<Readonly<Action>> {
    return this.actions[Symbol.iterator]();
  }

  /**
   * Copies of the accumulated actions, in insertion order
   */
  toArray(): Action[] {
    return this.actions.map((action) => ({ ...action }));
  }

  append(...actions: Array<Action | readonly Action[]>): ActionBatch {
    const added = actions.flatMap((entry) => (isActionList(entry) ? [...entry] : [entry]));
    return new ActionBatch([...this.actions, ...added]);
  }

  concat(other: ActionBatch): ActionBatch {
    return new ActionBatch([...this.actions, ...other.actions]);
  }

  add(target: AddTarget): ActionBatch {
    return this.append(add(target));
  }

  archive(ids: IdInput): ActionBatch {
    return this.append(archive(ids));
  }

  readd(ids: IdInput): ActionBatch {
    return this.append(readd(ids));
  }

  favorite(ids: IdInput): ActionBatch {
    return this.append(favorite(ids));
  }

  unfavorite(ids: IdInput): ActionBatch {
    return this.append(unfavorite(ids));
  }

  delete(ids: IdInput): ActionBatch {
    return this.append(deleteItem(ids));
  }

  tagsAdd(ids: IdInput, tags: TagInput): ActionBatch {
    return this.append(tagsAdd(ids, tags));
  }

  tagsRemove(ids: IdInput, tags: TagInput): ActionBatch {
    return this.append(tagsRemove(ids, tags));
  }

  tagsReplace(ids: IdInput, tags: TagInput): ActionBatch {
    return this.append(tagsReplace(ids, tags));
  }

  tagsClear(ids: IdInput): ActionBatch {
    return this.append(tagsClear(ids));
  }

  renameTag(id: string, oldTag: string, newTag: string): ActionBatch {
    return this.append(renameTag(id, oldTag, newTag));
  }

  deleteTag(id: string, tag: string): ActionBatch {
    return this.append(deleteTag(id, tag));
  }

  /**
   * Stamp every action with the same dispatch timestamp.
   * A stamped batch belongs to exactly one request.
   */
  stamp(now: Date = new Date()): StampedBatch {
    const timestamp = toEpochSeconds(now);
    return Object.freeze({
      timestamp,
      actions: Object.freeze(
        this.actions.map((action) => Object.freeze({ ...action, timestamp }))
      ),
    });
  }
}

function isActionList(value: Action | readonly Action[]): value is readonly Action[] {
  return Array.isArray(value);
}
