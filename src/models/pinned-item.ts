/**
 * Pinned Item Domain Types
 */

import { Schema } from "@effect/schema";
import { randomUUID } from "node:crypto";
import { ClipboardItemSchema, displayString, type ClipboardItem } from "./clipboard-item";

/**
 * A pin holds its own snapshot of the item, so it outlives the history entry
 * it was taken from (history eviction and clearing never touch pins).
 */
export const PinnedClipboardItemSchema = Schema.Struct({
  id: Schema.String.pipe(Schema.minLength(1)),
  item: ClipboardItemSchema,
  pinnedAt: Schema.DateFromString,
  customTitle: Schema.optional(Schema.String),
});

export type PinnedClipboardItem = Schema.Schema.Type<typeof PinnedClipboardItemSchema>;

export const makePinnedItem = (
  item: ClipboardItem,
  options: { readonly customTitle?: string; readonly pinnedAt?: Date; readonly id?: string } = {}
): PinnedClipboardItem => ({
  id: options.id ?? randomUUID(),
  item,
  pinnedAt: options.pinnedAt ?? new Date(),
  customTitle: normalizeTitle(options.customTitle),
});

/**
 * Blank titles are stored as no title
 */
export const normalizeTitle = (title: string | undefined): string | undefined => {
  const trimmed = title?.trim();
  return trimmed ? trimmed : undefined;
};

export const displayTitle = (pinned: PinnedClipboardItem): string =>
  pinned.customTitle ?? displayString(pinned.item);

/**
 * A pin matches an id when either the pin's own id or its snapshot's id equals it
 */
export const matchesPinId = (pinned: PinnedClipboardItem, id: string): boolean =>
  pinned.id === id || pinned.item.id === id;
