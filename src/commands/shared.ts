/**
 * Helpers shared by the command handlers: argument validation, id prefix
 * resolution and one-line item rendering
 */

import { Schema } from "@effect/schema";
import { Effect } from "effect";
import {
  displayString,
  isEquivalentContent,
  type ClipboardItem,
} from "../models/clipboard-item";
import { ValidationError } from "../models/errors";
import type { PinnedClipboardItem } from "../models/pinned-item";
import { ClipboardEngine, type EngineSnapshot } from "../services/clipboard-engine";

const SHORT_ID_LENGTH = 8;
const PREVIEW_LENGTH = 60;

export const shortId = (id: string): string => id.slice(0, SHORT_ID_LENGTH);

/**
 * `YYYY-MM-DD HH:mm:ss` in UTC
 */
export const formatTimestamp = (date: Date): string =>
  date.toISOString().slice(0, 19).replace("T", " ");

/**
 * Collapse whitespace and cut to one terminal line
 */
export const preview = (text: string, length = PREVIEW_LENGTH): string => {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > length ? `${flat.slice(0, length - 3)}...` : flat;
};

export const isPinned = (item: ClipboardItem, pinned: ReadonlyArray<PinnedClipboardItem>): boolean =>
  pinned.some((pin) => isEquivalentContent(pin.item, item));

/**
 * `<short id>  <pin mark><type>  <captured at>  <preview>`
 */
export const formatItemLine = (
  item: ClipboardItem,
  pinned: ReadonlyArray<PinnedClipboardItem>
): string =>
  [
    shortId(item.id),
    `${isPinned(item, pinned) ? "*" : " "}${item.type.padEnd(8)}`,
    formatTimestamp(item.timestamp),
    preview(displayString(item)),
  ].join("  ");

/**
 * Validate raw command arguments against a schema
 */
export const decodeArgs = <A, I>(schema: Schema.Schema<A, I>, raw: unknown, usage: string) =>
  Schema.decodeUnknown(schema)(raw).pipe(
    Effect.mapError((error) => {
      const message = error.message || "Invalid arguments";
      return new ValidationError({
        field: "args",
        message: `Invalid arguments: ${message}. Usage: ${usage}`,
      });
    })
  );

export const parseIntFlag = (value: string | undefined): number | undefined =>
  value === undefined ? undefined : Number(value);

/**
 * Resolve a full id or a unique prefix of one against the candidate ids
 *
 * @returns The matching full id, or undefined when nothing matches
 */
export const resolveIdPrefix = (
  candidates: ReadonlyArray<string>,
  ref: string
): Effect.Effect<string | undefined, ValidationError> => {
  if (candidates.includes(ref)) {
    return Effect.succeed(ref);
  }
  const matches = [...new Set(candidates.filter((id) => id.startsWith(ref)))];
  if (matches.length > 1) {
    return Effect.fail(
      new ValidationError({
        field: "id",
        message: `Ambiguous id "${ref}": matches ${matches.length} entries`,
      })
    );
  }
  return Effect.succeed(matches[0]);
};

/**
 * Every id an item command accepts: history ids, pin ids and the ids of
 * pinned snapshots
 */
export const itemIds = (snapshot: EngineSnapshot): ReadonlyArray<string> => [
  ...snapshot.history.map((item) => item.id),
  ...snapshot.pinned.flatMap((pin) => [pin.id, pin.item.id]),
];

export const pinIds = (snapshot: EngineSnapshot): ReadonlyArray<string> =>
  snapshot.pinned.flatMap((pin) => [pin.id, pin.item.id]);

/**
 * Expand an id prefix to the full id. An unknown ref is returned unchanged so
 * the engine reports it as not found.
 */
export const resolveRef = (
  ref: string,
  select: (snapshot: EngineSnapshot) => ReadonlyArray<string> = itemIds
) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const snapshot = yield* engine.snapshot;
    const id = yield* resolveIdPrefix(select(snapshot), ref);
    return id ?? ref;
  });
