/**
 * pinned command - List and rename pins
 *
 * Usage:
 *   clipvault pinned                       List pins, newest first
 *   clipvault pinned rename <id> [title]   Set or clear a pin's title
 */

import { Effect } from "effect";
import { ItemCommandArgsSchema, ValidationError } from "../models";
import { displayTitle } from "../models/pinned-item";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, formatTimestamp, pinIds, preview, resolveRef, shortId } from "./shared";

const USAGE = "clipvault pinned [rename <id> [title]]";

export const pinnedCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const [action, ...rest] = args.positional;

    if (action === "rename") {
      const { ref } = yield* decodeArgs(ItemCommandArgsSchema, { ref: rest[0] }, USAGE);
      const id = yield* resolveRef(ref, pinIds);
      const title = rest.slice(1).join(" ");
      const pin = yield* engine.renamePin(id, title);
      console.log(
        pin.customTitle === undefined
          ? `Cleared title of ${shortId(pin.id)}`
          : `Renamed ${shortId(pin.id)} to "${pin.customTitle}"`
      );
      return;
    }

    if (action !== undefined) {
      return yield* Effect.fail(
        new ValidationError({
          field: "action",
          message: `Unknown pinned action: ${action}. Usage: ${USAGE}`,
        })
      );
    }

    const pins = yield* engine.pinnedItems;
    if (pins.length === 0) {
      console.log("No pinned items.");
      return;
    }
    for (const pin of pins) {
      console.log(
        [
          shortId(pin.id),
          pin.item.type.padEnd(8),
          formatTimestamp(pin.pinnedAt),
          preview(displayTitle(pin)),
        ].join("  ")
      );
    }
  });
