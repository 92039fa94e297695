/**
 * pin command - Pin a history item
 *
 * Usage:
 *   clipvault pin <id>                   Pin with the item's own text as title
 *   clipvault pin <id> --title|-t <t>    Pin with a custom title
 *   clipvault pin <id> --toggle          Pin, or unpin when already pinned
 */

import { Effect } from "effect";
import { PinCommandArgsSchema } from "../models";
import { displayTitle } from "../models/pinned-item";
import { ClipboardEngine } from "../services/clipboard-engine";
import { booleanFlag, stringFlag, type ParsedArgs } from "../cli/parser";
import { decodeArgs, resolveRef, shortId } from "./shared";

const USAGE = "clipvault pin <id> [--title|-t <title>] [--toggle]";

export const pinCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const validatedArgs = yield* decodeArgs(
      PinCommandArgsSchema,
      {
        ref: args.positional[0],
        title: stringFlag(args, "title", "t"),
        toggle: booleanFlag(args, "toggle") ? true : undefined,
      },
      USAGE
    );

    const id = yield* resolveRef(validatedArgs.ref);

    if (validatedArgs.toggle) {
      const pinned = yield* engine.togglePin(id);
      console.log(`${pinned ? "Pinned" : "Unpinned"} ${shortId(id)}`);
      return;
    }

    const pin = yield* engine.pinItem(id, validatedArgs.title);
    console.log(`Pinned ${shortId(pin.id)}: ${displayTitle(pin)}`);
  });
