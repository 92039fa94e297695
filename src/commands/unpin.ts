/**
 * unpin command - Remove a pin by its own id or the id of the pinned item
 */

import { Effect } from "effect";
import { ItemCommandArgsSchema } from "../models";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, pinIds, resolveRef, shortId } from "./shared";

export const unpinCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { ref } = yield* decodeArgs(
      ItemCommandArgsSchema,
      { ref: args.positional[0] },
      "clipvault unpin <id>"
    );

    const id = yield* resolveRef(ref, pinIds);
    yield* engine.unpinItem(id);
    console.log(`Unpinned ${shortId(id)}`);
  });
