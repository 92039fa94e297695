/**
 * paste command - Copy an item and send the paste keystroke
 *
 * Without an id the active item (the last one selected) is pasted.
 */

import { Effect } from "effect";
import { PasteCommandArgsSchema } from "../models";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, resolveRef, shortId } from "./shared";

export const pasteCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { ref } = yield* decodeArgs(
      PasteCommandArgsSchema,
      { ref: args.positional[0] },
      "clipvault paste [id]"
    );

    if (ref === undefined) {
      yield* engine.pasteActiveItem();
      console.log("Pasted active item");
      return;
    }

    const id = yield* resolveRef(ref);
    yield* engine.pasteClipboardItem(id);
    console.log(`Pasted ${shortId(id)}`);
  });
