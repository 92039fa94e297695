/**
 * select command - Make an item active and put it on the clipboard
 *
 * Pastes it as well when auto-paste is enabled in settings.
 */

import { Effect } from "effect";
import { ItemCommandArgsSchema } from "../models";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, resolveRef, shortId } from "./shared";

export const selectCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { ref } = yield* decodeArgs(
      ItemCommandArgsSchema,
      { ref: args.positional[0] },
      "clipvault select <id>"
    );

    const id = yield* resolveRef(ref);
    yield* engine.selectClipboardItem(id);
    const { autoPasteEnabled } = yield* engine.settings;
    console.log(`Selected ${shortId(id)}${autoPasteEnabled ? " (pasted)" : ""}`);
  });
