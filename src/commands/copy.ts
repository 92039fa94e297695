/**
 * copy command - Put a history item back on the clipboard
 */

import { Effect } from "effect";
import { ItemCommandArgsSchema } from "../models";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, resolveRef, shortId } from "./shared";

export const copyCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { ref } = yield* decodeArgs(
      ItemCommandArgsSchema,
      { ref: args.positional[0] },
      "clipvault copy <id>"
    );

    const id = yield* resolveRef(ref);
    yield* engine.copyClipboardItem(id);
    console.log(`Copied ${shortId(id)} to clipboard`);
  });
