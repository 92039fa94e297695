/**
 * rm command - Delete items from history
 *
 * Usage:
 *   clipvault rm <id...>
 *
 * Deleting an item also removes any pin taken from it. All ids are resolved
 * before anything is deleted.
 */

import { Effect } from "effect";
import { RmCommandArgsSchema } from "../models";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, resolveRef, shortId } from "./shared";

export const rmCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { refs } = yield* decodeArgs(
      RmCommandArgsSchema,
      { refs: args.positional },
      "clipvault rm <id...>"
    );

    const ids: string[] = [];
    for (const ref of refs) {
      const id = yield* resolveRef(ref);
      yield* engine.resolveItem(id);
      if (!ids.includes(id)) {
        ids.push(id);
      }
    }

    for (const id of ids) {
      yield* engine.deleteClipboardItem(id);
      console.log(`Deleted: ${shortId(id)}`);
    }
  });
