/**
 * show command - Print one clipboard item with its metadata
 *
 * Usage:
 *   clipvault show <id>          Metadata followed by the content
 *   clipvault show <id> --raw    Content only, for piping
 */

import { Effect } from "effect";
import { ItemCommandArgsSchema } from "../models";
import { payloadSize, textPayload, type ClipboardItem } from "../models/clipboard-item";
import { ClipboardEngine } from "../services/clipboard-engine";
import { booleanFlag, type ParsedArgs } from "../cli/parser";
import { decodeArgs, formatTimestamp, isPinned, resolveRef } from "./shared";

const USAGE = "clipvault show <id> [--raw]";

const contentOf = (item: ClipboardItem): string =>
  item.type === "Image" ? `<image, ${item.data.byteLength} bytes>` : (textPayload(item) ?? "");

export const showCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { ref } = yield* decodeArgs(ItemCommandArgsSchema, { ref: args.positional[0] }, USAGE);

    const item = yield* engine.resolveItem(yield* resolveRef(ref));

    if (booleanFlag(args, "raw", "r")) {
      console.log(contentOf(item));
      return;
    }

    const { pinned } = yield* engine.snapshot;
    console.log(`Id:        ${item.id}`);
    console.log(`Type:      ${item.type}`);
    console.log(`Captured:  ${formatTimestamp(item.timestamp)}`);
    if (item.sourceAppId !== undefined) {
      console.log(`Source:    ${item.sourceAppId}`);
    }
    console.log(`Size:      ${payloadSize(item)} bytes`);
    console.log(`Pinned:    ${isPinned(item, pinned) ? "yes" : "no"}`);
    if (item.type === "RichText") {
      const formats = ["plain"];
      if (item.richText.rtf !== undefined) formats.push("rtf");
      if (item.richText.html !== undefined) formats.push("html");
      console.log(`Formats:   ${formats.join(", ")}`);
    }
    console.log("");
    console.log(contentOf(item));
  });
