/**
 * history command - List captured clipboard items, most recent first
 *
 * Usage:
 *   clipvault history                    Last 20 items
 *   clipvault history -n 50              Last 50 items
 *   clipvault history --type Url         Only items of one type
 *   clipvault history --json             Machine-readable output
 *
 * Pinned content is marked with "*" before its type.
 */

import { Effect } from "effect";
import { HistoryCommandArgsSchema } from "../models";
import { displayString, payloadSize } from "../models/clipboard-item";
import { ClipboardEngine } from "../services/clipboard-engine";
import { booleanFlag, stringFlag, type ParsedArgs } from "../cli/parser";
import { decodeArgs, formatItemLine, isPinned, parseIntFlag } from "./shared";

const DEFAULT_LIMIT = 20;

const USAGE = "clipvault history [--limit|-n <n>] [--type|-t <type>] [--json]";

/**
 * Parse raw CLI args into structured format for schema validation
 */
const parseHistoryArgs = (args: ParsedArgs) => ({
  limit: parseIntFlag(stringFlag(args, "limit", "n") ?? args.positional[0]),
  type: stringFlag(args, "type", "t"),
  json: booleanFlag(args, "json") ? true : undefined,
});

export const historyCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const validatedArgs = yield* decodeArgs(HistoryCommandArgsSchema, parseHistoryArgs(args), USAGE);

    const { history, pinned } = yield* engine.snapshot;
    const items = history
      .filter((item) => validatedArgs.type === undefined || item.type === validatedArgs.type)
      .slice(0, validatedArgs.limit ?? DEFAULT_LIMIT);

    if (validatedArgs.json) {
      const rows = items.map((item) => ({
        id: item.id,
        type: item.type,
        timestamp: item.timestamp.toISOString(),
        preview: displayString(item),
        size: payloadSize(item),
        pinned: isPinned(item, pinned),
      }));
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    if (items.length === 0) {
      console.log("Clipboard history is empty.");
      return;
    }

    for (const item of items) {
      console.log(formatItemLine(item, pinned));
    }
    if (history.length > items.length) {
      console.log(`\n${items.length} of ${history.length} items shown`);
    }
  });
