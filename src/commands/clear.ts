/**
 * clear command - Empty clipboard history
 *
 * Usage:
 *   clipvault clear            Ask before clearing
 *   clipvault clear --yes|-y   Skip confirmation
 *
 * Pinned items and snippets are kept.
 */

import { Effect } from "effect";
import * as readline from "node:readline";
import { ClipboardEngine } from "../services/clipboard-engine";
import { booleanFlag, type ParsedArgs } from "../cli/parser";

export const clearCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const { history } = yield* engine.snapshot;

    if (history.length === 0) {
      console.log("Clipboard history is already empty.");
      return;
    }

    if (!booleanFlag(args, "yes")) {
      const confirmed = yield* Effect.promise(() =>
        askConfirmation(`Clear ${history.length} items from history? [y/N] `)
      );
      if (!confirmed) {
        console.log("Cancelled.");
        return;
      }
    }

    yield* engine.clearClipboardHistory();
    console.log(`Cleared ${history.length} items from history`);
  });

/**
 * Ask for user confirmation
 *
 * @returns true if the user answered "y"
 */
function askConfirmation(question: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === "y");
    });
  });
}
