#!/usr/bin/env -S npx tsx

/**
 * clipvault CLI - Entry Point
 * Clipboard history with pins, snippets and retention limits.
 */

import { Effect, Either } from "effect";
import * as fs from "node:fs";
import { join } from "node:path";
import { parseArgs, type ParsedArgs } from "./cli/parser";
import {
  clearCommand,
  copyCommand,
  exportCommand,
  historyCommand,
  importCommand,
  logsCommand,
  pasteCommand,
  pinCommand,
  pinnedCommand,
  quickCommand,
  rmCommand,
  selectCommand,
  settingsCommand,
  showCommand,
  snippetCommand,
  unpinCommand,
  watchCommand,
} from "./commands";
import { ValidationError, describeError, runResult, type ClipvaultError } from "./models";
import { ClipboardEngine, MainLive, resolveStorageRoot, type AppServices } from "./services";

const VERSION = "0.1.0";

/**
 * Load environment variables from <storage root>/.env
 * This runs synchronously at startup before any services initialize
 */
const loadClipvaultEnv = () => {
  try {
    const envPath = join(resolveStorageRoot(), ".env");
    if (!fs.existsSync(envPath)) return;

    const content = fs.readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const eqIndex = trimmed.indexOf("=");
      if (eqIndex > 0) {
        const key = trimmed.slice(0, eqIndex).trim();
        let value = trimmed.slice(eqIndex + 1).trim();
        // Remove surrounding quotes
        if (
          (value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))
        ) {
          value = value.slice(1, -1);
        }
        // Only set if not already in environment (env vars take precedence)
        process.env[key] ??= value;
      }
    }
  } catch {
    // Silently ignore - .env file may be unreadable
  }
};

loadClipvaultEnv();

const HELP = `
clipvault - Clipboard history with pins, snippets and retention limits

USAGE:
  clipvault [OPTIONS] <COMMAND>

OPTIONS:
  -h, --help          Show this help message
  -v, --version       Show version information

COMMANDS:
  history             List captured items (-n <n>, --type <type>, --json)
  show <id>           Show an item and its metadata (--raw for content only)
  copy <id>           Put an item back on the clipboard
  select <id>         Make an item active (pastes when auto-paste is on)
  paste [id]          Paste an item, or the active one
  rm <id...>          Delete items from history
  clear               Clear history (--yes to skip confirmation)
  pin <id>            Pin an item (--title <t>, --toggle)
  unpin <id>          Remove a pin
  pinned              List pins (pinned rename <id> [title])
  snippet             Manage snippets (add, show, rm, use)
  quick <action> <id> save, base64, url-encode, url-decode, edit
  export              Export history and pins (--format json|yaml, -o <file>)
  import <file>       Replace history and pins from an export
  settings [k=v...]   Show or change settings
  watch               Capture clipboard changes until Ctrl+C
  logs                Show debug logs (-n <lines>, --clear, --path)

Ids may be shortened to any unique prefix.
Storage lives in $CLIPVAULT_HOME (default ~/.clipvault).
`;

/**
 * Commands that read or change clipboard state
 */
const routeStateCommand = (
  command: string,
  args: ParsedArgs
): Effect.Effect<void, ClipvaultError, AppServices> | undefined => {
  switch (command) {
    case "history":
      return historyCommand(args);
    case "show":
      return showCommand(args);
    case "copy":
      return copyCommand(args);
    case "select":
      return selectCommand(args);
    case "paste":
      return pasteCommand(args);
    case "rm":
    case "delete":
      return rmCommand(args);
    case "clear":
      return clearCommand(args);
    case "pin":
      return pinCommand(args);
    case "unpin":
      return unpinCommand(args);
    case "pinned":
      return pinnedCommand(args);
    case "snippet":
      return snippetCommand(args);
    case "quick":
      return quickCommand(args);
    case "export":
      return exportCommand(args);
    case "import":
      return importCommand(args);
    case "settings":
      return settingsCommand(args);
    case "watch":
      return watchCommand(args);
    default:
      return undefined;
  }
};

/**
 * Main program logic
 *
 * Parses command-line arguments, loads stored state and routes to the
 * command handler.
 */
const program = Effect.gen(function* () {
  const { command, flags, positional } = parseArgs(process.argv.slice(2));

  if (flags.help) {
    console.log(HELP);
    return;
  }

  if (flags.version) {
    console.log(`clipvault version ${VERSION}`);
    return;
  }

  if (command === null) {
    console.log(HELP);
    return;
  }

  const parsedArgs: ParsedArgs = { command, flags, positional };

  if (command === "logs") {
    yield* logsCommand(parsedArgs);
    return;
  }

  const handler = routeStateCommand(command, parsedArgs);
  if (handler === undefined) {
    return yield* Effect.fail(
      new ValidationError({
        field: "command",
        message: `Unknown command: ${command}. Use --help for usage information.`,
      })
    );
  }

  const engine = yield* ClipboardEngine;
  const report = yield* engine.initialize();
  for (const warning of report.warnings) {
    console.error(`Warning: starting with empty ${warning.aggregate}: ${warning.message}`);
  }

  yield* handler;
});

/**
 * Main entry point with error handling
 *
 * Displays user-friendly messages and sets the exit code (0 for success,
 * 1 for error).
 */
const result = await runResult(Effect.scoped(program.pipe(Effect.provide(MainLive))), {
  operation: "run command",
});

if (Either.isLeft(result)) {
  console.error(`Error: ${describeError(result.left)}`);
  process.exitCode = 1;
}
