/**
 * Logs Command - View and manage debug logs
 *
 * Usage:
 *   clipvault logs              - Show last 50 log entries
 *   clipvault logs -n 100       - Show last 100 entries
 *   clipvault logs -c           - Clear the log file
 *   clipvault logs -p           - Show log file path
 */

import { Effect } from "effect";
import { LogsCommandArgsSchema } from "../models";
import { LoggerService } from "../services/logger-service";
import { booleanFlag, stringFlag, type ParsedArgs } from "../cli/parser";
import { decodeArgs, parseIntFlag } from "./shared";

const DEFAULT_LINES = 50;

const colorize = (line: string): string => {
  if (line.includes(" ERROR ")) return `\x1b[31m${line}\x1b[0m`;
  if (line.includes(" WARN ")) return `\x1b[33m${line}\x1b[0m`;
  if (line.includes(" INFO ")) return `\x1b[36m${line}\x1b[0m`;
  return `\x1b[90m${line}\x1b[0m`;
};

/**
 * Logs command implementation
 */
export const logsCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const log = yield* LoggerService;
    const validatedArgs = yield* decodeArgs(
      LogsCommandArgsSchema,
      {
        lines: parseIntFlag(stringFlag(args, "lines", "n") ?? args.positional[0]),
        clear: booleanFlag(args, "clear", "c") ? true : undefined,
        path: booleanFlag(args, "path", "p") ? true : undefined,
      },
      "clipvault logs [-n <lines>] [--clear|-c] [--path|-p]"
    );
    const logPath = log.getLogPath();

    if (validatedArgs.path) {
      console.log(logPath);
      return;
    }

    if (validatedArgs.clear) {
      yield* log.clear();
      console.log("Log file cleared");
      return;
    }

    const logLines = yield* log.tail(validatedArgs.lines ?? DEFAULT_LINES);
    if (logLines.length === 0) {
      console.log("No logs found.");
      console.log(`Log file: ${logPath}`);
      return;
    }

    const plain = process.env.NO_COLOR !== undefined;
    console.log(`Last ${logLines.length} log entries from ${logPath}:\n`);
    for (const line of logLines) {
      console.log(plain ? line : colorize(line));
    }
  });
