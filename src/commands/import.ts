/**
 * import command - Replace history and pins from a backup file
 *
 * Accepts JSON or YAML exports. A rejected file leaves current state as it was.
 */

import { Effect, Option } from "effect";
import { ImportCommandArgsSchema, StorageError } from "../models";
import { BackupService } from "../services/backup-service";
import { readBytes } from "../services/file-store";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs } from "./shared";

export const importCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const backup = yield* BackupService;
    const { source } = yield* decodeArgs(
      ImportCommandArgsSchema,
      { source: args.positional[0] },
      "clipvault import <file>"
    );

    const contents = yield* readBytes(source);
    if (Option.isNone(contents)) {
      return yield* Effect.fail(
        new StorageError({ operation: "read", path: source, message: "Backup file not found" })
      );
    }

    const result = yield* backup.importBackup(contents.value);
    console.log(
      `Imported ${result.historyCount} history items and ${result.pinnedCount} pinned items`
    );
  });
