import { Effect } from "effect";
import { ExportCommandArgsSchema } from "../models";
import { BackupService } from "../services/backup-service";
import { writeAtomic } from "../services/file-store";
import { stringFlag, type ParsedArgs } from "../cli/parser";
import { decodeArgs } from "./shared";

const USAGE = "clipvault export [--format|-f <json|yaml>] [--output|-o <file>]";

/**
 * Parse raw CLI args into structured format for schema validation
 */
const parseExportArgs = (args: ParsedArgs) => ({
  format: stringFlag(args, "format", "f")?.toLowerCase(),
  output: stringFlag(args, "output", "o"),
});

export const exportCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const backup = yield* BackupService;
    const validatedArgs = yield* decodeArgs(ExportCommandArgsSchema, parseExportArgs(args), USAGE);

    const bytes = yield* backup.exportBackup({ format: validatedArgs.format ?? "json" });

    // Determine output destination
    if (validatedArgs.output === "-" || validatedArgs.output === undefined) {
      console.log(new TextDecoder().decode(bytes).trimEnd());
    } else {
      yield* writeAtomic(validatedArgs.output, bytes);
      console.log(`Exported to ${validatedArgs.output}`);
    }
  });
