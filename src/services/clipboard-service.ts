/**
 * ClipboardService - Platform-specific clipboard operations
 *
 * Supports macOS (pbcopy/pbpaste), Linux (xclip), and Windows (clip/powershell)
 */

import { Effect, Context, Layer, Option } from "effect";
import { ClipboardError } from "../models/errors";
import { runCommand } from "../utils/process";

/**
 * Platform-specific clipboard commands
 */
interface ClipboardCommands {
  copy: string[];
  paste: string[];
  /** Reads the HTML flavor, where the platform exposes one on the command line */
  pasteHtml: string[] | null;
}

/**
 * Get clipboard commands for the current platform
 */
const getClipboardCommands = (): ClipboardCommands | null => {
  switch (process.platform) {
    case "darwin":
      return {
        copy: ["pbcopy"],
        paste: ["pbpaste"],
        pasteHtml: null,
      };
    case "linux":
      return {
        copy: ["xclip", "-selection", "clipboard"],
        paste: ["xclip", "-selection", "clipboard", "-o"],
        pasteHtml: ["xclip", "-selection", "clipboard", "-o", "-t", "text/html"],
      };
    case "win32":
      return {
        copy: ["clip"],
        paste: ["powershell", "-NoProfile", "-command", "Get-Clipboard -Raw"],
        pasteHtml: [
          "powershell",
          "-NoProfile",
          "-command",
          "Add-Type -AssemblyName System.Windows.Forms; [System.Windows.Forms.Clipboard]::GetText('Html')",
        ],
      };
    default:
      return null;
  }
};

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Clipboard service interface
 */
export interface ClipboardService {
  /**
   * Copy text to system clipboard
   */
  readonly copy: (text: string) => Effect.Effect<void, ClipboardError>;

  /**
   * Read text from system clipboard
   */
  readonly paste: Effect.Effect<string, ClipboardError>;

  /**
   * Read the HTML flavor of the clipboard. None when the clipboard holds no
   * HTML or the platform cannot read it.
   */
  readonly pasteHtml: Effect.Effect<Option.Option<string>, ClipboardError>;
}

/**
 * Clipboard service tag
 */
export class Clipboard extends Context.Tag("Clipboard")<Clipboard, ClipboardService>() {}

const unsupportedPlatform = () =>
  Effect.fail(new ClipboardError({ message: `Unsupported platform: ${process.platform}` }));

/**
 * Clipboard service implementation
 */
export const ClipboardLive = Layer.succeed(
  Clipboard,
  Clipboard.of({
    copy: (text: string) =>
      Effect.gen(function* () {
        const commands = getClipboardCommands();

        if (!commands) {
          return yield* unsupportedPlatform();
        }

        yield* Effect.tryPromise({
          try: async () => {
            const result = await runCommand(commands.copy, text);
            if (result.exitCode !== 0) {
              throw new Error(`Clipboard command failed: ${result.stderr}`);
            }
          },
          catch: (error) =>
            new ClipboardError({
              message: `Failed to copy to clipboard: ${describe(error)}`,
              cause: error,
            }),
        });
      }),

    paste: Effect.gen(function* () {
      const commands = getClipboardCommands();

      if (!commands) {
        return yield* unsupportedPlatform();
      }

      return yield* Effect.tryPromise({
        try: async () => {
          const result = await runCommand(commands.paste);
          if (result.exitCode !== 0) {
            throw new Error(`Clipboard command failed: ${result.stderr}`);
          }
          return result.stdout;
        },
        catch: (error) =>
          new ClipboardError({
            message: `Failed to read from clipboard: ${describe(error)}`,
            cause: error,
          }),
      });
    }),

    pasteHtml: Effect.gen(function* () {
      const commands = getClipboardCommands();

      if (!commands) {
        return yield* unsupportedPlatform();
      }
      const htmlCommand = commands.pasteHtml;
      if (htmlCommand === null) {
        return Option.none();
      }

      return yield* Effect.tryPromise({
        try: async () => {
          const result = await runCommand(htmlCommand);
          // xclip exits non-zero when the target is not offered
          if (result.exitCode !== 0 || result.stdout.trim().length === 0) {
            return Option.none<string>();
          }
          return Option.some(result.stdout);
        },
        catch: (error) =>
          new ClipboardError({
            message: `Failed to read HTML from clipboard: ${describe(error)}`,
            cause: error,
          }),
      });
    }),
  })
);
