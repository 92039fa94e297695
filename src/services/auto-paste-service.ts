/**
 * Auto-Paste Service - Puts items back on the clipboard and pastes them
 *
 * Pasting sends the platform paste keystroke to whichever window has focus,
 * which is the window that was active before the picker was shown.
 */

import { Context, Effect, Layer } from "effect";
import { textPayload, type ClipboardItem } from "../models/clipboard-item";
import { AutoPasteFailedError, ClipboardItemUnsupportedTypeError } from "../models/errors";
import { runCommand } from "../utils/process";
import { Clipboard } from "./clipboard-service";

interface AutoPasteServiceImpl {
  /**
   * Write the item's text payload to the system clipboard
   */
  readonly setClipboardContent: (
    item: ClipboardItem
  ) => Effect.Effect<void, AutoPasteFailedError | ClipboardItemUnsupportedTypeError>;

  /**
   * Send the paste keystroke to the previously focused window
   */
  readonly pasteToPreviousWindow: () => Effect.Effect<void, AutoPasteFailedError>;
}

export class AutoPasteService extends Context.Tag("AutoPasteService")<
  AutoPasteService,
  AutoPasteServiceImpl
>() {}

const getPasteKeystrokeCommand = (): string[] | null => {
  switch (process.platform) {
    case "darwin":
      return [
        "osascript",
        "-e",
        'tell application "System Events" to keystroke "v" using command down',
      ];
    case "linux":
      return ["xdotool", "key", "--clearmodifiers", "ctrl+v"];
    case "win32":
      return [
        "powershell",
        "-NoProfile",
        "-command",
        "$ws = New-Object -ComObject WScript.Shell; $ws.SendKeys('^v')",
      ];
    default:
      return null;
  }
};

export const AutoPasteServiceLive = Layer.effect(
  AutoPasteService,
  Effect.gen(function* () {
    const clipboard = yield* Clipboard;

    return AutoPasteService.of({
      setClipboardContent: (item) => {
        const text = textPayload(item);
        if (text === undefined) {
          return Effect.fail(
            new ClipboardItemUnsupportedTypeError({ itemType: item.type, operation: "paste" })
          );
        }
        return clipboard.copy(text).pipe(
          Effect.mapError(
            (error) =>
              new AutoPasteFailedError({
                message: `Failed to set clipboard content: ${error.message}`,
                cause: error,
              })
          )
        );
      },

      pasteToPreviousWindow: () =>
        Effect.gen(function* () {
          const command = getPasteKeystrokeCommand();
          if (!command) {
            return yield* Effect.fail(
              new AutoPasteFailedError({ message: `Unsupported platform: ${process.platform}` })
            );
          }

          const result = yield* Effect.tryPromise({
            try: () => runCommand(command),
            catch: (error) =>
              new AutoPasteFailedError({
                message: `Failed to send paste keystroke: ${error instanceof Error ? error.message : String(error)}`,
                cause: error,
              }),
          });

          if (result.exitCode !== 0) {
            return yield* Effect.fail(
              new AutoPasteFailedError({
                message: `Paste keystroke command exited with ${result.exitCode}: ${result.stderr.trim()}`,
              })
            );
          }
        }),
    });
  })
);
