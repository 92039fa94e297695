/**
 * Platform Fakes
 *
 * In-process stand-ins for the services that touch the desktop: the system
 * clipboard, the clipboard monitor and the paste keystroke. Each fake keeps
 * its state in a plain object the test can read and script.
 */

import { Effect, Layer, Option } from "effect";
import { textPayload, type ClipboardItem } from "../../src/models/clipboard-item";
import {
  AutoPasteFailedError,
  ClipboardError,
  ClipboardItemUnsupportedTypeError,
  ClipboardMonitorStartFailedError,
} from "../../src/models/errors";
import { AutoPasteService } from "../../src/services/auto-paste-service";
import { Clipboard } from "../../src/services/clipboard-service";
import {
  ClipboardMonitor,
  type CaptureError,
  type CaptureHandler,
  type CaptureOutcome,
} from "../../src/services/clipboard-monitor";

// ============================================================================
// Clipboard
// ============================================================================

export interface MockClipboardState {
  text: string;
  html: Option.Option<string>;
  /** Every string written through `copy`, in order */
  copies: string[];
  failRead: boolean;
}

export const makeMockClipboard = (text = ""): MockClipboardState => ({
  text,
  html: Option.none(),
  copies: [],
  failRead: false,
});

export const mockClipboardLayer = (state: MockClipboardState) =>
  Layer.succeed(
    Clipboard,
    Clipboard.of({
      copy: (text) =>
        Effect.sync(() => {
          state.copies.push(text);
          state.text = text;
        }),
      paste: Effect.suspend((): Effect.Effect<string, ClipboardError> =>
        state.failRead
          ? Effect.fail(new ClipboardError({ message: "Injected clipboard read failure" }))
          : Effect.succeed(state.text)
      ),
      pasteHtml: Effect.sync(() => state.html),
    })
  );

// ============================================================================
// Clipboard Monitor
// ============================================================================

export interface ScriptedMonitor {
  handler: CaptureHandler | undefined;
  captureRichText: boolean | undefined;
  running: boolean;
  starts: number;
  stops: number;
  richTextUpdates: boolean[];
  failStart: boolean;
}

export const makeScriptedMonitor = (): ScriptedMonitor => ({
  handler: undefined,
  captureRichText: undefined,
  running: false,
  starts: 0,
  stops: 0,
  richTextUpdates: [],
  failStart: false,
});

/**
 * Monitor that never polls. Tests push captures through {@link deliverCapture}.
 */
export const scriptedMonitorLayer = (monitor: ScriptedMonitor) =>
  Layer.succeed(
    ClipboardMonitor,
    ClipboardMonitor.of({
      start: (onCapture, captureRichText) =>
        Effect.suspend((): Effect.Effect<void, ClipboardMonitorStartFailedError> => {
          if (monitor.running) {
            return Effect.void;
          }
          if (monitor.failStart) {
            return Effect.fail(
              new ClipboardMonitorStartFailedError({ message: "Injected start failure" })
            );
          }
          return Effect.sync(() => {
            monitor.handler = onCapture;
            monitor.captureRichText = captureRichText;
            monitor.running = true;
            monitor.starts++;
          });
        }),
      updateCaptureRichText: (enabled) =>
        Effect.sync(() => {
          monitor.captureRichText = enabled;
          monitor.richTextUpdates.push(enabled);
        }),
      stop: () =>
        Effect.sync(() => {
          if (monitor.running) {
            monitor.running = false;
            monitor.handler = undefined;
            monitor.stops++;
          }
        }),
      isRunning: () => Effect.sync(() => monitor.running),
    })
  );

/**
 * Hand an item to the engine the way a running monitor would
 */
export const deliverCapture = (
  monitor: ScriptedMonitor,
  item: ClipboardItem
): Effect.Effect<CaptureOutcome, CaptureError> =>
  Effect.suspend((): Effect.Effect<CaptureOutcome, CaptureError> =>
    monitor.handler === undefined
      ? Effect.dieMessage("Monitor is not running")
      : monitor.handler(item)
  );

// ============================================================================
// Auto-Paste
// ============================================================================

export interface RecordingAutoPaste {
  /** Text written to the clipboard, in order */
  contents: string[];
  pastes: number;
  failPaste: boolean;
}

export const makeRecordingAutoPaste = (): RecordingAutoPaste => ({
  contents: [],
  pastes: 0,
  failPaste: false,
});

export const recordingAutoPasteLayer = (recorder: RecordingAutoPaste) =>
  Layer.succeed(
    AutoPasteService,
    AutoPasteService.of({
      setClipboardContent: (item) => {
        const text = textPayload(item);
        if (text === undefined) {
          return Effect.fail(
            new ClipboardItemUnsupportedTypeError({ itemType: item.type, operation: "paste" })
          );
        }
        return Effect.sync(() => {
          recorder.contents.push(text);
        });
      },
      pasteToPreviousWindow: () =>
        Effect.suspend((): Effect.Effect<void, AutoPasteFailedError> =>
          recorder.failPaste
            ? Effect.fail(new AutoPasteFailedError({ message: "Injected paste failure" }))
            : Effect.sync(() => {
                recorder.pastes++;
              })
        ),
    })
  );
