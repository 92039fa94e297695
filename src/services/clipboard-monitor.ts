/**
 * Clipboard Monitor - Watches the system clipboard for new content
 *
 * The engine hands the monitor a capture callback when its runtime starts.
 * The polling implementation reads the platform clipboard every 750ms and
 * delivers one callback at a time, in capture order.
 */

import { Context, Duration, Effect, Fiber, Layer, Option, Ref, Schedule } from "effect";
import {
  makeRichTextItem,
  makeTextItem,
  type ClipboardItem,
} from "../models/clipboard-item";
import {
  ClipboardMonitorStartFailedError,
  type ClipboardImageTooLargeError,
  type ClipboardMonitorStopFailedError,
  type StateNotInitializedError,
} from "../models/errors";
import { classifyText } from "../utils/content-classifier";
import { Clipboard } from "./clipboard-service";
import { LoggerService } from "./logger-service";

// ============================================================================
// Types
// ============================================================================

export type CaptureOutcome = "added" | "refreshed" | "ignored";

export type CaptureError = ClipboardImageTooLargeError | StateNotInitializedError;

export type CaptureHandler = (item: ClipboardItem) => Effect.Effect<CaptureOutcome, CaptureError>;

interface ClipboardMonitorImpl {
  /**
   * Start delivering captures to `onCapture`. Starting a running monitor is a no-op.
   */
  readonly start: (
    onCapture: CaptureHandler,
    captureRichText: boolean
  ) => Effect.Effect<void, ClipboardMonitorStartFailedError>;

  /**
   * Toggle rich-text capture on a running monitor
   */
  readonly updateCaptureRichText: (enabled: boolean) => Effect.Effect<void>;

  /**
   * Stop delivering captures. Stopping a stopped monitor is a no-op.
   */
  readonly stop: () => Effect.Effect<void, ClipboardMonitorStopFailedError>;

  readonly isRunning: () => Effect.Effect<boolean>;
}

export class ClipboardMonitor extends Context.Tag("ClipboardMonitor")<
  ClipboardMonitor,
  ClipboardMonitorImpl
>() {}

// ============================================================================
// Polling Implementation
// ============================================================================

export const POLL_INTERVAL = Duration.millis(750);

const textEncoder = new TextEncoder();

export const PollingClipboardMonitorLive = Layer.scoped(
  ClipboardMonitor,
  Effect.gen(function* () {
    const clipboard = yield* Clipboard;
    const logger = yield* LoggerService;
    const scope = yield* Effect.scope;

    const fiberRef = yield* Ref.make(Option.none<Fiber.RuntimeFiber<number>>());
    const captureRichTextRef = yield* Ref.make(true);
    const lastSeenRef = yield* Ref.make<string | null>(null);
    const lifecycleLock = yield* Effect.makeSemaphore(1);

    const buildItem = (text: string) =>
      Effect.gen(function* () {
        const captureRichText = yield* Ref.get(captureRichTextRef);
        if (captureRichText) {
          const html = yield* clipboard.pasteHtml.pipe(
            Effect.catchAll((error) =>
              logger
                .debug("ClipboardMonitor", "HTML flavor unavailable", { message: error.message })
                .pipe(Effect.as(Option.none<string>()))
            )
          );
          if (Option.isSome(html)) {
            return makeRichTextItem({ plainText: text, html: textEncoder.encode(html.value) });
          }
        }
        return makeTextItem(text, { type: classifyText(text) });
      });

    const pollOnce = (onCapture: CaptureHandler) =>
      Effect.gen(function* () {
        const text = yield* clipboard.paste;
        const lastSeen = yield* Ref.get(lastSeenRef);
        if (text === lastSeen) {
          return;
        }
        yield* Ref.set(lastSeenRef, text);
        if (text.trim().length === 0) {
          return;
        }

        const item = yield* buildItem(text);
        const outcome = yield* onCapture(item);
        yield* logger.debug("ClipboardMonitor", `Captured ${item.type} item`, { outcome });
      }).pipe(
        Effect.catchAll((error) =>
          logger.warn("ClipboardMonitor", "Clipboard capture failed", {
            error: error._tag,
            code: error.code,
          })
        )
      );

    return ClipboardMonitor.of({
      start: (onCapture, captureRichText) =>
        lifecycleLock.withPermits(1)(
          Effect.gen(function* () {
            if (Option.isSome(yield* Ref.get(fiberRef))) {
              return;
            }

            // Whatever is on the clipboard at start is not a new capture
            const initial = yield* clipboard.paste.pipe(
              Effect.mapError(
                (error) =>
                  new ClipboardMonitorStartFailedError({
                    message: `Clipboard is not readable: ${error.message}`,
                    cause: error,
                  })
              )
            );
            yield* Ref.set(lastSeenRef, initial);
            yield* Ref.set(captureRichTextRef, captureRichText);

            const fiber = yield* pollOnce(onCapture).pipe(
              Effect.repeat(Schedule.spaced(POLL_INTERVAL)),
              Effect.forkIn(scope)
            );
            yield* Ref.set(fiberRef, Option.some(fiber));
            yield* logger.info("ClipboardMonitor", "Polling started", {
              intervalMs: Duration.toMillis(POLL_INTERVAL),
            });
          })
        ),

      updateCaptureRichText: (enabled) => Ref.set(captureRichTextRef, enabled),

      stop: () =>
        lifecycleLock.withPermits(1)(
          Effect.gen(function* () {
            const fiber = yield* Ref.getAndSet(fiberRef, Option.none());
            if (Option.isNone(fiber)) {
              return;
            }
            yield* Fiber.interrupt(fiber.value);
            yield* logger.info("ClipboardMonitor", "Polling stopped");
          })
        ),

      isRunning: () => Ref.get(fiberRef).pipe(Effect.map(Option.isSome)),
    });
  })
);
