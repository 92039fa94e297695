/**
 * Polling Clipboard Monitor Tests
 *
 * Runs the real poll loop against the mock clipboard, so each test waits a
 * little over one poll interval.
 */

import { describe, test, expect } from "vitest";
import { Effect, Layer, Option } from "effect";
import type { ClipboardItem } from "../../src/models/clipboard-item";
import { StateNotInitializedError } from "../../src/models/errors";
import {
  ClipboardMonitor,
  PollingClipboardMonitorLive,
  type CaptureHandler,
} from "../../src/services/clipboard-monitor";
import { LoggerService, makeMemoryLoggerService } from "../../src/services/logger-service";
import {
  makeMockClipboard,
  mockClipboardLayer,
  runTest,
  runTestExpectFailure,
  type MockClipboardState,
} from "../utils";

const AFTER_ONE_POLL = "1 second";

const setup = (initialText = "") => {
  const clipboard = makeMockClipboard(initialText);
  const logger = makeMemoryLoggerService();
  const captured: ClipboardItem[] = [];
  const handler: CaptureHandler = (item) =>
    Effect.sync(() => {
      captured.push(item);
      return "added" as const;
    });
  const layer = PollingClipboardMonitorLive.pipe(
    Layer.provide(Layer.merge(mockClipboardLayer(clipboard), Layer.succeed(LoggerService, logger)))
  );
  return { clipboard, logger, captured, handler, layer };
};

const copy = (clipboard: MockClipboardState, text: string, html?: string) =>
  Effect.sync(() => {
    clipboard.text = text;
    clipboard.html = html === undefined ? Option.none() : Option.some(html);
  });

describe("PollingClipboardMonitor", () => {
  test("ignores existing content and captures the next change", async () => {
    const { clipboard, captured, handler, layer } = setup("already there");

    await runTest(
      Effect.gen(function* () {
        const monitor = yield* ClipboardMonitor;
        yield* monitor.start(handler, false);
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* copy(clipboard, "https://example.com");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* monitor.stop();
      }).pipe(Effect.provide(layer))
    );

    expect(captured).toHaveLength(1);
    expect(captured[0]?.type).toBe("Url");
  });

  test("captures HTML as rich text until the option is turned off", async () => {
    const { clipboard, captured, handler, layer } = setup();

    await runTest(
      Effect.gen(function* () {
        const monitor = yield* ClipboardMonitor;
        yield* monitor.start(handler, true);
        yield* copy(clipboard, "bold", "<b>bold</b>");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* monitor.updateCaptureRichText(false);
        yield* copy(clipboard, "bolder", "<b>bolder</b>");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* monitor.stop();
      }).pipe(Effect.provide(layer))
    );

    expect(captured.map((item) => item.type)).toEqual(["RichText", "Text"]);
    const rich = captured[0];
    if (rich?.type === "RichText") {
      expect(rich.richText.plainText).toBe("bold");
      expect(new TextDecoder().decode(rich.richText.html)).toBe("<b>bold</b>");
    }
  });

  test("skips blank text", async () => {
    const { clipboard, captured, handler, layer } = setup("start");

    await runTest(
      Effect.gen(function* () {
        const monitor = yield* ClipboardMonitor;
        yield* monitor.start(handler, false);
        yield* copy(clipboard, "   ");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* copy(clipboard, "after");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* monitor.stop();
      }).pipe(Effect.provide(layer))
    );

    expect(captured.map((item) => item.type === "Text" && item.text)).toEqual(["after"]);
  });

  test("stop halts polling", async () => {
    const { clipboard, captured, handler, layer } = setup();

    const running = await runTest(
      Effect.gen(function* () {
        const monitor = yield* ClipboardMonitor;
        yield* monitor.start(handler, false);
        yield* monitor.stop();
        yield* monitor.stop();
        yield* copy(clipboard, "too late");
        yield* Effect.sleep(AFTER_ONE_POLL);
        return yield* monitor.isRunning();
      }).pipe(Effect.provide(layer))
    );

    expect(running).toBe(false);
    expect(captured).toEqual([]);
  });

  test("starting twice keeps one poller", async () => {
    const { clipboard, captured, handler, layer } = setup();

    await runTest(
      Effect.gen(function* () {
        const monitor = yield* ClipboardMonitor;
        yield* monitor.start(handler, false);
        yield* monitor.start(handler, false);
        yield* copy(clipboard, "once");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* monitor.stop();
      }).pipe(Effect.provide(layer))
    );

    expect(captured).toHaveLength(1);
  });

  test("start fails when the clipboard cannot be read", async () => {
    const { clipboard, handler, layer } = setup();
    clipboard.failRead = true;

    const error = await runTestExpectFailure(
      Effect.flatMap(ClipboardMonitor, (monitor) => monitor.start(handler, false)).pipe(
        Effect.provide(layer)
      )
    );

    expect(error._tag).toBe("ClipboardMonitorStartFailedError");
    expect(error.message).toBe("Clipboard is not readable: Injected clipboard read failure");
  });

  test("capture failures are logged and polling continues", async () => {
    const { clipboard, logger, layer } = setup();
    const seen: string[] = [];
    const failing: CaptureHandler = (item) =>
      Effect.suspend(() => {
        seen.push(item.type === "Text" ? item.text : item.type);
        return Effect.fail(new StateNotInitializedError({ operation: "capture clipboard content" }));
      });

    await runTest(
      Effect.gen(function* () {
        const monitor = yield* ClipboardMonitor;
        yield* monitor.start(failing, false);
        yield* copy(clipboard, "first");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* copy(clipboard, "second");
        yield* Effect.sleep(AFTER_ONE_POLL);
        yield* monitor.stop();
      }).pipe(Effect.provide(layer))
    );

    expect(seen).toEqual(["first", "second"]);
    const warnings = logger.entries.filter((entry) => entry.level === "warn");
    expect(warnings.map((entry) => entry.message)).toEqual([
      "Clipboard capture failed",
      "Clipboard capture failed",
    ]);
    expect(warnings[0]?.data).toMatchObject({ error: "StateNotInitializedError" });
  });
});
