/**
 * Backup Service Tests
 */

import { describe, test, expect } from "vitest";
import { Effect } from "effect";
import { textPayload } from "../../src/models/clipboard-item";
import { BackupService } from "../../src/services/backup-service";
import { ClipboardEngine } from "../../src/services/clipboard-engine";
import {
  createHistory,
  createImageItem,
  createPin,
  createTextItem,
  makeEngineHarness,
  runTest,
  runTestExpectFailure,
  type EngineHarness,
  type HarnessServices,
} from "../utils";

const provided = <A, E>(harness: EngineHarness, program: Effect.Effect<A, E, HarnessServices>) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    yield* engine.initialize();
    return yield* program;
  }).pipe(Effect.provide(harness.layer));

const exportFrom = (harness: EngineHarness, format?: "json" | "yaml") =>
  runTest(
    provided(
      harness,
      Effect.flatMap(BackupService, (backup) => backup.exportBackup({ format }))
    )
  );

const importInto = (harness: EngineHarness, bytes: Uint8Array) =>
  provided(
    harness,
    Effect.flatMap(BackupService, (backup) => backup.importBackup(bytes))
  );

const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);
const encode = (text: string) => new TextEncoder().encode(text);

const populated = () => {
  const history = createHistory(3);
  return makeEngineHarness({
    history,
    pinned: [createPin(history[1], { customTitle: "Keep" })],
  });
};

describe("exportBackup", () => {
  test("JSON export is versioned and ends with a newline", async () => {
    const text = decode(await exportFrom(populated()));
    const parsed: unknown = JSON.parse(text);

    expect(text.endsWith("}\n")).toBe(true);
    expect(parsed).toMatchObject({ version: 1 });
    expect(text).toContain('"text": "item 3"');
  });

  test("YAML export starts with the version", async () => {
    const text = decode(await exportFrom(populated(), "yaml"));
    expect(text.startsWith("version: 1\n")).toBe(true);
    expect(text).toContain("customTitle: Keep");
  });

  test("image bytes are exported as base64", async () => {
    const harness = makeEngineHarness({ history: [createImageItem(4)] });
    const text = decode(await exportFrom(harness));
    expect(text).toContain('"data": "iVBORw=="');
  });
});

describe("importBackup", () => {
  test("JSON round trip restores history and pins", async () => {
    const bytes = await exportFrom(populated());
    const target = makeEngineHarness({ history: [createTextItem("old")] });

    const result = await runTest(importInto(target, bytes));
    expect(result).toEqual({ historyCount: 3, pinnedCount: 1 });
    expect(target.store.history.map(textPayload)).toEqual(["item 3", "item 2", "item 1"]);
    expect(target.store.pinned[0]?.customTitle).toBe("Keep");
  });

  test("YAML round trip keeps timestamps", async () => {
    const source = populated();
    const bytes = await exportFrom(source, "yaml");
    const target = makeEngineHarness();

    const result = await runTest(importInto(target, bytes));
    expect(result).toEqual({ historyCount: 3, pinnedCount: 1 });
    expect(target.store.history[0]?.timestamp.toISOString()).toBe(
      source.store.history[0]?.timestamp.toISOString()
    );
  });

  test("rejects another bundle version", async () => {
    const error = await runTestExpectFailure(
      importInto(makeEngineHarness(), encode('{"version": 2, "history": [], "pinned": []}'))
    );
    expect(error._tag).toBe("DataFormatInvalidError");
    expect(error.message).toBe("Unsupported backup version: 2 (expected 1)");
  });

  test("plain text has no version", async () => {
    const error = await runTestExpectFailure(importInto(makeEngineHarness(), encode("hello")));
    expect(error.message).toBe("Unsupported backup version: undefined (expected 1)");
  });

  test("rejects a bundle with the wrong shape", async () => {
    const error = await runTestExpectFailure(
      importInto(makeEngineHarness(), encode('{"version": 1, "history": "nope", "pinned": []}'))
    );
    expect(error._tag).toBe("DataFormatInvalidError");
    expect(error.message).toMatch(/^Invalid backup format: /);
  });

  test("rejects bytes that are not UTF-8", async () => {
    const error = await runTestExpectFailure(
      importInto(makeEngineHarness(), new Uint8Array([0xff, 0xfe, 0xfd]))
    );
    expect(error.message).toBe("Backup is not valid UTF-8");
  });

  test("a rejected import leaves state untouched", async () => {
    const target = makeEngineHarness({ history: [createTextItem("keep me")] });
    await runTestExpectFailure(importInto(target, encode("version: 3")));

    expect(target.store.history.map(textPayload)).toEqual(["keep me"]);
    expect(target.store.writes.history).toBe(0);
  });
});
