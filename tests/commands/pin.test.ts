/**
 * Tests for pin, unpin and pinned commands
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { pinCommand } from "../../src/commands/pin";
import { pinnedCommand } from "../../src/commands/pinned";
import { unpinCommand } from "../../src/commands/unpin";
import { parseArgs } from "../../src/cli/parser";
import {
  captureConsole,
  createPin,
  createTextItem,
  makeEngineHarness,
  runTest,
  runTestExpectFailure,
  withEngine,
  type ConsoleCapture,
} from "../utils";

const ITEM_ID = "aaaa1111-0000-0000-0000-000000000001";
const PIN_ID = "cccc3333-0000-0000-0000-000000000003";

const urlItem = () => createTextItem("https://example.com", { id: ITEM_ID, type: "Url" });

const withPinnedUrl = (customTitle?: string) =>
  makeEngineHarness({ history: [urlItem()], pinned: [createPin(urlItem(), { id: PIN_ID, customTitle })] });

let output: ConsoleCapture;

beforeEach(() => {
  output = captureConsole();
});

afterEach(() => {
  output.restore();
});

describe("pinCommand", () => {
  test("pins with a custom title", async () => {
    const harness = makeEngineHarness({ history: [urlItem()] });
    await runTest(withEngine(harness, pinCommand(parseArgs(["pin", "aaaa", "-t", "Docs"]))));

    const [pin] = harness.store.pinned;
    expect(pin?.item.id).toBe(ITEM_ID);
    expect(pin?.customTitle).toBe("Docs");
    expect(output.logs).toEqual([`Pinned ${pin?.id.slice(0, 8)}: Docs`]);
  });

  test("without a title the item text is shown", async () => {
    const harness = makeEngineHarness({ history: [urlItem()] });
    await runTest(withEngine(harness, pinCommand(parseArgs(["pin", ITEM_ID]))));

    expect(output.logs[0]).toMatch(/^Pinned [0-9a-f]{8}: https:\/\/example\.com$/);
  });

  test("pinning twice is a duplicate", async () => {
    const error = await runTestExpectFailure(
      withEngine(withPinnedUrl(), pinCommand(parseArgs(["pin", "aaaa"])))
    );
    expect(error._tag).toBe("PinnedItemDuplicateError");
  });

  test("--toggle pins and then unpins", async () => {
    const harness = makeEngineHarness({ history: [urlItem()] });
    await runTest(withEngine(harness, pinCommand(parseArgs(["pin", "aaaa", "--toggle"]))));
    await runTest(withEngine(harness, pinCommand(parseArgs(["pin", "aaaa", "--toggle"]))));

    expect(output.logs).toEqual(["Pinned aaaa1111", "Unpinned aaaa1111"]);
    expect(harness.store.pinned).toEqual([]);
  });
});

describe("unpinCommand", () => {
  test("accepts the pinned item's id", async () => {
    const harness = withPinnedUrl();
    await runTest(withEngine(harness, unpinCommand(parseArgs(["unpin", "aaaa"]))));

    expect(output.logs).toEqual(["Unpinned aaaa1111"]);
    expect(harness.store.pinned).toEqual([]);
    expect(harness.store.history).toHaveLength(1);
  });

  test("accepts the pin's own id", async () => {
    const harness = withPinnedUrl();
    await runTest(withEngine(harness, unpinCommand(parseArgs(["unpin", PIN_ID]))));
    expect(output.logs).toEqual(["Unpinned cccc3333"]);
  });

  test("unknown pins are not found", async () => {
    const error = await runTestExpectFailure(
      withEngine(withPinnedUrl(), unpinCommand(parseArgs(["unpin", "ffff"])))
    );
    expect(error._tag).toBe("PinnedItemNotFoundError");
  });
});

describe("pinnedCommand", () => {
  test("lists pins with their titles", async () => {
    await runTest(withEngine(withPinnedUrl("Work"), pinnedCommand(parseArgs(["pinned"]))));
    expect(output.logs).toEqual(["cccc3333  Url       2025-01-01 12:00:00  Work"]);
  });

  test("no pins", async () => {
    await runTest(withEngine(makeEngineHarness(), pinnedCommand(parseArgs(["pinned"]))));
    expect(output.logs).toEqual(["No pinned items."]);
  });

  test("rename sets and clears the title", async () => {
    const harness = withPinnedUrl("Work");
    await runTest(
      withEngine(harness, pinnedCommand(parseArgs(["pinned", "rename", "cccc", "Personal", "stuff"])))
    );
    expect(harness.store.pinned[0]?.customTitle).toBe("Personal stuff");

    await runTest(withEngine(harness, pinnedCommand(parseArgs(["pinned", "rename", "cccc"]))));
    expect(harness.store.pinned[0]?.customTitle).toBeUndefined();

    expect(output.logs).toEqual(['Renamed cccc3333 to "Personal stuff"', "Cleared title of cccc3333"]);
  });

  test("unknown actions are rejected", async () => {
    const error = await runTestExpectFailure(
      withEngine(withPinnedUrl(), pinnedCommand(parseArgs(["pinned", "bogus"])))
    );
    expect(error.message).toBe("Unknown pinned action: bogus. Usage: clipvault pinned [rename <id> [title]]");
  });
});
