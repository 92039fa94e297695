/**
 * Tests for settings command
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { parseShortcut, settingsCommand } from "../../src/commands/settings";
import { parseArgs } from "../../src/cli/parser";
import { DEFAULT_SETTINGS } from "../../src/models/settings";
import {
  captureConsole,
  createHistory,
  makeEngineHarness,
  runTest,
  runTestExpectFailure,
  withEngine,
  type ConsoleCapture,
} from "../utils";

let output: ConsoleCapture;

beforeEach(() => {
  output = captureConsole();
});

afterEach(() => {
  output.restore();
});

describe("settingsCommand", () => {
  test("shows every setting and the effective limit", async () => {
    await runTest(withEngine(makeEngineHarness(), settingsCommand(parseArgs(["settings"]))));

    expect(output.logs).toContain("launchAtLogin        false");
    expect(output.logs).toContain("keyboardShortcut     Ctrl+;");
    expect(output.logs).toContain("maxHistoryItems      100");
    expect(output.logs).toContain("excludedAppIds       (none)");
    expect(output.logs).toHaveLength(Object.keys(DEFAULT_SETTINGS).length + 1);
    expect(output.logs[output.logs.length - 1]).toBe("\nEffective history limit: 500");
  });

  test("sets several values and truncates history", async () => {
    const harness = makeEngineHarness({ history: createHistory(30) });
    await runTest(
      withEngine(
        harness,
        settingsCommand(parseArgs(["settings", "enableHistoryLimit=on", "maxHistoryItems=25"]))
      )
    );

    expect(output.logs).toEqual(["Set maxHistoryItems = 25", "Set enableHistoryLimit = true"]);
    expect(harness.store.settings.maxHistoryItems).toBe(25);
    expect(harness.store.history).toHaveLength(25);
  });

  test("lists are comma-separated", async () => {
    const harness = makeEngineHarness();
    await runTest(
      withEngine(harness, settingsCommand(parseArgs(["settings", "excludedAppIds=slack, keepass,"])))
    );

    expect(output.logs).toEqual(["Set excludedAppIds = slack, keepass"]);
    expect(harness.store.settings.excludedAppIds).toEqual(["slack", "keepass"]);
  });

  test("shortcuts take their display form", async () => {
    const harness = makeEngineHarness();
    await runTest(
      withEngine(harness, settingsCommand(parseArgs(["settings", "keyboardShortcut=Ctrl+Shift+V"])))
    );

    expect(output.logs).toEqual(["Set keyboardShortcut = Ctrl+Shift+V"]);
    expect(harness.store.settings.keyboardShortcut).toEqual({
      keyCode: 86,
      modifiers: ["Control", "Shift"],
      display: "Ctrl+Shift+V",
    });
  });

  test("unknown settings are rejected", async () => {
    const error = await runTestExpectFailure(
      withEngine(makeEngineHarness(), settingsCommand(parseArgs(["settings", "colour=red"])))
    );
    expect(error.message).toBe("Unknown setting: colour");
  });

  test("values must match the setting's type", async () => {
    const error = await runTestExpectFailure(
      withEngine(makeEngineHarness(), settingsCommand(parseArgs(["settings", "autoPasteEnabled=maybe"])))
    );
    expect(error.message).toBe('autoPasteEnabled: expected true or false, got "maybe"');
  });

  test("arguments need an equals sign", async () => {
    const error = await runTestExpectFailure(
      withEngine(makeEngineHarness(), settingsCommand(parseArgs(["settings", "incognitoMode"])))
    );
    expect(error.message).toBe('Expected key=value, got "incognitoMode"');
  });

  test("out-of-range values are rejected by validation and nothing is saved", async () => {
    const harness = makeEngineHarness();
    const error = await runTestExpectFailure(
      withEngine(harness, settingsCommand(parseArgs(["settings", "maxHistoryItems=501"])))
    );

    expect(error._tag).toBe("SettingsRangeInvalidError");
    expect(harness.store.writes.settings).toBe(0);
    expect(output.logs).toEqual([]);
  });

  test("a shortcut without modifiers fails validation", async () => {
    const error = await runTestExpectFailure(
      withEngine(makeEngineHarness(), settingsCommand(parseArgs(["settings", "keyboardShortcut=V"])))
    );
    expect(error._tag).toBe("SettingsShortcutInvalidError");
  });
});

describe("parseShortcut", () => {
  test("normalizes modifiers and the key label", async () => {
    expect(await runTest(parseShortcut("ctrl+shift+v"))).toEqual({
      keyCode: 86,
      modifiers: ["Control", "Shift"],
      display: "Ctrl+Shift+V",
    });
  });

  test("function keys and the plus key", async () => {
    expect(await runTest(parseShortcut("Alt+F5"))).toEqual({
      keyCode: 0x74,
      modifiers: ["Alt"],
      display: "Alt+F5",
    });
    expect(await runTest(parseShortcut("Ctrl++"))).toEqual({
      keyCode: 0xbb,
      modifiers: ["Control"],
      display: "Ctrl++",
    });
  });

  test("reports unknown modifiers, unknown keys and missing keys", async () => {
    expect((await runTestExpectFailure(parseShortcut("Hyper+V"))).message).toBe(
      'Unknown modifier "Hyper" in shortcut "Hyper+V"'
    );
    expect((await runTestExpectFailure(parseShortcut("Ctrl+Banana"))).message).toBe(
      'Unknown key "Banana" in shortcut "Ctrl+Banana"'
    );
    expect((await runTestExpectFailure(parseShortcut("Ctrl+"))).message).toBe(
      'Missing key in shortcut "Ctrl+"'
    );
  });
});
