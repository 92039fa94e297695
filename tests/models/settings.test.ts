/**
 * Settings Model Tests
 */

import { describe, test, expect } from "vitest";
import { Schema } from "@effect/schema";
import { Effect } from "effect";
import {
  DEFAULT_SETTINGS,
  DEFAULT_SHORTCUT,
  SettingsSchema,
  effectiveHistoryLimit,
  isExcludedSource,
  validateSettings,
  type Settings,
} from "../../src/models/settings";
import { runTest, runTestExpectFailure } from "../utils";

const withSettings = (overrides: Partial<Settings>): Settings => ({ ...DEFAULT_SETTINGS, ...overrides });

describe("defaults", () => {
  test("an empty record decodes to the defaults", () => {
    const settings = Schema.decodeUnknownSync(SettingsSchema)({});
    expect(settings.rememberHistory).toBe(true);
    expect(settings.maxHistoryItems).toBe(100);
    expect(settings.enableHistoryLimit).toBe(false);
    expect(settings.captureRichText).toBe(true);
    expect(settings.themeOverride).toBe("dark");
    expect(settings.keyboardShortcut).toEqual(DEFAULT_SHORTCUT);
    expect(settings.excludedAppIds).toEqual([]);
  });

  test("missing keys in an older record take their defaults", () => {
    const settings = Schema.decodeUnknownSync(SettingsSchema)({ incognitoMode: true });
    expect(settings.incognitoMode).toBe(true);
    expect(settings.autoHideDelay).toBe(0.5);
  });
});

describe("effectiveHistoryLimit", () => {
  test("disabled limit uses the hard maximum", () => {
    expect(effectiveHistoryLimit(withSettings({ maxHistoryItems: 20 }))).toBe(500);
  });

  test("enabled limit is clamped between 10 and 500", () => {
    expect(effectiveHistoryLimit(withSettings({ enableHistoryLimit: true, maxHistoryItems: 25 }))).toBe(25);
    expect(effectiveHistoryLimit(withSettings({ enableHistoryLimit: true, maxHistoryItems: 3 }))).toBe(10);
  });
});

describe("validateSettings", () => {
  test("accepts the defaults", async () => {
    await runTest(validateSettings(DEFAULT_SETTINGS));
  });

  test("rejects a history limit above 500", async () => {
    const error = await runTestExpectFailure(validateSettings(withSettings({ maxHistoryItems: 501 })));
    expect(error._tag).toBe("SettingsRangeInvalidError");
    if (error._tag === "SettingsRangeInvalidError") {
      expect(error.field).toBe("maxHistoryItems");
      expect(error.message).toBe("must be between 1 and 500, got 501");
    }
  });

  test("rejects a fractional history limit", async () => {
    const error = await runTestExpectFailure(validateSettings(withSettings({ maxHistoryItems: 12.5 })));
    expect(error.message).toBe("must be an integer, got 12.5");
  });

  test("rejects an unknown theme", async () => {
    const error = await runTestExpectFailure(validateSettings(withSettings({ themeOverride: "neon" })));
    expect(error.message).toBe('must be one of dark, light, system, got "neon"');
  });

  test("rejects a shortcut without modifiers", async () => {
    const error = await runTestExpectFailure(
      validateSettings(withSettings({ keyboardShortcut: { keyCode: 0x41, modifiers: [], display: "A" } }))
    );
    expect(error._tag).toBe("SettingsShortcutInvalidError");
    expect(error.message).toBe("Shortcut needs at least one modifier key");
  });

  test("rejects a font scale outside 0.5 to 2", async () => {
    const exit = await Effect.runPromiseExit(validateSettings(withSettings({ fontSizeScale: 3 })));
    expect(exit._tag).toBe("Failure");
  });
});

describe("isExcludedSource", () => {
  test("matches case-insensitively and ignores .exe", () => {
    expect(isExcludedSource("KeePass.exe", ["keepass"])).toBe(true);
    expect(isExcludedSource("keepass", ["KEEPASS.EXE"])).toBe(true);
  });

  test("unknown or blank sources are never excluded", () => {
    expect(isExcludedSource(undefined, ["keepass"])).toBe(false);
    expect(isExcludedSource("  ", ["", "  "])).toBe(false);
    expect(isExcludedSource("editor", ["keepass"])).toBe(false);
  });
});
