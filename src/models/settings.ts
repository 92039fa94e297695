/**
 * Settings Domain Types
 *
 * User settings persisted as one record. Every field has a default so older
 * settings files missing newer keys still decode.
 */

import { Schema } from "@effect/schema";
import { Effect } from "effect";
import { SettingsRangeInvalidError, SettingsShortcutInvalidError } from "./errors";
import { DomainLimits } from "./limits";

// ============================================================================
// Keyboard Shortcut
// ============================================================================

export const ShortcutModifierSchema = Schema.Literal("Control", "Alt", "Shift", "Meta");
export type ShortcutModifier = Schema.Schema.Type<typeof ShortcutModifierSchema>;

export const KeyboardShortcutSchema = Schema.Struct({
  keyCode: Schema.Number,
  modifiers: Schema.Array(ShortcutModifierSchema),
  display: Schema.String,
});

export type KeyboardShortcut = Schema.Schema.Type<typeof KeyboardShortcutSchema>;

// 0xBA is the ";" key on US layouts
export const DEFAULT_SHORTCUT: KeyboardShortcut = {
  keyCode: 0xba,
  modifiers: ["Control"],
  display: "Ctrl+;",
};

// ============================================================================
// Settings
// ============================================================================

export const DENSITY_MODES = ["compact", "comfortable"] as const;
export const THEME_OVERRIDES = ["dark", "light", "system"] as const;

export const SettingsSchema = Schema.Struct({
  launchAtLogin: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  keyboardShortcut: Schema.optionalWith(KeyboardShortcutSchema, {
    default: () => DEFAULT_SHORTCUT,
  }),
  rememberHistory: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  showRecent: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  showPinned: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  autoPasteEnabled: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  maxHistoryItems: Schema.optionalWith(Schema.Number, { default: () => 100 }),
  enableHistoryLimit: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  autoShowOnEdge: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  autoShowDelay: Schema.optionalWith(Schema.Number, { default: () => 0.3 }),
  autoHideDelay: Schema.optionalWith(Schema.Number, { default: () => 0.5 }),
  captureRichText: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  snippetsEnabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  densityMode: Schema.optionalWith(Schema.String, { default: () => "comfortable" }),
  fontSizeScale: Schema.optionalWith(Schema.Number, { default: () => 1 }),
  themeOverride: Schema.optionalWith(Schema.String, { default: () => "dark" }),
  encryptHistory: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  incognitoMode: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  excludedAppIds: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
});

export type Settings = Schema.Schema.Type<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = Schema.decodeUnknownSync(SettingsSchema)({});

/**
 * The only value eviction consults. With the limit disabled, history is still
 * capped at the hard maximum.
 */
export const effectiveHistoryLimit = (settings: Settings): number =>
  settings.enableHistoryLimit
    ? Math.min(
        Math.max(settings.maxHistoryItems, DomainLimits.minHistoryItems),
        DomainLimits.maxHistoryItems
      )
    : DomainLimits.maxHistoryItems;

// ============================================================================
// Validation
// ============================================================================

const MAX_DELAY_SECONDS = 10;

const checkRange = (
  field: string,
  value: number,
  min: number,
  max: number
): Effect.Effect<void, SettingsRangeInvalidError> =>
  Number.isFinite(value) && value >= min && value <= max
    ? Effect.void
    : Effect.fail(
        new SettingsRangeInvalidError({
          field,
          message: `must be between ${min} and ${max}, got ${value}`,
        })
      );

const checkOneOf = (
  field: string,
  value: string,
  allowed: ReadonlyArray<string>
): Effect.Effect<void, SettingsRangeInvalidError> =>
  allowed.includes(value)
    ? Effect.void
    : Effect.fail(
        new SettingsRangeInvalidError({
          field,
          message: `must be one of ${allowed.join(", ")}, got "${value}"`,
        })
      );

export const validateShortcut = (
  shortcut: KeyboardShortcut
): Effect.Effect<void, SettingsShortcutInvalidError> => {
  if (!Number.isInteger(shortcut.keyCode) || shortcut.keyCode < 1 || shortcut.keyCode > 254) {
    return Effect.fail(
      new SettingsShortcutInvalidError({
        message: `Key code must be an integer between 1 and 254, got ${shortcut.keyCode}`,
      })
    );
  }
  if (shortcut.modifiers.length === 0) {
    return Effect.fail(
      new SettingsShortcutInvalidError({ message: "Shortcut needs at least one modifier key" })
    );
  }
  if (shortcut.display.trim().length === 0) {
    return Effect.fail(
      new SettingsShortcutInvalidError({ message: "Shortcut display text must not be empty" })
    );
  }
  return Effect.void;
};

/**
 * Validate a settings record before it is accepted
 */
export const validateSettings = (
  settings: Settings
): Effect.Effect<void, SettingsRangeInvalidError | SettingsShortcutInvalidError> =>
  Effect.gen(function* () {
    if (!Number.isInteger(settings.maxHistoryItems)) {
      return yield* Effect.fail(
        new SettingsRangeInvalidError({
          field: "maxHistoryItems",
          message: `must be an integer, got ${settings.maxHistoryItems}`,
        })
      );
    }
    yield* checkRange("maxHistoryItems", settings.maxHistoryItems, 1, DomainLimits.maxHistoryItems);
    yield* checkRange("autoShowDelay", settings.autoShowDelay, 0, MAX_DELAY_SECONDS);
    yield* checkRange("autoHideDelay", settings.autoHideDelay, 0, MAX_DELAY_SECONDS);
    yield* checkRange("fontSizeScale", settings.fontSizeScale, 0.5, 2);
    yield* checkOneOf("densityMode", settings.densityMode, DENSITY_MODES);
    yield* checkOneOf("themeOverride", settings.themeOverride, THEME_OVERRIDES);
    yield* validateShortcut(settings.keyboardShortcut);
  });

/**
 * Exclusion match on the capturing application's id. Comparison is
 * case-insensitive and tolerates a trailing ".exe" on either side.
 */
export const isExcludedSource = (
  sourceAppId: string | undefined,
  excludedAppIds: ReadonlyArray<string>
): boolean => {
  const normalize = (id: string): string => {
    const lowered = id.trim().toLowerCase();
    return lowered.endsWith(".exe") ? lowered.slice(0, -4) : lowered;
  };

  if (sourceAppId === undefined) return false;
  const source = normalize(sourceAppId);
  if (source.length === 0) return false;

  return excludedAppIds.some((excluded) => {
    const candidate = normalize(excluded);
    return candidate.length > 0 && candidate === source;
  });
};
