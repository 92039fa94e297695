/**
 * settings command - Show or change settings
 *
 * Usage:
 *   clipvault settings                    Show all settings
 *   clipvault settings key=value [...]    Change one or more settings
 *
 * Lists take comma-separated values (excludedAppIds=slack,keepass) and the
 * shortcut takes its display form (keyboardShortcut=Ctrl+Shift+V).
 */

import { Schema } from "@effect/schema";
import { Effect } from "effect";
import { ValidationError } from "../models";
import {
  KeyboardShortcutSchema,
  SettingsSchema,
  effectiveHistoryLimit,
  type KeyboardShortcut,
  type ShortcutModifier,
} from "../models/settings";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";

const isShortcut = Schema.is(KeyboardShortcutSchema);

export const formatSettingValue = (value: unknown): string => {
  if (isShortcut(value)) return value.display;
  if (Array.isArray(value)) return value.length === 0 ? "(none)" : value.map(String).join(", ");
  return String(value);
};

// ============================================================================
// Value parsing
// ============================================================================

const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0"]);

const MODIFIERS: Record<string, ShortcutModifier> = {
  ctrl: "Control",
  control: "Control",
  alt: "Alt",
  option: "Alt",
  shift: "Shift",
  meta: "Meta",
  cmd: "Meta",
  command: "Meta",
  win: "Meta",
  super: "Meta",
};

const MODIFIER_DISPLAY: Record<ShortcutModifier, string> = {
  Control: "Ctrl",
  Alt: "Alt",
  Shift: "Shift",
  Meta: "Meta",
};

// Virtual key codes of the non-alphanumeric keys a shortcut may use
const NAMED_KEYS: Record<string, number> = {
  ";": 0xba,
  "=": 0xbb,
  ",": 0xbc,
  "-": 0xbd,
  ".": 0xbe,
  "/": 0xbf,
  "`": 0xc0,
  "[": 0xdb,
  "\\": 0xdc,
  "]": 0xdd,
  "'": 0xde,
  space: 0x20,
  enter: 0x0d,
  tab: 0x09,
  escape: 0x1b,
  esc: 0x1b,
  insert: 0x2d,
  delete: 0x2e,
  home: 0x24,
  end: 0x23,
  pageup: 0x21,
  pagedown: 0x22,
};

const keyCodeFor = (key: string): number | undefined => {
  if (/^[a-z0-9]$/i.test(key)) {
    return key.toUpperCase().charCodeAt(0);
  }
  const fn = /^f([1-9]|1[0-9]|2[0-4])$/i.exec(key);
  if (fn?.[1] !== undefined) {
    return 0x6f + Number(fn[1]);
  }
  return NAMED_KEYS[key.toLowerCase()];
};

/**
 * Parse a shortcut such as "Ctrl+Shift+V". Modifier requirements are checked
 * when settings are saved.
 */
export const parseShortcut = (raw: string): Effect.Effect<KeyboardShortcut, ValidationError> => {
  const invalid = (message: string) =>
    Effect.fail(new ValidationError({ field: "keyboardShortcut", message }));

  // "Ctrl++" ends with the plus key itself
  const tokens = raw.endsWith("++")
    ? [...raw.slice(0, -2).split("+"), "+"]
    : raw.split("+");
  const key = tokens[tokens.length - 1]?.trim() ?? "";
  if (key.length === 0) {
    return invalid(`Missing key in shortcut "${raw}"`);
  }

  const modifiers: ShortcutModifier[] = [];
  for (const token of tokens.slice(0, -1)) {
    const modifier = MODIFIERS[token.trim().toLowerCase()];
    if (modifier === undefined) {
      return invalid(`Unknown modifier "${token.trim()}" in shortcut "${raw}"`);
    }
    if (!modifiers.includes(modifier)) {
      modifiers.push(modifier);
    }
  }

  const keyCode = key === "+" ? 0xbb : keyCodeFor(key);
  if (keyCode === undefined) {
    return invalid(`Unknown key "${key}" in shortcut "${raw}"`);
  }

  const keyLabel = key.length === 1 ? key.toUpperCase() : key;
  return Effect.succeed({
    keyCode,
    modifiers,
    display: [...modifiers.map((modifier) => MODIFIER_DISPLAY[modifier]), keyLabel].join("+"),
  });
};

/**
 * Convert a raw string to the type of the setting's current value
 */
const coerceValue = (
  key: string,
  raw: string,
  current: unknown
): Effect.Effect<unknown, ValidationError> => {
  const invalid = (expected: string) =>
    Effect.fail(new ValidationError({ field: key, message: `${key}: expected ${expected}, got "${raw}"` }));

  if (typeof current === "boolean") {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return Effect.succeed(true);
    if (FALSE_WORDS.has(word)) return Effect.succeed(false);
    return invalid("true or false");
  }
  if (typeof current === "number") {
    const value = Number(raw);
    return raw.trim().length === 0 || Number.isNaN(value) ? invalid("a number") : Effect.succeed(value);
  }
  if (Array.isArray(current)) {
    return Effect.succeed(
      raw
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    );
  }
  if (isShortcut(current)) {
    return parseShortcut(raw);
  }
  return Effect.succeed(raw);
};

const parseAssignment = (arg: string): Effect.Effect<[string, string], ValidationError> => {
  const eqIndex = arg.indexOf("=");
  if (eqIndex <= 0) {
    return Effect.fail(
      new ValidationError({ field: "args", message: `Expected key=value, got "${arg}"` })
    );
  }
  return Effect.succeed([arg.slice(0, eqIndex).trim(), arg.slice(eqIndex + 1)]);
};

// ============================================================================
// Command
// ============================================================================

export const settingsCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const settings = yield* engine.settings;
    const current = Object.entries(settings);

    if (args.positional.length === 0) {
      for (const [key, value] of current) {
        console.log(`${key.padEnd(20)} ${formatSettingValue(value)}`);
      }
      console.log(`\nEffective history limit: ${effectiveHistoryLimit(settings)}`);
      return;
    }

    const updates: Record<string, unknown> = {};
    for (const arg of args.positional) {
      const [key, raw] = yield* parseAssignment(arg);
      const entry = current.find(([name]) => name === key);
      if (entry === undefined) {
        return yield* Effect.fail(
          new ValidationError({ field: key, message: `Unknown setting: ${key}` })
        );
      }
      updates[key] = yield* coerceValue(key, raw, entry[1]);
    }

    const next = yield* Schema.decodeUnknown(SettingsSchema)({ ...settings, ...updates }).pipe(
      Effect.mapError(
        (error) => new ValidationError({ field: "settings", message: error.message })
      )
    );
    yield* engine.saveSettings(next);

    for (const [key, value] of Object.entries(next)) {
      if (key in updates) {
        console.log(`Set ${key} = ${formatSettingValue(value)}`);
      }
    }
  });
