/**
 * Settings Repository - Durable storage for the settings record
 *
 * A missing or empty settings file loads as the defaults; keys missing from an
 * older file take their default values.
 */

import { Context, Effect, Layer, Option } from "effect";
import type { SerializationError, StorageError } from "../models/errors";
import { DEFAULT_SETTINGS, SettingsSchema, type Settings } from "../models/settings";
import { readBytes, writeAtomic } from "./file-store";
import { decodeJson, encodeJson } from "./json-file";
import { StoragePaths } from "./storage-paths";

interface SettingsRepositoryImpl {
  readonly load: () => Effect.Effect<Settings, StorageError | SerializationError>;
  readonly save: (settings: Settings) => Effect.Effect<void, StorageError | SerializationError>;
}

export class SettingsRepository extends Context.Tag("SettingsRepository")<
  SettingsRepository,
  SettingsRepositoryImpl
>() {}

export const SettingsRepositoryLive = Layer.effect(
  SettingsRepository,
  Effect.gen(function* () {
    const { settingsFile } = yield* StoragePaths;

    return SettingsRepository.of({
      load: () =>
        Effect.gen(function* () {
          const bytes = yield* readBytes(settingsFile);
          if (Option.isNone(bytes)) {
            return DEFAULT_SETTINGS;
          }
          return yield* decodeJson(SettingsSchema, bytes.value, DEFAULT_SETTINGS);
        }),

      save: (settings) =>
        Effect.gen(function* () {
          const json = yield* encodeJson(SettingsSchema, settings);
          yield* writeAtomic(settingsFile, json);
        }),
    });
  })
);
