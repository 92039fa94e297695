/**
 * Backup Service - Export and import of history and pins
 *
 * Exports are a versioned bundle in JSON (default) or YAML. Imports accept
 * either format, require the current bundle version and replace history and
 * pins together through the engine, so a rejected import changes nothing.
 */

import { Schema } from "@effect/schema";
import { Context, Effect, Layer } from "effect";
import * as yaml from "js-yaml";
import {
  BACKUP_VERSION,
  BackupPayloadSchema,
  type BackupFormat,
  type BackupPayload,
} from "../models/backup";
import {
  DataFormatInvalidError,
  SerializationError,
  type StateNotInitializedError,
  type StatePersistenceFailedError,
} from "../models/errors";
import { DomainLimits } from "../models/limits";
import { ClipboardEngine } from "./clipboard-engine";
import { persistableHistory } from "./history-repository";
import { LoggerService } from "./logger-service";

/**
 * Export format options
 */
export interface BackupExportOptions {
  format?: BackupFormat;
}

export interface BackupImportResult {
  readonly historyCount: number;
  readonly pinnedCount: number;
}

interface BackupServiceImpl {
  /**
   * Serialize current history and pins
   */
  readonly exportBackup: (
    options?: BackupExportOptions
  ) => Effect.Effect<Uint8Array, SerializationError>;

  /**
   * Validate a bundle and replace history and pins with its contents
   */
  readonly importBackup: (
    payload: Uint8Array
  ) => Effect.Effect<
    BackupImportResult,
    DataFormatInvalidError | StatePersistenceFailedError | StateNotInitializedError
  >;
}

export class BackupService extends Context.Tag("BackupService")<BackupService, BackupServiceImpl>() {}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

const serializePayload = (
  payload: BackupPayload,
  format: BackupFormat
): Effect.Effect<Uint8Array, SerializationError> =>
  Effect.gen(function* () {
    const encoded = yield* Schema.encode(BackupPayloadSchema)(payload);
    const text =
      format === "json"
        ? `${JSON.stringify(encoded, null, 2)}\n`
        : yaml.dump(encoded, {
            indent: 2,
            lineWidth: -1,
            noRefs: true,
            skipInvalid: true,
            sortKeys: false,
            schema: yaml.JSON_SCHEMA,
          });
    return textEncoder.encode(text);
  }).pipe(
    Effect.mapError(
      (error) =>
        new SerializationError({
          direction: "encode",
          message: `Failed to serialize backup as ${format}: ${error.message}`,
          cause: error,
        })
    )
  );

/**
 * Parse data from JSON or YAML format
 */
const parseData = (content: string): Effect.Effect<unknown, DataFormatInvalidError> =>
  Effect.try({
    try: (): unknown => JSON.parse(content),
    catch: (error) => error,
  }).pipe(
    Effect.orElse(() =>
      Effect.try({
        // JSON_SCHEMA keeps ISO timestamps as strings
        try: (): unknown => yaml.load(content, { schema: yaml.JSON_SCHEMA }),
        catch: (error) =>
          new DataFormatInvalidError({ message: "Backup is neither valid JSON nor YAML", cause: error }),
      })
    )
  );

const readVersion = (data: unknown): unknown =>
  typeof data === "object" && data !== null && "version" in data ? data.version : undefined;

export const parseBackup = (bytes: Uint8Array): Effect.Effect<BackupPayload, DataFormatInvalidError> =>
  Effect.gen(function* () {
    const content = yield* Effect.try({
      try: () => textDecoder.decode(bytes),
      catch: (error) => new DataFormatInvalidError({ message: "Backup is not valid UTF-8", cause: error }),
    });
    const data = yield* parseData(content);

    const version = readVersion(data);
    if (version !== BACKUP_VERSION) {
      return yield* Effect.fail(
        new DataFormatInvalidError({
          message: `Unsupported backup version: ${String(version)} (expected ${BACKUP_VERSION})`,
        })
      );
    }

    return yield* Schema.decodeUnknown(BackupPayloadSchema)(data).pipe(
      Effect.mapError(
        (error) =>
          new DataFormatInvalidError({
            message: `Invalid backup format: ${error.message}`,
            cause: error,
          })
      )
    );
  });

export const BackupServiceLive = Layer.effect(
  BackupService,
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const logger = yield* LoggerService;

    return BackupService.of({
      exportBackup: (options = {}) =>
        Effect.gen(function* () {
          const { history, pinned } = yield* engine.snapshot;
          const payload: BackupPayload = {
            version: BACKUP_VERSION,
            exportedAt: new Date(),
            history: persistableHistory(history),
            pinned: pinned.slice(0, DomainLimits.maxPinnedItems),
          };

          const format = options.format ?? "json";
          const bytes = yield* serializePayload(payload, format);
          yield* logger.info("BackupService", "Backup exported", {
            format,
            history: payload.history.length,
            pinned: payload.pinned.length,
          });
          return bytes;
        }),

      importBackup: (bytes) =>
        Effect.gen(function* () {
          const payload = yield* parseBackup(bytes);
          yield* engine.replaceAll(payload.history, payload.pinned);

          const { history, pinned } = yield* engine.snapshot;
          yield* logger.info("BackupService", "Backup imported", {
            history: history.length,
            pinned: pinned.length,
          });
          return { historyCount: history.length, pinnedCount: pinned.length };
        }),
    });
  })
);
