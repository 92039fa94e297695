/**
 * History Repository - Durable storage for clipboard history
 *
 * History is stored either as plain JSON or encrypted, depending on the flag
 * the engine passes. Loading falls back to the other form when the expected
 * file is missing, so flipping the setting does not lose history; saving
 * writes the chosen form and removes the other.
 */

import { Schema } from "@effect/schema";
import { Context, Effect, Layer, Option } from "effect";
import { ClipboardItemSchema, type ClipboardItem } from "../models/clipboard-item";
import type {
  EncryptedPayloadInvalidError,
  EncryptionError,
  SerializationError,
  StorageError,
} from "../models/errors";
import { DomainLimits } from "../models/limits";
import { EncryptionService } from "./encryption-service";
import { readBytes, removeFile, writeAtomic } from "./file-store";
import { decodeJson, encodeJson } from "./json-file";
import { StoragePaths } from "./storage-paths";

const HistorySchema = Schema.Array(ClipboardItemSchema);

export type HistoryLoadError =
  | StorageError
  | SerializationError
  | EncryptionError
  | EncryptedPayloadInvalidError;

export type HistorySaveError = StorageError | SerializationError | EncryptionError;

/**
 * Drop what must never reach disk: oversized images and anything past the
 * hard history limit
 */
export const persistableHistory = (
  items: ReadonlyArray<ClipboardItem>
): ReadonlyArray<ClipboardItem> =>
  items
    .filter(
      (item) => item.type !== "Image" || item.data.byteLength <= DomainLimits.maxPersistedImageBytes
    )
    .slice(0, DomainLimits.maxHistoryItems);

interface HistoryRepositoryImpl {
  /**
   * Load persisted history, most recent first
   */
  readonly load: (encrypted: boolean) => Effect.Effect<ReadonlyArray<ClipboardItem>, HistoryLoadError>;

  /**
   * Replace persisted history with `items`
   */
  readonly save: (
    items: ReadonlyArray<ClipboardItem>,
    encrypted: boolean
  ) => Effect.Effect<void, HistorySaveError>;

  /**
   * Remove both the plain and the encrypted history file
   */
  readonly clear: () => Effect.Effect<void, StorageError>;
}

export class HistoryRepository extends Context.Tag("HistoryRepository")<
  HistoryRepository,
  HistoryRepositoryImpl
>() {}

export const HistoryRepositoryLive = Layer.effect(
  HistoryRepository,
  Effect.gen(function* () {
    const paths = yield* StoragePaths;
    const encryption = yield* EncryptionService;

    const decodeFrom = (bytes: Uint8Array, encrypted: boolean) =>
      Effect.gen(function* () {
        const clear = encrypted ? yield* encryption.decrypt(bytes) : bytes;
        return yield* decodeJson(HistorySchema, clear, []);
      });

    return HistoryRepository.of({
      load: (encrypted) =>
        Effect.gen(function* () {
          const preferred = encrypted ? paths.encryptedHistoryFile : paths.historyFile;
          const other = encrypted ? paths.historyFile : paths.encryptedHistoryFile;

          const fromPreferred = yield* readBytes(preferred);
          if (Option.isSome(fromPreferred)) {
            return persistableHistory(yield* decodeFrom(fromPreferred.value, encrypted));
          }

          const fromOther = yield* readBytes(other);
          if (Option.isSome(fromOther)) {
            return persistableHistory(yield* decodeFrom(fromOther.value, !encrypted));
          }

          return [];
        }),

      save: (items, encrypted) =>
        Effect.gen(function* () {
          const json = yield* encodeJson(HistorySchema, persistableHistory(items));
          if (encrypted) {
            yield* writeAtomic(paths.encryptedHistoryFile, yield* encryption.encrypt(json));
            yield* removeFile(paths.historyFile);
          } else {
            yield* writeAtomic(paths.historyFile, json);
            yield* removeFile(paths.encryptedHistoryFile);
          }
        }),

      clear: () =>
        Effect.gen(function* () {
          yield* removeFile(paths.historyFile);
          yield* removeFile(paths.encryptedHistoryFile);
        }),
    });
  })
);
