/**
 * Pinned Repository - Durable storage for pinned items
 */

import { Schema } from "@effect/schema";
import { Context, Effect, Layer, Option } from "effect";
import type { SerializationError, StorageError } from "../models/errors";
import { DomainLimits } from "../models/limits";
import { PinnedClipboardItemSchema, type PinnedClipboardItem } from "../models/pinned-item";
import { readBytes, removeFile, writeAtomic } from "./file-store";
import { decodeJson, encodeJson } from "./json-file";
import { StoragePaths } from "./storage-paths";

const PinnedSchema = Schema.Array(PinnedClipboardItemSchema);

interface PinnedRepositoryImpl {
  readonly load: () => Effect.Effect<
    ReadonlyArray<PinnedClipboardItem>,
    StorageError | SerializationError
  >;
  readonly save: (
    items: ReadonlyArray<PinnedClipboardItem>
  ) => Effect.Effect<void, StorageError | SerializationError>;
  readonly clear: () => Effect.Effect<void, StorageError>;
}

export class PinnedRepository extends Context.Tag("PinnedRepository")<
  PinnedRepository,
  PinnedRepositoryImpl
>() {}

export const PinnedRepositoryLive = Layer.effect(
  PinnedRepository,
  Effect.gen(function* () {
    const { pinnedFile } = yield* StoragePaths;

    return PinnedRepository.of({
      load: () =>
        Effect.gen(function* () {
          const bytes = yield* readBytes(pinnedFile);
          if (Option.isNone(bytes)) {
            return [];
          }
          const pinned = yield* decodeJson(PinnedSchema, bytes.value, []);
          return pinned.slice(0, DomainLimits.maxPinnedItems);
        }),

      save: (items) =>
        Effect.gen(function* () {
          const json = yield* encodeJson(PinnedSchema, items.slice(0, DomainLimits.maxPinnedItems));
          yield* writeAtomic(pinnedFile, json);
        }),

      clear: () => removeFile(pinnedFile),
    });
  })
);
