/**
 * Snippet Repository - Durable storage for text snippets
 */

import { Schema } from "@effect/schema";
import { Context, Effect, Layer, Option } from "effect";
import type { SerializationError, StorageError } from "../models/errors";
import { DomainLimits } from "../models/limits";
import { SnippetSchema, type Snippet } from "../models/snippet";
import { readBytes, removeFile, writeAtomic } from "./file-store";
import { decodeJson, encodeJson } from "./json-file";
import { StoragePaths } from "./storage-paths";

const SnippetsSchema = Schema.Array(SnippetSchema);

interface SnippetRepositoryImpl {
  readonly load: () => Effect.Effect<ReadonlyArray<Snippet>, StorageError | SerializationError>;
  readonly save: (
    snippets: ReadonlyArray<Snippet>
  ) => Effect.Effect<void, StorageError | SerializationError>;
  readonly clear: () => Effect.Effect<void, StorageError>;
}

export class SnippetRepository extends Context.Tag("SnippetRepository")<
  SnippetRepository,
  SnippetRepositoryImpl
>() {}

export const SnippetRepositoryLive = Layer.effect(
  SnippetRepository,
  Effect.gen(function* () {
    const { snippetsFile } = yield* StoragePaths;

    return SnippetRepository.of({
      load: () =>
        Effect.gen(function* () {
          const bytes = yield* readBytes(snippetsFile);
          if (Option.isNone(bytes)) {
            return [];
          }
          const snippets = yield* decodeJson(SnippetsSchema, bytes.value, []);
          return snippets.slice(0, DomainLimits.maxSnippets);
        }),

      save: (snippets) =>
        Effect.gen(function* () {
          const json = yield* encodeJson(SnippetsSchema, snippets.slice(0, DomainLimits.maxSnippets));
          yield* writeAtomic(snippetsFile, json);
        }),

      clear: () => removeFile(snippetsFile),
    });
  })
);
