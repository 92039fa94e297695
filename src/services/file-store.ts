/**
 * File Store - Low-level file access for the repositories
 *
 * Reads treat a missing file as "no data". Writes go to a temporary file in
 * the same directory and are renamed over the target, so a crash mid-write
 * leaves the previous file intact.
 */

import { Effect, Option } from "effect";
import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { StorageError, type StorageOperation } from "../models/errors";

const errnoOf = (error: unknown): string | undefined =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

const toStorageError = (operation: StorageOperation, path: string, verb: string) => (error: unknown) =>
  new StorageError({
    operation,
    path,
    message: `Failed to ${verb}: ${error instanceof Error ? error.message : String(error)}`,
    errno: errnoOf(error),
    cause: error,
  });

export const ensureDirectory = (dir: string): Effect.Effect<void, StorageError> =>
  Effect.tryPromise({
    try: () => mkdir(dir, { recursive: true }),
    catch: toStorageError("path", dir, "create directory"),
  }).pipe(Effect.asVoid);

export const readBytes = (path: string): Effect.Effect<Option.Option<Uint8Array>, StorageError> =>
  Effect.tryPromise({
    try: async () => {
      try {
        return Option.some<Uint8Array>(await readFile(path));
      } catch (error) {
        if (errnoOf(error) === "ENOENT") {
          return Option.none<Uint8Array>();
        }
        throw error;
      }
    },
    catch: toStorageError("read", path, "read file"),
  });

export const writeAtomic = (
  path: string,
  data: Uint8Array | string
): Effect.Effect<void, StorageError> =>
  Effect.gen(function* () {
    yield* ensureDirectory(dirname(path));

    const tempPath = `${path}.${randomUUID().slice(0, 8)}.tmp`;
    yield* Effect.tryPromise({
      try: async () => {
        try {
          await writeFile(tempPath, data, { mode: 0o600 });
          await rename(tempPath, path);
        } catch (error) {
          await rm(tempPath, { force: true });
          throw error;
        }
      },
      catch: toStorageError("write", path, "write file"),
    });
  });

export const removeFile = (path: string): Effect.Effect<void, StorageError> =>
  Effect.tryPromise({
    try: () => rm(path, { force: true }),
    catch: toStorageError("delete", path, "delete file"),
  });
