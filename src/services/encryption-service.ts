/**
 * Encryption Service - Authenticated encryption for persisted history
 *
 * AES-256-GCM with a random 32-byte key kept in the storage root. The key is
 * created on first use. Payload layout: nonce (12) | auth tag (16) | ciphertext.
 */

import { Context, Effect, Layer, Option, Ref } from "effect";
import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { EncryptedPayloadInvalidError, EncryptionError } from "../models/errors";
import { readBytes, writeAtomic } from "./file-store";
import { StoragePaths } from "./storage-paths";

const ALGORITHM = "aes-256-gcm";
const KEY_SIZE = 32;
const NONCE_SIZE = 12;
const TAG_SIZE = 16;

// ============================================================================
// Service Interface
// ============================================================================

interface EncryptionServiceImpl {
  /**
   * Encrypt a cleartext buffer with a fresh nonce
   */
  readonly encrypt: (cleartext: Uint8Array) => Effect.Effect<Uint8Array, EncryptionError>;

  /**
   * Decrypt and authenticate a payload produced by `encrypt`
   *
   * @returns Fails with EncryptedPayloadInvalidError if the payload is
   * truncated or was not produced under the current key
   */
  readonly decrypt: (
    payload: Uint8Array
  ) => Effect.Effect<Uint8Array, EncryptionError | EncryptedPayloadInvalidError>;
}

export class EncryptionService extends Context.Tag("EncryptionService")<
  EncryptionService,
  EncryptionServiceImpl
>() {}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Build the service around a key source. The key is loaded once and cached.
 */
export const makeEncryptionService = (
  loadKey: Effect.Effect<Uint8Array, EncryptionError>
): Effect.Effect<EncryptionServiceImpl> =>
  Effect.gen(function* () {
    const cached = yield* Ref.make(Option.none<Uint8Array>());
    const keyLock = yield* Effect.makeSemaphore(1);

    const getKey = keyLock.withPermits(1)(
      Effect.gen(function* () {
        const current = yield* Ref.get(cached);
        if (Option.isSome(current)) {
          return current.value;
        }
        const key = yield* loadKey;
        if (key.byteLength !== KEY_SIZE) {
          return yield* Effect.fail(
            new EncryptionError({ message: `Encryption key must be ${KEY_SIZE} bytes, got ${key.byteLength}` })
          );
        }
        yield* Ref.set(cached, Option.some(key));
        return key;
      })
    );

    return EncryptionService.of({
      encrypt: (cleartext) =>
        Effect.gen(function* () {
          const key = yield* getKey;
          return yield* Effect.try({
            try: () => {
              const nonce = randomBytes(NONCE_SIZE);
              const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_SIZE });
              const ciphertext = Buffer.concat([cipher.update(cleartext), cipher.final()]);
              return new Uint8Array(Buffer.concat([nonce, cipher.getAuthTag(), ciphertext]));
            },
            catch: (error) =>
              new EncryptionError({
                message: `Failed to encrypt: ${error instanceof Error ? error.message : String(error)}`,
                cause: error,
              }),
          });
        }),

      decrypt: (payload) =>
        Effect.gen(function* () {
          if (payload.byteLength < NONCE_SIZE + TAG_SIZE) {
            return yield* Effect.fail(
              new EncryptedPayloadInvalidError({
                message: `Encrypted payload is truncated (${payload.byteLength} bytes)`,
              })
            );
          }

          const key = yield* getKey;
          return yield* Effect.try({
            try: () => {
              const nonce = payload.subarray(0, NONCE_SIZE);
              const tag = payload.subarray(NONCE_SIZE, NONCE_SIZE + TAG_SIZE);
              const ciphertext = payload.subarray(NONCE_SIZE + TAG_SIZE);
              const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_SIZE });
              decipher.setAuthTag(tag);
              return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
            },
            catch: (error) =>
              new EncryptedPayloadInvalidError({
                message: "Encrypted payload failed authentication",
                cause: error,
              }),
          });
        }),
    });
  });

/**
 * Read the key file, creating it with a fresh random key when missing
 */
export const loadOrCreateKey = (keyFile: string): Effect.Effect<Uint8Array, EncryptionError> =>
  Effect.gen(function* () {
    const existing = yield* readBytes(keyFile);
    if (Option.isSome(existing)) {
      return existing.value;
    }
    const key = new Uint8Array(randomBytes(KEY_SIZE));
    yield* writeAtomic(keyFile, key);
    return key;
  }).pipe(
    Effect.mapError(
      (error) =>
        new EncryptionError({
          message: `Encryption key unavailable: ${error.message}`,
          cause: error,
        })
    )
  );

// ============================================================================
// Layer
// ============================================================================

export const EncryptionServiceLive = Layer.effect(
  EncryptionService,
  Effect.flatMap(StoragePaths, (paths) => makeEncryptionService(loadOrCreateKey(paths.encryptionKeyFile)))
);
