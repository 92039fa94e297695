/**
 * Schema-backed JSON encoding shared by the repositories
 */

import { Schema } from "@effect/schema";
import { Effect } from "effect";
import { SerializationError } from "../models/errors";

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export const encodeJson = <A, I>(
  schema: Schema.Schema<A, I>,
  value: A
): Effect.Effect<Uint8Array, SerializationError> =>
  Schema.encode(Schema.parseJson(schema, { space: 2 }))(value).pipe(
    Effect.map((json) => textEncoder.encode(`${json}\n`)),
    Effect.mapError(
      (error) =>
        new SerializationError({
          direction: "encode",
          message: `Failed to serialize: ${error.message}`,
          cause: error,
        })
    )
  );

/**
 * Decode UTF-8 JSON bytes through `schema`. Blank input decodes as `fallback`.
 */
export const decodeJson = <A, I>(
  schema: Schema.Schema<A, I>,
  bytes: Uint8Array,
  fallback: A
): Effect.Effect<A, SerializationError> =>
  Effect.gen(function* () {
    const text = yield* Effect.try({
      try: () => textDecoder.decode(bytes),
      catch: (error) =>
        new SerializationError({
          direction: "decode",
          message: "File is not valid UTF-8",
          cause: error,
        }),
    });

    if (text.trim().length === 0) {
      return fallback;
    }

    return yield* Schema.decodeUnknown(Schema.parseJson(schema))(text).pipe(
      Effect.mapError(
        (error) =>
          new SerializationError({
            direction: "decode",
            message: `Failed to parse: ${error.message}`,
            cause: error,
          })
      )
    );
  });
