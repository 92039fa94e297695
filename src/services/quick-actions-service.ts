/**
 * Quick Actions Service - One-shot transformations of a clipboard item
 *
 * Each action resolves the item through the engine. Transformations put their
 * result on the system clipboard; the monitor then records it like any other
 * copy.
 */

import { Context, Effect, Layer } from "effect";
import { copyFile, stat, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import {
  isTextItem,
  makeTextItem,
  textPayload,
  type ClipboardItem,
} from "../models/clipboard-item";
import {
  ClipboardItemUnsupportedTypeError,
  DataFormatInvalidError,
  StorageError,
  type AutoPasteFailedError,
  type ClipboardHistoryItemNotFoundError,
} from "../models/errors";
import { AutoPasteService } from "./auto-paste-service";
import type { CaptureError } from "./clipboard-monitor";
import { ClipboardEngine } from "./clipboard-engine";

type LookupError = ClipboardHistoryItemNotFoundError | ClipboardItemUnsupportedTypeError;

export type TransformError = LookupError | AutoPasteFailedError;

interface QuickActionsServiceImpl {
  /**
   * Write the item's payload to `target`. When `target` is an existing
   * directory the file name is suggested from the item.
   *
   * @returns The path written
   */
  readonly saveToFile: (id: string, target: string) => Effect.Effect<string, LookupError | StorageError>;

  /**
   * Base64 of the text payload (UTF-8), or of the raw bytes for images
   */
  readonly copyAsBase64: (id: string) => Effect.Effect<string, TransformError>;

  readonly urlEncode: (id: string) => Effect.Effect<string, TransformError>;

  /**
   * Fails with DataFormatInvalidError on malformed percent-escapes
   */
  readonly urlDecode: (id: string) => Effect.Effect<string, TransformError | DataFormatInvalidError>;

  /**
   * Capture an edited copy of a text item as a new history entry and put it
   * on the clipboard. Rich text is edited as plain text.
   */
  readonly editText: (
    id: string,
    text: string
  ) => Effect.Effect<ClipboardItem, TransformError | CaptureError>;
}

export class QuickActionsService extends Context.Tag("QuickActionsService")<
  QuickActionsService,
  QuickActionsServiceImpl
>() {}

// ============================================================================
// Helpers
// ============================================================================

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];

const suggestedExtension = (item: ClipboardItem): string => {
  switch (item.type) {
    case "Image":
      return PNG_SIGNATURE.every((byte, i) => item.data[i] === byte) ? ".png" : ".bin";
    case "RichText":
      return item.richText.rtf !== undefined ? ".rtf" : ".txt";
    case "File": {
      const ext = extname(item.filePath);
      return ext.length > 1 ? ext : ".bin";
    }
    default:
      return ".txt";
  }
};

/**
 * `clipboard-yyyyMMdd-HHmmss.<ext>` (UTC), or the original name for files
 */
export const suggestFileName = (item: ClipboardItem): string => {
  const extension = suggestedExtension(item);
  if (item.type === "File") {
    const name = basename(item.filePath, extname(item.filePath));
    if (name.trim().length > 0) {
      return name + extension;
    }
  }
  const stamp = item.timestamp
    .toISOString()
    .slice(0, 19)
    .replace(/[-:]/g, "")
    .replace("T", "-");
  return `clipboard-${stamp}${extension}`;
};

const payloadBytes = (item: ClipboardItem): Uint8Array | undefined => {
  switch (item.type) {
    case "Image":
      return item.data;
    case "RichText":
      return item.richText.rtf ?? Buffer.from(item.richText.plainText, "utf8");
    case "File":
      return undefined;
    default:
      return Buffer.from(item.text, "utf8");
  }
};

const toStorageError = (path: string, verb: string) => (error: unknown) =>
  new StorageError({
    operation: "write",
    path,
    message: `Failed to ${verb}: ${error instanceof Error ? error.message : String(error)}`,
    cause: error,
  });

const isDirectory = (path: string): Effect.Effect<boolean> =>
  Effect.promise(() =>
    stat(path).then(
      (stats) => stats.isDirectory(),
      () => false
    )
  );

// ============================================================================
// Layer
// ============================================================================

export const QuickActionsServiceLive = Layer.effect(
  QuickActionsService,
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const autoPaste = yield* AutoPasteService;

    const requireText = (id: string, operation: string) =>
      Effect.gen(function* () {
        const item = yield* engine.resolveItem(id);
        const text = textPayload(item);
        if (text === undefined || item.type === "File") {
          return yield* Effect.fail(
            new ClipboardItemUnsupportedTypeError({ itemType: item.type, operation })
          );
        }
        return text;
      });

    const publish = (text: string) =>
      autoPaste.setClipboardContent(makeTextItem(text)).pipe(Effect.as(text));

    return QuickActionsService.of({
      saveToFile: (id, target) =>
        Effect.gen(function* () {
          const item = yield* engine.resolveItem(id);
          const path = (yield* isDirectory(target)) ? join(target, suggestFileName(item)) : target;

          if (item.type === "File") {
            const source = item.filePath;
            yield* Effect.tryPromise({
              try: () => copyFile(source, path),
              catch: (error) =>
                new StorageError({
                  operation: "read",
                  path: source,
                  message: `Failed to copy file: ${error instanceof Error ? error.message : String(error)}`,
                  cause: error,
                }),
            });
            return path;
          }

          const bytes = payloadBytes(item);
          if (bytes === undefined) {
            return yield* Effect.fail(
              new ClipboardItemUnsupportedTypeError({ itemType: item.type, operation: "save" })
            );
          }
          yield* Effect.tryPromise({
            try: () => writeFile(path, bytes),
            catch: toStorageError(path, "save clipboard item"),
          });
          return path;
        }),

      copyAsBase64: (id) =>
        Effect.gen(function* () {
          const item = yield* engine.resolveItem(id);
          const text = item.type === "File" ? undefined : textPayload(item);
          const encoded =
            text !== undefined && text.trim().length > 0
              ? Buffer.from(text, "utf8").toString("base64")
              : item.type === "Image"
                ? Buffer.from(item.data).toString("base64")
                : undefined;
          if (encoded === undefined) {
            return yield* Effect.fail(
              new ClipboardItemUnsupportedTypeError({ itemType: item.type, operation: "encode" })
            );
          }
          return yield* publish(encoded);
        }),

      urlEncode: (id) =>
        Effect.gen(function* () {
          const text = yield* requireText(id, "URL-encode");
          return yield* publish(encodeURIComponent(text));
        }),

      urlDecode: (id) =>
        Effect.gen(function* () {
          const text = yield* requireText(id, "URL-decode");
          const decoded = yield* Effect.try({
            try: () => decodeURIComponent(text),
            catch: (error) =>
              new DataFormatInvalidError({ message: "Text is not valid URL-encoded data", cause: error }),
          });
          return yield* publish(decoded);
        }),

      editText: (id, text) =>
        Effect.gen(function* () {
          const item = yield* engine.resolveItem(id);
          if (!isTextItem(item) && item.type !== "RichText") {
            return yield* Effect.fail(
              new ClipboardItemUnsupportedTypeError({ itemType: item.type, operation: "edit" })
            );
          }

          const edited = makeTextItem(text, {
            type: isTextItem(item) ? item.type : "Text",
            sourceAppId: item.sourceAppId,
            sourceAppPath: item.sourceAppPath,
          });
          yield* engine.addClipboardItem(edited);
          yield* autoPaste.setClipboardContent(edited);
          return edited;
        }),
    });
  })
);
