/**
 * Clipboard Item Domain Types
 *
 * A captured clipboard entry. Items are a tagged union on `type`: the text
 * family shares a `text` payload, images carry raw bytes, files carry a path
 * and rich text carries its plain-text rendering plus optional RTF/HTML.
 */

import { Schema } from "@effect/schema";
import { randomUUID } from "node:crypto";

// ============================================================================
// Schemas
// ============================================================================

export const TEXT_ITEM_TYPES = ["Text", "Color", "Code", "Url", "Email", "Phone", "Json"] as const;

export const TextItemTypeSchema = Schema.Literal(...TEXT_ITEM_TYPES);
export type TextItemType = Schema.Schema.Type<typeof TextItemTypeSchema>;

const ItemFields = {
  id: Schema.String.pipe(Schema.minLength(1)),
  timestamp: Schema.DateFromString,
  sourceAppId: Schema.optional(Schema.String),
  sourceAppPath: Schema.optional(Schema.String),
};

export const TextClipboardItemSchema = Schema.Struct({
  ...ItemFields,
  type: TextItemTypeSchema,
  text: Schema.String,
});

export const ImageClipboardItemSchema = Schema.Struct({
  ...ItemFields,
  type: Schema.Literal("Image"),
  data: Schema.Uint8ArrayFromBase64,
});

export const FileClipboardItemSchema = Schema.Struct({
  ...ItemFields,
  type: Schema.Literal("File"),
  filePath: Schema.String,
});

export const RichTextContentSchema = Schema.Struct({
  plainText: Schema.String,
  rtf: Schema.optional(Schema.Uint8ArrayFromBase64),
  html: Schema.optional(Schema.Uint8ArrayFromBase64),
});

export const RichTextClipboardItemSchema = Schema.Struct({
  ...ItemFields,
  type: Schema.Literal("RichText"),
  richText: RichTextContentSchema,
});

export const ClipboardItemSchema = Schema.Union(
  TextClipboardItemSchema,
  ImageClipboardItemSchema,
  FileClipboardItemSchema,
  RichTextClipboardItemSchema
);

export type TextClipboardItem = Schema.Schema.Type<typeof TextClipboardItemSchema>;
export type ImageClipboardItem = Schema.Schema.Type<typeof ImageClipboardItemSchema>;
export type FileClipboardItem = Schema.Schema.Type<typeof FileClipboardItemSchema>;
export type RichTextContent = Schema.Schema.Type<typeof RichTextContentSchema>;
export type RichTextClipboardItem = Schema.Schema.Type<typeof RichTextClipboardItemSchema>;
export type ClipboardItem = Schema.Schema.Type<typeof ClipboardItemSchema>;
export type ClipboardItemType = ClipboardItem["type"];

// ============================================================================
// Constructors
// ============================================================================

export interface ItemOptions {
  readonly id?: string;
  readonly timestamp?: Date;
  readonly sourceAppId?: string;
  readonly sourceAppPath?: string;
}

const baseFields = (options: ItemOptions) => ({
  id: options.id ?? randomUUID(),
  timestamp: options.timestamp ?? new Date(),
  sourceAppId: options.sourceAppId,
  sourceAppPath: options.sourceAppPath,
});

export const makeTextItem = (
  text: string,
  options: ItemOptions & { readonly type?: TextItemType } = {}
): TextClipboardItem => ({
  ...baseFields(options),
  type: options.type ?? "Text",
  text,
});

export const makeImageItem = (data: Uint8Array, options: ItemOptions = {}): ImageClipboardItem => ({
  ...baseFields(options),
  type: "Image",
  data,
});

export const makeFileItem = (filePath: string, options: ItemOptions = {}): FileClipboardItem => ({
  ...baseFields(options),
  type: "File",
  filePath,
});

export const makeRichTextItem = (
  richText: RichTextContent,
  options: ItemOptions = {}
): RichTextClipboardItem => ({
  ...baseFields(options),
  type: "RichText",
  richText,
});

// ============================================================================
// Helpers
// ============================================================================

export const isTextItem = (item: ClipboardItem): item is TextClipboardItem =>
  item.type !== "Image" && item.type !== "File" && item.type !== "RichText";

const bytesEqual = (left: Uint8Array | undefined, right: Uint8Array | undefined): boolean => {
  if (left === right) return true;
  if (left === undefined || right === undefined) return false;
  if (left.byteLength !== right.byteLength) return false;
  for (let i = 0; i < left.byteLength; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
};

/**
 * Content equivalence used for head-only dedup and duplicate pins.
 *
 * Ids, timestamps and sources are ignored. Text compares ordinally, binary
 * payloads byte for byte, file paths case-insensitively and rich text by its
 * plain-text rendering.
 */
export const isEquivalentContent = (left: ClipboardItem, right: ClipboardItem): boolean => {
  if (left.type !== right.type) return false;

  if (isTextItem(left)) {
    return isTextItem(right) && left.text === right.text;
  }

  switch (left.type) {
    case "Image":
      return right.type === "Image" && bytesEqual(left.data, right.data);
    case "File":
      return right.type === "File" && left.filePath.toLowerCase() === right.filePath.toLowerCase();
    case "RichText":
      return right.type === "RichText" && left.richText.plainText === right.richText.plainText;
  }
};

/**
 * Text representation of an item, if it has one
 */
export const textPayload = (item: ClipboardItem): string | undefined => {
  if (isTextItem(item)) return item.text;
  switch (item.type) {
    case "RichText":
      return item.richText.plainText;
    case "File":
      return item.filePath;
    case "Image":
      return undefined;
  }
};

const DISPLAY_LENGTH = 100;

const trimForDisplay = (text: string): string => {
  const trimmed = text.trim();
  return trimmed.length > DISPLAY_LENGTH ? trimmed.slice(0, DISPLAY_LENGTH) : trimmed;
};

const baseName = (filePath: string): string => {
  const segments = filePath.split(/[\\/]/).filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? "";
};

export const displayString = (item: ClipboardItem): string => {
  if (isTextItem(item)) {
    const text = trimForDisplay(item.text);
    return text.length > 0 ? text : "Invalid Text";
  }
  switch (item.type) {
    case "Image":
      return "Image";
    case "File":
      return baseName(item.filePath) || "File";
    case "RichText":
      return trimForDisplay(item.richText.plainText);
  }
};

/**
 * Size of the item's payload in bytes (text measured as UTF-8)
 */
export const payloadSize = (item: ClipboardItem): number => {
  if (item.type === "Image") return item.data.byteLength;
  if (item.type === "RichText") {
    return (
      Buffer.byteLength(item.richText.plainText, "utf8") +
      (item.richText.rtf?.byteLength ?? 0) +
      (item.richText.html?.byteLength ?? 0)
    );
  }
  return Buffer.byteLength(textPayload(item) ?? "", "utf8");
};
