/**
 * Test Fixtures
 *
 * Factory functions with deterministic ids and timestamps for clipboard
 * items, pins and snippets.
 */

import {
  makeFileItem,
  makeImageItem,
  makeRichTextItem,
  makeTextItem,
  type ClipboardItem,
  type FileClipboardItem,
  type ImageClipboardItem,
  type ItemOptions,
  type RichTextClipboardItem,
  type TextClipboardItem,
  type TextItemType,
} from "../../src/models/clipboard-item";
import { makePinnedItem, type PinnedClipboardItem } from "../../src/models/pinned-item";
import { makeSnippet, type Snippet } from "../../src/models/snippet";

// ============================================================================
// UUID Generation
// ============================================================================

let uuidCounter = 0;

/**
 * Generate a unique test UUID.
 * Uses a counter to ensure uniqueness across tests.
 */
export const testUuid = (): string => {
  uuidCounter++;
  const hex = uuidCounter.toString(16).padStart(8, "0");
  return `test${hex}-0000-0000-0000-000000000000`;
};

/**
 * Reset the UUID counter (call in beforeEach if needed).
 */
export const resetUuidCounter = (): void => {
  uuidCounter = 0;
};

// ============================================================================
// Date Helpers
// ============================================================================

/**
 * Fixed reference date for deterministic tests.
 */
export const FIXED_DATE = new Date("2025-01-01T12:00:00.000Z");

export const minutesAfter = (minutes: number, base: Date = FIXED_DATE): Date =>
  new Date(base.getTime() + minutes * 60_000);

// ============================================================================
// Item Fixtures
// ============================================================================

const withDefaults = (options: ItemOptions = {}): ItemOptions => ({
  id: options.id ?? testUuid(),
  timestamp: options.timestamp ?? FIXED_DATE,
  sourceAppId: options.sourceAppId,
  sourceAppPath: options.sourceAppPath,
});

export const createTextItem = (
  text: string,
  options: ItemOptions & { readonly type?: TextItemType } = {}
): TextClipboardItem => makeTextItem(text, { ...withDefaults(options), type: options.type });

/**
 * Image item whose payload is `size` bytes starting with the PNG signature
 */
export const createImageItem = (size = 16, options: ItemOptions = {}): ImageClipboardItem => {
  const data = new Uint8Array(size);
  data.set([0x89, 0x50, 0x4e, 0x47].slice(0, size));
  return makeImageItem(data, withDefaults(options));
};

export const createFileItem = (filePath: string, options: ItemOptions = {}): FileClipboardItem =>
  makeFileItem(filePath, withDefaults(options));

export const createRichTextItem = (
  plainText: string,
  options: ItemOptions & { readonly html?: string; readonly rtf?: string } = {}
): RichTextClipboardItem =>
  makeRichTextItem(
    {
      plainText,
      html: options.html === undefined ? undefined : new TextEncoder().encode(options.html),
      rtf: options.rtf === undefined ? undefined : new TextEncoder().encode(options.rtf),
    },
    withDefaults(options)
  );

/**
 * `count` text items, newest first, one minute apart
 */
export const createHistory = (count: number, prefix = "item"): ClipboardItem[] =>
  Array.from({ length: count }, (_, i) =>
    createTextItem(`${prefix} ${count - i}`, { timestamp: minutesAfter(count - i) })
  );

export const createPin = (
  item: ClipboardItem,
  options: { readonly customTitle?: string; readonly id?: string } = {}
): PinnedClipboardItem =>
  makePinnedItem(item, { id: options.id ?? testUuid(), pinnedAt: FIXED_DATE, customTitle: options.customTitle });

export const createSnippet = (
  overrides: { readonly title?: string; readonly content?: string; readonly category?: string; readonly id?: string } = {}
): Snippet =>
  makeSnippet({
    id: overrides.id ?? testUuid(),
    title: overrides.title ?? "Greeting",
    content: overrides.content ?? "Hello {name}",
    category: overrides.category,
    createdAt: FIXED_DATE,
  });
