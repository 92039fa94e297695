/**
 * Clipboard Item Model Tests
 */

import { describe, test, expect } from "vitest";
import { Schema } from "@effect/schema";
import {
  ClipboardItemSchema,
  displayString,
  isEquivalentContent,
  isTextItem,
  payloadSize,
  textPayload,
} from "../../src/models/clipboard-item";
import {
  FIXED_DATE,
  createFileItem,
  createImageItem,
  createRichTextItem,
  createTextItem,
} from "../utils";

describe("isEquivalentContent", () => {
  test("text compares ordinally and ignores id, time and source", () => {
    const left = createTextItem("hello", { sourceAppId: "editor" });
    const right = createTextItem("hello", { sourceAppId: "browser" });
    expect(isEquivalentContent(left, right)).toBe(true);
    expect(isEquivalentContent(left, createTextItem("Hello"))).toBe(false);
  });

  test("different types never match", () => {
    expect(isEquivalentContent(createTextItem("a.txt"), createFileItem("a.txt"))).toBe(false);
    expect(isEquivalentContent(createTextItem("x"), createTextItem("x", { type: "Code" }))).toBe(false);
  });

  test("file paths compare case-insensitively", () => {
    expect(
      isEquivalentContent(createFileItem("/Docs/Report.PDF"), createFileItem("/docs/report.pdf"))
    ).toBe(true);
  });

  test("images compare byte for byte", () => {
    expect(isEquivalentContent(createImageItem(8), createImageItem(8))).toBe(true);
    expect(isEquivalentContent(createImageItem(8), createImageItem(9))).toBe(false);
  });

  test("rich text compares its plain rendering", () => {
    const left = createRichTextItem("Title", { html: "<b>Title</b>" });
    const right = createRichTextItem("Title", { html: "<i>Title</i>" });
    expect(isEquivalentContent(left, right)).toBe(true);
  });
});

describe("displayString", () => {
  test("trims text and cuts at 100 characters", () => {
    expect(displayString(createTextItem("  padded  "))).toBe("padded");
    expect(displayString(createTextItem("x".repeat(150)))).toBe("x".repeat(100));
  });

  test("blank text is flagged", () => {
    expect(displayString(createTextItem("   "))).toBe("Invalid Text");
  });

  test("files show their base name", () => {
    expect(displayString(createFileItem("/home/me/notes.md"))).toBe("notes.md");
    expect(displayString(createFileItem("C:\\Users\\me\\report.docx"))).toBe("report.docx");
    expect(displayString(createFileItem("/"))).toBe("File");
  });

  test("images and rich text", () => {
    expect(displayString(createImageItem())).toBe("Image");
    expect(displayString(createRichTextItem(" Heading "))).toBe("Heading");
  });
});

describe("payloads", () => {
  test("textPayload per type", () => {
    expect(textPayload(createTextItem("abc"))).toBe("abc");
    expect(textPayload(createFileItem("/a/b"))).toBe("/a/b");
    expect(textPayload(createRichTextItem("plain"))).toBe("plain");
    expect(textPayload(createImageItem())).toBeUndefined();
  });

  test("payloadSize counts UTF-8 bytes and rich text flavors", () => {
    expect(payloadSize(createTextItem("héllo"))).toBe(6);
    expect(payloadSize(createImageItem(32))).toBe(32);
    expect(payloadSize(createRichTextItem("ab", { html: "<p>ab</p>" }))).toBe(11);
  });

  test("isTextItem covers the text family only", () => {
    expect(isTextItem(createTextItem("#fff", { type: "Color" }))).toBe(true);
    expect(isTextItem(createFileItem("/x"))).toBe(false);
  });
});

describe("ClipboardItemSchema", () => {
  test("image bytes encode as base64 and decode back", () => {
    const item = createImageItem(4, { id: "img-1" });
    const encoded = Schema.encodeSync(ClipboardItemSchema)(item);

    expect(encoded).toEqual({
      id: "img-1",
      timestamp: FIXED_DATE.toISOString(),
      type: "Image",
      data: "iVBORw==",
    });
    const decoded = Schema.decodeUnknownSync(ClipboardItemSchema)(encoded);
    expect(decoded.type).toBe("Image");
    expect(isEquivalentContent(decoded, item)).toBe(true);
  });

  test("rejects an unknown type", () => {
    expect(() =>
      Schema.decodeUnknownSync(ClipboardItemSchema)({
        id: "x",
        timestamp: FIXED_DATE.toISOString(),
        type: "Video",
        text: "clip",
      })
    ).toThrow();
  });
});
