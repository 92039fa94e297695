/**
 * Snippet and Pinned Item Model Tests
 */

import { describe, test, expect } from "vitest";
import { Schema } from "@effect/schema";
import { SnippetSchema, getPlaceholders, resolveSnippet } from "../../src/models/snippet";
import {
  displayTitle,
  makePinnedItem,
  matchesPinId,
  normalizeTitle,
} from "../../src/models/pinned-item";
import { FIXED_DATE, createPin, createTextItem } from "../utils";

describe("snippets", () => {
  test("placeholders in order of first appearance", () => {
    expect(getPlaceholders("Hi {name}, your {item} ships to {name} on {date}")).toEqual([
      "name",
      "item",
      "date",
    ]);
    expect(getPlaceholders("no placeholders")).toEqual([]);
  });

  test("a placeholder runs from its opening brace to the first closing one", () => {
    expect(getPlaceholders("{a{b} then {c}")).toEqual(["a{b", "c"]);
  });

  test("resolve replaces every occurrence and leaves unknown names", () => {
    expect(resolveSnippet("{a} and {a} but {b}", { a: "x" })).toBe("x and x but {b}");
  });

  test("values are inserted literally", () => {
    expect(resolveSnippet("cost: {price}", { price: "$5 {sale}" })).toBe("cost: $5 {sale}");
  });

  test("category defaults to empty when missing from storage", () => {
    const snippet = Schema.decodeUnknownSync(SnippetSchema)({
      id: "s1",
      title: "T",
      content: "C",
      createdAt: FIXED_DATE.toISOString(),
    });
    expect(snippet.category).toBe("");
    expect(snippet.lastUsedAt).toBeUndefined();
  });
});

describe("pinned items", () => {
  test("blank titles normalize to no title", () => {
    expect(normalizeTitle("   ")).toBeUndefined();
    expect(normalizeTitle(" Home ")).toBe("Home");
    expect(makePinnedItem(createTextItem("x"), { customTitle: "" }).customTitle).toBeUndefined();
  });

  test("display title falls back to the item's display string", () => {
    const item = createTextItem("  42 Main Street  ");
    expect(displayTitle(createPin(item))).toBe("42 Main Street");
    expect(displayTitle(createPin(item, { customTitle: "Address" }))).toBe("Address");
  });

  test("a pin matches its own id and its snapshot's id", () => {
    const pin = createPin(createTextItem("x", { id: "item-1" }), { id: "pin-1" });
    expect(matchesPinId(pin, "pin-1")).toBe(true);
    expect(matchesPinId(pin, "item-1")).toBe(true);
    expect(matchesPinId(pin, "other")).toBe(false);
  });
});
