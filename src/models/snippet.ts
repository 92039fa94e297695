/**
 * Snippet Domain Types
 *
 * Reusable text templates with `{name}` placeholders.
 */

import { Schema } from "@effect/schema";
import { randomUUID } from "node:crypto";

export const SnippetSchema = Schema.Struct({
  id: Schema.String.pipe(Schema.minLength(1)),
  title: Schema.String,
  content: Schema.String,
  category: Schema.optionalWith(Schema.String, { default: () => "" }),
  createdAt: Schema.DateFromString,
  lastUsedAt: Schema.optional(Schema.DateFromString),
});

export type Snippet = Schema.Schema.Type<typeof SnippetSchema>;

export const makeSnippet = (input: {
  readonly title: string;
  readonly content: string;
  readonly category?: string;
  readonly id?: string;
  readonly createdAt?: Date;
}): Snippet => ({
  id: input.id ?? randomUUID(),
  title: input.title,
  content: input.content,
  category: input.category ?? "",
  createdAt: input.createdAt ?? new Date(),
  lastUsedAt: undefined,
});

const PLACEHOLDER_PATTERN = /\{([^}]+)\}/g;

/**
 * Placeholder names in order of first appearance, without duplicates
 */
export const getPlaceholders = (content: string): ReadonlyArray<string> => {
  const names: string[] = [];
  for (const match of content.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
};

/**
 * Replace every `{name}` with its value. Placeholders without a value are left
 * as written.
 */
export const resolveSnippet = (
  content: string,
  values: Readonly<Record<string, string>>
): string => {
  let output = content;
  for (const [name, value] of Object.entries(values)) {
    output = output.split(`{${name}}`).join(value);
  }
  return output;
};
