/**
 * Command Argument Schemas
 *
 * Effect Schema definitions for validating CLI command arguments.
 * These schemas provide runtime validation at the CLI boundary,
 * ensuring commands receive properly typed and validated inputs.
 */

import { Schema } from "@effect/schema";
import { BackupFormatSchema } from "./backup";
import { TEXT_ITEM_TYPES } from "./clipboard-item";

// ============================================================================
// COMMON SCHEMAS
// ============================================================================

/**
 * Item reference - a full id or a unique prefix of one
 */
export const ItemRefSchema = Schema.String.pipe(
  Schema.minLength(1),
  Schema.maxLength(255),
  Schema.pattern(/^\S+$/, { message: () => "Item id cannot contain whitespace" })
);

export const ItemTypeFilterSchema = Schema.Literal(...TEXT_ITEM_TYPES, "Image", "File", "RichText");

const PositiveIntSchema = (max: number) =>
  Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(1), Schema.lessThanOrEqualTo(max));

/**
 * `name=value` pairs
 */
export const AssignmentsSchema = Schema.Record({ key: Schema.String, value: Schema.String });

// ============================================================================
// COMMAND SCHEMAS
// ============================================================================

/**
 * History command arguments
 */
export const HistoryCommandArgsSchema = Schema.Struct({
  limit: Schema.optional(PositiveIntSchema(500)),
  type: Schema.optional(ItemTypeFilterSchema),
  json: Schema.optional(Schema.Boolean),
});
export type HistoryCommandArgs = Schema.Schema.Type<typeof HistoryCommandArgsSchema>;

/**
 * Single-item command arguments (show, copy, select)
 */
export const ItemCommandArgsSchema = Schema.Struct({
  ref: ItemRefSchema,
});
export type ItemCommandArgs = Schema.Schema.Type<typeof ItemCommandArgsSchema>;

/**
 * Paste command arguments; without a ref the active item is pasted
 */
export const PasteCommandArgsSchema = Schema.Struct({
  ref: Schema.optional(ItemRefSchema),
});
export type PasteCommandArgs = Schema.Schema.Type<typeof PasteCommandArgsSchema>;

/**
 * Rm (delete) command arguments
 */
export const RmCommandArgsSchema = Schema.Struct({
  refs: Schema.Array(ItemRefSchema).pipe(Schema.minItems(1)),
});
export type RmCommandArgs = Schema.Schema.Type<typeof RmCommandArgsSchema>;

/**
 * Pin command arguments
 */
export const PinCommandArgsSchema = Schema.Struct({
  ref: ItemRefSchema,
  title: Schema.optional(Schema.String.pipe(Schema.maxLength(200))),
  toggle: Schema.optional(Schema.Boolean),
});
export type PinCommandArgs = Schema.Schema.Type<typeof PinCommandArgsSchema>;

/**
 * Export command arguments
 */
export const ExportCommandArgsSchema = Schema.Struct({
  format: Schema.optional(BackupFormatSchema),
  output: Schema.optional(Schema.String.pipe(Schema.minLength(1))),
});
export type ExportCommandArgs = Schema.Schema.Type<typeof ExportCommandArgsSchema>;

/**
 * Import command arguments
 */
export const ImportCommandArgsSchema = Schema.Struct({
  source: Schema.String.pipe(Schema.minLength(1)),
});
export type ImportCommandArgs = Schema.Schema.Type<typeof ImportCommandArgsSchema>;

/**
 * Snippet command arguments
 */
export const SnippetCommandArgsSchema = Schema.Union(
  Schema.Struct({ action: Schema.Literal("list") }),
  Schema.Struct({
    action: Schema.Literal("add"),
    title: Schema.String.pipe(Schema.minLength(1), Schema.maxLength(200)),
    content: Schema.String.pipe(Schema.minLength(1)),
    category: Schema.optional(Schema.String),
  }),
  Schema.Struct({ action: Schema.Literal("show", "rm"), ref: ItemRefSchema }),
  Schema.Struct({
    action: Schema.Literal("use"),
    ref: ItemRefSchema,
    values: AssignmentsSchema,
  })
);
export type SnippetCommandArgs = Schema.Schema.Type<typeof SnippetCommandArgsSchema>;

/**
 * Quick action command arguments
 */
export const QuickCommandArgsSchema = Schema.Union(
  Schema.Struct({
    action: Schema.Literal("base64", "url-encode", "url-decode"),
    ref: ItemRefSchema,
  }),
  Schema.Struct({
    action: Schema.Literal("save"),
    ref: ItemRefSchema,
    target: Schema.String.pipe(Schema.minLength(1)),
  }),
  Schema.Struct({
    action: Schema.Literal("edit"),
    ref: ItemRefSchema,
    text: Schema.String,
  })
);
export type QuickCommandArgs = Schema.Schema.Type<typeof QuickCommandArgsSchema>;

/**
 * Logs command arguments
 */
export const LogsCommandArgsSchema = Schema.Struct({
  lines: Schema.optional(PositiveIntSchema(10000)),
  clear: Schema.optional(Schema.Boolean),
  path: Schema.optional(Schema.Boolean),
});
export type LogsCommandArgs = Schema.Schema.Type<typeof LogsCommandArgsSchema>;
