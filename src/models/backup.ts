/**
 * Backup Domain Types
 */

import { Schema } from "@effect/schema";
import { ClipboardItemSchema } from "./clipboard-item";
import { PinnedClipboardItemSchema } from "./pinned-item";

export const BACKUP_VERSION = 1;

/**
 * Portable snapshot of history and pins. Byte fields are base64 in the
 * encoded form so the payload survives both JSON and YAML.
 */
export const BackupPayloadSchema = Schema.Struct({
  version: Schema.Literal(BACKUP_VERSION),
  exportedAt: Schema.DateFromString,
  history: Schema.Array(ClipboardItemSchema),
  pinned: Schema.Array(PinnedClipboardItemSchema),
});

export type BackupPayload = Schema.Schema.Type<typeof BackupPayloadSchema>;

export const BackupFormatSchema = Schema.Literal("json", "yaml");
export type BackupFormat = Schema.Schema.Type<typeof BackupFormatSchema>;
