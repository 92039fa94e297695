/**
 * Error Types
 *
 * Every failure the engine and its services can report. Each error carries a
 * numeric `code` from {@link ErrorCode}.
 */

import { Data } from "effect";
import { ErrorCode } from "./error-codes";

// ============================================================================
// Domain
// ============================================================================

/**
 * A clipboard item failed shape validation (empty payload, bad id)
 */
export class ClipboardItemInvalidError extends Data.TaggedError("ClipboardItemInvalidError")<{
  message: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.ClipboardItemInvalid;
  }
}

/**
 * The requested operation does not apply to this kind of item
 */
export class ClipboardItemUnsupportedTypeError extends Data.TaggedError(
  "ClipboardItemUnsupportedTypeError"
)<{
  itemType: string;
  operation: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.ClipboardItemUnsupportedType;
  }
}

export class ClipboardImageTooLargeError extends Data.TaggedError("ClipboardImageTooLargeError")<{
  size: number;
  maxSize: number;
}> {
  get code(): ErrorCode {
    return ErrorCode.ClipboardImageTooLarge;
  }
}

export class ClipboardHistoryItemNotFoundError extends Data.TaggedError(
  "ClipboardHistoryItemNotFoundError"
)<{
  id: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.ClipboardHistoryItemNotFound;
  }
}

/**
 * An equivalent item is already pinned
 */
export class PinnedItemDuplicateError extends Data.TaggedError("PinnedItemDuplicateError")<{
  itemId: string;
  existingPinId: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.PinnedItemDuplicate;
  }
}

export class PinnedItemNotFoundError extends Data.TaggedError("PinnedItemNotFoundError")<{
  id: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.PinnedItemNotFound;
  }
}

export class PinnedItemsLimitExceededError extends Data.TaggedError(
  "PinnedItemsLimitExceededError"
)<{
  limit: number;
}> {
  get code(): ErrorCode {
    return ErrorCode.PinnedItemsLimitExceeded;
  }
}

export class SnippetNotFoundError extends Data.TaggedError("SnippetNotFoundError")<{
  id: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.SnippetNotFound;
  }
}

export class SnippetsLimitExceededError extends Data.TaggedError("SnippetsLimitExceededError")<{
  limit: number;
}> {
  get code(): ErrorCode {
    return ErrorCode.SnippetsLimitExceeded;
  }
}

/**
 * A numeric or enumerated setting is outside its accepted range
 */
export class SettingsRangeInvalidError extends Data.TaggedError("SettingsRangeInvalidError")<{
  field: string;
  message: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.SettingsRangeInvalid;
  }
}

export class SettingsShortcutInvalidError extends Data.TaggedError(
  "SettingsShortcutInvalidError"
)<{
  message: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.SettingsShortcutInvalid;
  }
}

// ============================================================================
// Application
// ============================================================================

export class StateInitializationFailedError extends Data.TaggedError(
  "StateInitializationFailedError"
)<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.StateInitializationFailed;
  }
}

/**
 * A mutation arrived before `initialize` completed
 */
export class StateNotInitializedError extends Data.TaggedError("StateNotInitializedError")<{
  operation: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.StateNotInitialized;
  }
}

export class StatePersistenceFailedError extends Data.TaggedError("StatePersistenceFailedError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.StatePersistenceFailed;
  }
}

export class ClipboardMonitorStartFailedError extends Data.TaggedError(
  "ClipboardMonitorStartFailedError"
)<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.ClipboardMonitorStartFailed;
  }
}

export class ClipboardMonitorStopFailedError extends Data.TaggedError(
  "ClipboardMonitorStopFailedError"
)<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.ClipboardMonitorStopFailed;
  }
}

export class RuntimeStartFailedError extends Data.TaggedError("RuntimeStartFailedError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.RuntimeStartFailed;
  }
}

export class AutoPasteFailedError extends Data.TaggedError("AutoPasteFailedError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.AutoPasteFailed;
  }
}

// ============================================================================
// Infrastructure
// ============================================================================

export type StorageOperation = "read" | "write" | "delete" | "access" | "path";

/**
 * Base error for storage-related failures
 */
export class StorageError extends Data.TaggedError("StorageError")<{
  operation: StorageOperation;
  path: string;
  message: string;
  errno?: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    switch (this.errno) {
      case "EACCES":
      case "EPERM":
      case "EROFS":
        return ErrorCode.StorageAccessDenied;
      case "ENOSPC":
      case "EDQUOT":
        return ErrorCode.StorageQuotaExceeded;
      case "ENOTDIR":
      case "ENAMETOOLONG":
        return ErrorCode.StoragePathUnavailable;
    }
    switch (this.operation) {
      case "read":
        return ErrorCode.StorageReadFailed;
      case "write":
        return ErrorCode.StorageWriteFailed;
      case "delete":
        return ErrorCode.StorageDeleteFailed;
      case "access":
        return ErrorCode.StorageAccessDenied;
      case "path":
        return ErrorCode.StoragePathUnavailable;
    }
  }
}

export class SerializationError extends Data.TaggedError("SerializationError")<{
  direction: "encode" | "decode";
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return this.direction === "encode"
      ? ErrorCode.SerializationFailed
      : ErrorCode.DeserializationFailed;
  }
}

/**
 * Imported data has the wrong shape or an unsupported version
 */
export class DataFormatInvalidError extends Data.TaggedError("DataFormatInvalidError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.DataFormatInvalid;
  }
}

export class EncryptionError extends Data.TaggedError("EncryptionError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.EncryptionFailed;
  }
}

export class EncryptedPayloadInvalidError extends Data.TaggedError(
  "EncryptedPayloadInvalidError"
)<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.EncryptedPayloadInvalid;
  }
}

/**
 * Error for clipboard operations
 */
export class ClipboardError extends Data.TaggedError("ClipboardError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.PlatformCommandFailed;
  }
}

// ============================================================================
// Generic
// ============================================================================

/**
 * Error for validation failures
 */
export class ValidationError extends Data.TaggedError("ValidationError")<{
  field: string;
  message: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.ValidationFailed;
  }
}

export class OperationCancelledError extends Data.TaggedError("OperationCancelledError")<{
  operation?: string;
}> {
  get code(): ErrorCode {
    return ErrorCode.OperationCanceled;
  }
}

export class UnexpectedError extends Data.TaggedError("UnexpectedError")<{
  message: string;
  cause?: unknown;
}> {
  get code(): ErrorCode {
    return ErrorCode.UnknownError;
  }
}

// ============================================================================
// Union + Formatting
// ============================================================================

export type ClipvaultError =
  | ClipboardItemInvalidError
  | ClipboardItemUnsupportedTypeError
  | ClipboardImageTooLargeError
  | ClipboardHistoryItemNotFoundError
  | PinnedItemDuplicateError
  | PinnedItemNotFoundError
  | PinnedItemsLimitExceededError
  | SnippetNotFoundError
  | SnippetsLimitExceededError
  | SettingsRangeInvalidError
  | SettingsShortcutInvalidError
  | StateInitializationFailedError
  | StateNotInitializedError
  | StatePersistenceFailedError
  | ClipboardMonitorStartFailedError
  | ClipboardMonitorStopFailedError
  | RuntimeStartFailedError
  | AutoPasteFailedError
  | StorageError
  | SerializationError
  | DataFormatInvalidError
  | EncryptionError
  | EncryptedPayloadInvalidError
  | ClipboardError
  | ValidationError
  | OperationCancelledError
  | UnexpectedError;

/**
 * Human-readable one-line description used by the CLI
 */
export const describeError = (error: ClipvaultError): string => {
  switch (error._tag) {
    case "ClipboardItemUnsupportedTypeError":
      return `Cannot ${error.operation} a ${error.itemType} item`;
    case "ClipboardImageTooLargeError":
      return `Image is ${error.size} bytes; the limit is ${error.maxSize} bytes`;
    case "ClipboardHistoryItemNotFoundError":
      return `Clipboard item not found: ${error.id}`;
    case "PinnedItemDuplicateError":
      return `Item ${error.itemId} is already pinned as ${error.existingPinId}`;
    case "PinnedItemNotFoundError":
      return `Pinned item not found: ${error.id}`;
    case "PinnedItemsLimitExceededError":
      return `Cannot pin more than ${error.limit} items`;
    case "SnippetNotFoundError":
      return `Snippet not found: ${error.id}`;
    case "SnippetsLimitExceededError":
      return `Cannot store more than ${error.limit} snippets`;
    case "SettingsRangeInvalidError":
      return `${error.field}: ${error.message}`;
    case "StateNotInitializedError":
      return `Cannot ${error.operation} before the clipboard state is initialized`;
    case "StorageError":
      return `${error.message} (${error.path})`;
    case "ValidationError":
      return error.message;
    case "OperationCancelledError":
      return error.operation ? `Cancelled: ${error.operation}` : "Cancelled";
    default:
      return error.message;
  }
};
