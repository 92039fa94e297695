/**
 * Error Codes
 *
 * Numeric codes carried by every tagged error. Codes are grouped in bands so
 * callers can tell a user mistake from an I/O problem without matching tags:
 *
 *   0-99        generic
 *   1000-1499   domain (invalid items, limits, settings)
 *   2000-2399   application (lifecycle, persistence, runtime)
 *   3000-3499   infrastructure (storage, serialization, encryption, platform)
 */

export const ErrorCode = {
  // Generic
  UnknownError: 0,
  ValidationFailed: 1,
  OperationCanceled: 7,

  // Domain
  ClipboardItemInvalid: 1000,
  ClipboardItemUnsupportedType: 1001,
  ClipboardImageTooLarge: 1002,
  ClipboardHistoryItemNotFound: 1003,
  PinnedItemDuplicate: 1100,
  PinnedItemNotFound: 1101,
  PinnedItemsLimitExceeded: 1102,
  SnippetNotFound: 1200,
  SnippetsLimitExceeded: 1201,
  SettingsRangeInvalid: 1300,
  SettingsShortcutInvalid: 1301,

  // Application
  StateInitializationFailed: 2000,
  StateNotInitialized: 2001,
  StatePersistenceFailed: 2002,
  ClipboardMonitorStartFailed: 2100,
  ClipboardMonitorStopFailed: 2101,
  RuntimeStartFailed: 2200,
  AutoPasteFailed: 2300,

  // Infrastructure
  StorageReadFailed: 3000,
  StorageWriteFailed: 3001,
  StorageDeleteFailed: 3002,
  StorageAccessDenied: 3003,
  StoragePathUnavailable: 3004,
  StorageQuotaExceeded: 3005,
  SerializationFailed: 3100,
  DeserializationFailed: 3101,
  DataFormatInvalid: 3102,
  PlatformCommandFailed: 3200,
  EncryptionFailed: 3300,
  EncryptedPayloadInvalid: 3301,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorBand = "generic" | "domain" | "application" | "infrastructure" | "unknown";

export const errorBand = (code: number): ErrorBand => {
  if (code >= 0 && code < 100) return "generic";
  if (code >= 1000 && code < 1500) return "domain";
  if (code >= 2000 && code < 2400) return "application";
  if (code >= 3000 && code < 3500) return "infrastructure";
  return "unknown";
};
