/**
 * Services Index - Central export for all services
 */

import { Layer } from "effect";
import { AutoPasteServiceLive } from "./auto-paste-service";
import { BackupServiceLive } from "./backup-service";
import { ClipboardEngineLive } from "./clipboard-engine";
import { PollingClipboardMonitorLive } from "./clipboard-monitor";
import { ClipboardLive } from "./clipboard-service";
import { EncryptionServiceLive } from "./encryption-service";
import { HistoryRepositoryLive } from "./history-repository";
import { LoggerServiceLive } from "./logger-service";
import { PinnedRepositoryLive } from "./pinned-repository";
import { QuickActionsServiceLive } from "./quick-actions-service";
import { SettingsRepositoryLive } from "./settings-repository";
import { SnippetRepositoryLive } from "./snippet-repository";
import { StoragePathsLive, storagePathsAt } from "./storage-paths";

// Storage
export {
  StoragePaths,
  StoragePathsLive,
  makeStoragePaths,
  resolveStorageRoot,
  storagePathsAt,
  type StoragePathsImpl,
} from "./storage-paths";
export { ensureDirectory, readBytes, removeFile, writeAtomic } from "./file-store";
export { decodeJson, encodeJson } from "./json-file";
export {
  EncryptionService,
  EncryptionServiceLive,
  loadOrCreateKey,
  makeEncryptionService,
} from "./encryption-service";

// Repositories
export {
  HistoryRepository,
  HistoryRepositoryLive,
  persistableHistory,
  type HistoryLoadError,
  type HistorySaveError,
} from "./history-repository";
export { PinnedRepository, PinnedRepositoryLive } from "./pinned-repository";
export { SnippetRepository, SnippetRepositoryLive } from "./snippet-repository";
export { SettingsRepository, SettingsRepositoryLive } from "./settings-repository";

// Logging
export {
  LoggerService,
  LoggerServiceLive,
  LoggerServiceMemory,
  formatEntry,
  makeLoggerService,
  makeMemoryLoggerService,
  type LogEntry,
  type LogLevel,
  type LoggerServiceImpl,
} from "./logger-service";

// Platform
export { Clipboard, ClipboardLive, type ClipboardService } from "./clipboard-service";
export {
  ClipboardMonitor,
  PollingClipboardMonitorLive,
  POLL_INTERVAL,
  type CaptureError,
  type CaptureHandler,
  type CaptureOutcome,
} from "./clipboard-monitor";
export { AutoPasteService, AutoPasteServiceLive } from "./auto-paste-service";

// Engine and facades
export {
  ClipboardEngine,
  ClipboardEngineLive,
  type Aggregate,
  type EngineSnapshot,
  type InitializationReport,
  type LoadWarning,
  type PinError,
  type SelectionError,
  type SettingsError,
  type TogglePinError,
} from "./clipboard-engine";
export {
  BackupService,
  BackupServiceLive,
  parseBackup,
  type BackupExportOptions,
  type BackupImportResult,
} from "./backup-service";
export {
  QuickActionsService,
  QuickActionsServiceLive,
  suggestFileName,
  type TransformError,
} from "./quick-actions-service";

/**
 * Full application layer. `root` overrides the storage root resolved from
 * `$CLIPVAULT_HOME`.
 */
export const makeAppLayer = (root?: string) => {
  const PathsLive = root === undefined ? StoragePathsLive : storagePathsAt(root);

  // Logging and encryption need only the storage paths
  const BaseLive = Layer.mergeAll(LoggerServiceLive, EncryptionServiceLive).pipe(
    Layer.provideMerge(PathsLive)
  );

  const PlatformLive = Layer.mergeAll(PollingClipboardMonitorLive, AutoPasteServiceLive).pipe(
    Layer.provideMerge(ClipboardLive)
  );

  const RepositoriesLive = Layer.mergeAll(
    HistoryRepositoryLive,
    PinnedRepositoryLive,
    SnippetRepositoryLive,
    SettingsRepositoryLive
  );

  const EngineLive = ClipboardEngineLive.pipe(
    Layer.provideMerge(Layer.merge(RepositoriesLive, PlatformLive))
  );

  const FacadesLive = Layer.mergeAll(BackupServiceLive, QuickActionsServiceLive).pipe(
    Layer.provideMerge(EngineLive)
  );

  return FacadesLive.pipe(Layer.provideMerge(BaseLive));
};

export const MainLive = makeAppLayer();

/**
 * Type helper for the full service context
 */
export type AppServices = Layer.Layer.Success<typeof MainLive>;
