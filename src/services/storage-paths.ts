/**
 * Storage Paths - Where clipvault keeps its files
 *
 * Everything lives under one root: `$CLIPVAULT_HOME` when set, otherwise
 * `~/.clipvault`.
 */

import { Context, Layer } from "effect";
import { homedir } from "node:os";
import { join } from "node:path";

export interface StoragePathsImpl {
  readonly root: string;
  readonly historyFile: string;
  readonly encryptedHistoryFile: string;
  readonly pinnedFile: string;
  readonly snippetsFile: string;
  readonly settingsFile: string;
  readonly encryptionKeyFile: string;
  readonly logFile: string;
  readonly envFile: string;
}

export class StoragePaths extends Context.Tag("StoragePaths")<StoragePaths, StoragePathsImpl>() {}

export const resolveStorageRoot = (): string => {
  const fromEnv = process.env.CLIPVAULT_HOME?.trim();
  return fromEnv ? fromEnv : join(homedir(), ".clipvault");
};

export const makeStoragePaths = (root: string): StoragePathsImpl => ({
  root,
  historyFile: join(root, "clipboard-history.json"),
  encryptedHistoryFile: join(root, "clipboard-history.enc"),
  pinnedFile: join(root, "pinned-items.json"),
  snippetsFile: join(root, "snippets.json"),
  settingsFile: join(root, "settings.json"),
  encryptionKeyFile: join(root, "history.key"),
  logFile: join(root, "debug.log"),
  envFile: join(root, ".env"),
});

/**
 * Resolved when the layer is built, so `.env` must be loaded before then
 */
export const StoragePathsLive = Layer.sync(StoragePaths, () => makeStoragePaths(resolveStorageRoot()));

export const storagePathsAt = (root: string) => Layer.succeed(StoragePaths, makeStoragePaths(root));
