/**
 * Clipboard Engine - Owns clipboard history, pins, snippets and settings
 *
 * The engine is the single writer of clipboard state. Mutations are
 * serialized by one semaphore; each one computes its next state off to the
 * side and commits it with a single uninterruptible `SubscriptionRef` set, so
 * readers never observe a half-applied change and an interrupted mutation
 * leaves state untouched.
 *
 * Persistence of captures, deletes, pins and snippets is asynchronous: a
 * commit marks the affected aggregates dirty and signals a background fiber,
 * which coalesces bursts through a sliding single-slot queue. Clearing
 * history, saving settings and replacing state from a backup write through
 * synchronously. A second semaphore serializes every durable write. If such a
 * mutation is interrupted after its write started, memory keeps the old state
 * and the written aggregates are marked dirty, so the background fiber (or
 * `flush`) puts the stored copy back in line with memory.
 */

import { Context, Effect, Either, Layer, Queue, Ref, Stream, SubscriptionRef } from "effect";
import {
  isEquivalentContent,
  type ClipboardItem,
} from "../models/clipboard-item";
import {
  ClipboardHistoryItemNotFoundError,
  ClipboardImageTooLargeError,
  PinnedItemDuplicateError,
  PinnedItemNotFoundError,
  PinnedItemsLimitExceededError,
  RuntimeStartFailedError,
  SnippetNotFoundError,
  SnippetsLimitExceededError,
  StateInitializationFailedError,
  StateNotInitializedError,
  StatePersistenceFailedError,
  type AutoPasteFailedError,
  type ClipboardItemUnsupportedTypeError,
  type ClipboardMonitorStopFailedError,
  type SerializationError,
  type SettingsRangeInvalidError,
  type SettingsShortcutInvalidError,
  type StorageError,
} from "../models/errors";
import { DomainLimits } from "../models/limits";
import {
  makePinnedItem,
  matchesPinId,
  normalizeTitle,
  type PinnedClipboardItem,
} from "../models/pinned-item";
import {
  DEFAULT_SETTINGS,
  effectiveHistoryLimit,
  isExcludedSource,
  validateSettings,
  type Settings,
} from "../models/settings";
import { resolveSnippet, type Snippet } from "../models/snippet";
import { AutoPasteService } from "./auto-paste-service";
import {
  ClipboardMonitor,
  type CaptureError,
  type CaptureOutcome,
} from "./clipboard-monitor";
import { ensureDirectory } from "./file-store";
import {
  HistoryRepository,
  type HistoryLoadError,
  type HistorySaveError,
} from "./history-repository";
import { LoggerService } from "./logger-service";
import { PinnedRepository } from "./pinned-repository";
import { SettingsRepository } from "./settings-repository";
import { SnippetRepository } from "./snippet-repository";
import { StoragePaths } from "./storage-paths";

// ============================================================================
// Types
// ============================================================================

export interface EngineSnapshot {
  /** Most recent first */
  readonly history: ReadonlyArray<ClipboardItem>;
  readonly pinned: ReadonlyArray<PinnedClipboardItem>;
  readonly snippets: ReadonlyArray<Snippet>;
  readonly settings: Settings;
  readonly activeItemId: string | null;
  /** Incremented on every commit */
  readonly generation: number;
  readonly initialized: boolean;
}

export type Aggregate = "history" | "pinned" | "snippets";

export interface LoadWarning {
  readonly aggregate: Aggregate;
  readonly message: string;
  readonly code: number;
}

export interface InitializationReport {
  readonly historyCount: number;
  readonly pinnedCount: number;
  readonly snippetCount: number;
  readonly warnings: ReadonlyArray<LoadWarning>;
}

/** Everything the engine writes to disk */
type StoredAggregate = Aggregate | "settings";

type DirtyMarks = Readonly<Record<StoredAggregate, boolean>>;

const AGGREGATES: ReadonlyArray<StoredAggregate> = ["history", "pinned", "snippets", "settings"];

const CLEAN: DirtyMarks = { history: false, pinned: false, snippets: false, settings: false };

const withDirty = (
  marks: DirtyMarks,
  aggregates: ReadonlyArray<StoredAggregate>
): DirtyMarks => ({
  history: marks.history || aggregates.includes("history"),
  pinned: marks.pinned || aggregates.includes("pinned"),
  snippets: marks.snippets || aggregates.includes("snippets"),
  settings: marks.settings || aggregates.includes("settings"),
});

const INITIAL_SNAPSHOT: EngineSnapshot = {
  history: [],
  pinned: [],
  snippets: [],
  settings: DEFAULT_SETTINGS,
  activeItemId: null,
  generation: 0,
  initialized: false,
};

/**
 * What a planned mutation produces: its result, and the next state if it
 * changes anything
 */
interface Transition<A, E = never> {
  readonly result: A;
  readonly next?: EngineSnapshot;
  readonly dirty?: ReadonlyArray<StoredAggregate>;
  /**
   * Durable write that must land before `next` is committed. If the caller
   * is interrupted once it has started, `next` is dropped and the aggregates
   * it touches are marked dirty so the stored copy is rewritten from memory.
   */
  readonly writeThrough?: {
    readonly write: Effect.Effect<void, E>;
    readonly touches: ReadonlyArray<StoredAggregate>;
  };
}

type PersistenceError = StorageError | SerializationError | HistoryLoadError;

type Plan<A, E, W = never> = Effect.Effect<Transition<A, W>, E>;

export type SettingsError =
  | SettingsRangeInvalidError
  | SettingsShortcutInvalidError
  | StatePersistenceFailedError
  | StateNotInitializedError;

export type PinError =
  | ClipboardHistoryItemNotFoundError
  | PinnedItemDuplicateError
  | PinnedItemsLimitExceededError
  | StateNotInitializedError;

export type TogglePinError = PinError | PinnedItemNotFoundError;

export type SelectionError =
  | ClipboardHistoryItemNotFoundError
  | AutoPasteFailedError
  | ClipboardItemUnsupportedTypeError;

// ============================================================================
// Service Interface
// ============================================================================

interface ClipboardEngineImpl {
  /** Current immutable snapshot of all engine state */
  readonly snapshot: Effect.Effect<EngineSnapshot>;
  readonly clipboardItems: Effect.Effect<ReadonlyArray<ClipboardItem>>;
  readonly pinnedItems: Effect.Effect<ReadonlyArray<PinnedClipboardItem>>;
  readonly snippets: Effect.Effect<ReadonlyArray<Snippet>>;
  readonly settings: Effect.Effect<Settings>;

  /**
   * Stream of snapshots, starting with the current one. Slow consumers see
   * the latest snapshot, not every intermediate one.
   */
  readonly changes: Stream.Stream<EngineSnapshot>;

  /**
   * Load settings, history, pins and snippets from durable storage.
   *
   * Storage root or settings failures abort initialization. History, pin and
   * snippet failures are reported as warnings and that aggregate starts empty.
   */
  readonly initialize: () => Effect.Effect<InitializationReport, StateInitializationFailedError>;

  /**
   * Record a captured item at the head of history
   */
  readonly addClipboardItem: (item: ClipboardItem) => Effect.Effect<CaptureOutcome, CaptureError>;

  /**
   * Remove an item from history together with any pin of it
   */
  readonly deleteClipboardItem: (
    id: string
  ) => Effect.Effect<void, ClipboardHistoryItemNotFoundError | StateNotInitializedError>;

  /**
   * Empty history in memory and on disk. Pins are kept.
   */
  readonly clearClipboardHistory: () => Effect.Effect<
    void,
    StatePersistenceFailedError | StateNotInitializedError
  >;

  /**
   * Find an item by id in history, then among pins
   */
  readonly resolveItem: (id: string) => Effect.Effect<ClipboardItem, ClipboardHistoryItemNotFoundError>;

  readonly activeItem: Effect.Effect<ClipboardItem | null>;

  /**
   * Make the item active, put it on the clipboard and paste it when
   * auto-paste is enabled
   */
  readonly selectClipboardItem: (id: string) => Effect.Effect<void, SelectionError>;

  readonly copyClipboardItem: (id: string) => Effect.Effect<void, SelectionError>;
  readonly pasteClipboardItem: (id: string) => Effect.Effect<void, SelectionError>;
  readonly pasteActiveItem: () => Effect.Effect<void, SelectionError>;

  readonly pinItem: (id: string, customTitle?: string) => Effect.Effect<PinnedClipboardItem, PinError>;
  readonly unpinItem: (
    id: string
  ) => Effect.Effect<void, PinnedItemNotFoundError | StateNotInitializedError>;

  /**
   * Pin the item if it is not pinned, otherwise unpin it
   *
   * @returns true when the item ends up pinned
   */
  readonly togglePin: (id: string) => Effect.Effect<boolean, TogglePinError>;

  readonly renamePin: (
    id: string,
    customTitle: string | undefined
  ) => Effect.Effect<PinnedClipboardItem, PinnedItemNotFoundError | StateNotInitializedError>;

  /**
   * Validate, persist and apply a settings record
   */
  readonly saveSettings: (settings: Settings) => Effect.Effect<void, SettingsError>;

  readonly saveSnippet: (
    snippet: Snippet
  ) => Effect.Effect<Snippet, SnippetsLimitExceededError | StateNotInitializedError>;
  readonly deleteSnippet: (
    id: string
  ) => Effect.Effect<void, SnippetNotFoundError | StateNotInitializedError>;

  /**
   * Resolve a snippet's placeholders and stamp its last use
   */
  readonly useSnippet: (
    id: string,
    values: Readonly<Record<string, string>>
  ) => Effect.Effect<string, SnippetNotFoundError | StateNotInitializedError>;

  /**
   * Replace history and pins together, persisting both before committing
   */
  readonly replaceAll: (
    history: ReadonlyArray<ClipboardItem>,
    pinned: ReadonlyArray<PinnedClipboardItem>
  ) => Effect.Effect<void, StatePersistenceFailedError | StateNotInitializedError>;

  /**
   * Start clipboard monitoring. Starting twice is a no-op.
   */
  readonly startRuntime: () => Effect.Effect<void, RuntimeStartFailedError | StateNotInitializedError>;
  readonly stopRuntime: () => Effect.Effect<void, ClipboardMonitorStopFailedError>;
  readonly isRuntimeStarted: Effect.Effect<boolean>;

  /**
   * Wait until durable state matches memory
   */
  readonly flush: () => Effect.Effect<void, StatePersistenceFailedError>;
}

export class ClipboardEngine extends Context.Tag("ClipboardEngine")<
  ClipboardEngine,
  ClipboardEngineImpl
>() {}

// ============================================================================
// Pure Transitions
// ============================================================================

const removeAt = <A>(items: ReadonlyArray<A>, index: number): ReadonlyArray<A> => [
  ...items.slice(0, index),
  ...items.slice(index + 1),
];

const findHistoryItem = (state: EngineSnapshot, id: string) =>
  state.history.find((item) => item.id === id);

/**
 * The active pointer survives only while its item is still in history or pinned
 */
const keepActive = (
  activeItemId: string | null,
  history: ReadonlyArray<ClipboardItem>,
  pinned: ReadonlyArray<PinnedClipboardItem>
): string | null =>
  activeItemId !== null &&
  (history.some((item) => item.id === activeItemId) ||
    pinned.some((pin) => matchesPinId(pin, activeItemId)))
    ? activeItemId
    : null;

const planCapture = (
  state: EngineSnapshot,
  item: ClipboardItem
): Plan<CaptureOutcome, ClipboardImageTooLargeError> => {
  const { settings } = state;
  if (
    !settings.rememberHistory ||
    settings.incognitoMode ||
    isExcludedSource(item.sourceAppId, settings.excludedAppIds)
  ) {
    return Effect.succeed({ result: "ignored" });
  }

  if (item.type === "Image" && item.data.byteLength > DomainLimits.maxPersistedImageBytes) {
    return Effect.fail(
      new ClipboardImageTooLargeError({
        size: item.data.byteLength,
        maxSize: DomainLimits.maxPersistedImageBytes,
      })
    );
  }

  // Only the head is compared; an older equivalent entry stays where it is
  const head = state.history[0];
  if (head !== undefined && isEquivalentContent(head, item)) {
    const refreshed: ClipboardItem = {
      ...head,
      timestamp: item.timestamp,
      sourceAppId: item.sourceAppId ?? head.sourceAppId,
      sourceAppPath: item.sourceAppPath ?? head.sourceAppPath,
    };
    return Effect.succeed({
      result: "refreshed",
      next: { ...state, history: [refreshed, ...state.history.slice(1)] },
      dirty: ["history"],
    });
  }

  const history = [item, ...state.history].slice(0, effectiveHistoryLimit(settings));
  return Effect.succeed({
    result: "added",
    next: { ...state, history, activeItemId: keepActive(state.activeItemId, history, state.pinned) },
    dirty: ["history"],
  });
};

const planDelete = (
  state: EngineSnapshot,
  id: string
): Plan<void, ClipboardHistoryItemNotFoundError> => {
  const history = state.history.filter((item) => item.id !== id);
  const pinned = state.pinned.filter((pin) => !matchesPinId(pin, id));
  const historyChanged = history.length !== state.history.length;
  const pinnedChanged = pinned.length !== state.pinned.length;

  if (!historyChanged && !pinnedChanged) {
    return Effect.fail(new ClipboardHistoryItemNotFoundError({ id }));
  }

  const dirty: Aggregate[] = [];
  if (historyChanged) dirty.push("history");
  if (pinnedChanged) dirty.push("pinned");

  return Effect.succeed({
    result: undefined,
    next: {
      ...state,
      history,
      pinned,
      activeItemId: state.activeItemId === id ? null : state.activeItemId,
    },
    dirty,
  });
};

const planPin = (
  state: EngineSnapshot,
  id: string,
  customTitle: string | undefined
): Plan<PinnedClipboardItem, Exclude<PinError, StateNotInitializedError>> => {
  const item = findHistoryItem(state, id);
  if (item === undefined) {
    return Effect.fail(new ClipboardHistoryItemNotFoundError({ id }));
  }

  const existing = state.pinned.find((pin) => isEquivalentContent(pin.item, item));
  if (existing !== undefined) {
    return Effect.fail(new PinnedItemDuplicateError({ itemId: id, existingPinId: existing.id }));
  }

  if (state.pinned.length >= DomainLimits.maxPinnedItems) {
    return Effect.fail(new PinnedItemsLimitExceededError({ limit: DomainLimits.maxPinnedItems }));
  }

  const pin = makePinnedItem(item, { customTitle });
  return Effect.succeed({
    result: pin,
    next: { ...state, pinned: [pin, ...state.pinned] },
    dirty: ["pinned"],
  });
};

const planUnpin = (
  state: EngineSnapshot,
  id: string
): Plan<void, PinnedItemNotFoundError> => {
  const index = state.pinned.findIndex((pin) => matchesPinId(pin, id));
  if (index === -1) {
    return Effect.fail(new PinnedItemNotFoundError({ id }));
  }
  return Effect.succeed({
    result: undefined,
    next: { ...state, pinned: removeAt(state.pinned, index) },
    dirty: ["pinned"],
  });
};

/**
 * Locate the pin a toggle should remove: a pin with this id, or a pin
 * equivalent to the history item with this id
 */
const findTogglePin = (state: EngineSnapshot, id: string): PinnedClipboardItem | undefined => {
  const direct = state.pinned.find((pin) => matchesPinId(pin, id));
  if (direct !== undefined) return direct;
  const item = findHistoryItem(state, id);
  return item === undefined ? undefined : state.pinned.find((pin) => isEquivalentContent(pin.item, item));
};

const planSaveSnippet = (
  state: EngineSnapshot,
  snippet: Snippet
): Plan<Snippet, SnippetsLimitExceededError> => {
  const index = state.snippets.findIndex((existing) => existing.id === snippet.id);
  if (index === -1) {
    if (state.snippets.length >= DomainLimits.maxSnippets) {
      return Effect.fail(new SnippetsLimitExceededError({ limit: DomainLimits.maxSnippets }));
    }
    return Effect.succeed({
      result: snippet,
      next: { ...state, snippets: [...state.snippets, snippet] },
      dirty: ["snippets"],
    });
  }

  const snippets = state.snippets.map((existing, i) => (i === index ? snippet : existing));
  return Effect.succeed({ result: snippet, next: { ...state, snippets }, dirty: ["snippets"] });
};

const planTogglePin = (
  state: EngineSnapshot,
  id: string
): Plan<boolean, Exclude<TogglePinError, StateNotInitializedError>> => {
  const existing = findTogglePin(state, id);
  if (existing === undefined) {
    return planPin(state, id, undefined).pipe(
      Effect.map((transition) => ({ ...transition, result: true }))
    );
  }
  return planUnpin(state, existing.id).pipe(
    Effect.map((transition) => ({ ...transition, result: false }))
  );
};

const planRenamePin = (
  state: EngineSnapshot,
  id: string,
  customTitle: string | undefined
): Plan<PinnedClipboardItem, PinnedItemNotFoundError> => {
  const index = state.pinned.findIndex((pin) => matchesPinId(pin, id));
  const current = state.pinned[index];
  if (current === undefined) {
    return Effect.fail(new PinnedItemNotFoundError({ id }));
  }
  const renamed: PinnedClipboardItem = { ...current, customTitle: normalizeTitle(customTitle) };
  return Effect.succeed({
    result: renamed,
    next: { ...state, pinned: state.pinned.map((pin, i) => (i === index ? renamed : pin)) },
    dirty: ["pinned"],
  });
};

const planDeleteSnippet = (state: EngineSnapshot, id: string): Plan<void, SnippetNotFoundError> => {
  const index = state.snippets.findIndex((snippet) => snippet.id === id);
  if (index === -1) {
    return Effect.fail(new SnippetNotFoundError({ id }));
  }
  return Effect.succeed({
    result: undefined,
    next: { ...state, snippets: removeAt(state.snippets, index) },
    dirty: ["snippets"],
  });
};

const planUseSnippet = (
  state: EngineSnapshot,
  id: string,
  values: Readonly<Record<string, string>>
): Plan<string, SnippetNotFoundError> => {
  const index = state.snippets.findIndex((snippet) => snippet.id === id);
  const snippet = state.snippets[index];
  if (snippet === undefined) {
    return Effect.fail(new SnippetNotFoundError({ id }));
  }
  const used: Snippet = { ...snippet, lastUsedAt: new Date() };
  return Effect.succeed({
    result: resolveSnippet(snippet.content, values),
    next: { ...state, snippets: state.snippets.map((s, i) => (i === index ? used : s)) },
    dirty: ["snippets"],
  });
};

// ============================================================================
// Layer
// ============================================================================

export const ClipboardEngineLive = Layer.scoped(
  ClipboardEngine,
  Effect.gen(function* () {
    const paths = yield* StoragePaths;
    const historyRepository = yield* HistoryRepository;
    const pinnedRepository = yield* PinnedRepository;
    const snippetRepository = yield* SnippetRepository;
    const settingsRepository = yield* SettingsRepository;
    const monitor = yield* ClipboardMonitor;
    const autoPaste = yield* AutoPasteService;
    const logger = yield* LoggerService;

    const stateRef = yield* SubscriptionRef.make(INITIAL_SNAPSHOT);
    const mutationLock = yield* Effect.makeSemaphore(1);
    const writeLock = yield* Effect.makeSemaphore(1);
    const lifecycleLock = yield* Effect.makeSemaphore(1);
    const dirtyRef = yield* Ref.make(CLEAN);
    const flushSignal = yield* Queue.sliding<void>(1);
    const runtimeStartedRef = yield* Ref.make(false);

    const persistenceFailed = (message: string) => (cause: PersistenceError) =>
      new StatePersistenceFailedError({ message: `${message}: ${cause.message}`, cause });

    // ------------------------------------------------------------------------
    // Commit + persistence
    // ------------------------------------------------------------------------

    const markDirty = (aggregates: ReadonlyArray<StoredAggregate>) =>
      Ref.update(dirtyRef, (marks) => withDirty(marks, aggregates)).pipe(
        Effect.zipRight(Queue.offer(flushSignal, undefined))
      );

    const commit = (next: EngineSnapshot, dirty: ReadonlyArray<StoredAggregate>) =>
      Effect.uninterruptible(
        Effect.gen(function* () {
          const current = yield* SubscriptionRef.get(stateRef);
          yield* SubscriptionRef.set(stateRef, { ...next, generation: current.generation + 1 });
          if (dirty.length > 0) {
            yield* markDirty(dirty);
          }
        })
      );

    /**
     * Run a planned mutation under the mutation lock. Only planning can be
     * interrupted; nothing is committed unless the plan (and its write-through,
     * if any) succeeds. A write-through always runs to completion, and an
     * interrupt that arrives while it runs discards the commit instead.
     */
    const mutate = <A, E, W = never>(
      operation: string,
      plan: (state: EngineSnapshot) => Plan<A, E, W>
    ): Effect.Effect<A, E | W | StateNotInitializedError> =>
      mutationLock.withPermits(1)(
        Effect.uninterruptibleMask((restore) =>
          Effect.gen(function* () {
            const state = yield* SubscriptionRef.get(stateRef);
            if (!state.initialized) {
              return yield* Effect.fail(new StateNotInitializedError({ operation }));
            }
            const transition = yield* restore(plan(state));
            if (transition.next === undefined) {
              return transition.result;
            }
            const { writeThrough } = transition;
            if (writeThrough !== undefined) {
              yield* writeThrough.write;
              yield* Effect.allowInterrupt.pipe(
                Effect.onInterrupt(() =>
                  markDirty(writeThrough.touches).pipe(
                    Effect.zipRight(
                      logger.warn("ClipboardEngine", `Interrupted ${operation} after writing`, {
                        touches: writeThrough.touches,
                      })
                    )
                  )
                )
              );
            }
            yield* commit(transition.next, transition.dirty ?? []);
            return transition.result;
          })
        )
      );

    const persistHistory = (state: EngineSnapshot): Effect.Effect<void, HistorySaveError> =>
      state.settings.rememberHistory
        ? historyRepository.save(state.history, state.settings.encryptHistory)
        : Effect.void;

    const persistAggregate = (
      aggregate: StoredAggregate,
      state: EngineSnapshot
    ): Effect.Effect<void, PersistenceError> => {
      switch (aggregate) {
        case "history":
          return persistHistory(state);
        case "pinned":
          return pinnedRepository.save(state.pinned);
        case "snippets":
          return snippetRepository.save(state.snippets);
        case "settings":
          return settingsRepository.save(state.settings);
      }
    };

    /**
     * Write every dirty aggregate from the latest state. Failed aggregates
     * stay dirty so the next change retries them.
     */
    const persistDirty: Effect.Effect<ReadonlyArray<PersistenceError>> = writeLock.withPermits(1)(
      Effect.gen(function* () {
        const marks = yield* Ref.getAndSet(dirtyRef, CLEAN);
        const pending = AGGREGATES.filter((aggregate) => marks[aggregate]);
        if (pending.length === 0) {
          return [];
        }

        const state = yield* SubscriptionRef.get(stateRef);
        const failures: PersistenceError[] = [];
        for (const aggregate of pending) {
          const outcome = yield* Effect.either(persistAggregate(aggregate, state));
          if (Either.isLeft(outcome)) {
            failures.push(outcome.left);
            yield* Ref.update(dirtyRef, (current) => withDirty(current, [aggregate]));
            yield* logger.warn("ClipboardEngine", `Failed to persist ${aggregate}`, {
              error: outcome.left._tag,
              code: outcome.left.code,
              message: outcome.left.message,
            });
          }
        }
        return failures;
      })
    );

    yield* Effect.forkScoped(
      Effect.forever(Queue.take(flushSignal).pipe(Effect.zipRight(persistDirty)))
    );

    const flush = () =>
      persistDirty.pipe(
        Effect.flatMap((failures) => {
          const first = failures[0];
          return first === undefined
            ? Effect.void
            : Effect.fail(persistenceFailed("Failed to persist clipboard state")(first));
        })
      );

    // ------------------------------------------------------------------------
    // Lifecycle
    // ------------------------------------------------------------------------

    const initialize = () =>
      mutationLock.withPermits(1)(
        Effect.gen(function* () {
          yield* ensureDirectory(paths.root).pipe(
            Effect.mapError(
              (error) =>
                new StateInitializationFailedError({
                  message: `Storage location is unavailable: ${error.message}`,
                  cause: error,
                })
            )
          );

          const settings = yield* settingsRepository.load().pipe(
            Effect.mapError(
              (error) =>
                new StateInitializationFailedError({
                  message: `Failed to load settings: ${error.message}`,
                  cause: error,
                })
            )
          );

          const warnings: LoadWarning[] = [];
          const orEmpty = <A>(
            aggregate: Aggregate,
            load: Effect.Effect<ReadonlyArray<A>, PersistenceError>
          ) =>
            load.pipe(
              Effect.catchAll((error) =>
                Effect.sync(() => {
                  warnings.push({ aggregate, message: error.message, code: error.code });
                  return [];
                })
              )
            );

          const history = settings.rememberHistory
            ? yield* orEmpty("history", historyRepository.load(settings.encryptHistory))
            : [];
          const pinned = yield* orEmpty("pinned", pinnedRepository.load());
          const snippets = yield* orEmpty("snippets", snippetRepository.load());

          const next: EngineSnapshot = {
            history: history.slice(0, effectiveHistoryLimit(settings)),
            pinned,
            snippets,
            settings,
            activeItemId: null,
            generation: 0,
            initialized: true,
          };
          yield* commit(next, []);

          for (const warning of warnings) {
            yield* logger.warn("ClipboardEngine", `Starting with empty ${warning.aggregate}`, warning);
          }
          yield* logger.info("ClipboardEngine", "State initialized", {
            history: next.history.length,
            pinned: pinned.length,
            snippets: snippets.length,
          });

          return {
            historyCount: next.history.length,
            pinnedCount: pinned.length,
            snippetCount: snippets.length,
            warnings,
          };
        })
      );

    const addClipboardItem = (item: ClipboardItem) =>
      mutate("capture clipboard item", (state) => planCapture(state, item));

    const startRuntime = () =>
      lifecycleLock.withPermits(1)(
        Effect.gen(function* () {
          if (yield* Ref.get(runtimeStartedRef)) {
            return;
          }
          const state = yield* SubscriptionRef.get(stateRef);
          if (!state.initialized) {
            return yield* Effect.fail(new StateNotInitializedError({ operation: "start the runtime" }));
          }

          yield* monitor.start(addClipboardItem, state.settings.captureRichText).pipe(
            Effect.mapError(
              (error) =>
                new RuntimeStartFailedError({
                  message: `Clipboard monitor failed to start: ${error.message}`,
                  cause: error,
                })
            )
          );
          yield* Ref.set(runtimeStartedRef, true);
          yield* logger.info("ClipboardEngine", "Runtime started");
        })
      );

    const stopRuntime = () =>
      lifecycleLock.withPermits(1)(
        Effect.gen(function* () {
          if (!(yield* Ref.get(runtimeStartedRef))) {
            return;
          }
          yield* monitor.stop();
          yield* Ref.set(runtimeStartedRef, false);
          yield* logger.info("ClipboardEngine", "Runtime stopped");
        })
      );

    // Finalizers run in reverse: the monitor stops before the final flush
    yield* Effect.addFinalizer(() =>
      flush().pipe(
        Effect.catchAll((error) =>
          logger.error("ClipboardEngine", "Final flush failed", { message: error.message })
        )
      )
    );
    yield* Effect.addFinalizer(() =>
      stopRuntime().pipe(
        Effect.catchAll((error) =>
          logger.error("ClipboardEngine", "Failed to stop runtime", { message: error.message })
        )
      )
    );

    // ------------------------------------------------------------------------
    // Selection
    // ------------------------------------------------------------------------

    const resolveItem = (id: string) =>
      Effect.gen(function* () {
        const state = yield* SubscriptionRef.get(stateRef);
        const item =
          findHistoryItem(state, id) ?? state.pinned.find((pin) => matchesPinId(pin, id))?.item;
        if (item === undefined) {
          return yield* Effect.fail(new ClipboardHistoryItemNotFoundError({ id }));
        }
        return item;
      });

    const activeItem = Effect.gen(function* () {
      const { activeItemId } = yield* SubscriptionRef.get(stateRef);
      if (activeItemId === null) {
        return null;
      }
      return yield* resolveItem(activeItemId).pipe(Effect.orElseSucceed(() => null));
    });

    const markActive = (item: ClipboardItem) =>
      mutationLock.withPermits(1)(
        Effect.gen(function* () {
          const state = yield* SubscriptionRef.get(stateRef);
          if (state.activeItemId !== item.id) {
            yield* commit({ ...state, activeItemId: item.id }, []);
          }
        })
      );

    const deliver = (id: string, paste: (settings: Settings) => boolean) =>
      Effect.gen(function* () {
        const item = yield* resolveItem(id);
        yield* markActive(item);
        yield* autoPaste.setClipboardContent(item);
        const settings = (yield* SubscriptionRef.get(stateRef)).settings;
        if (paste(settings)) {
          yield* autoPaste.pasteToPreviousWindow();
        }
      });

    // ------------------------------------------------------------------------
    // Service
    // ------------------------------------------------------------------------

    return ClipboardEngine.of({
      snapshot: SubscriptionRef.get(stateRef),
      clipboardItems: SubscriptionRef.get(stateRef).pipe(Effect.map((state) => state.history)),
      pinnedItems: SubscriptionRef.get(stateRef).pipe(Effect.map((state) => state.pinned)),
      snippets: SubscriptionRef.get(stateRef).pipe(Effect.map((state) => state.snippets)),
      settings: SubscriptionRef.get(stateRef).pipe(Effect.map((state) => state.settings)),
      changes: stateRef.changes,

      initialize,
      addClipboardItem,

      deleteClipboardItem: (id) => mutate("delete clipboard item", (state) => planDelete(state, id)),

      clearClipboardHistory: () =>
        mutate("clear clipboard history", (state) =>
          Effect.succeed<Transition<void, StatePersistenceFailedError>>({
            result: undefined,
            next: {
              ...state,
              history: [],
              activeItemId: keepActive(state.activeItemId, [], state.pinned),
            },
            writeThrough: {
              write: writeLock
                .withPermits(1)(historyRepository.clear())
                .pipe(Effect.mapError(persistenceFailed("Failed to clear stored history"))),
              touches: ["history"],
            },
          })
        ),

      resolveItem,
      activeItem,

      selectClipboardItem: (id) => deliver(id, (settings) => settings.autoPasteEnabled),
      copyClipboardItem: (id) => deliver(id, () => false),
      pasteClipboardItem: (id) => deliver(id, () => true),

      pasteActiveItem: () =>
        Effect.gen(function* () {
          const { activeItemId } = yield* SubscriptionRef.get(stateRef);
          if (activeItemId === null) {
            return yield* Effect.fail(new ClipboardHistoryItemNotFoundError({ id: "(active)" }));
          }
          yield* deliver(activeItemId, () => true);
        }),

      pinItem: (id, customTitle) =>
        mutate("pin item", (state) => planPin(state, id, customTitle)),

      unpinItem: (id) => mutate("unpin item", (state) => planUnpin(state, id)),

      togglePin: (id) => mutate("toggle pin", (state) => planTogglePin(state, id)),

      renamePin: (id, customTitle) =>
        mutate("rename pin", (state) => planRenamePin(state, id, customTitle)),

      saveSettings: (settings) =>
        Effect.gen(function* () {
          const richTextChanged = yield* mutate("save settings", (state) =>
            Effect.gen(function* () {
              yield* validateSettings(settings);

              const previous = state.settings;
              const history = state.history.slice(0, effectiveHistoryLimit(settings));
              const rewriteHistory =
                history.length !== state.history.length ||
                previous.encryptHistory !== settings.encryptHistory ||
                (settings.rememberHistory && !previous.rememberHistory);

              const transition: Transition<boolean, StatePersistenceFailedError> = {
                result: previous.captureRichText !== settings.captureRichText,
                next: {
                  ...state,
                  settings,
                  history,
                  activeItemId: keepActive(state.activeItemId, history, state.pinned),
                },
                dirty: rewriteHistory ? ["history"] : [],
                writeThrough: {
                  write: writeLock
                    .withPermits(1)(settingsRepository.save(settings))
                    .pipe(Effect.mapError(persistenceFailed("Failed to save settings"))),
                  touches: ["settings"],
                },
              };
              return transition;
            })
          );

          if (richTextChanged && (yield* Ref.get(runtimeStartedRef))) {
            yield* monitor.updateCaptureRichText(settings.captureRichText);
          }
        }),

      saveSnippet: (snippet) => mutate("save snippet", (state) => planSaveSnippet(state, snippet)),

      deleteSnippet: (id) => mutate("delete snippet", (state) => planDeleteSnippet(state, id)),

      useSnippet: (id, values) =>
        mutate("use snippet", (state) => planUseSnippet(state, id, values)),

      replaceAll: (history, pinned) =>
        mutate("replace clipboard state", (state) =>
          Effect.gen(function* () {
            const limit = effectiveHistoryLimit(state.settings);
            const nextHistory = history
              .filter(
                (item) =>
                  item.type !== "Image" ||
                  item.data.byteLength <= DomainLimits.maxPersistedImageBytes
              )
              .slice(0, limit);
            const nextPinned = pinned.slice(0, DomainLimits.maxPinnedItems);
            const next: EngineSnapshot = {
              ...state,
              history: nextHistory,
              pinned: nextPinned,
              activeItemId: keepActive(state.activeItemId, nextHistory, nextPinned),
            };

            const write = writeLock
              .withPermits(1)(
                Effect.gen(function* () {
                  yield* persistHistory(next);
                  yield* pinnedRepository.save(nextPinned).pipe(
                    Effect.tapError(() =>
                      // Put history back so disk matches the state we keep
                      persistHistory(state).pipe(
                        Effect.catchAll((error) =>
                          logger.error("ClipboardEngine", "Failed to restore history after import", {
                            message: error.message,
                          })
                        )
                      )
                    )
                  );
                })
              )
              .pipe(Effect.mapError(persistenceFailed("Failed to replace stored state")));

            const transition: Transition<void, StatePersistenceFailedError> = {
              result: undefined,
              next,
              writeThrough: { write, touches: ["history", "pinned"] },
            };
            return transition;
          })
        ),

      startRuntime,
      stopRuntime,
      isRuntimeStarted: Ref.get(runtimeStartedRef),
      flush,
    });
  })
);
