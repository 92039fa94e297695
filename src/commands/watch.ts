/**
 * watch command - Run clipboard monitoring in the foreground
 *
 * Prints each new capture until interrupted (Ctrl+C), then stops the monitor
 * and flushes pending writes.
 */

import { Effect, Option, Stream } from "effect";
import { ClipboardEngine } from "../services/clipboard-engine";
import type { ParsedArgs } from "../cli/parser";
import { formatItemLine } from "./shared";

/**
 * Completes on the first SIGINT or SIGTERM
 */
export const waitForShutdownSignal: Effect.Effect<void> = Effect.async<void>((resume) => {
  const onSignal = () => resume(Effect.void);
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return Effect.sync(() => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
});

/**
 * @param until - Completes when watching should stop
 */
export const watchCommand = (_args: ParsedArgs, until: Effect.Effect<void> = waitForShutdownSignal) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const initialHead = (yield* engine.snapshot).history[0]?.id;

    yield* engine.startRuntime();
    console.log("Watching clipboard (Ctrl+C to stop)");

    // A new head id is a new capture; refreshes keep the head's id
    const printCaptures = engine.changes.pipe(
      Stream.filterMap((snapshot) => {
        const head = snapshot.history[0];
        return head === undefined ? Option.none() : Option.some({ head, pinned: snapshot.pinned });
      }),
      Stream.changesWith((left, right) => left.head.id === right.head.id),
      Stream.filter(({ head }) => head.id !== initialHead),
      Stream.runForEach(({ head, pinned }) =>
        Effect.sync(() => console.log(formatItemLine(head, pinned)))
      )
    );

    yield* Effect.raceFirst(printCaptures, until);

    yield* engine.stopRuntime();
    yield* engine.flush();
    console.log("Stopped watching");
  });
