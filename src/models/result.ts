/**
 * Result boundary
 *
 * Converts an effect into a promise of `Either` for callers outside Effect
 * (a UI shell, a tray host). The promise never rejects: defects become
 * `UnexpectedError` and an aborted signal becomes `OperationCancelledError`.
 */

import { Cause, Effect, Either, Exit, Option } from "effect";
import { OperationCancelledError, UnexpectedError } from "./errors";

export interface RunResultOptions {
  readonly signal?: AbortSignal;
  readonly operation?: string;
}

export const runResult = async <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunResultOptions = {}
): Promise<Either.Either<A, E | OperationCancelledError | UnexpectedError>> => {
  const exit = await Effect.runPromiseExit(
    effect,
    options.signal ? { signal: options.signal } : undefined
  );

  if (Exit.isSuccess(exit)) {
    return Either.right(exit.value);
  }

  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    return Either.left(failure.value);
  }

  if (Cause.isInterruptedOnly(exit.cause)) {
    return Either.left(new OperationCancelledError({ operation: options.operation }));
  }

  const defect = Cause.squash(exit.cause);
  return Either.left(
    new UnexpectedError({
      message: defect instanceof Error ? defect.message : String(defect),
      cause: defect,
    })
  );
};
