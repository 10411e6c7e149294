/**
 * Effect platform layer for file I/O
 *
 * The converter runs on Node.js only; the layer provides the FileSystem and
 * Path services used by the reader and writer.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Platform layer for the current runtime
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided Effect, rejecting with its typed failure
 *
 * `Effect.runPromise` would wrap the failure in a FiberFailure; callers of the
 * I/O helpers expect the {@link FileError} itself.
 */
export async function runEffect<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
