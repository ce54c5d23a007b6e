/**
 * Effect platform layer selection
 *
 * File access goes through `@effect/platform`'s FileSystem service; this
 * module supplies the Node.js implementation of it and the bridge from
 * Effect programs back to the Promise-based public API.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Get the Effect platform layer providing FileSystem and Path
 *
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a platform program and settle with its typed failure
 *
 * `Effect.runPromise` would reject with a FiberFailure wrapper; callers of
 * the Promise API expect the library's own error classes instead.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program.pipe(Effect.provide(getPlatform())))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
