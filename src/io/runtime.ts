/**
 * Platform layer for file system programs
 *
 * Every I/O program in this package asks for `FileSystem.FileSystem` and is
 * run here against the Node.js platform layer.
 */

import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Layer providing FileSystem, Path and the other platform services
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a file system program, rejecting with its own failure value rather
 * than a wrapped fiber failure
 */
export async function runFileProgram<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem>
): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program).pipe(Effect.provide(getPlatform()))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
