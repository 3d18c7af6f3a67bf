/**
 * Effect platform layer for file I/O
 *
 * File access goes through `@effect/platform`'s `FileSystem` service; this
 * module supplies the Node.js implementation and a helper that runs a
 * platform program to a promise.
 */

import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";

/**
 * Get the Effect platform layer
 *
 * Provides FileSystem, Path and the other platform services.
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a program that needs the file system and resolve with its value
 *
 * @example
 * ```typescript
 * const size = await runWithPlatform(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return (yield* fs.stat("reads.fastq")).size;
 *   })
 * );
 * ```
 */
export function runWithPlatform<A, E>(program: Effect.Effect<A, E, FileSystem.FileSystem>): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}
