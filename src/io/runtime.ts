/**
 * Effect platform layer selection
 *
 * Every file operation runs as an Effect program that needs FileSystem and
 * Path services; this module supplies them for Node.js.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem and Path
 *
 * @returns Node.js platform layer
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
