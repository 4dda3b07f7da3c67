/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers over Effect FileSystem programs. Paths ending in
 * `.gz` are gzip-compressed on the way out.
 *
 * @module file-writer
 */

import { gzipSync } from "node:zlib";
import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { isGzipPath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write string content to a file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 * @example
 * ```typescript
 * await writeString("strandedness.tsv", formatReportTable(reports));
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const data = isGzipPath(path)
    ? new Uint8Array(gzipSync(content))
    : new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Remove a file if it exists
 *
 * @throws {FileError} When removal fails for a reason other than absence
 */
export async function deleteFile(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(path)) {
      yield* fs.remove(path);
    }
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}
