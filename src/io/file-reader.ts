/**
 * File reading on top of Effect Platform
 *
 * Effect programs do the I/O; the exported functions run them against the
 * Node.js platform layer and hand back Promises, translating every failure
 * into a FileError.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { FileError, StreamError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema } from "../types";
import { getPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
};

/**
 * Check if a path names an existing regular file
 *
 * @throws {FileError} If path validation or the stat call fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Whether a path carries gzip compression by extension
 */
export function isGzipPath(path: string): boolean {
  return path.toLowerCase().endsWith(".gz");
}

/**
 * Create a streaming reader for a file, decompressing `.gz` inputs
 *
 * @throws {FileError} If the file is missing or cannot be opened
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const merged = { ...DEFAULT_OPTIONS, ...options };

  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "open");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, { chunkSize: merged.bufferSize });
    return Stream.toReadableStream(effectStream);
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  if (merged.autoDecompress && isGzipPath(validatedPath)) {
    return stream.pipeThrough(new DecompressionStream("gzip"));
  }
  return stream;
}

/**
 * Read an entire file to a string
 *
 * @throws {FileError} If the file cannot be read
 * @throws {StreamError} If a gzip file is corrupt
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const merged = { ...DEFAULT_OPTIONS, ...options };

  if (merged.autoDecompress && isGzipPath(validatedPath)) {
    return collectText(await createStream(validatedPath, merged));
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

export const FileReader = {
  exists,
  createStream,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function collectText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let text = "";
  let bytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      bytes += value.length;
      text += decoder.decode(value, { stream: true });
    }
  } catch (error) {
    throw new StreamError(
      `Decompression failed: ${error instanceof Error ? error.message : String(error)}`,
      "decompress",
      bytes
    );
  } finally {
    reader.releaseLock();
  }

  return text + decoder.decode();
}

/**
 * Validate file path using ArkType
 * Maintains FileError interface contract for callers
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
