/**
 * Line splitting over byte streams
 *
 * Converts a ReadableStream of bytes into complete text lines, carrying
 * partial lines across chunk boundaries.
 */

import { BufferError, StreamError } from "../errors";

// Constants for stream processing
const MAX_LINE_LENGTH = 10_000_000; // long-read SEQ/QUAL fields
const MAX_BUFFER_SIZE = 16_777_216; // 16MB max buffer

/**
 * Result of splitting a text buffer into lines
 */
export interface LineProcessingResult {
  lines: string[];
  /** Trailing text with no line ending yet */
  remainder: string;
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * The reader is released when iteration finishes, fails, or is abandoned by
 * the consumer; an abandoned stream is cancelled.
 *
 * @param stream Stream of binary data to process
 * @yields Complete lines of text, without line endings
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line exceeds the maximum length
 * @example
 * ```typescript
 * const stream = await createStream('/path/to/sample.sam');
 * for await (const line of readLines(stream)) {
 *   if (!line.startsWith('@')) console.log(line.split('\t')[1]);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  // true once the stream has ended or errored; otherwise it is cancelled on exit
  let settled = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          "read",
          totalBytesProcessed
        );
      });

      if (chunk.done) {
        settled = true;
        buffer += decoder.decode();
        if (buffer.length > 0) {
          yield buffer;
        }
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      for (const line of result.lines) {
        yield line;
      }

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines
 *
 * Handles \n and \r\n endings; text after the last line ending is returned
 * as the remainder for the next chunk.
 *
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = buffer.indexOf("\n"); position !== -1; position = buffer.indexOf("\n", lineStart)) {
    const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
    const line = buffer.slice(lineStart, lineEnd);

    if (line.length > MAX_LINE_LENGTH) {
      throw new BufferError(
        `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
        line.length,
        "overflow",
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }

    lines.push(line);
    lineStart = position + 1;
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

export const StreamUtils = {
  readLines,
  processBuffer,
} as const;
