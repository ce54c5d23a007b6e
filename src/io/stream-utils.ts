/**
 * Stream processing utilities for line-oriented text files
 *
 * Turns a byte stream into complete lines regardless of where chunk
 * boundaries fall, accepting LF, CRLF and bare CR line endings.
 */

import { BufferError, LiftoverError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

/**
 * Default maximum line length
 */
export const DEFAULT_MAX_LINE_LENGTH = 1_000_000;
const MAX_BUFFER_SIZE = 10_485_760;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Lines are yielded without their terminators. A final line lacking a
 * terminator is still yielded unless it is empty. If the consumer stops
 * early the stream is cancelled.
 *
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a line exceeds the maximum length
 * @example
 * ```typescript
 * const stream = await createStream("scaffolds.gff3");
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  // Set once the stream is drained or errored; nothing is left to cancel
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read().catch((error: unknown) => {
        settled = true;
        throw error;
      });

      if (done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer, maxLineLength);
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

    buffer += decoder.decode();
    const finalLine = buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
    if (finalLine.length > 0) {
      yield checkLength(finalLine, maxLineLength);
    }
  } catch (error) {
    if (error instanceof LiftoverError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * A trailing `\r` is held back in the remainder because the next chunk may
 * start with the `\n` of a CRLF pair.
 *
 * @throws {BufferError} If a single line exceeds maximum length
 */
export function processBuffer(
  buffer: string,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLength(buffer.slice(lineStart, lineEnd), maxLineLength));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLength(buffer.slice(lineStart, position), maxLineLength));
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > maxLineLength) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

/**
 * Split in-memory text into lines the same way readLines does
 */
export function splitLines(
  data: string,
  maxLineLength: number = DEFAULT_MAX_LINE_LENGTH
): string[] {
  const { lines, remainder } = processBuffer(data, maxLineLength);
  const finalLine = remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  return finalLine.length > 0 ? [...lines, finalLine] : lines;
}

function checkLength(line: string, maxLineLength: number): string {
  if (line.length > maxLineLength) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
      line.length,
      "overflow",
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
} as const;
