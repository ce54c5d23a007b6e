/**
 * Streaming gzip decompression
 *
 * Wraps fflate's incremental `Gunzip` in a web TransformStream so that
 * compressed AGP and GFF3 inputs are inflated chunk by chunk and never held
 * in memory whole.
 */

import { Gunzip } from "fflate";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";

/**
 * Create gzip decompression transform stream
 *
 * @example
 * ```typescript
 * const inflated = compressedStream.pipeThrough(createStream());
 * ```
 */
export function createStream(
  options: DecompressorOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  let bytesProcessed = 0;
  let gunzip: Gunzip | null = null;

  return new TransformStream<Uint8Array, Uint8Array>({
    start: (controller) => {
      gunzip = new Gunzip((data) => {
        if (data.length > 0) {
          controller.enqueue(data);
        }
      });
    },
    transform: (chunk, controller) => {
      bytesProcessed += chunk.length;
      options.onProgress?.(bytesProcessed);

      if (options.signal?.aborted === true) {
        controller.error(
          new CompressionError("Decompression aborted", "gzip", "stream", bytesProcessed)
        );
        return;
      }
      if (gunzip === null) {
        controller.error(new CompressionError("Decompressor not initialized", "gzip", "stream"));
        return;
      }

      try {
        gunzip.push(chunk, false);
      } catch (error) {
        controller.error(CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed));
      }
    },
    flush: (controller) => {
      try {
        gunzip?.push(new Uint8Array(0), true);
      } catch (error) {
        controller.error(CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed));
      }
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(options));
}

export const GzipDecompressor = {
  createStream,
  wrapStream,
} as const;
