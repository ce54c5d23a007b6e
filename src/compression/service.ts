/**
 * Effect service for stream decompression
 *
 * The file reader asks for a `DecompressionService` instead of calling a
 * codec directly, so tests and embedders can swap the implementation by
 * providing a different layer.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* DecompressionService;
 *   return yield* svc.createDecompressionStream("gzip");
 * });
 *
 * const transform = await Effect.runPromise(
 *   program.pipe(Effect.provide(DecompressionService.Live))
 * );
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat, DecompressorOptions } from "../types";
import { createStream as createGzipDecompressionStream } from "./gzip";

/**
 * Operations offered by the decompression service
 */
export interface DecompressionServiceShape {
  /**
   * Create a decompression transform stream for the given format
   */
  readonly createDecompressionStream: (
    format: CompressionFormat,
    options?: DecompressorOptions
  ) => Effect.Effect<TransformStream<Uint8Array, Uint8Array>, CompressionError>;
}

/**
 * Decompression service tag
 *
 * `DecompressionService.Live` supports gzip and passthrough. Zstandard input
 * is detected but rejected with a CompressionError.
 */
export class DecompressionService extends Context.Tag("chromolift/DecompressionService")<
  DecompressionService,
  DecompressionServiceShape
>() {
  static readonly Live: Layer.Layer<DecompressionService> = Layer.succeed(
    DecompressionService,
    createGzipService()
  );
}

function createGzipService(): DecompressionServiceShape {
  return {
    createDecompressionStream: (format, options) => {
      switch (format) {
        case "gzip":
          return Effect.try({
            try: () => createGzipDecompressionStream(options),
            catch: (error) => CompressionError.fromSystemError("gzip", "stream", error),
          });
        case "none":
          return Effect.succeed(createPassthroughStream());
        case "zstd":
          return Effect.fail(
            new CompressionError(
              "Zstandard input is not supported; decompress the file or recompress it with gzip",
              "zstd",
              "validate"
            )
          );
      }
    },
  };
}

/**
 * Create a passthrough stream that forwards data unchanged
 */
function createPassthroughStream(): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}
