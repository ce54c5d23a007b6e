/**
 * File reading utilities on top of Effect Platform
 *
 * Opens AGP and GFF3 inputs as byte streams, transparently inflating
 * gzip-compressed files, and exposes Promise-based helpers so callers never
 * need to run Effect programs themselves.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Layer, Option, Stream } from "effect";
import { CompressionDetector, DecompressionService } from "../compression";
import { FileError, LiftoverError, ValidationError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";
import { readLines } from "./stream-utils";

interface ResolvedReaderOptions {
  bufferSize: number;
  maxFileSize: number;
  signal?: AbortSignal;
  autoDecompress: boolean;
  compressionFormat?: FileReaderOptions["compressionFormat"];
}

const DEFAULT_OPTIONS: ResolvedReaderOptions = {
  bufferSize: 65_536,
  maxFileSize: 10_737_418_240, // 10GB
  autoDecompress: true,
};

/**
 * Check if a path names an existing regular file
 *
 * @throws {FileError} If path validation fails
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
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const dot = validatedPath.lastIndexOf(".");
    const slash = validatedPath.lastIndexOf("/");

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      extension: dot > slash + 1 ? validatedPath.substring(dot) : "",
    };
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check that a file exists and respects the size limit
 */
export async function validateFile(
  path: string,
  options: FileReaderOptions = {}
): Promise<FileValidationResult> {
  const mergedOptions = mergeOptions(options);

  try {
    if (!(await exists(path))) {
      return { isValid: false, error: "File does not exist or is not accessible" };
    }

    const metadata = await getMetadata(path);
    if (metadata.size > mergedOptions.maxFileSize) {
      return {
        isValid: false,
        metadata,
        error: `File size ${metadata.size} exceeds maximum ${mergedOptions.maxFileSize}`,
      };
    }

    return { isValid: true, metadata };
  } catch (error) {
    return {
      isValid: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Build the Effect program that opens a file as a decoded byte stream
 *
 * Requires a FileSystem and a DecompressionService, so tests can supply
 * their own decompression layer.
 */
export function openStream(
  path: FilePath,
  options: FileReaderOptions = {}
): Effect.Effect<
  ReadableStream<Uint8Array>,
  LiftoverError,
  FileSystem.FileSystem | DecompressionService
> {
  const mergedOptions = mergeOptions(options);

  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const raw = Stream.toReadableStream(fs.stream(path, { chunkSize: mergedOptions.bufferSize }));

    if (!mergedOptions.autoDecompress) {
      return raw;
    }

    const format = mergedOptions.compressionFormat ?? CompressionDetector.fromExtension(path);
    if (format === "none") {
      return raw;
    }

    const decompression = yield* DecompressionService;
    const transform = yield* decompression.createDecompressionStream(format, {
      ...(mergedOptions.signal !== undefined && { signal: mergedOptions.signal }),
    });
    return raw.pipeThrough(transform);
  });
}

/**
 * Create a streaming reader for a file
 *
 * Gzip input (`.gz`, `.gzip`, `.bgz`) is decompressed on the fly unless
 * `autoDecompress` is false.
 *
 * @throws {FileError} If the file is missing, too large or unreadable
 * @throws {CompressionError} If the compression format is unsupported
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {},
  decompression: Layer.Layer<DecompressionService> = DecompressionService.Live
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);

  const validation = await validateFile(validatedPath, options);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "read");
  }

  return runWithPlatform(openStream(validatedPath, options).pipe(Effect.provide(decompression)));
}

/**
 * Read a file line by line, decompressing when needed
 *
 * @example
 * ```typescript
 * for await (const line of readLinesFromFile("scaffolds.agp.gz")) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLinesFromFile(
  path: string,
  options: FileReaderOptions = {}
): AsyncIterable<string> {
  const stream = await createStream(path, options);
  yield* readLines(stream, options.maxLineLength);
}

export const FileReader = {
  exists,
  getMetadata,
  validateFile,
  createStream,
  readLinesFromFile,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): ResolvedReaderOptions {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid file reader options: ${validationResult.summary}`);
  }

  return {
    ...DEFAULT_OPTIONS,
    ...(options.bufferSize !== undefined && { bufferSize: options.bufferSize }),
    ...(options.maxFileSize !== undefined && { maxFileSize: options.maxFileSize }),
    ...(options.signal !== undefined && { signal: options.signal }),
    ...(options.autoDecompress !== undefined && { autoDecompress: options.autoDecompress }),
    ...(options.compressionFormat !== undefined && {
      compressionFormat: options.compressionFormat,
    }),
  };
}
