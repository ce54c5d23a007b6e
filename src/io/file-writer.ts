/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing stays behind Promise-based functions. Files are
 * opened inside a scope so the handle is closed however the write ends.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import { runWithPlatform } from "./runtime";

const DEFAULT_BATCH_SIZE = 1_000;

/**
 * Handle for writing to a file multiple times within a scope
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;

  /**
   * Write binary data to the file
   */
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Options for line-oriented writes
 */
export interface WriteLinesOptions {
  /** Number of lines joined into a single write (default: 1000) */
  batchSize?: number;
  /** Abort signal checked between batches */
  signal?: AbortSignal;
  /**
   * Write to a staging file beside `path` and rename it into place once every
   * line is written. On failure the staging file is removed and `path` is
   * left as it was.
   */
  atomic?: boolean;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 */
export async function writeString(path: string, content: string): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is created or truncated, and closed when the callback settles.
 *
 * @example
 * ```typescript
 * await openForWriting("lifted.gff3", async (handle) => {
 *   await handle.writeString("##gff-version 3\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const writeBytes = async (content: Uint8Array): Promise<void> => {
      const result = await Effect.runPromise(Effect.either(file.writeAll(content)));
      if (Either.isLeft(result)) {
        throw FileError.fromSystemError("write", path, result.left);
      }
    };

    const handle: FileWriteHandle = {
      writeString: (content: string) => writeBytes(encoder.encode(content)),
      writeBytes,
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runWithPlatform(program.pipe(Effect.scoped));
}

/**
 * Write lines to a file, each followed by a newline
 *
 * Accepts sync or async iterables so liftover output can be streamed to
 * disk without collecting it first.
 *
 * @returns Number of lines written
 * @example
 * ```typescript
 * await writeLines("chromosomes.gff3", liftoverFiles(options), { atomic: true });
 * ```
 */
export async function writeLines(
  path: string,
  lines: Iterable<string> | AsyncIterable<string>,
  options: WriteLinesOptions = {}
): Promise<number> {
  if (options.atomic !== true) {
    return writeBatches(path, lines, options);
  }

  const staging = `${path}.tmp-${process.pid}-${Date.now()}`;
  try {
    const written = await writeBatches(staging, lines, options);
    await renameFile(staging, path);
    return written;
  } catch (error) {
    await deleteFile(staging);
    throw error;
  }
}

/**
 * Move a file, replacing any file at the destination
 *
 * @throws {FileError} When the rename fails
 */
export async function renameFile(from: string, to: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.rename(from, to);
  });

  try {
    await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("rename", from, error);
  }
}

/**
 * Delete a file if it exists
 *
 * @throws {FileError} When the file exists but cannot be removed
 */
export async function deleteFile(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(path)) {
      yield* fs.remove(path);
    }
  });

  try {
    await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("delete", path, error);
  }
}

async function writeBatches(
  path: string,
  lines: Iterable<string> | AsyncIterable<string>,
  options: WriteLinesOptions
): Promise<number> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

  return openForWriting(path, async (handle) => {
    let batch: string[] = [];
    let written = 0;

    for await (const line of lines) {
      batch.push(line);
      if (batch.length >= batchSize) {
        if (options.signal?.aborted === true) {
          throw new FileError("Write aborted", path, "write");
        }
        await handle.writeString(`${batch.join("\n")}\n`);
        written += batch.length;
        batch = [];
      }
    }

    if (batch.length > 0) {
      await handle.writeString(`${batch.join("\n")}\n`);
      written += batch.length;
    }

    return written;
  });
}

export const FileWriter = {
  writeString,
  openForWriting,
  writeLines,
  renameFile,
  deleteFile,
} as const;
