/**
 * Shared type definitions and validation schemas
 *
 * Format-specific record types live beside their parsers under
 * `formats/`; this module holds what the parsers, the I/O layer and the
 * liftover engine have in common.
 */

import { type } from "arktype";

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Options shared by every line parser
 */
export interface ParserOptions {
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Upper bound accepted for `maxLineLength`
 */
export const MAX_LINE_LENGTH_LIMIT = 10_000_000;

// =============================================================================
// COMPRESSION TYPES
// =============================================================================

/**
 * Compression formats recognised on input files
 */
export type CompressionFormat = "gzip" | "zstd" | "none";

/**
 * Decompression configuration
 */
export interface DecompressorOptions {
  /** Abort signal checked between chunks */
  readonly signal?: AbortSignal;
  /** Progress callback receiving compressed bytes consumed so far */
  readonly onProgress?: (bytesProcessed: number) => void;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Branded type for validated file paths
 * Ensures file paths have been validated before use in I/O operations
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Maximum file size to prevent memory exhaustion (default: 10GB) */
  readonly maxFileSize?: number;
  /** AbortController signal for cancelling operations */
  readonly signal?: AbortSignal;
  /** Whether to automatically detect and decompress compressed files (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression format detection (default: auto-detect) */
  readonly compressionFormat?: CompressionFormat;
  /** Longest line `readLinesFromFile` accepts (default: 1,000,000) */
  readonly maxLineLength?: number;
}

/**
 * File metadata gathered before a read
 */
export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  readonly lastModified: Date;
  /** File extension including the leading dot, or "" */
  readonly extension: string;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

/**
 * Line processing result for streaming text files
 * Handles incomplete lines and buffer management
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation schema
 * Rejects empty paths and paths containing null bytes
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject("a path without null characters");
    }
    return true;
  })
  .pipe((path) => path as FilePath);

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "maxFileSize?": "number>=0",
  "signal?": "unknown",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"zstd"|"none"',
  "maxLineLength?": "number>0",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && options.bufferSize > 1_048_576) {
    return ctx.reject("bufferSize of at most 1MB");
  }
  if (options.maxLineLength !== undefined && options.maxLineLength > MAX_LINE_LENGTH_LIMIT) {
    return ctx.reject("maxLineLength of at most 10MB");
  }
  return true;
});
