/**
 * Compression format detection for annotation and assembly files
 *
 * Detection is by file extension, including the composite extensions
 * (`.gff3.gz`, `.agp.gz`) that annotation pipelines produce.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const COMPRESSION_EXTENSIONS = {
  gzip: [".gz", ".gzip", ".bgz"],
  zstd: [".zst", ".zstd"],
} as const;

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("/data/scaffolds.gff3.gz"); // "gzip"
 * CompressionDetector.fromExtension("/data/assembly.agp");      // "none"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");

    if (COMPRESSION_EXTENSIONS.gzip.some((ext) => normalizedPath.endsWith(ext))) {
      return "gzip";
    }
    if (COMPRESSION_EXTENSIONS.zstd.some((ext) => normalizedPath.endsWith(ext))) {
      return "zstd";
    }
    return "none";
  }
}
