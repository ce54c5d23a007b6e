/**
 * Compression support for input files
 *
 * @example
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from "@/compression";
 *
 * if (CompressionDetector.fromExtension(path) === "gzip") {
 *   stream = GzipDecompressor.wrapStream(stream);
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { GzipDecompressor } from "./gzip";
export { DecompressionService, type DecompressionServiceShape } from "./service";
export type { CompressionFormat, DecompressorOptions } from "../types";
