/**
 * chromolift - lift GFF3 annotations from scaffolds onto chromosomes
 *
 * Reads an AGP assembly map describing where each scaffold sits on its
 * chromosome and re-projects scaffold-space GFF3 features into
 * chromosome-space coordinates.
 */

// Compression infrastructure
export { CompressionDetector, DecompressionService, GzipDecompressor } from "./compression";
export type { DecompressionServiceShape } from "./compression";
// Error types
export {
  BufferError,
  CompressionError,
  FileError,
  LiftoverError,
  MalformedAnnotationRecordError,
  MalformedAssemblyRecordError,
  ParseError,
  StreamError,
  ValidationError,
} from "./errors";
// AGP format
export { AGP_FIELD_COUNTS, AgpParser, isGapType, parseAgpLine } from "./formats/agp";
export type {
  AgpComponentRecord,
  AgpGapRecord,
  AgpGapType,
  AgpParserOptions,
  AgpRecord,
} from "./formats/agp";
// GFF3 format
export {
  classifyGff3Line,
  GFF3_FIELD_COUNTS,
  Gff3Parser,
  Gff3Writer,
  isFastaDirective,
  isHeaderLine,
  isSequenceRegionHeader,
  parseGff3Record,
  parseSequenceRegion,
} from "./formats/gff3";
export type { Gff3Line, Gff3ParserOptions, Gff3Record } from "./formats/gff3";
// File I/O infrastructure
export { FileReader, createStream, readLinesFromFile } from "./io/file-reader";
export { deleteFile, FileWriter, openForWriting, renameFile, writeLines } from "./io/file-writer";
export type { FileWriteHandle, WriteLinesOptions } from "./io/file-writer";
export { StreamUtils } from "./io/stream-utils";
// Liftover core
export {
  AnnotationTransformer,
  buildPlacementTable,
  flipStrand,
  liftoverFiles,
  PlacementTable,
  PlacementTableBuilder,
  projectInterval,
  TransformerState,
  transformAnnotations,
} from "./liftover";
export type {
  ChromosomeExtent,
  ExtentMode,
  LiftoverFilesOptions,
  LiftoverProgress,
  Orientation,
  PlacementTableOptions,
  ScaffoldPlacement,
  TransformOptions,
} from "./liftover";
// Core types
export type {
  CompressionFormat,
  DecompressorOptions,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  ParserOptions,
} from "./types";

/**
 * Library version
 */
export const VERSION = "0.1.0";
