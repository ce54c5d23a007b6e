/**
 * Scaffold-to-chromosome annotation liftover
 *
 * @example
 * ```typescript
 * import { liftoverFiles } from "@/liftover";
 * import { writeLines } from "@/io/file-writer";
 *
 * await writeLines(
 *   "chromosomes.gff3",
 *   liftoverFiles({ agpPath: "chromosomes.agp", gffPath: "scaffolds.gff3.gz" })
 * );
 * ```
 *
 * @module liftover
 */

import { readLinesFromFile } from "../io/file-reader";
import type { ParserOptions } from "../types";
import type { ExtentMode, PlacementTable } from "./placement-table";
import { buildPlacementTable } from "./placement-table";
import { transformAnnotations } from "./transformer";

/**
 * Milestones reported while a liftover runs
 */
export type LiftoverProgress =
  | { readonly stage: "reading-assembly"; readonly path: string }
  | { readonly stage: "assembly-read"; readonly scaffolds: number; readonly table: PlacementTable }
  | { readonly stage: "transforming"; readonly path: string };

/**
 * Inputs and options for a file-to-lines liftover
 */
export interface LiftoverFilesOptions {
  /** AGP assembly map; `.gz` is decompressed */
  agpPath: string;
  /** Scaffold-space GFF3; `.gz` is decompressed */
  gffPath: string;
  debug?: boolean;
  extentMode?: ExtentMode;
  alwaysEmitSequenceRegions?: boolean;
  /** Longest accepted input line in either file */
  maxLineLength?: number;
  signal?: AbortSignal;
  onWarning?: ParserOptions["onWarning"];
  onProgress?: (progress: LiftoverProgress) => void;
}

/**
 * Read an AGP and a GFF3 file and yield the lifted GFF3 lines
 *
 * The AGP is consumed completely before the first GFF3 line is read.
 */
export async function* liftoverFiles(options: LiftoverFilesOptions): AsyncIterable<string> {
  const { agpPath, gffPath, onProgress } = options;
  const readerOptions = {
    ...(options.signal !== undefined && { signal: options.signal }),
    ...(options.maxLineLength !== undefined && { maxLineLength: options.maxLineLength }),
  };

  onProgress?.({ stage: "reading-assembly", path: agpPath });
  const table = await buildPlacementTable(readLinesFromFile(agpPath, readerOptions), {
    ...readerOptions,
    ...(options.extentMode !== undefined && { extentMode: options.extentMode }),
    ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
  });
  onProgress?.({ stage: "assembly-read", scaffolds: table.size, table });

  onProgress?.({ stage: "transforming", path: gffPath });
  yield* transformAnnotations(table, readLinesFromFile(gffPath, readerOptions), {
    ...(options.signal !== undefined && { signal: options.signal }),
    ...(options.debug !== undefined && { debug: options.debug }),
    ...(options.alwaysEmitSequenceRegions !== undefined && {
      alwaysEmitSequenceRegions: options.alwaysEmitSequenceRegions,
    }),
  });
}

export type { Interval, Orientation } from "./coordinates";
export {
  flipStrand,
  orientationFromSymbol,
  parseCoordinate,
  placementOffset,
  projectInterval,
  projectStrand,
} from "./coordinates";
export type {
  ChromosomeExtent,
  ExtentMode,
  PlacementTableOptions,
  ScaffoldPlacement,
} from "./placement-table";
export { buildPlacementTable, PlacementTable, PlacementTableBuilder } from "./placement-table";
export type { TransformOptions } from "./transformer";
export { AnnotationTransformer, TransformerState, transformAnnotations } from "./transformer";
