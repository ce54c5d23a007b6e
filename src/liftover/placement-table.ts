/**
 * Scaffold placement table built from an AGP assembly map
 *
 * The table is built once, before any annotation is read, and is immutable
 * afterwards. Gap rows never touch it. When a scaffold or chromosome appears
 * on several component rows the last row wins.
 *
 * @module liftover/placement-table
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { AgpParser } from "../formats/agp";
import type { AgpComponentRecord, AgpRecord } from "../formats/agp";
import type { ParserOptions } from "../types";
import type { Interval, Orientation } from "./coordinates";
import { orientationFromSymbol, placementOffset } from "./coordinates";

/**
 * Where a scaffold lies on a chromosome
 */
export interface ScaffoldPlacement {
  readonly chromosome: string;
  /** Chromosome-space start for forward placements, end for reverse */
  readonly offset: number;
  readonly orientation: Orientation;
}

/**
 * Chromosome span reported in synthesized sequence-region headers
 */
export type ChromosomeExtent = Interval;

/**
 * How chromosome extents are derived from component rows
 *
 * - `last`: the span of the last component row seen for the chromosome
 * - `span`: the minimum start and maximum end over all its component rows
 */
export type ExtentMode = "last" | "span";

/**
 * Options for building a placement table
 */
export interface PlacementTableOptions extends ParserOptions {
  /** Extent derivation (default: "last") */
  extentMode?: ExtentMode;
}

const PlacementTableOptionsSchema = type({
  "extentMode?": '"last"|"span"',
  "maxLineLength?": "number>0",
  "signal?": "unknown",
});

/**
 * Immutable scaffold → placement and chromosome → extent lookup
 */
export class PlacementTable {
  private constructor(
    private readonly placements: ReadonlyMap<string, ScaffoldPlacement>,
    private readonly extents: ReadonlyMap<string, ChromosomeExtent>
  ) {}

  /**
   * Build a table from already-parsed AGP records
   */
  static fromRecords(
    records: Iterable<AgpRecord>,
    options: PlacementTableOptions = {}
  ): PlacementTable {
    const builder = new PlacementTableBuilder(options);
    for (const record of records) {
      builder.add(record);
    }
    return builder.build();
  }

  /** @internal */
  static create(
    placements: Map<string, ScaffoldPlacement>,
    extents: Map<string, ChromosomeExtent>
  ): PlacementTable {
    return new PlacementTable(new Map(placements), new Map(extents));
  }

  /**
   * Placement of a scaffold, or undefined when the map does not place it
   */
  lookup(scaffold: string): ScaffoldPlacement | undefined {
    return this.placements.get(scaffold);
  }

  has(scaffold: string): boolean {
    return this.placements.has(scaffold);
  }

  extent(chromosome: string): ChromosomeExtent | undefined {
    return this.extents.get(chromosome);
  }

  /**
   * Chromosome identifiers in ascending code-unit order
   */
  chromosomes(): string[] {
    return [...this.extents.keys()].sort();
  }

  /**
   * Number of placed scaffolds
   */
  get size(): number {
    return this.placements.size;
  }
}

/**
 * Incremental placement table builder
 *
 * @example
 * ```typescript
 * const builder = new PlacementTableBuilder();
 * for await (const record of new AgpParser().parseFile("chromosomes.agp")) {
 *   builder.add(record);
 * }
 * const table = builder.build();
 * ```
 */
export class PlacementTableBuilder {
  private readonly placements = new Map<string, ScaffoldPlacement>();
  private readonly placementLines = new Map<string, number>();
  private readonly extents = new Map<string, ChromosomeExtent>();
  private readonly extentMode: ExtentMode;
  private readonly onWarning: (warning: string, lineNumber?: number) => void;

  constructor(options: PlacementTableOptions = {}) {
    const validationResult = PlacementTableOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid placement table options: ${validationResult.summary}`);
    }

    this.extentMode = options.extentMode ?? "last";
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`AGP Warning${where}: ${warning}`);
      });
  }

  /**
   * Record one AGP row; gap rows are ignored
   */
  add(record: AgpRecord): this {
    if (record.kind === "gap") {
      return this;
    }

    this.addPlacement(record);
    this.addExtent(record);
    return this;
  }

  /**
   * Freeze the accumulated rows into a table
   */
  build(): PlacementTable {
    return PlacementTable.create(this.placements, this.extents);
  }

  private addPlacement(record: AgpComponentRecord): void {
    const orientation = orientationFromSymbol(record.orientation);
    const previousLine = this.placementLines.get(record.componentId);
    if (previousLine !== undefined) {
      this.onWarning(
        `Scaffold ${record.componentId} is placed again (previously on line ${previousLine}); the later placement wins`,
        record.lineNumber
      );
    }

    this.placements.set(
      record.componentId,
      Object.freeze({
        chromosome: record.object,
        offset: placementOffset(record.objectStart, record.objectEnd, orientation),
        orientation,
      })
    );
    this.placementLines.set(record.componentId, record.lineNumber);
  }

  private addExtent(record: AgpComponentRecord): void {
    const previous = this.extents.get(record.object);
    const next: ChromosomeExtent =
      this.extentMode === "span" && previous !== undefined
        ? {
            start: Math.min(previous.start, record.objectStart),
            end: Math.max(previous.end, record.objectEnd),
          }
        : { start: record.objectStart, end: record.objectEnd };

    this.extents.set(record.object, Object.freeze(next));
  }
}

/**
 * Parse AGP lines and build the placement table
 *
 * @throws {MalformedAssemblyRecordError} On the first malformed row
 * @example
 * ```typescript
 * const table = await buildPlacementTable(readLinesFromFile("chromosomes.agp"));
 * table.lookup("scafA"); // { chromosome: "chr1", offset: 1, orientation: "forward" }
 * ```
 */
export async function buildPlacementTable(
  source: Iterable<string> | AsyncIterable<string>,
  options: PlacementTableOptions = {}
): Promise<PlacementTable> {
  const builder = new PlacementTableBuilder(options);
  const parser = new AgpParser({
    ...(options.maxLineLength !== undefined && { maxLineLength: options.maxLineLength }),
    ...(options.signal !== undefined && { signal: options.signal }),
    ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
  });

  for await (const record of parser.parseLines(source)) {
    builder.add(record);
  }
  return builder.build();
}
