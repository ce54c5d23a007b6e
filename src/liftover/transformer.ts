/**
 * Annotation stream transformer
 *
 * Rewrites scaffold-space GFF3 lines into chromosome space in one forward
 * pass. Header lines are held back until the first non-header line so that
 * sequence-region declarations for placed scaffolds can be replaced by
 * declarations for their chromosomes.
 *
 * @module liftover/transformer
 */

import { type } from "arktype";
import { MalformedAnnotationRecordError, ParseError, ValidationError } from "../errors";
import {
  Gff3Writer,
  isFastaDirective,
  isHeaderLine,
  isSequenceRegionHeader,
  parseGff3Record,
  parseSequenceRegion,
} from "../formats/gff3";
import type { Gff3Record } from "../formats/gff3";
import { parseCoordinate, projectInterval, projectStrand } from "./coordinates";
import type { PlacementTable, ScaffoldPlacement } from "./placement-table";

/**
 * Transformer states
 *
 * ACCUMULATING_HEADERS → STREAMING → EMBEDDED_SEQUENCE
 */
export enum TransformerState {
  ACCUMULATING_HEADERS, // Buffering `##` lines until the first other line
  STREAMING, // Rewriting records, passing everything else through
  EMBEDDED_SEQUENCE, // After ##FASTA; every line passes through
}

/**
 * Annotation transformation options
 */
export interface TransformOptions {
  /** Follow each unmapped record with a `#<seqid> not mapped to a chromosome` comment */
  debug?: boolean;
  /** Emit chromosome sequence-region headers even when the input has no headers */
  alwaysEmitSequenceRegions?: boolean;
  /** Abort signal checked between lines */
  signal?: AbortSignal;
}

const TransformOptionsSchema = type({
  "debug?": "boolean",
  "alwaysEmitSequenceRegions?": "boolean",
  "signal?": "unknown",
});

/**
 * Line-at-a-time transformation state machine
 *
 * `push` returns the output lines produced by one input line (possibly none
 * while headers are buffered); `finish` returns whatever end of input
 * releases.
 *
 * @example
 * ```typescript
 * const transformer = new AnnotationTransformer(table);
 * const out = [...lines.flatMap((line) => transformer.push(line)), ...transformer.finish()];
 * ```
 */
export class AnnotationTransformer {
  private currentState = TransformerState.ACCUMULATING_HEADERS;
  private readonly pendingHeaders: string[] = [];
  private headersSeen = false;
  private lineNumber = 0;
  private readonly writer = new Gff3Writer();
  private readonly debug: boolean;
  private readonly alwaysEmitSequenceRegions: boolean;

  constructor(
    private readonly table: PlacementTable,
    options: TransformOptions = {}
  ) {
    const validationResult = TransformOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid transform options: ${validationResult.summary}`);
    }
    this.debug = options.debug ?? false;
    this.alwaysEmitSequenceRegions = options.alwaysEmitSequenceRegions ?? false;
  }

  get state(): TransformerState {
    return this.currentState;
  }

  /**
   * Feed one input line (without terminator)
   *
   * A trailing `\r` left by CRLF input is dropped.
   *
   * @throws {MalformedAnnotationRecordError} For records with fewer than 7
   *   columns, or mapped records with non-integer coordinates
   */
  push(rawLine: string): string[] {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    this.lineNumber++;

    switch (this.currentState) {
      case TransformerState.EMBEDDED_SEQUENCE:
        return [line];
      case TransformerState.STREAMING:
        return this.processLine(line);
      case TransformerState.ACCUMULATING_HEADERS:
        return this.accumulate(line);
    }
  }

  /**
   * Signal end of input
   *
   * Releases buffered headers of a header-only input.
   */
  finish(): string[] {
    if (this.currentState !== TransformerState.ACCUMULATING_HEADERS) {
      return [];
    }
    this.currentState = TransformerState.STREAMING;
    return this.flushHeaders();
  }

  private accumulate(line: string): string[] {
    if (isHeaderLine(line) && !isFastaDirective(line)) {
      this.headersSeen = true;
      const keep =
        !isSequenceRegionHeader(line) ||
        !this.table.has(parseSequenceRegion(line, this.lineNumber).seqid);
      if (keep) {
        this.pendingHeaders.push(line);
      }
      return [];
    }

    this.currentState = TransformerState.STREAMING;
    return [...this.flushHeaders(), ...this.processLine(line)];
  }

  private flushHeaders(): string[] {
    if (!this.headersSeen && !this.alwaysEmitSequenceRegions) {
      return [];
    }

    const output = this.pendingHeaders.splice(0);
    for (const chromosome of this.table.chromosomes()) {
      const extent = this.table.extent(chromosome);
      if (extent !== undefined) {
        output.push(this.writer.formatSequenceRegion(chromosome, extent.start, extent.end));
      }
    }
    return output;
  }

  private processLine(line: string): string[] {
    if (isFastaDirective(line)) {
      this.currentState = TransformerState.EMBEDDED_SEQUENCE;
      return [line];
    }
    if (line.startsWith("#") || line.trim() === "") {
      return [line];
    }

    const record = parseGff3Record(line, this.lineNumber);
    const placement = this.table.lookup(record.seqid);
    if (placement === undefined) {
      return this.debug ? [line, `#${record.seqid} not mapped to a chromosome`] : [line];
    }

    return [this.writer.formatRecord(this.liftRecord(record, placement, line))];
  }

  private liftRecord(record: Gff3Record, placement: ScaffoldPlacement, line: string): Gff3Record {
    const start = this.coordinate(record.start, "start", line);
    const end = this.coordinate(record.end, "end", line);
    const projected = projectInterval({ start, end }, placement.offset, placement.orientation);

    if (!Number.isSafeInteger(projected.start) || !Number.isSafeInteger(projected.end)) {
      throw new MalformedAnnotationRecordError(
        `GFF3 record on line ${this.lineNumber} projects outside the safe integer range`,
        line,
        this.lineNumber
      );
    }

    return {
      ...record,
      seqid: placement.chromosome,
      start: String(projected.start),
      end: String(projected.end),
      strand: projectStrand(record.strand, placement.orientation),
    };
  }

  private coordinate(text: string, column: "start" | "end", line: string): number {
    const value = parseCoordinate(text);
    if (value === undefined) {
      throw new MalformedAnnotationRecordError(
        `GFF3 record on line ${this.lineNumber} has ${column} '${text}', expected an integer`,
        line,
        this.lineNumber
      );
    }
    return value;
  }
}

/**
 * Re-project an annotation stream into chromosome space
 *
 * The returned sequence is lazy: input is pulled only as output is consumed.
 *
 * @throws {MalformedAnnotationRecordError} On the first malformed record
 * @throws {ParseError} If the signal is aborted
 * @example
 * ```typescript
 * const table = await buildPlacementTable(readLinesFromFile("chromosomes.agp"));
 * for await (const line of transformAnnotations(table, readLinesFromFile("scaffolds.gff3"))) {
 *   console.log(line);
 * }
 * ```
 */
export async function* transformAnnotations(
  table: PlacementTable,
  source: Iterable<string> | AsyncIterable<string>,
  options: TransformOptions = {}
): AsyncIterable<string> {
  const transformer = new AnnotationTransformer(table, options);

  for await (const line of source) {
    if (options.signal?.aborted === true) {
      throw new ParseError("Operation aborted during GFF3 transformation", "ABORTED");
    }
    yield* transformer.push(line);
  }
  yield* transformer.finish();
}
