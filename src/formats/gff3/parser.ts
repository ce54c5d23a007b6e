/**
 * GFF3 line classifier and record parser
 *
 * Unlike the AGP parser this one yields every line, classified, so that a
 * consumer can write the file back out with headers, comments and the
 * embedded FASTA section intact.
 *
 * @module gff3/parser
 */

import { type } from "arktype";
import {
  LiftoverError,
  MalformedAnnotationRecordError,
  ParseError,
  ValidationError,
} from "../../errors";
import { readLines, splitLines } from "../../io/stream-utils";
import { MAX_LINE_LENGTH_LIMIT } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { Gff3Line, Gff3ParserOptions, Gff3Record, Gff3SequenceRegionLine } from "./types";
import { GFF3_FIELD_COUNTS } from "./types";

const Gff3ParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "signal?": "unknown",
  "includeTrivia?": "boolean",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > MAX_LINE_LENGTH_LIMIT) {
    return ctx.reject("maxLineLength of at most 10MB");
  }
  return true;
});

const SEQUENCE_REGION = /^##sequence-region(?:\s|$)/;

/**
 * Whether a line is a `##` header line
 */
export function isHeaderLine(line: string): boolean {
  return line.startsWith("##");
}

/**
 * Whether a line is a `##sequence-region` header
 */
export function isSequenceRegionHeader(line: string): boolean {
  return SEQUENCE_REGION.test(line);
}

/**
 * Whether a line is the directive that opens the embedded FASTA section
 */
export function isFastaDirective(line: string): boolean {
  return line.trimEnd() === "##FASTA";
}

/**
 * Parse a `##sequence-region` header
 *
 * Missing tokens are left undefined; a header with no seqid yields "".
 *
 * @example
 * ```typescript
 * parseSequenceRegion("##sequence-region scafA 1 5000", 1);
 * // { kind: "sequence-region", seqid: "scafA", start: "1", end: "5000", ... }
 * ```
 */
export function parseSequenceRegion(line: string, lineNumber: number): Gff3SequenceRegionLine {
  const [, seqid = "", start, end] = line.trim().split(/\s+/, 4);
  return {
    kind: "sequence-region",
    raw: line,
    lineNumber,
    seqid,
    ...(start !== undefined && { start }),
    ...(end !== undefined && { end }),
  };
}

/**
 * Split a data line into a named-field record
 *
 * @throws {MalformedAnnotationRecordError} If fewer than 7 columns are present
 */
export function parseGff3Record(line: string, lineNumber: number): Gff3Record {
  const fields = line.split("\t");
  if (fields.length < GFF3_FIELD_COUNTS.MINIMUM) {
    throw MalformedAnnotationRecordError.forFieldCount(
      line,
      lineNumber,
      GFF3_FIELD_COUNTS.MINIMUM,
      fields.length
    );
  }

  const [seqid = "", source = "", featureType = "", start = "", end = "", score = "", strand = ""] =
    fields;
  const phase = fields[7];
  const attributes = fields[8];

  return {
    seqid,
    source,
    type: featureType,
    start,
    end,
    score,
    strand,
    ...(phase !== undefined && { phase }),
    ...(attributes !== undefined && { attributes }),
    extraFields: fields.slice(GFF3_FIELD_COUNTS.STANDARD),
    lineNumber,
  };
}

/**
 * Classify a single GFF3 line
 *
 * @param inSequenceSection - true once `##FASTA` has been seen
 * @throws {MalformedAnnotationRecordError} For data lines with too few columns
 */
export function classifyGff3Line(
  line: string,
  lineNumber: number,
  inSequenceSection = false
): Gff3Line {
  if (inSequenceSection) {
    return { kind: "sequence", raw: line, lineNumber };
  }
  if (line.trim() === "") {
    return { kind: "blank", raw: line, lineNumber };
  }
  if (isSequenceRegionHeader(line)) {
    return parseSequenceRegion(line, lineNumber);
  }
  if (isHeaderLine(line)) {
    const body = line.slice(2);
    const split = body.search(/\s/);
    return {
      kind: "directive",
      raw: line,
      lineNumber,
      name: split === -1 ? body : body.slice(0, split),
      value: split === -1 ? "" : body.slice(split).trim(),
    };
  }
  if (line.startsWith("#")) {
    return { kind: "comment", raw: line, lineNumber };
  }
  return { kind: "record", raw: line, lineNumber, record: parseGff3Record(line, lineNumber) };
}

/**
 * Streaming GFF3 parser yielding classified lines
 *
 * @example
 * ```typescript
 * const parser = new Gff3Parser({ includeTrivia: false });
 * for await (const line of parser.parseFile("scaffolds.gff3.gz")) {
 *   if (line.kind === "record") console.log(line.record.seqid);
 * }
 * ```
 */
export class Gff3Parser extends AbstractParser<Gff3Line, Gff3ParserOptions> {
  constructor(options: Gff3ParserOptions = {}) {
    const validationResult = Gff3ParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid GFF3 parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<Gff3ParserOptions> {
    return { includeTrivia: true };
  }

  protected getFormatName(): string {
    return "GFF3";
  }

  override async *parseString(data: string): AsyncIterable<Gff3Line> {
    yield* this.parseLines(splitLines(data, this.options.maxLineLength));
  }

  override async *parseFile(filePath: string): AsyncIterable<Gff3Line> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath cannot be empty");
    }

    try {
      const { createStream } = await import("../../io/file-reader");
      const stream = await createStream(filePath);
      yield* this.parseLines(readLines(stream, this.options.maxLineLength));
    } catch (error) {
      if (error instanceof LiftoverError) {
        throw error;
      }
      throw new ParseError(
        `Failed to parse GFF3 file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "GFF3",
        undefined,
        `File path: ${filePath}`
      );
    }
  }

  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<Gff3Line> {
    yield* this.parseLines(readLines(stream, this.options.maxLineLength));
  }

  override async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>
  ): AsyncIterable<Gff3Line> {
    let lineNumber = 0;
    let inSequenceSection = false;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();
      this.checkLineLength(line, lineNumber);

      const classified = classifyGff3Line(line, lineNumber, inSequenceSection);
      if (classified.kind === "directive" && isFastaDirective(line)) {
        inSequenceSection = true;
      }
      if (
        this.options.includeTrivia === false &&
        (classified.kind === "comment" || classified.kind === "blank")
      ) {
        continue;
      }
      yield classified;
    }
  }
}
