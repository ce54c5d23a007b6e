/**
 * AGP assembly-map parser
 *
 * Rows are tab-separated. Blank lines, comments and `##agp-version`
 * directives are skipped. Every remaining row becomes an AgpRecord or a
 * MalformedAssemblyRecordError.
 *
 * @module agp/parser
 */

import { type } from "arktype";
import {
  LiftoverError,
  MalformedAssemblyRecordError,
  ParseError,
  ValidationError,
} from "../../errors";
import { readLines, splitLines } from "../../io/stream-utils";
import { MAX_LINE_LENGTH_LIMIT } from "../../types";
import { AbstractParser } from "../abstract-parser";
import type { AgpGapType, AgpParserOptions, AgpRecord } from "./types";
import { AGP_FIELD_COUNTS } from "./types";

const AgpParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "signal?": "unknown",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > MAX_LINE_LENGTH_LIMIT) {
    return ctx.reject("maxLineLength of at most 10MB");
  }
  return true;
});

const POSITIVE_INTEGER = /^[1-9][0-9]*$/;

/**
 * Whether a component type denotes a gap row
 */
export function isGapType(componentType: string): componentType is AgpGapType {
  return componentType === "N" || componentType === "U";
}

/**
 * Parse one AGP row
 *
 * Returns null for blank lines and `#` lines.
 *
 * @throws {MalformedAssemblyRecordError} If the row has too few columns or
 *   a non-positive-integer coordinate or part number
 * @example
 * ```typescript
 * const record = parseAgpLine("chr1\t1\t1000\t1\tW\tscafA\t1\t1000\t+", 1);
 * // record.kind === "component", record.componentId === "scafA"
 * ```
 */
export function parseAgpLine(rawLine: string, lineNumber: number): AgpRecord | null {
  const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
  if (line.trim() === "" || line.startsWith("#")) {
    return null;
  }

  const fields = line.split("\t");
  if (fields.length < AGP_FIELD_COUNTS.CLASSIFY) {
    throw MalformedAssemblyRecordError.forFieldCount(
      line,
      lineNumber,
      AGP_FIELD_COUNTS.CLASSIFY,
      fields.length
    );
  }

  const [object = "", startText = "", endText = "", partText = "", componentType = ""] = fields;
  const objectStart = parsePositiveInteger(startText, "object start", line, lineNumber);
  const objectEnd = parsePositiveInteger(endText, "object end", line, lineNumber);
  const partNumber = parsePositiveInteger(partText, "part number", line, lineNumber);

  if (isGapType(componentType)) {
    const [, , , , , gapLength, gapType, linkage, linkageEvidence] = fields;
    return {
      kind: "gap",
      object,
      objectStart,
      objectEnd,
      partNumber,
      componentType,
      lineNumber,
      ...(gapLength !== undefined && { gapLength }),
      ...(gapType !== undefined && { gapType }),
      ...(linkage !== undefined && { linkage }),
      ...(linkageEvidence !== undefined && { linkageEvidence }),
    };
  }

  if (fields.length < AGP_FIELD_COUNTS.COMPONENT) {
    throw MalformedAssemblyRecordError.forFieldCount(
      line,
      lineNumber,
      AGP_FIELD_COUNTS.COMPONENT,
      fields.length
    );
  }

  const [, , , , , componentId = "", componentStart = "", componentEnd = "", orientation = ""] =
    fields;
  return {
    kind: "component",
    object,
    objectStart,
    objectEnd,
    partNumber,
    componentType,
    componentId,
    componentStart,
    componentEnd,
    orientation,
    lineNumber,
  };
}

function parsePositiveInteger(
  text: string,
  column: string,
  line: string,
  lineNumber: number
): number {
  const value = Number(text);
  if (!POSITIVE_INTEGER.test(text) || !Number.isSafeInteger(value)) {
    throw new MalformedAssemblyRecordError(
      `AGP row ${lineNumber} has ${column} '${text}', expected a positive integer`,
      line,
      lineNumber
    );
  }
  return value;
}

/**
 * Streaming AGP parser
 *
 * @example
 * ```typescript
 * const parser = new AgpParser();
 * for await (const record of parser.parseFile("chromosomes.agp")) {
 *   if (record.kind === "component") console.log(record.componentId);
 * }
 * ```
 */
export class AgpParser extends AbstractParser<AgpRecord, AgpParserOptions> {
  constructor(options: AgpParserOptions = {}) {
    const validationResult = AgpParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid AGP parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<AgpParserOptions> {
    return {};
  }

  protected getFormatName(): string {
    return "AGP";
  }

  override async *parseString(data: string): AsyncIterable<AgpRecord> {
    yield* this.parseLines(splitLines(data, this.options.maxLineLength));
  }

  override async *parseFile(filePath: string): AsyncIterable<AgpRecord> {
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
        `Failed to parse AGP file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "AGP",
        undefined,
        `File path: ${filePath}`
      );
    }
  }

  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<AgpRecord> {
    yield* this.parseLines(readLines(stream, this.options.maxLineLength));
  }

  override async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>
  ): AsyncIterable<AgpRecord> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();
      this.checkLineLength(line, lineNumber);

      const record = parseAgpLine(line, lineNumber);
      if (record !== null) {
        yield record;
      }
    }
  }
}
