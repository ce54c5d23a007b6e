/**
 * GFF3 annotation type definitions
 *
 * Records keep every column as text so that a line which is not rewritten
 * can be reproduced byte for byte.
 *
 * @module gff3/types
 */

import type { ParserOptions } from "../../types";

/**
 * A GFF3 feature record with named columns
 */
export interface Gff3Record {
  /** Sequence the feature lies on (scaffold or chromosome) */
  readonly seqid: string;
  readonly source: string;
  readonly type: string;
  /** Start coordinate as written (1-based inclusive) */
  readonly start: string;
  /** End coordinate as written (1-based inclusive) */
  readonly end: string;
  readonly score: string;
  /** Strand symbol as written: "+", "-", "." or "?" */
  readonly strand: string;
  readonly phase?: string;
  readonly attributes?: string;
  /** Columns beyond the ninth, preserved in order */
  readonly extraFields: readonly string[];
  readonly lineNumber: number;
}

/**
 * Fields every classified line carries
 */
interface Gff3LineBase {
  /** The line exactly as read, without terminator */
  readonly raw: string;
  readonly lineNumber: number;
}

/**
 * `##name value` directive other than sequence-region
 */
export interface Gff3DirectiveLine extends Gff3LineBase {
  readonly kind: "directive";
  readonly name: string;
  readonly value: string;
}

/**
 * `##sequence-region <seqid> <start> <end>` declaration
 */
export interface Gff3SequenceRegionLine extends Gff3LineBase {
  readonly kind: "sequence-region";
  readonly seqid: string;
  readonly start?: string;
  readonly end?: string;
}

export interface Gff3CommentLine extends Gff3LineBase {
  readonly kind: "comment";
}

export interface Gff3BlankLine extends Gff3LineBase {
  readonly kind: "blank";
}

export interface Gff3RecordLine extends Gff3LineBase {
  readonly kind: "record";
  readonly record: Gff3Record;
}

/**
 * A line inside the embedded FASTA section (after `##FASTA`)
 */
export interface Gff3SequenceLine extends Gff3LineBase {
  readonly kind: "sequence";
}

/**
 * A classified GFF3 line
 */
export type Gff3Line =
  | Gff3DirectiveLine
  | Gff3SequenceRegionLine
  | Gff3CommentLine
  | Gff3BlankLine
  | Gff3RecordLine
  | Gff3SequenceLine;

/**
 * GFF3 parser configuration options
 */
export interface Gff3ParserOptions extends ParserOptions {
  /** Yield comment and blank lines instead of skipping them (default: true) */
  includeTrivia?: boolean;
}

/**
 * Column counts for GFF3 records
 */
export const GFF3_FIELD_COUNTS = {
  /** Columns through strand; the minimum a record needs to be re-projected */
  MINIMUM: 7,
  STANDARD: 9,
} as const;
