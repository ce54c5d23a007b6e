/**
 * GFF3 annotation format
 *
 * @example
 * ```typescript
 * import { Gff3Parser } from "@/formats/gff3";
 *
 * for await (const line of new Gff3Parser().parseString(gffText)) {
 *   if (line.kind === "sequence-region") console.log(line.seqid);
 * }
 * ```
 *
 * @module gff3
 */

export {
  classifyGff3Line,
  Gff3Parser,
  isFastaDirective,
  isHeaderLine,
  isSequenceRegionHeader,
  parseGff3Record,
  parseSequenceRegion,
} from "./parser";
export type {
  Gff3BlankLine,
  Gff3CommentLine,
  Gff3DirectiveLine,
  Gff3Line,
  Gff3ParserOptions,
  Gff3Record,
  Gff3RecordLine,
  Gff3SequenceLine,
  Gff3SequenceRegionLine,
} from "./types";
export { GFF3_FIELD_COUNTS } from "./types";
export { Gff3Writer } from "./writer";
