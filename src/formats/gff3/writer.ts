/**
 * GFF3 format writer
 *
 * @module gff3/writer
 */

import type { Gff3Record } from "./types";

/**
 * Formats GFF3 records and headers back to text
 *
 * @example
 * ```typescript
 * const writer = new Gff3Writer();
 * writer.formatRecord({ ...record, seqid: "chr1" });
 * // "chr1\tsrc\tgene\t10\t50\t.\t+\t.\tID=g1"
 * ```
 */
export class Gff3Writer {
  /**
   * Format a record as a tab-separated line
   *
   * Columns absent from the source line (phase, attributes) stay absent.
   */
  formatRecord(record: Gff3Record): string {
    const fields: string[] = [
      record.seqid,
      record.source,
      record.type,
      record.start,
      record.end,
      record.score,
      record.strand,
    ];

    if (record.phase !== undefined) {
      fields.push(record.phase);
    }
    if (record.attributes !== undefined) {
      fields.push(record.attributes);
    }

    return [...fields, ...record.extraFields].join("\t");
  }

  /**
   * Format a `##sequence-region` header
   */
  formatSequenceRegion(seqid: string, start: number | string, end: number | string): string {
    return `##sequence-region ${seqid} ${start} ${end}`;
  }

  /**
   * Format several records, newline-terminated
   */
  formatRecords(records: Iterable<Gff3Record>): string {
    const lines: string[] = [];
    for (const record of records) {
      lines.push(this.formatRecord(record));
    }
    return lines.length > 0 ? `${lines.join("\n")}\n` : "";
  }
}
