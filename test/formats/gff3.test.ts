/**
 * Tests for GFF3 line classification, record parsing and formatting
 */

import { describe, expect, test } from "vitest";
import { MalformedAnnotationRecordError } from "../../src/errors";
import {
  classifyGff3Line,
  Gff3Parser,
  Gff3Writer,
  isFastaDirective,
  isHeaderLine,
  isSequenceRegionHeader,
  parseGff3Record,
  parseSequenceRegion,
} from "../../src/formats/gff3";
import { collect, expectThrow } from "../utils/async";

describe("classifyGff3Line", () => {
  test("classifies directives", () => {
    expect(classifyGff3Line("##gff-version 3.1.26", 1)).toEqual({
      kind: "directive",
      raw: "##gff-version 3.1.26",
      lineNumber: 1,
      name: "gff-version",
      value: "3.1.26",
    });
    expect(classifyGff3Line("###", 2)).toEqual({
      kind: "directive",
      raw: "###",
      lineNumber: 2,
      name: "#",
      value: "",
    });
  });

  test("classifies sequence-region headers", () => {
    expect(classifyGff3Line("##sequence-region scafA 1 1000", 3)).toEqual({
      kind: "sequence-region",
      raw: "##sequence-region scafA 1 1000",
      lineNumber: 3,
      seqid: "scafA",
      start: "1",
      end: "1000",
    });
  });

  test("classifies comments and blank lines", () => {
    expect(classifyGff3Line("# made by hand", 1).kind).toBe("comment");
    expect(classifyGff3Line("", 1).kind).toBe("blank");
    expect(classifyGff3Line(" \t", 1).kind).toBe("blank");
  });

  test("classifies records", () => {
    const line = classifyGff3Line("scafA\tsrc\tgene\t10\t50\t.\t+\t.\tID=g1", 5);
    expect(line.kind).toBe("record");
    expect(line.kind === "record" ? line.record.seqid : undefined).toBe("scafA");
  });

  test("treats every line as sequence inside the FASTA section", () => {
    expect(classifyGff3Line("##gff-version 3", 9, true).kind).toBe("sequence");
    expect(classifyGff3Line(">scafA", 10, true).kind).toBe("sequence");
  });
});

describe("header predicates", () => {
  test("recognize header lines", () => {
    expect(isHeaderLine("##gff-version 3")).toBe(true);
    expect(isHeaderLine("# comment")).toBe(false);
  });

  test("recognize sequence-region headers", () => {
    expect(isSequenceRegionHeader("##sequence-region scafA 1 10")).toBe(true);
    expect(isSequenceRegionHeader("##sequence-region")).toBe(true);
    expect(isSequenceRegionHeader("##sequence-regions scafA")).toBe(false);
  });

  test("recognize the FASTA directive", () => {
    expect(isFastaDirective("##FASTA")).toBe(true);
    expect(isFastaDirective("##FASTA  ")).toBe(true);
    expect(isFastaDirective("##fasta")).toBe(false);
  });
});

describe("parseSequenceRegion", () => {
  test("leaves missing tokens undefined", () => {
    expect(parseSequenceRegion("##sequence-region", 1)).toEqual({
      kind: "sequence-region",
      raw: "##sequence-region",
      lineNumber: 1,
      seqid: "",
    });
  });

  test("splits on any whitespace", () => {
    const region = parseSequenceRegion("##sequence-region\tscafB   5\t900", 2);
    expect([region.seqid, region.start, region.end]).toEqual(["scafB", "5", "900"]);
  });
});

describe("parseGff3Record", () => {
  test("names all nine columns", () => {
    expect(parseGff3Record("scafA\tsrc\tgene\t10\t50\t0.5\t-\t0\tID=g1;Name=a b", 4)).toEqual({
      seqid: "scafA",
      source: "src",
      type: "gene",
      start: "10",
      end: "50",
      score: "0.5",
      strand: "-",
      phase: "0",
      attributes: "ID=g1;Name=a b",
      extraFields: [],
      lineNumber: 4,
    });
  });

  test("keeps columns beyond the ninth", () => {
    const record = parseGff3Record("s\tsrc\tgene\t1\t2\t.\t+\t.\tID=x\tfoo\tbar", 1);
    expect(record.extraFields).toEqual(["foo", "bar"]);
  });

  test("accepts seven-column records", () => {
    const record = parseGff3Record("s\tsrc\tgene\t1\t2\t.\t+", 1);
    expect(record.phase).toBeUndefined();
    expect(record.attributes).toBeUndefined();
  });

  test("rejects records with fewer than seven columns", () => {
    const error = expectThrow(
      () => parseGff3Record("s\tsrc\tgene\t1\t2\t.", 8),
      MalformedAnnotationRecordError
    );
    expect(error.message).toBe("GFF3 record on line 8 has 6 tab-separated fields, expected at least 7");
    expect(error.context).toBe("Record content: s\tsrc\tgene\t1\t2\t.");
  });
});

describe("Gff3Parser", () => {
  const data = [
    "##gff-version 3",
    "# comment",
    "scafA\tsrc\tgene\t10\t50\t.\t+\t.\tID=g1",
    "",
    "##FASTA",
    ">scafA",
    "ACGT",
  ].join("\n");

  test("yields every line classified", async () => {
    const lines = await collect(new Gff3Parser().parseString(data));
    expect(lines.map((line) => line.kind)).toEqual([
      "directive",
      "comment",
      "record",
      "blank",
      "directive",
      "sequence",
      "sequence",
    ]);
    expect(lines.map((line) => line.lineNumber)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  test("drops comments and blank lines without trivia", async () => {
    const lines = await collect(new Gff3Parser({ includeTrivia: false }).parseString(data));
    expect(lines.map((line) => line.raw)).toEqual([
      "##gff-version 3",
      "scafA\tsrc\tgene\t10\t50\t.\t+\t.\tID=g1",
      "##FASTA",
      ">scafA",
      "ACGT",
    ]);
  });
});

describe("Gff3Writer", () => {
  const writer = new Gff3Writer();

  test("formats a record back to its source line", () => {
    const line = "scafA\tsrc\tgene\t10\t50\t.\t+\t.\tID=g1\textra";
    expect(writer.formatRecord(parseGff3Record(line, 1))).toBe(line);
  });

  test("omits absent optional columns", () => {
    const line = "scafA\tsrc\tgene\t10\t50\t.\t+";
    expect(writer.formatRecord(parseGff3Record(line, 1))).toBe(line);
  });

  test("formats sequence-region headers", () => {
    expect(writer.formatSequenceRegion("chr1", 1, 1000)).toBe("##sequence-region chr1 1 1000");
  });

  test("formats several records", () => {
    const records = [
      parseGff3Record("a\ts\tgene\t1\t2\t.\t+", 1),
      parseGff3Record("b\ts\tgene\t3\t4\t.\t-", 2),
    ];
    expect(writer.formatRecords(records)).toBe("a\ts\tgene\t1\t2\t.\t+\nb\ts\tgene\t3\t4\t.\t-\n");
    expect(writer.formatRecords([])).toBe("");
  });
});
