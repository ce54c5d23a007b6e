/**
 * Tests for AGP row parsing
 */

import { writeFileSync } from "node:fs";
import { beforeEach, describe, expect, test } from "vitest";
import { MalformedAssemblyRecordError, ParseError, ValidationError } from "../../src/errors";
import { AgpParser, isGapType, parseAgpLine } from "../../src/formats/agp";
import { collect, expectRejection, expectThrow } from "../utils/async";
import { createTempDir } from "../utils/temp-files";

describe("parseAgpLine", () => {
  test("parses a component row into named fields", () => {
    expect(parseAgpLine("chr1\t1101\t1600\t3\tW\tscafB\t1\t500\t-", 7)).toEqual({
      kind: "component",
      object: "chr1",
      objectStart: 1101,
      objectEnd: 1600,
      partNumber: 3,
      componentType: "W",
      componentId: "scafB",
      componentStart: "1",
      componentEnd: "500",
      orientation: "-",
      lineNumber: 7,
    });
  });

  test("parses a full gap row", () => {
    expect(parseAgpLine("chr1\t1001\t1100\t2\tN\t100\tscaffold\tyes\tpaired-ends", 2)).toEqual({
      kind: "gap",
      object: "chr1",
      objectStart: 1001,
      objectEnd: 1100,
      partNumber: 2,
      componentType: "N",
      gapLength: "100",
      gapType: "scaffold",
      linkage: "yes",
      linkageEvidence: "paired-ends",
      lineNumber: 2,
    });
  });

  test("classifies a gap row from five columns", () => {
    const record = parseAgpLine("chr1\t1001\t1100\t2\tU", 1);
    expect(record?.kind).toBe("gap");
    expect(record?.componentType).toBe("U");
  });

  test("skips blank lines and comments", () => {
    expect(parseAgpLine("", 1)).toBeNull();
    expect(parseAgpLine("   ", 1)).toBeNull();
    expect(parseAgpLine("# comment", 1)).toBeNull();
    expect(parseAgpLine("##agp-version\t2.1", 1)).toBeNull();
  });

  test("strips a trailing carriage return", () => {
    const record = parseAgpLine("chr1\t1\t1000\t1\tW\tscafA\t1\t1000\t+\r", 1);
    expect(record?.kind === "component" ? record.orientation : undefined).toBe("+");
  });

  test("rejects rows that are too short to classify", () => {
    const error = expectThrow(() => parseAgpLine("chr1\t1\t1000\t1", 4), MalformedAssemblyRecordError);
    expect(error.message).toBe("AGP row 4 has 4 tab-separated fields, expected at least 5");
    expect(error.format).toBe("AGP");
    expect(error.context).toBe("Row content: chr1\t1\t1000\t1");
  });

  test("rejects a zero part number", () => {
    const error = expectThrow(
      () => parseAgpLine("chr1\t1\t1000\t0\tW\tscafA\t1\t1000\t+", 3),
      MalformedAssemblyRecordError
    );
    expect(error.message).toBe("AGP row 3 has part number '0', expected a positive integer");
  });

  test("rejects negative and fractional coordinates", () => {
    expectThrow(() => parseAgpLine("chr1\t-1\t1000\t1\tW\tscafA\t1\t1000\t+", 1), MalformedAssemblyRecordError);
    expectThrow(() => parseAgpLine("chr1\t1\t10.5\t1\tW\tscafA\t1\t1000\t+", 1), MalformedAssemblyRecordError);
  });
});

describe("isGapType", () => {
  test("recognizes N and U only", () => {
    expect(isGapType("N")).toBe(true);
    expect(isGapType("U")).toBe(true);
    expect(isGapType("W")).toBe(false);
    expect(isGapType("n")).toBe(false);
  });
});

describe("AgpParser", () => {
  let parser: AgpParser;

  beforeEach(() => {
    parser = new AgpParser();
  });

  test("parses rows from a string and keeps source line numbers", async () => {
    const data = [
      "##agp-version\t2.1",
      "chr1\t1\t1000\t1\tW\tscafA\t1\t1000\t+",
      "",
      "chr1\t1001\t1100\t2\tN\t100\tscaffold\tyes\tpaired-ends",
    ].join("\n");

    const records = await collect(parser.parseString(data));
    expect(records.map((record) => [record.kind, record.lineNumber])).toEqual([
      ["component", 2],
      ["gap", 4],
    ]);
  });

  test("parses CRLF input", async () => {
    const records = await collect(
      parser.parseString("chr1\t1\t1000\t1\tW\tscafA\t1\t1000\t-\r\nchr2\t1\t9\t1\tW\tscafB\t1\t9\t+\r\n")
    );
    expect(records).toHaveLength(2);
    expect(records[0]?.kind === "component" ? records[0].orientation : undefined).toBe("-");
  });

  test("reports the failing line", async () => {
    const error = await expectRejection(
      collect(parser.parseLines(["chr1\t1\t1000\t1\tW\tscafA\t1\t1000\t+", "broken"])),
      MalformedAssemblyRecordError
    );
    expect(error.lineNumber).toBe(2);
    expect(error.actualFields).toBe(1);
  });

  test("enforces the maximum line length", async () => {
    const short = new AgpParser({ maxLineLength: 10 });
    const error = await expectRejection(
      collect(short.parseLines(["chr1\t1\t1000\t1\tW\tscafA\t1\t1000\t+"])),
      ParseError
    );
    expect(error.message).toBe("Line too long (30 > 10)");
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const aborting = new AgpParser({ signal: controller.signal });

    const error = await expectRejection(collect(aborting.parseLines(["chr1"])), ParseError);
    expect(error.message).toBe("Operation aborted during AGP parsing");
    expect(error.format).toBe("ABORTED");
  });

  test("rejects an oversized maxLineLength", () => {
    const error = expectThrow(() => new AgpParser({ maxLineLength: 20_000_000 }), ValidationError);
    expect(error.message).toContain("Invalid AGP parser options");
  });

  test("rejects an empty file path", async () => {
    await expectRejection(collect(parser.parseFile("")), ValidationError);
  });

  test("honours a raised maxLineLength when reading files", async () => {
    const dir = createTempDir();
    try {
      const path = dir.file("long.agp");
      writeFileSync(path, `#${"x".repeat(2_000_000)}\nchr1\t1\t1000\t1\tW\tscafA\t1\t1000\t+\n`);

      const records = await collect(new AgpParser({ maxLineLength: 5_000_000 }).parseFile(path));
      expect(records.map((record) => record.lineNumber)).toEqual([2]);
    } finally {
      dir.remove();
    }
  });
});
