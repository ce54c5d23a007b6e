/**
 * Tests for file writing on top of Effect Platform
 */

import { readdirSync, readFileSync, writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import {
  deleteFile,
  openForWriting,
  renameFile,
  writeLines,
  writeString,
} from "../../src/io/file-writer";
import { expectRejection } from "../utils/async";
import { createTempDir } from "../utils/temp-files";
import type { TempDir } from "../utils/temp-files";

describe("file writer", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.remove();
  });

  test("writeString overwrites the file", async () => {
    const path = dir.file("out.gff3");
    await writeString(path, "first\n");
    await writeString(path, "second\n");
    expect(readFileSync(path, "utf8")).toBe("second\n");
  });

  test("writeLines terminates every line", async () => {
    const path = dir.file("out.gff3");
    const written = await writeLines(path, ["##gff-version 3", "chr1\tsrc\tgene\t1\t2\t.\t+"]);

    expect(written).toBe(2);
    expect(readFileSync(path, "utf8")).toBe("##gff-version 3\nchr1\tsrc\tgene\t1\t2\t.\t+\n");
  });

  test("writeLines drains async sources in batches", async () => {
    async function* lines(): AsyncIterable<string> {
      for (let i = 1; i <= 5; i++) {
        yield `line ${i}`;
      }
    }

    const path = dir.file("out.gff3");
    expect(await writeLines(path, lines(), { batchSize: 2 })).toBe(5);
    expect(readFileSync(path, "utf8")).toBe("line 1\nline 2\nline 3\nline 4\nline 5\n");
  });

  test("writeLines creates an empty file for no lines", async () => {
    const path = dir.file("empty.gff3");
    expect(await writeLines(path, [])).toBe(0);
    expect(readFileSync(path, "utf8")).toBe("");
  });

  test("openForWriting returns the callback result", async () => {
    const path = dir.file("out.txt");
    const result = await openForWriting(path, async (handle) => {
      await handle.writeString("a");
      await handle.writeBytes(new TextEncoder().encode("b"));
      return "done";
    });

    expect(result).toBe("done");
    expect(readFileSync(path, "utf8")).toBe("ab");
  });

  test("openForWriting propagates callback errors", async () => {
    const path = dir.file("out.txt");
    const error = await expectRejection(
      openForWriting(path, async () => {
        throw new RangeError("stop here");
      }),
      RangeError
    );
    expect(error.message).toBe("stop here");
  });

  test("openForWriting reports unopenable paths", async () => {
    const error = await expectRejection(
      openForWriting(dir.file("no/such/dir/out.txt"), async () => undefined),
      FileError
    );
    expect(error.operation).toBe("open");
  });

  test("atomic writeLines replaces the file only on success", async () => {
    const path = dir.file("out.gff3");
    writeFileSync(path, "old\n");

    expect(await writeLines(path, ["new"], { atomic: true })).toBe(1);
    expect(readFileSync(path, "utf8")).toBe("new\n");
    expect(readdirSync(dir.path)).toEqual(["out.gff3"]);
  });

  test("atomic writeLines leaves the file alone when the source fails", async () => {
    async function* failing(): AsyncIterable<string> {
      yield "partial";
      throw new RangeError("source broke");
    }

    const path = dir.file("out.gff3");
    writeFileSync(path, "old\n");

    await expectRejection(writeLines(path, failing(), { atomic: true, batchSize: 1 }), RangeError);
    expect(readFileSync(path, "utf8")).toBe("old\n");
    expect(readdirSync(dir.path)).toEqual(["out.gff3"]);
  });

  test("renameFile and deleteFile", async () => {
    writeFileSync(dir.file("a.txt"), "a");
    await renameFile(dir.file("a.txt"), dir.file("b.txt"));
    expect(readdirSync(dir.path)).toEqual(["b.txt"]);

    await deleteFile(dir.file("b.txt"));
    await deleteFile(dir.file("missing.txt"));
    expect(readdirSync(dir.path)).toEqual([]);

    const error = await expectRejection(
      renameFile(dir.file("missing.txt"), dir.file("c.txt")),
      FileError
    );
    expect(error.operation).toBe("rename");
  });
});
