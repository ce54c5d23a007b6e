/**
 * Tests for byte-stream to line splitting
 */

import { describe, expect, test } from "vitest";
import { BufferError, StreamError } from "../../src/errors";
import { processBuffer, readLines, splitLines } from "../../src/io/stream-utils";
import { collect, expectRejection, expectThrow, streamOf } from "../utils/async";

describe("processBuffer", () => {
  test("splits complete lines and carries the remainder", () => {
    expect(processBuffer("a\nb\r\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
  });

  test("treats a bare carriage return as a line ending", () => {
    expect(processBuffer("a\rb\n")).toEqual({ lines: ["a", "b"], remainder: "" });
  });

  test("holds back a trailing carriage return", () => {
    expect(processBuffer("a\r")).toEqual({ lines: [], remainder: "a\r" });
  });

  test("keeps empty lines", () => {
    expect(processBuffer("\n\nx\n")).toEqual({ lines: ["", "", "x"], remainder: "" });
  });

  test("enforces the given line length", () => {
    const complete = expectThrow(() => processBuffer("abcd\nef", 3), BufferError);
    expect(complete.message).toBe("Line too long: 4 characters exceeds maximum 3");

    const partial = expectThrow(() => processBuffer("abc\nabcdef", 5), BufferError);
    expect(partial.message).toBe("Incomplete line too long: 6 characters exceeds maximum 5");
  });
});

describe("splitLines", () => {
  test("drops only the empty final segment", () => {
    expect(splitLines("x\ny\n")).toEqual(["x", "y"]);
    expect(splitLines("x\n\ny")).toEqual(["x", "", "y"]);
    expect(splitLines("x\r")).toEqual(["x"]);
    expect(splitLines("")).toEqual([]);
  });
});

describe("readLines", () => {
  test("joins lines split across chunks", async () => {
    const lines = await collect(readLines(streamOf(["ab\r", "\ncd\n", "e"])));
    expect(lines).toEqual(["ab", "cd", "e"]);
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const lines = await collect(
      readLines(streamOf([new Uint8Array([0x61, 0xc3]), new Uint8Array([0xa9, 0x0a])]))
    );
    expect(lines).toEqual(["aé"]);
  });

  test("mixes line ending styles", async () => {
    const lines = await collect(readLines(streamOf(["Unix\nWindows\r\nMac\rEmpty\n\nDone"])));
    expect(lines).toEqual(["Unix", "Windows", "Mac", "Empty", "", "Done"]);
  });

  test("wraps stream failures in StreamError", async () => {
    const failing = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error("disk went away"));
      },
    });

    const error = await expectRejection(collect(readLines(failing)), StreamError);
    expect(error.message).toBe("Line reading failed: disk went away");
    expect(error.streamType).toBe("read");
  });

  test("accepts lines up to a raised limit", async () => {
    const long = "x".repeat(2_000_000);

    await expectRejection(collect(readLines(streamOf([`${long}\n`]))), BufferError);
    const lines = await collect(readLines(streamOf([`${long}\nshort\n`]), 5_000_000));
    expect(lines.map((line) => line.length)).toEqual([2_000_000, 5]);
  });

  test("cancels the stream when the consumer stops early", async () => {
    let cancelled = false;
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new TextEncoder().encode("row\n"));
      },
      cancel() {
        cancelled = true;
      },
    });

    const seen: string[] = [];
    for await (const line of readLines(endless)) {
      seen.push(line);
      break;
    }

    expect(seen).toEqual(["row"]);
    expect(cancelled).toBe(true);
  });
});
