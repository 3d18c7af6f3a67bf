/**
 * Tests for file reading and line splitting
 */

import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { BufferError, ChunkCancelledError, ChunkIOError, FileError } from "../../src/errors";
import { createStream, detectCompression, exists, getSize, readFileLines } from "../../src/io/file-reader";
import { processBuffer, readLines } from "../../src/io/stream-utils";
import { ChunkProcessor } from "../../src/operations/chunk-processor";
import { fileSources, runChunks } from "../../src/operations/pool";
import { collect, fastqText, record, syntheticRecords } from "../utils/fastq-fixtures";

let fixturesDir = "";
const fixture = (name: string): string => join(fixturesDir, name);

const READS = fastqText(record("r1", "ACGT", "IIII"), record("r2", "GGCC", "!!!!"));

beforeAll(() => {
  fixturesDir = mkdtempSync(join(tmpdir(), "readqc-io-"));
  writeFileSync(fixture("reads.fastq"), READS);
  writeFileSync(fixture("reads.fastq.gz"), gzipSync(READS));
  writeFileSync(fixture("endings.txt"), "a\nb\r\nc");
  writeFileSync(fixture("empty.fastq"), "");
  writeFileSync(fixture("long-line.fastq"), `@r1\n${"A".repeat(3_000_000)}\n+\n`);
  writeFileSync(fixture("many.fastq"), fastqText(...syntheticRecords(5000)));
  mkdirSync(fixture("a-directory"));
});

afterAll(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

const openDescriptors = (): number => readdirSync("/proc/self/fd").length;

function streamOf(...parts: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const part of parts) {
        controller.enqueue(encoder.encode(part));
      }
      controller.close();
    },
  });
}

describe("detectCompression", () => {
  test("detects gzip by extension", () => {
    expect(detectCompression("reads.fastq.gz")).toBe("gzip");
    expect(detectCompression("READS.FQ.GZIP")).toBe("gzip");
    expect(detectCompression("reads.fastq")).toBe("none");
  });
});

describe("file checks", () => {
  test("exists is true only for regular files", async () => {
    expect(await exists(fixture("reads.fastq"))).toBe(true);
    expect(await exists(fixture("missing.fastq"))).toBe(false);
    expect(await exists(fixture("a-directory"))).toBe(false);
  });

  test("invalid paths raise FileError", async () => {
    await expect(exists("")).rejects.toThrow(FileError);
    await expect(exists("reads\0.fastq")).rejects.toThrow(FileError);
  });

  test("getSize returns the byte length", async () => {
    expect(await getSize(fixture("endings.txt"))).toBe(6);
  });

  test("createStream fails for a missing file", async () => {
    await expect(createStream(fixture("missing.fastq"))).rejects.toThrow(FileError);
  });
});

describe("readFileLines", () => {
  test("splits LF and CRLF lines and keeps a final unterminated line", async () => {
    expect(await collect(readFileLines(fixture("endings.txt")))).toEqual(["a", "b", "c"]);
  });

  test("decompresses gzip files", async () => {
    const plain = await collect(readFileLines(fixture("reads.fastq")));
    const gzipped = await collect(readFileLines(fixture("reads.fastq.gz")));

    expect(gzipped).toEqual(plain);
    expect(gzipped).toEqual(["@r1", "ACGT", "+", "IIII", "@r2", "GGCC", "+", "!!!!"]);
  });

  test("reads plain files with decompression turned off", async () => {
    const lines = await collect(readFileLines(fixture("reads.fastq"), { autoDecompress: false }));
    expect(lines).toHaveLength(8);
  });

  test("an empty file has no lines", async () => {
    expect(await collect(readFileLines(fixture("empty.fastq")))).toEqual([]);
  });
});

describe("stream utilities", () => {
  test("processBuffer keeps the incomplete tail as remainder", () => {
    expect(processBuffer("a\nb\r\nrest")).toEqual({ lines: ["a", "b"], remainder: "rest" });
    expect(processBuffer("")).toEqual({ lines: [], remainder: "" });
  });

  test("processBuffer rejects overlong lines", () => {
    expect(() => processBuffer(`${"A".repeat(1_000_001)}\n`)).toThrow(BufferError);
  });

  test("readLines joins lines split across chunks", async () => {
    const lines = await collect(readLines(streamOf("@r1\r", "\nAC", "GT\n+\n", "II")));
    expect(lines).toEqual(["@r1", "ACGT", "+", "II"]);
  });
});

describe("ChunkProcessor.processFile", () => {
  test("processes plain and gzip chunk files alike", async () => {
    const processor = new ChunkProcessor();
    const plain = await processor.processFile(fixture("reads.fastq"), { sourceIdentifier: "chunk" });
    const gzipped = await processor.processFile(fixture("reads.fastq.gz"), { sourceIdentifier: "chunk" });

    expect(plain.stats.count).toBe(2);
    expect(plain.stats.sumQuality).toBe(160);
    expect(gzipped).toEqual(plain);
  });
});

describe("fileSources", () => {
  test("feeds chunk files to the pool", async () => {
    const run = await runChunks(
      fileSources([fixture("reads.fastq"), fixture("reads.fastq.gz"), fixture("missing.fastq")])
    );

    expect(run.completed).toBe(2);
    expect(run.result.stats.count).toBe(4);
    expect(run.failures.map((failure) => failure.sourceIdentifier)).toEqual([fixture("missing.fastq")]);
  });
});

describe.skipIf(!existsSync("/proc/self/fd"))("abandoned file chunks", () => {
  const processor = new ChunkProcessor();

  test("a chunk failing on an overlong line closes its file", async () => {
    const before = openDescriptors();
    for (let i = 0; i < 20; i++) {
      await expect(processor.processFile(fixture("long-line.fastq"))).rejects.toThrow(ChunkIOError);
    }
    expect(openDescriptors() - before).toBeLessThan(5);
  });

  test("a chunk aborted mid-read closes its file", async () => {
    const before = openDescriptors();
    for (let i = 0; i < 20; i++) {
      const controller = new AbortController();
      async function* abortAfterFirstLine(): AsyncGenerator<string> {
        for await (const line of readFileLines(fixture("many.fastq"))) {
          yield line;
          controller.abort();
        }
      }
      await expect(
        processor.process(abortAfterFirstLine(), { sourceIdentifier: "many", signal: controller.signal })
      ).rejects.toThrow(ChunkCancelledError);
    }
    expect(openDescriptors() - before).toBeLessThan(5);
  });

  test("a consumer that stops early closes the file", async () => {
    const before = openDescriptors();
    for (let i = 0; i < 20; i++) {
      for await (const line of readFileLines(fixture("many.fastq"))) {
        expect(line).toBe("@read0");
        break;
      }
    }
    expect(openDescriptors() - before).toBeLessThan(5);
  });
});
