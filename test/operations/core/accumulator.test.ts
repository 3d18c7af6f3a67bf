import { describe, expect, test } from "vitest";
import { DecodeError } from "../../../src/errors";
import { gcBin, observe, QcAccumulator } from "../../../src/operations/core/accumulator";
import { resolveQcOptions } from "../../../src/operations/options";
import type { FastqRecord } from "../../../src/types";

const fastq = (sequence: string, quality: string): FastqRecord => ({
  header: "@r",
  sequence,
  separator: "+",
  quality,
});

describe("observe", () => {
  test("computes length, GC and scores once per record", () => {
    expect(observe(fastq("acGT", "!+5I"))).toEqual({
      length: 4,
      gcPercent: 50,
      qualityScores: [0, 10, 20, 40],
      bases: "ACGT",
    });
  });

  test("throws DecodeError for characters outside Phred+33", () => {
    expect(() => observe(fastq("AC", "I "))).toThrow(DecodeError);
  });
});

describe("gcBin", () => {
  test("floors percentages and keeps 100% in the last bin", () => {
    expect(gcBin(0)).toBe(0);
    expect(gcBin(99.9)).toBe(99);
    expect(gcBin(100)).toBe(100);
  });
});

describe("QcAccumulator", () => {
  test("folds a single read", () => {
    const accumulator = new QcAccumulator();
    accumulator.fold(observe(fastq("ACGT", "!!!!")));
    const result = accumulator.snapshot("chunk-0");

    expect(result.kind).toBe("chunk");
    expect(result.sourceIdentifier).toBe("chunk-0");
    expect(result.stats).toEqual({
      count: 1,
      sumLength: 4,
      sumSquaresLength: 16,
      minLength: 4,
      maxLength: 4,
      sumGC: 50,
      sumSquaresGC: 2500,
      sumQuality: 0,
      sumSquaresQuality: 0,
      minQuality: 0,
      maxQuality: 0,
    });
    expect(result.composition).toEqual({ A: 1, C: 1, G: 1, T: 1, N: 0 });
    expect(result.qualityHistogram).toHaveLength(94);
    expect(result.qualityHistogram[0]).toBe(4);
    expect(result.gcHistogram).toHaveLength(101);
    expect(result.gcHistogram[50]).toBe(1);
    expect(result.reservoir.gc).toEqual([50]);
    expect(result.reservoir.quality).toEqual([0, 0, 0, 0]);
    expect(result.positionProfile.positions).toHaveLength(4);
  });

  test("an empty accumulator keeps null extrema", () => {
    const result = new QcAccumulator().snapshot("empty");

    expect(result.stats.count).toBe(0);
    expect(result.stats.minLength).toBeNull();
    expect(result.stats.maxQuality).toBeNull();
    expect(result.positionProfile.positions).toEqual([]);
    expect(result.discards.total).toBe(0);
  });

  test("counts discards by reason", () => {
    const accumulator = new QcAccumulator();
    accumulator.recordDiscard("InvalidBases");
    accumulator.recordDiscard("InvalidBases");
    accumulator.recordDiscard("DecodeError");
    accumulator.recordTrailingLines(3);

    const { discards } = accumulator.snapshot("c");
    expect(discards).toEqual({
      total: 3,
      byReason: {
        InvalidHeader: 0,
        InvalidSeparator: 0,
        InvalidBases: 2,
        LengthMismatch: 0,
        DecodeError: 1,
      },
      trailingLines: 3,
    });
  });

  test("counts reads passing the length and N filter", () => {
    const accumulator = new QcAccumulator(resolveQcOptions({ filterMinLength: 4 }));
    const reads = ["ACGT", "ACG", "ACGTNACGTN", "ACGTACGTAN", "ACGTACGTACGN", "nacgtacgtacg"];
    for (const sequence of reads) {
      accumulator.fold(observe(fastq(sequence, "I".repeat(sequence.length))));
    }

    expect(accumulator.snapshot("c").passingFilter).toBe(3);
  });

  test("applies the default filter of 50 bases and under 10% N", () => {
    const accumulator = new QcAccumulator();
    accumulator.fold(observe(fastq("A".repeat(49), "I".repeat(49))));
    accumulator.fold(observe(fastq("A".repeat(50), "I".repeat(50))));
    accumulator.fold(observe(fastq(`${"A".repeat(45)}NNNNN`, "I".repeat(50))));
    accumulator.fold(observe(fastq(`${"A".repeat(46)}NNNN`, "I".repeat(50))));

    expect(accumulator.snapshot("c").passingFilter).toBe(2);
  });

  test("samples by stride using the configured options", () => {
    const accumulator = new QcAccumulator(resolveQcOptions({ sampleStride: 2, qualitySamplePositions: 1 }));
    const reads: Array<[string, string]> = [
      ["GG", "!!"],
      ["AA", "++"],
      ["GA", "55"],
      ["AA", "??"],
      ["AT", "II"],
    ];
    for (const [sequence, quality] of reads) {
      accumulator.fold(observe(fastq(sequence, quality)));
    }

    const { reservoir } = accumulator.snapshot("c");
    expect(reservoir.stride).toBe(2);
    expect(reservoir.gc).toEqual([100, 50, 0]);
    expect(reservoir.quality).toEqual([0, 20, 40]);
  });

  test("snapshots are frozen and do not reset the state", () => {
    const accumulator = new QcAccumulator();
    accumulator.fold(observe(fastq("A", "I")));
    const first = accumulator.snapshot("c");
    accumulator.fold(observe(fastq("C", "I")));

    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.stats)).toBe(true);
    expect(first.stats.count).toBe(1);
    expect(accumulator.snapshot("c").stats.count).toBe(2);
    expect(accumulator.count).toBe(2);
  });
});
