/**
 * Tests for FASTQ record grouping, validation and quality decoding
 */

import { describe, expect, test } from "vitest";
import { DecodeError } from "../../src/errors";
import {
  charToScore,
  createRecordValidator,
  decodeQuality,
  encodeScores,
  extractId,
  gcPercent,
  groupRecords,
  hasOnlyValidBases,
  scoreToChar,
  splitLines,
  validateRecord,
} from "../../src/formats/fastq";
import type { RawRecord } from "../../src/types";
import { collect } from "../utils/fastq-fixtures";

describe("groupRecords", () => {
  test("groups lines by position modulo four", async () => {
    const lines = ["@r1", "ACGT", "+", "!!!!", "@r2", "GG", "+", "II"];
    const records = await collect(groupRecords(lines));

    expect(records).toEqual([
      ["@r1", "ACGT", "+", "!!!!"],
      ["@r2", "GG", "+", "II"],
    ]);
  });

  test("drops a trailing partial group and reports its size", async () => {
    const trailing: number[] = [];
    const lines = ["@r1", "ACGT", "+", "!!!!", "@r2", "AC"];
    const records = await collect(groupRecords(lines, { onTrailingLines: (n) => trailing.push(n) }));

    expect(records).toHaveLength(1);
    expect(trailing).toEqual([2]);
  });

  test("does not report trailing lines when the count is a multiple of four", async () => {
    const trailing: number[] = [];
    await collect(groupRecords(["@r1", "A", "+", "I"], { onTrailingLines: (n) => trailing.push(n) }));
    expect(trailing).toEqual([]);
  });

  test("keeps framing after a malformed record", async () => {
    const lines = ["r1", "ACGT", "+", "!!!!", "@r2", "GG", "+", "II"];
    const records = await collect(groupRecords(lines));

    expect(records[1]).toEqual(["@r2", "GG", "+", "II"]);
  });

  test("trims surrounding whitespace and carriage returns", async () => {
    const records = await collect(groupRecords(["  @r1\r", "ACGT\r", "+\r", "!!!!\r"]));
    expect(records).toEqual([["@r1", "ACGT", "+", "!!!!"]]);
  });

  test("accepts async line sources", async () => {
    async function* lines(): AsyncGenerator<string> {
      yield "@r1";
      yield "AC";
      yield "+";
      yield "II";
    }
    const records = await collect(groupRecords(lines()));
    expect(records).toEqual([["@r1", "AC", "+", "II"]]);
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(collect(groupRecords(["@r1", "A", "+", "I"], { signal: controller.signal }))).rejects.toThrow();
  });
});

describe("splitLines", () => {
  test("splits on LF and CRLF without a trailing empty line", () => {
    expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
    expect(splitLines("")).toEqual([]);
  });
});

describe("validateRecord", () => {
  const reject = (raw: RawRecord, relaxed = false): string | undefined => {
    const outcome = validateRecord(raw, { separatorMode: relaxed ? "relaxed" : "strict" });
    return outcome.ok ? undefined : outcome.reason;
  };

  test("accepts a well-formed record", () => {
    const outcome = validateRecord(["@r1", "ACGT", "+", "!!!!"]);
    expect(outcome).toEqual({
      ok: true,
      record: { header: "@r1", sequence: "ACGT", separator: "+", quality: "!!!!" },
    });
  });

  test("rejects a header without '@'", () => {
    expect(reject(["r1", "ACGT", "+", "!!!!"])).toBe("InvalidHeader");
  });

  test("rejects a separator other than '+'", () => {
    expect(reject(["@r1", "ACGT", "-", "!!!!"])).toBe("InvalidSeparator");
    expect(reject(["@r1", "ACGT", "+r1", "!!!!"])).toBe("InvalidSeparator");
  });

  test("relaxed mode accepts a separator repeating the id or title", () => {
    expect(reject(["@r1", "ACGT", "+r1", "!!!!"], true)).toBeUndefined();
    expect(reject(["@r1 lane=2", "ACGT", "+r1 lane=2", "!!!!"], true)).toBeUndefined();
    expect(reject(["@r1", "ACGT", "+r2", "!!!!"], true)).toBe("InvalidSeparator");
  });

  test("rejects bases outside ACGTN", () => {
    expect(reject(["@r1", "ACXT", "+", "!!!!"])).toBe("InvalidBases");
    expect(reject(["@r1", "AC-T", "+", "!!!!"])).toBe("InvalidBases");
  });

  test("accepts lower-case bases", () => {
    expect(reject(["@r1", "acgtn", "+", "!!!!!"])).toBeUndefined();
  });

  test("rejects sequence and quality of different lengths", () => {
    expect(reject(["@r1", "ACGT", "+", "!!!"])).toBe("LengthMismatch");
  });

  test("reports only the first broken rule", () => {
    expect(reject(["r1", "ACXT", "-", "!"])).toBe("InvalidHeader");
    expect(reject(["@r1", "ACXT", "-", "!"])).toBe("InvalidSeparator");
    expect(reject(["@r1", "ACXT", "+", "!"])).toBe("InvalidBases");
  });

  test("accepts an empty read", () => {
    expect(reject(["@r1", "", "+", ""])).toBeUndefined();
  });

  test("createRecordValidator binds the separator mode", () => {
    const validate = createRecordValidator({ separatorMode: "relaxed" });
    expect(validate(["@r1", "A", "+r1", "I"]).ok).toBe(true);
  });
});

describe("quality decoding", () => {
  test("decodes Phred+33 characters", () => {
    expect(decodeQuality("!I~")).toEqual([0, 40, 93]);
    expect(decodeQuality("")).toEqual([]);
    expect(charToScore("5")).toBe(20);
  });

  test("char to score to char is the identity over ASCII 33-126", () => {
    for (let code = 33; code <= 126; code++) {
      const char = String.fromCharCode(code);
      expect(scoreToChar(charToScore(char))).toBe(char);
    }
  });

  test("encodeScores inverts decodeQuality", () => {
    expect(encodeScores(decodeQuality("#+5?I"))).toBe("#+5?I");
  });

  test("throws DecodeError with position and code for characters out of range", () => {
    try {
      decodeQuality("II\u007f");
      expect.unreachable("Should have thrown DecodeError");
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError);
      if (error instanceof DecodeError) {
        expect(error.position).toBe(2);
        expect(error.charCode).toBe(127);
      }
    }

    expect(() => decodeQuality(" ")).toThrow(DecodeError);
  });

  test("scoreToChar rejects scores outside 0-93", () => {
    expect(() => scoreToChar(94)).toThrow(RangeError);
    expect(() => scoreToChar(-1)).toThrow(RangeError);
    expect(() => scoreToChar(1.5)).toThrow(RangeError);
  });
});

describe("primitives", () => {
  test("gcPercent stays within [0, 100]", () => {
    expect(gcPercent("GGCC")).toBe(100);
    expect(gcPercent("ACGT")).toBe(50);
    expect(gcPercent("atat")).toBe(0);
    expect(gcPercent("gGnN")).toBe(50);
    expect(gcPercent("")).toBe(0);
  });

  test("hasOnlyValidBases is case-insensitive and strict", () => {
    expect(hasOnlyValidBases("ACGTNacgtn")).toBe(true);
    expect(hasOnlyValidBases("ACGU")).toBe(false);
    expect(hasOnlyValidBases("Ł")).toBe(false);
  });

  test("extractId takes the text before the first whitespace", () => {
    expect(extractId("@r1 lane=2")).toBe("r1");
    expect(extractId("@r1\tx")).toBe("r1");
    expect(extractId("@")).toBe("");
  });
});
