/**
 * Small FASTQ builders shared by the tests
 */

/**
 * Four lines of one record; quality defaults to 'I' (Q40) per base
 */
export function record(id: string, sequence: string, quality = "I".repeat(sequence.length)): string[] {
  return [`@${id}`, sequence, "+", quality];
}

/**
 * FASTQ text of the given records, newline-terminated
 */
export function fastqText(...records: string[][]): string {
  return `${records.flat().join("\n")}\n`;
}

/**
 * Deterministic pseudo-random reads for partition tests
 */
export function syntheticRecords(n: number, seed = 7): string[][] {
  const bases = "ACGTN";
  let state = seed;
  const next = (): number => {
    state = (state * 16807) % 2147483647;
    return state;
  };

  const records: string[][] = [];
  for (let i = 0; i < n; i++) {
    const length = 20 + (next() % 130);
    let sequence = "";
    let quality = "";
    for (let j = 0; j < length; j++) {
      sequence += bases.charAt(next() % bases.length);
      quality += String.fromCharCode(33 + (next() % 42));
    }
    records.push(record(`read${i}`, sequence, quality));
  }
  return records;
}

/**
 * Collect an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}
