/**
 * BED3 peak reader and writer tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { BedError, ParseError } from "../../src/errors";
import { BedParser, BedWriter, validateCoordinates } from "../../src/formats/bed";
import { collect } from "../../src/io/stream-utils";

describe("BedParser", () => {
  let warnings: Array<[string, number | undefined]>;
  let parser: BedParser;

  beforeEach(() => {
    warnings = [];
    parser = new BedParser({
      onWarning: (warning, lineNumber) => {
        warnings.push([warning, lineNumber]);
      },
    });
  });

  test("parses minimal BED3 peaks", async () => {
    const peaks = await collect(parser.parseString("chr1\t1000\t2000\nchr2\t5\t10\n"));
    expect(peaks).toEqual([
      { chromosome: "chr1", start: 1000, end: 2000 },
      { chromosome: "chr2", start: 5, end: 10 },
    ]);
  });

  test("ignores columns past the third and accepts space separators", async () => {
    const peaks = await collect(parser.parseString("chr1 100 200 peak_1 950 +\n"));
    expect(peaks).toEqual([{ chromosome: "chr1", start: 100, end: 200 }]);
  });

  test("skips comments, track and browser lines, and blank lines", async () => {
    const data = [
      "# called with default settings",
      'track name="peaks"',
      "browser position chr1:1-1000",
      "chr1\t1000\t2000",
      "",
      "   ",
      "chr2\t3000\t4000",
    ].join("\n");

    const peaks = await collect(parser.parseString(data));
    expect(peaks.map((p) => p.chromosome)).toEqual(["chr1", "chr2"]);
  });

  test("handles CRLF line endings", async () => {
    const peaks = await collect(parser.parseString("chr1\t1\t2\r\nchr1\t3\t4\r\n"));
    expect(peaks).toEqual([
      { chromosome: "chr1", start: 1, end: 2 },
      { chromosome: "chr1", start: 3, end: 4 },
    ]);
  });

  test("skips empty peaks with a warning", async () => {
    const peaks = await collect(parser.parseString("chr1\t100\t200\nchr1\t200\t200\n"));

    expect(peaks).toEqual([{ chromosome: "chr1", start: 100, end: 200 }]);
    expect(warnings).toEqual([["Skipping empty peak chr1:200-200", 2]]);
  });

  test("logs skipped peaks to the console by default", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const peaks = await collect(new BedParser().parseString("chr1\t300\t100\n"));
      expect(peaks).toEqual([]);
      expect(warn).toHaveBeenCalledWith("BED Warning (line 1): Skipping empty peak chr1:300-100");
    } finally {
      warn.mockRestore();
    }
  });

  test("skips a column header line with a warning", async () => {
    const peaks = await collect(parser.parseString("chrom\tstart\tend\nchr1\t100\t200\n"));

    expect(peaks).toEqual([{ chromosome: "chr1", start: 100, end: 200 }]);
    expect(warnings).toEqual([["Invalid start: 'start' is not a valid integer", 1]]);
  });

  test("logs skipped header lines to the console by default", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const peaks = await collect(new BedParser().parseString("chrom\tstart\tend\nchr1\t1\t2\n"));
      expect(peaks).toEqual([{ chromosome: "chr1", start: 1, end: 2 }]);
      expect(warn).toHaveBeenCalledWith(
        "BED Warning (line 1): Invalid start: 'start' is not a valid integer"
      );
    } finally {
      warn.mockRestore();
    }
  });

  test("skips short and non-integer lines with a warning", async () => {
    const data = ["chr1\t100", "chr1\tabc\t10", "chr1\t10\t2.5", "chr2\t5\t10"].join("\n");
    const peaks = await collect(parser.parseString(data));

    expect(peaks).toEqual([{ chromosome: "chr2", start: 5, end: 10 }]);
    expect(warnings).toEqual([
      ["BED format requires at least 3 fields, got 2", 1],
      ["Invalid start: 'abc' is not a valid integer", 2],
      ["Invalid end: '2.5' is not a valid integer", 3],
    ]);
  });

  test("throws BedError for negative coordinates", async () => {
    await expect(collect(parser.parseString("chr1\t-5\t10\n"))).rejects.toThrow(
      "Coordinates cannot be negative"
    );
  });

  test("reports the failing line number", async () => {
    try {
      await collect(parser.parseString("chr1\t1\t2\nchr1\t-1\t2\n"));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BedError);
      if (error instanceof BedError) {
        expect(error.lineNumber).toBe(2);
        expect(error.chromosome).toBe("chr1");
        expect(error.start).toBe(-1);
      }
    }
  });

  test("routes malformed lines to onError and keeps going", async () => {
    const errors: Array<[string, number | undefined]> = [];
    const lenient = new BedParser({
      onError: (error, lineNumber) => {
        errors.push([error, lineNumber]);
      },
    });

    const peaks = await collect(
      lenient.parseString("chr1\t100\nchr1\t5\t10\nchr1\t-3\t4\n")
    );

    expect(peaks).toEqual([{ chromosome: "chr1", start: 5, end: 10 }]);
    expect(errors).toEqual([
      ["BED format requires at least 3 fields, got 2", 1],
      ["Coordinates cannot be negative", 3],
    ]);
  });

  test("rejects lines over the length limit", async () => {
    const strict = new BedParser({ maxLineLength: 10 });
    await expect(collect(strict.parseString("chr1\t1000\t2000\n"))).rejects.toThrow(
      "Line too long (14 > 10)"
    );
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const abortable = new BedParser({ signal: controller.signal });

    await expect(collect(abortable.parseString("chr1\t1\t2\n"))).rejects.toThrow(
      "Operation aborted during BED parsing"
    );
    await expect(collect(abortable.parseString("chr1\t1\t2\n"))).rejects.toBeInstanceOf(
      ParseError
    );
  });
});

describe("validateCoordinates", () => {
  test("accepts non-negative safe integers", () => {
    expect(validateCoordinates(0, 10)).toEqual({ valid: true });
  });

  test("rejects negative and unsafe values", () => {
    expect(validateCoordinates(-1, 10)).toEqual({
      valid: false,
      error: "Coordinates cannot be negative",
    });
    expect(validateCoordinates(0, 2 ** 60)).toEqual({
      valid: false,
      error: "Coordinates exceed the safe integer range",
    });
  });
});

describe("BedWriter", () => {
  const writer = new BedWriter();

  test("formats tab-separated BED3 lines", () => {
    expect(writer.formatInterval({ chromosome: "chr1", start: 100, end: 260 })).toBe(
      "chr1\t100\t260"
    );
    expect(
      writer.formatIntervals([
        { chromosome: "chr1", start: 1, end: 2 },
        { chromosome: "chr2", start: 3, end: 4 },
      ])
    ).toBe("chr1\t1\t2\nchr2\t3\t4\n");
    expect(writer.formatIntervals([])).toBe("");
  });
});

describe("BED files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "peakset-bed-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("writes peaks that read back unchanged", async () => {
    const path = join(dir, "union.bed");
    const peaks = [
      { chromosome: "chr1", start: 100, end: 260 },
      { chromosome: "chr2", start: 10, end: 40 },
    ];

    await new BedWriter().writeFile(path, peaks);
    expect(await collect(new BedParser().parseFile(path))).toEqual(peaks);
  });

  test("streams a file with a trailing partial line", async () => {
    const path = join(dir, "peaks.bed");
    await writeFile(path, "chr1\t1\t5\nchr1\t7\t9", "utf8");

    expect(await collect(new BedParser().parseFile(path))).toEqual([
      { chromosome: "chr1", start: 1, end: 5 },
      { chromosome: "chr1", start: 7, end: 9 },
    ]);
  });
});
