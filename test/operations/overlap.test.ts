import { describe, expect, test } from "vitest";
import { merge1d, overlaps } from "../../src/operations/core/intervals";
import { findGenomicOverlaps, findOverlaps, sweepOverlaps } from "../../src/operations/overlap";
import { randomIntervals, seededRandom } from "../utils/random-intervals";

describe("findOverlaps", () => {
  test("finds every overlapping pair between sorted lists", () => {
    const peaks = [
      { start: 100, end: 180 },
      { start: 150, end: 220 },
      { start: 300, end: 330 },
      { start: 320, end: 350 },
    ];
    const regions = [
      { start: 160, end: 200 },
      { start: 310, end: 360 },
    ];

    expect(findOverlaps(peaks, regions)).toEqual([
      [0, 0],
      [1, 0],
      [2, 1],
      [3, 1],
    ]);
  });

  test("does not report touching intervals", () => {
    expect(findOverlaps([{ start: 0, end: 10 }], [{ start: 10, end: 20 }])).toEqual([]);
  });

  test("returns no pairs when either list is empty", () => {
    expect(findOverlaps([], [{ start: 0, end: 10 }])).toEqual([]);
    expect(findOverlaps([{ start: 0, end: 10 }], [])).toEqual([]);
  });

  test("advances the left list on equal ends", () => {
    const left = [
      { start: 0, end: 10 },
      { start: 2, end: 12 },
    ];
    expect(findOverlaps(left, [{ start: 0, end: 10 }])).toEqual([
      [0, 0],
      [1, 0],
    ]);
  });

  test("reports each overlapping pair of merged lists exactly once", () => {
    const random = seededRandom(101);

    for (let round = 0; round < 25; round++) {
      const a = merge1d(randomIntervals(random, 30, 2000, 80));
      const b = merge1d(randomIntervals(random, 30, 2000, 80));

      const expected: Array<[number, number]> = [];
      a.forEach((left, i) => {
        b.forEach((right, j) => {
          if (overlaps(left, right)) expected.push([i, j]);
        });
      });

      const found = findOverlaps(a, b);
      const keys = found.map(([i, j]) => `${i}:${j}`);
      expect(new Set(keys).size).toBe(found.length);
      expect([...keys].sort()).toEqual(expected.map(([i, j]) => `${i}:${j}`).sort());
    }
  });
});

describe("sweepOverlaps", () => {
  test("passes the overlapping elements and their positions", () => {
    const hits: string[] = [];
    sweepOverlaps(
      [{ start: 0, end: 50, label: "a0" }],
      [
        { start: 10, end: 20, label: "b0" },
        { start: 40, end: 60, label: "b1" },
      ],
      (left, right, i, j) => {
        hits.push(`${left.label}@${i}-${right.label}@${j}`);
      }
    );
    expect(hits).toEqual(["a0@0-b0@0", "a0@0-b1@1"]);
  });
});

describe("findGenomicOverlaps", () => {
  test("sweeps each shared chromosome and reports input indices", () => {
    const peaks = [
      { chromosome: "chr1", start: 100, end: 180 },
      { chromosome: "chr1", start: 150, end: 220 },
      { chromosome: "chr1", start: 300, end: 330 },
      { chromosome: "chr2", start: 50, end: 100 },
    ];
    const promoters = [
      { chromosome: "chr1", start: 160, end: 200 },
      { chromosome: "chr1", start: 310, end: 360 },
      { chromosome: "chr2", start: 10, end: 60 },
    ];

    expect(findGenomicOverlaps(peaks, promoters)).toEqual([
      [0, 0],
      [1, 0],
      [2, 1],
      [3, 2],
    ]);
  });

  test("maps sorted positions back to unsorted input", () => {
    const a = [
      { chromosome: "chr1", start: 500, end: 600 },
      { chromosome: "chr1", start: 100, end: 200 },
    ];
    const b = [{ chromosome: "chr1", start: 150, end: 550 }];

    expect(findGenomicOverlaps(a, b)).toEqual([
      [1, 0],
      [0, 0],
    ]);
  });

  test("never compares intervals on different chromosomes", () => {
    expect(
      findGenomicOverlaps(
        [{ chromosome: "chrX", start: 0, end: 100 }],
        [{ chromosome: "chrY", start: 0, end: 100 }]
      )
    ).toEqual([]);
  });
});
