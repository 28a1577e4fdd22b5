import { describe, expect, it } from "vitest";
import type { Box, CropPolicy, MarginVector, RotationAngle } from "../contracts/contracts.js";
import { calculateCropBoxes, normalizeSamePageSize, usesUniformCrop } from "./crop-calculation.js";
import { createMemoryLogger } from "./logger.js";

const zero: MarginVector = [0, 0, 0, 0];

const makePolicy = (overrides: Partial<CropPolicy> = {}, pageCount = 2): CropPolicy => ({
  percentRetain: zero,
  absoluteOffset: zero,
  absolutePreCrop: zero,
  uniform: false,
  uniformOrderStat: null,
  uniformOrderPercent: null,
  evenOdd: false,
  samePageSize: false,
  samePageSizeOrderStat: 0,
  setPageRatio: null,
  pageRatioWeights: [1, 1, 1, 1],
  percentText: false,
  keepHorizCenter: false,
  keepVertCenter: false,
  cropSafe: false,
  cropSafeMin: zero,
  pagesToCrop: new Set(Array.from({ length: pageCount }, (_, page) => page)),
  ...overrides,
});

const calculate = (
  fullPageBoxes: Box[],
  tightBoxes: Box[],
  policy: CropPolicy,
  rotationAngles: RotationAngle[] = fullPageBoxes.map(() => 0)
) => calculateCropBoxes({ fullPageBoxes, tightBoxes, rotationAngles, policy });

describe("calculateCropBoxes", () => {
  const full: Box[] = [
    [0, 0, 100, 200],
    [0, 0, 120, 200],
  ];
  const tight: Box[] = [
    [10, 10, 90, 190],
    [20, 10, 100, 190],
  ];

  it("crops each page to its own tight box", () => {
    const result = calculate(full, tight, makePolicy());
    expect(result.deltas).toEqual([
      [10, 10, 10, 10],
      [20, 10, 20, 10],
    ]);
    expect(result.cropBoxes).toEqual(tight);
  });

  it("uniform cropping applies the smallest delta to every page", () => {
    const result = calculate(full, tight, makePolicy({ uniform: true }));
    expect(result.deltas).toEqual([
      [10, 10, 10, 10],
      [10, 10, 10, 10],
    ]);
    expect(result.cropBoxes).toEqual([
      [10, 10, 90, 190],
      [10, 10, 110, 190],
    ]);
  });

  it("an order statistic of zero matches plain uniform cropping", () => {
    const plain = calculate(full, tight, makePolicy({ uniform: true }));
    const ordered = calculate(full, tight, makePolicy({ uniformOrderStat: [0, 0, 0, 0] }));
    expect(ordered.cropBoxes).toEqual(plain.cropBoxes);
  });

  it("a uniform order percent ranks the pages", () => {
    const result = calculate(full, tight, makePolicy({ uniformOrderPercent: 50 }));
    expect(result.deltas).toEqual([
      [20, 10, 20, 10],
      [20, 10, 20, 10],
    ]);
  });

  it("keeps a full-page box when the tight box fills the page", () => {
    const result = calculate([[0, 0, 100, 100]], [[0, 0, 100, 100]], makePolicy({}, 1));
    expect(result.cropBoxes).toEqual([[0, 0, 100, 100]]);
  });

  it("retaining all of every margin leaves the page unchanged", () => {
    const result = calculate(
      [[0, 0, 100, 100]],
      [[10, 20, 80, 70]],
      makePolicy({ percentRetain: [100, 100, 100, 100] }, 1)
    );
    expect(result.cropBoxes).toEqual([[0, 0, 100, 100]]);
  });

  it("leaves pages outside the crop set untouched", () => {
    const result = calculate(full, tight, makePolicy({ pagesToCrop: new Set([0]) }));
    expect(result.cropBoxes).toEqual([
      [10, 10, 90, 190],
      [0, 0, 120, 200],
    ]);
    expect(result.deltas[1]).toBeNull();
  });

  it("keeps the page centered horizontally and vertically", () => {
    const horizontal = calculate(
      [[0, 0, 100, 100]],
      [[10, 20, 70, 90]],
      makePolicy({ keepHorizCenter: true }, 1)
    );
    expect(horizontal.cropBoxes).toEqual([[10, 20, 90, 90]]);

    const both = calculate(
      [[0, 0, 100, 100]],
      [[10, 20, 70, 90]],
      makePolicy({ keepHorizCenter: true, keepVertCenter: true }, 1)
    );
    expect(both.cropBoxes).toEqual([[10, 10, 90, 90]]);
  });

  it("never cuts into the tight box with cropSafe", () => {
    const result = calculate(
      [[0, 0, 100, 100]],
      [[10, 10, 90, 90]],
      makePolicy({ absoluteOffset: [5, 5, 5, 5], cropSafe: true, cropSafeMin: [2, 2, 2, 2] }, 1)
    );
    expect(result.cropBoxes).toEqual([[8, 8, 92, 92]]);
  });

  it("cropSafe shares one box across a uniform group", () => {
    const result = calculate(
      full,
      tight,
      makePolicy({ uniform: true, absoluteOffset: [15, 0, 0, 0], cropSafe: true })
    );
    // A left delta of 25 cuts into both pages; the shared box covers both safe boxes.
    expect(result.cropBoxes).toEqual([
      [10, 10, 110, 190],
      [10, 10, 110, 190],
    ]);
  });

  it("applies the page ratio after cropping", () => {
    const result = calculate(full, tight, makePolicy({ setPageRatio: 1 }));
    expect(result.cropBoxes).toEqual([
      [-40, 10, 140, 190],
      [-30, 10, 150, 190],
    ]);
  });

  it("normalizes full-page boxes with samePageSize", () => {
    const result = calculate(
      [
        [0, 0, 100, 200],
        [5, 10, 90, 190],
      ],
      [
        [10, 10, 80, 180],
        [10, 20, 80, 180],
      ],
      makePolicy({ samePageSize: true })
    );
    expect(result.fullPageBoxes).toEqual([
      [0, 0, 100, 200],
      [0, 0, 100, 200],
    ]);
    expect(result.cropBoxes).toEqual([
      [10, 10, 80, 180],
      [10, 20, 80, 180],
    ]);
  });
});

describe("even and odd pages", () => {
  const full: Box[] = [
    [0, 0, 100, 200],
    [0, 0, 100, 200],
    [0, 0, 100, 200],
  ];
  const tight: Box[] = [
    [10, 20, 80, 170],
    [30, 5, 95, 190],
    [15, 25, 90, 180],
  ];

  it("crops each parity group uniformly", () => {
    const result = calculate(full, tight, makePolicy({ evenOdd: true }, 3));
    expect(result.cropBoxes).toEqual([
      [10, 20, 90, 180],
      [30, 5, 95, 190],
      [10, 20, 90, 180],
    ]);
  });

  it("shares the vertical deltas across both groups when uniform", () => {
    const result = calculate(full, tight, makePolicy({ evenOdd: true, uniform: true }, 3));
    expect(result.deltas).toEqual([
      [10, 5, 10, 10],
      [30, 5, 5, 10],
      [10, 5, 10, 10],
    ]);
    expect(result.cropBoxes).toEqual([
      [10, 5, 90, 190],
      [30, 5, 95, 190],
      [10, 5, 90, 190],
    ]);
  });
});

describe("even and odd pages with crop-safe", () => {
  it("keeps the vertical edges shared after crop-safe widens one group", () => {
    const result = calculate(
      [
        [0, 0, 100, 200],
        [0, 0, 100, 200],
      ],
      [
        [10, 5, 90, 190],
        [10, 30, 90, 170],
      ],
      makePolicy({
        evenOdd: true,
        uniform: true,
        cropSafe: true,
        absoluteOffset: [0, 20, 0, 20],
      })
    );
    expect(result.cropBoxes).toEqual([
      [10, 5, 90, 190],
      [10, 5, 90, 190],
    ]);
  });
});

describe("large documents", () => {
  it("handles uniform crop-safe groups with many pages", () => {
    const count = 200_000;
    const full: Box[] = Array.from({ length: count }, (): Box => [0, 0, 100, 200]);
    const tight: Box[] = Array.from({ length: count }, (): Box => [10, 10, 90, 190]);
    const result = calculate(
      full,
      tight,
      makePolicy({ uniform: true, evenOdd: true, cropSafe: true }, count)
    );
    expect(result.cropBoxes[0]).toEqual([10, 10, 90, 190]);
    expect(result.cropBoxes[count - 1]).toEqual([10, 10, 90, 190]);
  });
});

describe("helpers", () => {
  it("detects uniform cropping from any uniform setting", () => {
    expect(usesUniformCrop(makePolicy())).toBe(false);
    expect(usesUniformCrop(makePolicy({ uniform: true }))).toBe(true);
    expect(usesUniformCrop(makePolicy({ uniformOrderStat: [1, 1, 1, 1] }))).toBe(true);
    expect(usesUniformCrop(makePolicy({ uniformOrderPercent: 10 }))).toBe(true);
  });

  it("picks the n-th most extreme edges for samePageSize", () => {
    const boxes: Box[] = [
      [0, 0, 100, 200],
      [5, 10, 90, 190],
      [0, 0, 300, 300],
    ];
    const logger = createMemoryLogger();
    expect(normalizeSamePageSize(boxes, [0, 1], 1, logger)).toEqual([
      [5, 10, 90, 190],
      [5, 10, 90, 190],
      [0, 0, 300, 300],
    ]);
    expect(normalizeSamePageSize(boxes, [0, 1], 5, logger)[0]).toEqual([5, 10, 90, 190]);
    expect(logger.entries.some((entry) => entry.level === "warn")).toBe(true);
  });
});
