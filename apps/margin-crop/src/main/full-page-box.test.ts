import { describe, expect, it } from "vitest";
import type { Box, PageBoxes, PageGeometry } from "../contracts/contracts.js";
import { applyPreCrop, resolveFullPageBox, resolveFullPageBoxes } from "./full-page-box.js";
import { CropConfigurationError } from "./errors.js";

const boxesOf = (media: Box, crop: Box = media): PageBoxes => ({
  media,
  crop,
  trim: crop,
  art: crop,
  bleed: crop,
});

const page = (index: number, rotation: number, boxes: PageBoxes): PageGeometry => ({
  index,
  rotation,
  boxes,
});

describe("resolveFullPageBox", () => {
  it("intersects the selected page boxes", () => {
    const resolved = resolveFullPageBox(
      page(0, 0, boxesOf([0, 0, 612, 792], [10, 20, 600, 800])),
      ["media", "crop"],
      [0, 0, 0, 0]
    );
    expect(resolved).toEqual({ index: 0, rotationAngle: 0, fullPageBox: [10, 20, 600, 792] });
  });

  it("uses a single box kind when asked", () => {
    const resolved = resolveFullPageBox(
      page(0, 0, boxesOf([0, 0, 612, 792], [10, 20, 600, 780])),
      ["media"],
      [0, 0, 0, 0]
    );
    expect(resolved.fullPageBox).toEqual([0, 0, 612, 792]);
  });

  it("applies the pre-crop in the rotated frame", () => {
    const resolved = resolveFullPageBox(
      page(0, 90, boxesOf([0, 0, 100, 200])),
      ["media"],
      [5, 0, 0, 0]
    );
    expect(resolved.rotationAngle).toBe(90);
    expect(resolved.fullPageBox).toEqual([0, 0, 100, 195]);
  });

  it("rejects pages with an odd rotation", () => {
    expect(() =>
      resolveFullPageBox(page(0, 45, boxesOf([0, 0, 100, 100])), ["media"], [0, 0, 0, 0])
    ).toThrow(CropConfigurationError);
  });
});

describe("resolveFullPageBoxes", () => {
  it("resolves every page in order", () => {
    const resolved = resolveFullPageBoxes(
      [page(0, 0, boxesOf([0, 0, 100, 100])), page(1, 180, boxesOf([0, 0, 50, 80]))],
      ["media", "crop"],
      [1, 2, 3, 4]
    );
    expect(resolved.map((entry) => entry.fullPageBox)).toEqual([
      [1, 2, 97, 96],
      [3, 4, 49, 78],
    ]);
  });

  it("applyPreCrop shrinks each side", () => {
    expect(applyPreCrop([0, 0, 100, 100], [1, 2, 3, 4])).toEqual([1, 2, 97, 96]);
  });
});
