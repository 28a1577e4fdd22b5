import type { Box, MarginVector } from "../contracts/contracts.js";
import { CropConfigurationError } from "./errors.js";

/** Accepts "width:height" or a plain decimal ratio. */
export const parsePageRatio = (value: string | number): number => {
  if (typeof value === "number") {
    return assertValidRatio(value, String(value));
  }
  const parts = value.split(":");
  if (parts.length > 2) {
    throw new CropConfigurationError(`Bad page ratio "${value}": too many colons`);
  }
  const numbers = parts.map((part) => (part.trim() === "" ? Number.NaN : Number(part)));
  const ratio = numbers.length === 2 ? numbers[0] / numbers[1] : numbers[0];
  if (Number.isNaN(ratio)) {
    throw new CropConfigurationError(`Bad page ratio "${value}": cannot convert to a number`);
  }
  return assertValidRatio(ratio, value);
};

export const assertValidRatio = (ratio: number, label: string): number => {
  if (!Number.isFinite(ratio) || ratio <= 0) {
    throw new CropConfigurationError(
      `Bad page ratio "${label}": the ratio must be positive and finite`
    );
  }
  return ratio;
};

const splitWeights = (first: number, second: number): [number, number] => {
  const total = first + second;
  if (total <= 0) return [0.5, 0.5];
  return [first / total, second / total];
};

/**
 * Pads the box outward until width / height equals the ratio. Only one pair of
 * margins moves; the other pair keeps its coordinates.
 */
export const enforcePageRatio = (box: Box, ratio: number, weights: MarginVector): Box => {
  const [left, bottom, right, top] = box;
  const width = right - left;
  const height = top - bottom;
  const newHeight = width / ratio;

  if (newHeight < height) {
    const difference = height * ratio - width;
    const [leftWeight, rightWeight] = splitWeights(weights[0], weights[2]);
    return [left - difference * leftWeight, bottom, right + difference * rightWeight, top];
  }

  const difference = newHeight - height;
  const [bottomWeight, topWeight] = splitWeights(weights[1], weights[3]);
  return [left, bottom - difference * bottomWeight, right, top + difference * topWeight];
};
