import type { Box, MarginVector, RotationAngle } from "../contracts/contracts.js";
import { CropConfigurationError } from "./errors.js";

type Permutation = readonly [0 | 1 | 2 | 3, 0 | 1 | 2 | 3, 0 | 1 | 2 | 3, 0 | 1 | 2 | 3];

// Clockwise quarter turns: one turn maps (l, b, r, t) to (b, r, t, l).
const QUARTER_TURNS: Record<0 | 1 | 2 | 3, Permutation> = {
  0: [0, 1, 2, 3],
  1: [1, 2, 3, 0],
  2: [2, 3, 0, 1],
  3: [3, 0, 1, 2],
};

const TURNS_FOR_ANGLE: Record<RotationAngle, 0 | 1 | 2 | 3> = { 0: 0, 90: 1, 180: 2, 270: 3 };
const UNDO_TURNS_FOR_ANGLE: Record<RotationAngle, 0 | 1 | 2 | 3> = { 0: 0, 90: 3, 180: 2, 270: 1 };

export const normalizeRotation = (angle: number): RotationAngle => {
  if (!Number.isFinite(angle) || angle % 90 !== 0) {
    throw new CropConfigurationError(`Unsupported page rotation: ${angle}`);
  }
  let normalized = angle;
  while (normalized >= 360) normalized -= 360;
  while (normalized < 0) normalized += 360;
  if (normalized === 90 || normalized === 180 || normalized === 270) return normalized;
  return 0;
};

/**
 * Moves screen-relative margin values into the page's unrotated frame.
 * With `undo` the values are moved back.
 */
export const remapForRotation = (
  vector: MarginVector,
  angle: RotationAngle,
  undo = false
): MarginVector => {
  const turns = undo ? UNDO_TURNS_FOR_ANGLE[angle] : TURNS_FOR_ANGLE[angle];
  const [a, b, c, d] = QUARTER_TURNS[turns];
  return [vector[a], vector[b], vector[c], vector[d]];
};

export const boxWidth = (box: Box): number => box[2] - box[0];

export const boxHeight = (box: Box): number => box[3] - box[1];

export const intersectBoxes = (a: Box, b: Box): Box => {
  const left = Math.max(a[0], b[0]);
  const bottom = Math.max(a[1], b[1]);
  const right = Math.min(a[2], b[2]);
  const top = Math.min(a[3], b[3]);
  if (right < left || top < bottom) {
    return [left, bottom, left, bottom];
  }
  return [left, bottom, right, top];
};

export const translateBox = (box: Box, dx: number, dy: number): Box => [
  box[0] + dx,
  box[1] + dy,
  box[2] + dx,
  box[3] + dy,
];

/** The box moved so its lower-left corner sits at the origin. */
export const zeroOriginBox = (box: Box): Box => [0, 0, boxWidth(box), boxHeight(box)];

export const roundBox = (box: Box, digits = 3): Box => {
  const factor = 10 ** digits;
  const round = (value: number): number => Math.round(value * factor) / factor;
  return [round(box[0]), round(box[1]), round(box[2]), round(box[3])];
};
