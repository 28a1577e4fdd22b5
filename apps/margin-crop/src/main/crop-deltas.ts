import type { Box, CropPolicy, MarginVector, RotationAngle } from "../contracts/contracts.js";
import { remapForRotation } from "./geometry.js";

type DeltaPolicy = Pick<CropPolicy, "percentRetain" | "absoluteOffset" | "percentText">;

/**
 * Per-margin reduction of the full-page box for one page. Deltas are positive
 * when a margin shrinks and negative when it grows (percentRetain above 100 or
 * a negative offset).
 */
export const computePageDelta = (
  fullBox: Box,
  tightBox: Box,
  rotation: RotationAngle,
  policy: DeltaPolicy
): MarginVector => {
  const pct = remapForRotation(policy.percentRetain, rotation);
  const offset = remapForRotation(policy.absoluteOffset, rotation);
  const textWidth = tightBox[2] - tightBox[0];
  const textHeight = tightBox[3] - tightBox[1];
  const textSize = [textWidth, textHeight, textWidth, textHeight] as const;

  const margin = (m: 0 | 1 | 2 | 3): number => {
    const raw = Math.abs(tightBox[m] - fullBox[m]);
    const fraction = pct[m] / 100;
    const scaled = policy.percentText ? raw - textSize[m] * fraction : raw * (1 - fraction);
    return scaled + offset[m];
  };

  return [margin(0), margin(1), margin(2), margin(3)];
};

export const applyDeltas = (fullBox: Box, delta: MarginVector): Box => [
  fullBox[0] + delta[0],
  fullBox[1] + delta[1],
  fullBox[2] - delta[2],
  fullBox[3] - delta[3],
];

export const keepCentered = (
  delta: MarginVector,
  options: { horizontal: boolean; vertical: boolean }
): MarginVector => {
  const horizontal = Math.min(delta[0], delta[2]);
  const vertical = Math.min(delta[1], delta[3]);
  return [
    options.horizontal ? horizontal : delta[0],
    options.vertical ? vertical : delta[1],
    options.horizontal ? horizontal : delta[2],
    options.vertical ? vertical : delta[3],
  ];
};
