import type {
  Box,
  BoxKind,
  MarginVector,
  PageGeometry,
  ResolvedPage,
} from "../contracts/contracts.js";
import { intersectBoxes, normalizeRotation, remapForRotation } from "./geometry.js";
import { createNullLogger, type CropLogger } from "./logger.js";

export const DEFAULT_FULL_PAGE_BOXES: readonly BoxKind[] = ["media", "crop"];

export const applyPreCrop = (box: Box, preCrop: MarginVector): Box => [
  box[0] + preCrop[0],
  box[1] + preCrop[1],
  box[2] - preCrop[2],
  box[3] - preCrop[3],
];

export const resolveFullPageBox = (
  page: PageGeometry,
  boxKinds: readonly BoxKind[],
  absolutePreCrop: MarginVector
): ResolvedPage => {
  const rotationAngle = normalizeRotation(page.rotation);
  const kinds = boxKinds.length > 0 ? boxKinds : DEFAULT_FULL_PAGE_BOXES;
  const [first, ...rest] = kinds;
  const fullBox = rest.reduce<Box>(
    (current, kind) => intersectBoxes(current, page.boxes[kind]),
    page.boxes[first]
  );
  const preCrop = remapForRotation(absolutePreCrop, rotationAngle);
  return {
    index: page.index,
    rotationAngle,
    fullPageBox: applyPreCrop(fullBox, preCrop),
  };
};

export const resolveFullPageBoxes = (
  pages: readonly PageGeometry[],
  boxKinds: readonly BoxKind[],
  absolutePreCrop: MarginVector,
  logger: CropLogger = createNullLogger()
): ResolvedPage[] =>
  pages.map((page) => {
    const resolved = resolveFullPageBox(page, boxKinds, absolutePreCrop);
    logger.debug("full-page-box", {
      page: page.index + 1,
      rotation: resolved.rotationAngle,
      box: resolved.fullPageBox,
    });
    return resolved;
  });
