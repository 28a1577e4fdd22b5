import type {
  Box,
  BoundingBoxSource,
  CropCalculation,
  CropPolicy,
  ExtractionSettings,
  RotationAngle,
} from "../contracts/contracts.js";
import { findTightBoxes } from "./bounding-boxes.js";
import { calculateCropBoxes } from "./crop-calculation.js";
import { createNullLogger, type CropLogger } from "./logger.js";

export interface ComputeCropBoxesParams {
  fullPageBoxes: readonly Box[];
  rotationAngles: readonly RotationAngle[];
  policy: CropPolicy;
  source: BoundingBoxSource;
  extraction: ExtractionSettings;
  logger?: CropLogger;
  signal?: AbortSignal;
  onProgress?: (processed: number, total: number) => void;
}

export interface ComputedCropBoxes extends CropCalculation {
  /** Origin-corrected tight boxes, one per page. */
  tightBoxes: Box[];
}

/**
 * Finds the tight box of every page with the injected source and turns the
 * boxes into one crop box per page, in document order.
 */
export const computeCropBoxes = async (
  params: ComputeCropBoxesParams
): Promise<ComputedCropBoxes> => {
  const logger = params.logger ?? createNullLogger();
  if (params.rotationAngles.length !== params.fullPageBoxes.length) {
    throw new RangeError(
      `Expected ${params.fullPageBoxes.length} rotation angles, got ${params.rotationAngles.length}`
    );
  }

  const tightBoxes = await findTightBoxes({
    fullPageBoxes: params.fullPageBoxes,
    pagesToCrop: params.policy.pagesToCrop,
    source: params.source,
    settings: params.extraction,
    logger,
    signal: params.signal,
    onProgress: params.onProgress,
  });

  const calculation = calculateCropBoxes(
    {
      fullPageBoxes: params.fullPageBoxes,
      tightBoxes,
      rotationAngles: params.rotationAngles,
      policy: params.policy,
    },
    logger
  );
  return { ...calculation, tightBoxes };
};
