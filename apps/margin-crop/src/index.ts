export * from "./contracts/contracts.js";
export { parsePageRanges } from "./contracts/validation.js";
export {
  correctBoxesForOrigin,
  correctForOrigin,
  extractTightBoxes,
  findTightBoxes,
} from "./main/bounding-boxes.js";
export { calculateCropBoxes, normalizeSamePageSize } from "./main/crop-calculation.js";
export {
  defaultCropConfig,
  loadCropConfig,
  resolveCropConfig,
  resolveCropPolicy,
  resolveExtractionSettings,
  type CropConfig,
} from "./main/crop-config.js";
export { applyDeltas, computePageDelta } from "./main/crop-deltas.js";
export { computeCropBoxes } from "./main/crop-engine.js";
export { cropPdf } from "./main/crop-runner.js";
export {
  BoundingBoxExtractionError,
  CropCancelledError,
  CropConfigurationError,
} from "./main/errors.js";
export { loadEnv, parseEnv } from "./main/env.js";
export { resolveFullPageBoxes } from "./main/full-page-box.js";
export { normalizeRotation, remapForRotation } from "./main/geometry.js";
export { createNullLogger, createRunLogger, type CropLogger } from "./main/logger.js";
export { selectOrderStatistic } from "./main/order-statistics.js";
export { enforcePageRatio, parsePageRatio } from "./main/page-ratio.js";
export { selectBoundingBoxSource } from "./main/renderers.js";
