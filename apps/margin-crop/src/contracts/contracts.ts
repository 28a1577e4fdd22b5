/**
 * Shared types for the crop engine and its collaborators.
 * Boxes and margin vectors are always ordered left, bottom, right, top.
 */

export type Box = readonly [number, number, number, number];

export type MarginVector = readonly [number, number, number, number];

export type MarginIndex = 0 | 1 | 2 | 3;

export const MARGIN_NAMES = ["left", "bottom", "right", "top"] as const;

export type MarginName = (typeof MARGIN_NAMES)[number];

export type RotationAngle = 0 | 90 | 180 | 270;

export type BoxKind = "media" | "crop" | "trim" | "art" | "bleed";

export type PageBoxes = Record<BoxKind, Box>;

export interface PageGeometry {
  index: number;
  rotation: number;
  boxes: PageBoxes;
}

export interface ResolvedPage {
  index: number;
  rotationAngle: RotationAngle;
  fullPageBox: Box;
}

export interface CropPolicy {
  readonly percentRetain: MarginVector;
  readonly absoluteOffset: MarginVector;
  readonly absolutePreCrop: MarginVector;
  readonly uniform: boolean;
  readonly uniformOrderStat: MarginVector | null;
  readonly uniformOrderPercent: number | null;
  readonly evenOdd: boolean;
  readonly samePageSize: boolean;
  readonly samePageSizeOrderStat: number;
  readonly setPageRatio: number | null;
  readonly pageRatioWeights: MarginVector;
  readonly percentText: boolean;
  readonly keepHorizCenter: boolean;
  readonly keepVertCenter: boolean;
  readonly cropSafe: boolean;
  readonly cropSafeMin: MarginVector;
  readonly pagesToCrop: ReadonlySet<number>;
}

export interface Dpi {
  x: number;
  y: number;
}

export interface ExtractionSettings {
  readonly dpi: Dpi;
  /** Negative values classify light ink on a dark background. */
  readonly threshold: number;
  readonly numBlurs: number;
  readonly numSmooths: number;
  readonly referenceBoxes: readonly BoxKind[];
  readonly concurrency: number;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
}

/** Grayscale pixels, row-major, y growing downward. */
export interface RasterImage {
  data: Uint8Array;
  width: number;
  height: number;
}

export interface RasterBoundingBoxSource {
  kind: "raster";
  name: string;
  renderPage: (pageIndex: number, dpi: Dpi, signal?: AbortSignal) => Promise<RasterImage>;
}

export interface VectorBoundingBoxSource {
  kind: "vector";
  name: string;
  queryBoundingBoxes: (
    dpi: Dpi,
    referenceBoxes: readonly BoxKind[],
    signal?: AbortSignal
  ) => Promise<Box[]>;
}

export type BoundingBoxSource = RasterBoundingBoxSource | VectorBoundingBoxSource;

export type BoundingBoxMethod = "auto" | "pdftoppm" | "ghostscript-raster" | "ghostscript-bbox";

export interface OrderStatisticSelection {
  values: MarginVector;
  /** Page index that supplied the value chosen for each margin. */
  sourcePages: readonly [number, number, number, number];
  /** Pages below the chosen rank on each margin. */
  skippedPages: readonly [ReadonlySet<number>, ReadonlySet<number>, ReadonlySet<number>, ReadonlySet<number>];
}

export interface CropCalculation {
  cropBoxes: Box[];
  deltas: Array<MarginVector | null>;
  fullPageBoxes: Box[];
}

export interface PageCropReport {
  page: number;
  rotation: RotationAngle;
  cropped: boolean;
  fullPageBox: Box;
  tightBox: Box;
  cropBox: Box;
}

export interface CropRunReport {
  inputPath: string;
  outputPath: string;
  source: string;
  pageCount: number;
  croppedPages: number;
  pages: PageCropReport[];
}
