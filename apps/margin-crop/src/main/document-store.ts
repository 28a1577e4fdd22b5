import fs from "node:fs/promises";
import { PDFDocument, degrees, type PDFPage } from "pdf-lib";
import type { Box, BoxKind, PageBoxes, PageGeometry } from "../contracts/contracts.js";

type Rect = { x: number; y: number; width: number; height: number };

const rectToBox = (rect: Rect): Box => [rect.x, rect.y, rect.x + rect.width, rect.y + rect.height];

const BOX_SETTERS: Record<BoxKind, (page: PDFPage, box: Box) => void> = {
  media: (page, box) => page.setMediaBox(box[0], box[1], box[2] - box[0], box[3] - box[1]),
  crop: (page, box) => page.setCropBox(box[0], box[1], box[2] - box[0], box[3] - box[1]),
  trim: (page, box) => page.setTrimBox(box[0], box[1], box[2] - box[0], box[3] - box[1]),
  art: (page, box) => page.setArtBox(box[0], box[1], box[2] - box[0], box[3] - box[1]),
  bleed: (page, box) => page.setBleedBox(box[0], box[1], box[2] - box[0], box[3] - box[1]),
};

// The media box goes first so the other boxes are never set outside it.
const BOX_ORDER: readonly BoxKind[] = ["media", "crop", "trim", "art", "bleed"];

export const loadPdfDocument = async (bytes: Uint8Array): Promise<PDFDocument> =>
  PDFDocument.load(bytes, { updateMetadata: false });

export const readPdfFile = async (filePath: string): Promise<Uint8Array> =>
  new Uint8Array(await fs.readFile(filePath));

export const readPageBoxes = (page: PDFPage): PageBoxes => ({
  media: rectToBox(page.getMediaBox()),
  crop: rectToBox(page.getCropBox()),
  trim: rectToBox(page.getTrimBox()),
  art: rectToBox(page.getArtBox()),
  bleed: rectToBox(page.getBleedBox()),
});

export const readPageGeometry = (document: PDFDocument): PageGeometry[] =>
  document.getPages().map((page, index) => ({
    index,
    rotation: page.getRotation().angle,
    boxes: readPageBoxes(page),
  }));

export const setPageBoxes = (page: PDFPage, box: Box, kinds: readonly BoxKind[]): void => {
  for (const kind of BOX_ORDER) {
    if (kinds.includes(kind)) BOX_SETTERS[kind](page, box);
  }
};

/**
 * Copy used for finding bounding boxes: every page box equals the full-page
 * box and rotation is cleared, so renderers see the unrotated page geometry.
 */
export const buildRenderCopy = async (
  bytes: Uint8Array,
  fullPageBoxes: readonly Box[]
): Promise<Uint8Array> => {
  const document = await loadPdfDocument(bytes);
  document.getPages().forEach((page, index) => {
    page.setRotation(degrees(0));
    setPageBoxes(page, fullPageBoxes[index], BOX_ORDER);
  });
  return document.save();
};

/** Writes crop boxes onto the selected pages; rotation and other pages are untouched. */
export const buildCroppedDocument = async (
  bytes: Uint8Array,
  cropBoxes: readonly Box[],
  pagesToCrop: ReadonlySet<number>,
  boxesToSet: readonly BoxKind[]
): Promise<Uint8Array> => {
  const document = await loadPdfDocument(bytes);
  document.getPages().forEach((page, index) => {
    if (!pagesToCrop.has(index)) return;
    setPageBoxes(page, cropBoxes[index], boxesToSet);
  });
  return document.save();
};
