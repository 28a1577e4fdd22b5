import { CropConfigurationError } from "../main/errors.js";
import type { MarginVector } from "./contracts.js";

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const parsePageNumber = (value: string, spec: string): number => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new CropConfigurationError(`Invalid page range "${spec}": "${value}" is not a page number`);
  }
  return Number(trimmed);
};

/**
 * Parses 1-based page selections such as "1-4,7,9" into 0-based indices,
 * keeping only pages the document has.
 */
export const parsePageRanges = (spec: string, pageCount: number): Set<number> => {
  const selected = new Set<number>();
  for (const part of spec.split(",")) {
    const bounds = part.split("-");
    if (bounds.length === 1) {
      selected.add(parsePageNumber(bounds[0], spec) - 1);
      continue;
    }
    if (bounds.length !== 2) {
      throw new CropConfigurationError(`Invalid page range "${spec}": "${part}" has too many dashes`);
    }
    const first = parsePageNumber(bounds[0], spec);
    const last = parsePageNumber(bounds[1], spec);
    if (first > last) {
      throw new CropConfigurationError(
        `Invalid page range "${spec}": ${first} is greater than ${last}`
      );
    }
    for (let page = first; page <= last; page++) {
      selected.add(page - 1);
    }
  }

  const inDocument = new Set([...selected].filter((page) => page >= 0 && page < pageCount));
  if (inDocument.size === 0) {
    throw new CropConfigurationError(`Page range "${spec}" selects no pages of the document`);
  }
  return inDocument;
};

export const allPages = (pageCount: number): Set<number> =>
  new Set(Array.from({ length: pageCount }, (_, page) => page));

export const assertNonNegativeWeights = (weights: MarginVector, label: string): MarginVector => {
  if (weights.some((weight) => !isFiniteNumber(weight) || weight < 0)) {
    throw new CropConfigurationError(`Invalid ${label}: weights must be finite and non-negative`);
  }
  return weights;
};
