import type {
  MarginIndex,
  MarginVector,
  OrderStatisticSelection,
} from "../contracts/contracts.js";
import { MARGIN_NAMES } from "../contracts/contracts.js";
import { createNullLogger, type CropLogger } from "./logger.js";

const MARGINS: readonly MarginIndex[] = [0, 1, 2, 3];

export const clampOrderIndex = (n: number, count: number, logger: CropLogger): number => {
  const max = Math.max(0, count - 1);
  if (n < 0 || n > max) {
    logger.warn("The selected order statistic is out of range; using the closest value.", {
      requested: n,
      max,
    });
    return Math.min(max, Math.max(0, n));
  }
  return n;
};

/** Rounds to the nearest integer; exact halves go to the even neighbour. */
export const roundHalfToEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

/** Rank per margin for a percentage of the pages, e.g. 10 percent of 40 pages is rank 4. */
export const orderIndexFromPercent = (
  percent: number,
  count: number,
  logger: CropLogger
): number => {
  let bounded = percent;
  if (percent < 0 || percent > 100) {
    logger.warn("Uniform order percent is outside 0-100; clamping.", { requested: percent });
    bounded = Math.min(100, Math.max(0, percent));
  }
  return roundHalfToEven((count * bounded) / 100);
};

/**
 * Picks the n-th smallest delta on each margin across the given pages. Ties
 * are ordered by page index so the reported source page is stable.
 */
export const selectOrderStatistic = (
  deltas: ReadonlyMap<number, MarginVector>,
  ranks: MarginVector,
  logger: CropLogger = createNullLogger()
): OrderStatisticSelection => {
  const entries = [...deltas.entries()];
  if (entries.length === 0) {
    throw new RangeError("Cannot select an order statistic over zero pages");
  }

  const pick = (m: MarginIndex): { value: number; page: number; skipped: Set<number> } => {
    const sorted = entries
      .map(([page, delta]) => ({ page, value: delta[m] }))
      .sort((a, b) => a.value - b.value || a.page - b.page);
    const n = clampOrderIndex(Math.trunc(ranks[m]), sorted.length, logger);
    const chosen = sorted[n];
    return {
      value: chosen.value,
      page: chosen.page,
      skipped: new Set(sorted.slice(0, n).map((entry) => entry.page)),
    };
  };

  const [left, bottom, right, top] = MARGINS.map(pick);
  logger.debug("order-statistic", {
    ranks,
    pages: MARGIN_NAMES.map((name, m) => `${name}:${[left, bottom, right, top][m].page + 1}`),
  });
  return {
    values: [left.value, bottom.value, right.value, top.value],
    sourcePages: [left.page, bottom.page, right.page, top.page],
    skippedPages: [left.skipped, bottom.skipped, right.skipped, top.skipped],
  };
};

export const broadcastSelection = (
  pages: Iterable<number>,
  selection: OrderStatisticSelection
): Map<number, MarginVector> => {
  const result = new Map<number, MarginVector>();
  for (const page of pages) {
    result.set(page, selection.values);
  }
  return result;
};
