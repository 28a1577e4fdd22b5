import type {
  Box,
  CropCalculation,
  CropPolicy,
  MarginVector,
  RotationAngle,
} from "../contracts/contracts.js";
import { applyDeltas, computePageDelta, keepCentered } from "./crop-deltas.js";
import { createNullLogger, type CropLogger } from "./logger.js";
import {
  broadcastSelection,
  clampOrderIndex,
  orderIndexFromPercent,
  selectOrderStatistic,
} from "./order-statistics.js";
import { enforcePageRatio } from "./page-ratio.js";

export interface CropCalculationInput {
  fullPageBoxes: readonly Box[];
  /** Tight boxes already translated to the full-page boxes' origin. */
  tightBoxes: readonly Box[];
  rotationAngles: readonly RotationAngle[];
  policy: CropPolicy;
}

type SkippedPages = [Set<number>, Set<number>, Set<number>, Set<number>];

interface GroupDeltas {
  pages: number[];
  deltas: Map<number, MarginVector>;
  uniform: boolean;
  skipped: SkippedPages;
}

const minOf = (values: readonly number[]): number =>
  values.reduce((lowest, value) => Math.min(lowest, value), Number.POSITIVE_INFINITY);

const maxOf = (values: readonly number[]): number =>
  values.reduce((highest, value) => Math.max(highest, value), Number.NEGATIVE_INFINITY);

const emptySkipped = (): SkippedPages => [new Set(), new Set(), new Set(), new Set()];

export const usesUniformCrop = (policy: CropPolicy): boolean =>
  policy.uniform || policy.uniformOrderStat !== null || policy.uniformOrderPercent !== null;

/**
 * Replaces the full-page box of every page in `pages` with one shared box:
 * the `orderN`-th smallest left and bottom and the `orderN`-th largest right
 * and top over those pages.
 */
export const normalizeSamePageSize = (
  fullPageBoxes: readonly Box[],
  pages: readonly number[],
  orderN: number,
  logger: CropLogger = createNullLogger()
): Box[] => {
  if (pages.length === 0) return fullPageBoxes.slice();
  const n = clampOrderIndex(orderN, pages.length, logger);
  const ascending = (m: 0 | 1 | 2 | 3): number[] =>
    pages.map((page) => fullPageBoxes[page][m]).sort((a, b) => a - b);
  const descending = (m: 0 | 1 | 2 | 3): number[] => ascending(m).reverse();
  const common: Box = [ascending(0)[n], ascending(1)[n], descending(2)[n], descending(3)[n]];
  logger.debug("same-page-size", { box: common, orderN: n });
  const selected = new Set(pages);
  return fullPageBoxes.map((box, page) => (selected.has(page) ? common : box));
};

const resolveRanks = (policy: CropPolicy, count: number, logger: CropLogger): MarginVector => {
  if (policy.uniformOrderPercent !== null) {
    const n = orderIndexFromPercent(policy.uniformOrderPercent, count, logger);
    return [n, n, n, n];
  }
  return policy.uniformOrderStat ?? [0, 0, 0, 0];
};

const calculateGroupDeltas = (
  input: CropCalculationInput,
  fullPageBoxes: readonly Box[],
  pages: number[],
  uniform: boolean,
  logger: CropLogger
): GroupDeltas => {
  const perPage = new Map<number, MarginVector>();
  for (const page of pages) {
    perPage.set(
      page,
      computePageDelta(
        fullPageBoxes[page],
        input.tightBoxes[page],
        input.rotationAngles[page],
        input.policy
      )
    );
  }

  if (!uniform || pages.length === 0) {
    return { pages, deltas: perPage, uniform: false, skipped: emptySkipped() };
  }

  const ranks = resolveRanks(input.policy, pages.length, logger);
  const selection = selectOrderStatistic(perPage, ranks, logger);
  logger.info("Uniform crop deltas selected", {
    deltas: selection.values,
    sourcePages: selection.sourcePages.map((page) => page + 1),
  });
  const [left, bottom, right, top] = selection.skippedPages;
  return {
    pages,
    deltas: broadcastSelection(pages, selection),
    uniform: true,
    skipped: [new Set(left), new Set(bottom), new Set(right), new Set(top)],
  };
};

/** Even and odd pages are cropped as two independent uniform groups. */
const calculateEvenOddDeltas = (
  input: CropCalculationInput,
  fullPageBoxes: readonly Box[],
  pages: number[],
  logger: CropLogger
): GroupDeltas[] => {
  const groups = [pages.filter((page) => page % 2 === 0), pages.filter((page) => page % 2 !== 0)]
    .filter((group) => group.length > 0)
    .map((group) => calculateGroupDeltas(input, fullPageBoxes, group, true, logger));

  if (!input.policy.uniform) return groups;

  // Only left and right may differ between the groups; vertical cropping is
  // the least aggressive of the two.
  const all = groups.flatMap((group) => [...group.deltas.values()]);
  const bottom = minOf(all.map((delta) => delta[1]));
  const top = minOf(all.map((delta) => delta[3]));
  return groups.map((group) => ({
    ...group,
    deltas: new Map(
      [...group.deltas.entries()].map(([page, delta]): [number, MarginVector] => [
        page,
        [delta[0], bottom, delta[2], top],
      ])
    ),
  }));
};

const applyCropSafe = (
  group: GroupDeltas,
  boxes: Map<number, Box>,
  tightBoxes: readonly Box[],
  minimum: MarginVector
): Map<number, Box> => {
  const safe = new Map<number, Box>();
  for (const page of group.pages) {
    const box = boxes.get(page);
    if (!box) continue;
    const tight = tightBoxes[page];
    const next: [number, number, number, number] = [box[0], box[1], box[2], box[3]];
    if (!group.skipped[0].has(page) && next[0] > tight[0] - minimum[0]) next[0] = tight[0] - minimum[0];
    if (!group.skipped[1].has(page) && next[1] > tight[1] - minimum[1]) next[1] = tight[1] - minimum[1];
    if (!group.skipped[2].has(page) && next[2] < tight[2] + minimum[2]) next[2] = tight[2] + minimum[2];
    if (!group.skipped[3].has(page) && next[3] < tight[3] + minimum[3]) next[3] = tight[3] + minimum[3];
    safe.set(page, next);
  }

  if (!group.uniform) return safe;

  const kept = (m: 0 | 1 | 2 | 3): number[] =>
    group.pages
      .filter((page) => !group.skipped[m].has(page))
      .map((page) => safe.get(page)?.[m])
      .filter((value): value is number => value !== undefined);
  const shared: Box = [minOf(kept(0)), minOf(kept(1)), maxOf(kept(2)), maxOf(kept(3))];
  return new Map(group.pages.map((page): [number, Box] => [page, shared]));
};

/**
 * Turns full-page and tight boxes into final crop boxes under the policy.
 * Pages outside `policy.pagesToCrop` keep their full-page box.
 */
export const calculateCropBoxes = (
  input: CropCalculationInput,
  logger: CropLogger = createNullLogger()
): CropCalculation => {
  const { policy } = input;
  const pageCount = input.fullPageBoxes.length;
  const pages = [...policy.pagesToCrop]
    .filter((page) => page >= 0 && page < pageCount)
    .sort((a, b) => a - b);

  const samePageSize = policy.samePageSize || policy.samePageSizeOrderStat > 0;
  const fullPageBoxes = samePageSize
    ? normalizeSamePageSize(input.fullPageBoxes, pages, policy.samePageSizeOrderStat, logger)
    : input.fullPageBoxes.slice();

  const groups = policy.evenOdd
    ? calculateEvenOddDeltas(input, fullPageBoxes, pages, logger)
    : [calculateGroupDeltas(input, fullPageBoxes, pages, usesUniformCrop(policy), logger)];

  const deltas: Array<MarginVector | null> = fullPageBoxes.map(() => null);
  const cropBoxes: Box[] = input.fullPageBoxes.slice();

  for (const group of groups) {
    let boxes = new Map<number, Box>();
    for (const page of group.pages) {
      const groupDelta = group.deltas.get(page);
      if (!groupDelta) continue;
      const delta = keepCentered(groupDelta, {
        horizontal: policy.keepHorizCenter,
        vertical: policy.keepVertCenter,
      });
      deltas[page] = delta;
      boxes.set(page, applyDeltas(fullPageBoxes[page], delta));
    }
    if (policy.cropSafe) {
      boxes = applyCropSafe(group, boxes, input.tightBoxes, policy.cropSafeMin);
    }
    for (const [page, box] of boxes) {
      cropBoxes[page] = box;
    }
  }

  // Crop-safe merges each parity group on its own; the vertical edges are
  // shared again across both groups so every page keeps the same extent.
  if (policy.evenOdd && policy.uniform && policy.cropSafe && pages.length > 0) {
    const bottom = minOf(pages.map((page) => cropBoxes[page][1]));
    const top = maxOf(pages.map((page) => cropBoxes[page][3]));
    for (const page of pages) {
      const box = cropBoxes[page];
      cropBoxes[page] = [box[0], bottom, box[2], top];
    }
  }

  if (policy.setPageRatio !== null) {
    const ratio = policy.setPageRatio;
    logger.info("Setting page width to height ratios", {
      ratio,
      weights: policy.pageRatioWeights,
    });
    for (const page of pages) {
      cropBoxes[page] = enforcePageRatio(cropBoxes[page], ratio, policy.pageRatioWeights);
    }
  }

  return { cropBoxes, deltas, fullPageBoxes };
};
