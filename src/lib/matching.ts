import { isDeepStrictEqual } from "node:util";
import { solveLinearSumAssignment } from "@/lib/assignment";
import { DEFAULT_IOU_THRESHOLD } from "@/lib/constants";
import { iou } from "@/lib/geometry";
import { harmonicMean } from "@/lib/token-f1";
import type {
  BoundingBox,
  BoxedElement,
  EqualityFunction,
  ScoreFunction,
} from "@/lib/types";

// Bare numbers compare with `===`, so 0 equals -0 and NaN equals nothing.
export const valuesEqual = <Value>(left: Value, right: Value) => {
  if (typeof left === "number" && typeof right === "number") {
    return left === right;
  }

  return isDeepStrictEqual(left, right);
};

export const equalityScore = <Value>(
  equals: EqualityFunction<Value> = valuesEqual,
): ScoreFunction<Value> => {
  return (left, right) => (equals(left, right) ? 1 : 0);
};

export const bboxScore: ScoreFunction<BoundingBox> = (left, right) => iou(left, right);

export const contentGatedBoxScore = <Content>(
  equals: EqualityFunction<Content> = valuesEqual,
): ScoreFunction<BoxedElement<Content>> => {
  return ([leftBox, leftContent], [rightBox, rightContent]) =>
    equals(leftContent, rightContent) ? iou(leftBox, rightBox) : 0;
};

export const elementsMatch = <Content>(
  left: BoxedElement<Content>,
  right: BoxedElement<Content>,
  iouThreshold = DEFAULT_IOU_THRESHOLD,
  equals: EqualityFunction<Content> = valuesEqual,
) => {
  const [leftBox, leftContent] = left;
  const [rightBox, rightContent] = right;
  return equals(leftContent, rightContent) && iou(leftBox, rightBox) >= iouThreshold;
};

/**
 * Position-by-position comparison. Unlike `assignmentF1` this is order
 * sensitive, so both lists are expected in the same canonical order.
 */
export const elementsExactMatch = <Content>(
  left: readonly BoxedElement<Content>[],
  right: readonly BoxedElement<Content>[],
  iouThreshold = DEFAULT_IOU_THRESHOLD,
  equals: EqualityFunction<Content> = valuesEqual,
) => {
  if (left.length !== right.length) {
    return false;
  }

  return left.every((element, index) =>
    elementsMatch(element, right[index], iouThreshold, equals),
  );
};

export const buildThresholdedScoreMatrix = <Left, Right>(
  left: readonly Left[],
  right: readonly Right[],
  scoreFunc: ScoreFunction<Left, Right>,
  threshold: number,
) => {
  return left.map((leftItem) =>
    right.map((rightItem) => {
      const score = scoreFunc(leftItem, rightItem);
      return score >= threshold ? score : 0;
    }),
  );
};

/**
 * Number of pairs in a maximum-weight one-to-one assignment whose score
 * reaches `threshold`. Filler pairs the solver places on zeroed cells are
 * not counted.
 */
export const countAssignmentMatches = <Left, Right>(
  left: readonly Left[],
  right: readonly Right[],
  scoreFunc: ScoreFunction<Left, Right>,
  threshold: number,
) => {
  const scoreMatrix = buildThresholdedScoreMatrix(left, right, scoreFunc, threshold);
  const { rowIndices, columnIndices } = solveLinearSumAssignment(scoreMatrix, {
    maximize: true,
  });

  return rowIndices.filter(
    (row, pairIndex) => scoreMatrix[row][columnIndices[pairIndex]] >= threshold,
  ).length;
};

export const assignmentF1 = <Left, Right>(
  left: readonly Left[],
  right: readonly Right[],
  scoreFunc: ScoreFunction<Left, Right>,
  threshold: number,
) => {
  if (left.length === 0 && right.length === 0) {
    return 1;
  }

  if (left.length === 0 || right.length === 0) {
    return 0;
  }

  const matches = countAssignmentMatches(left, right, scoreFunc, threshold);
  if (matches === 0) {
    return 0;
  }

  return harmonicMean(matches / left.length, matches / right.length);
};
