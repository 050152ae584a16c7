import { DEFAULT_IOU_THRESHOLD, NO_ANSWER } from "@/lib/constants";
import {
  assignmentF1,
  bboxScore,
  contentGatedBoxScore,
  elementsExactMatch,
  equalityScore,
  valuesEqual,
} from "@/lib/matching";
import { normalizeAnswerText, tokenizeAnswer } from "@/lib/normalization";
import { tokenF1 } from "@/lib/token-f1";
import type {
  BinaryScore,
  BoxedElement,
  BoxedElementMetrics,
  ElementListMetrics,
  EqualityFunction,
  TextMetrics,
} from "@/lib/types";

const toBinaryScore = (value: boolean): BinaryScore => (value ? 1 : 0);

const maxOf = (values: number[]) => Math.max(...values);

/**
 * SQA-S. Only the `NO_ANSWER` sentinel means "no answer"; an empty string is
 * scored like any other text.
 */
export const sqaTextMetrics = (
  prediction: string,
  groundTruths: readonly string[],
): TextMetrics => {
  if (prediction === NO_ANSWER) {
    const expectsNoAnswer = groundTruths.some((groundTruth) => groundTruth === NO_ANSWER);
    return expectsNoAnswer ? { exactMatch: 1, f1: 1 } : { exactMatch: 0, f1: 0 };
  }

  const answerable = groundTruths.filter((groundTruth) => groundTruth !== NO_ANSWER);
  if (answerable.length === 0) {
    return { exactMatch: 0, f1: 0 };
  }

  const normalizedPrediction = normalizeAnswerText(prediction);
  const normalizedGroundTruths = answerable.map(normalizeAnswerText);
  const predictionTokens = tokenizeAnswer(normalizedPrediction);

  return {
    exactMatch: toBinaryScore(normalizedGroundTruths.includes(normalizedPrediction)),
    f1: maxOf(
      normalizedGroundTruths.map((groundTruth) =>
        tokenF1(predictionTokens, tokenizeAnswer(groundTruth)),
      ),
    ),
  };
};

/** SQA-UIC. An empty list is the "no answer" value. */
export const sqaElementListMetrics = <Element>(
  prediction: readonly Element[],
  groundTruths: readonly (readonly Element[])[],
  equals: EqualityFunction<Element> = valuesEqual,
): ElementListMetrics => {
  if (prediction.length === 0) {
    const expectsNoAnswer = groundTruths.some((groundTruth) => groundTruth.length === 0);
    return expectsNoAnswer ? { exactMatch: 1, f1: 1 } : { exactMatch: 0, f1: 0 };
  }

  const answerable = groundTruths.filter((groundTruth) => groundTruth.length > 0);
  if (answerable.length === 0) {
    return { exactMatch: 0, f1: 0 };
  }

  const listsEqual = (groundTruth: readonly Element[]) =>
    groundTruth.length === prediction.length &&
    groundTruth.every((element, index) => equals(prediction[index], element));
  const scoreFunc = equalityScore(equals);

  return {
    exactMatch: toBinaryScore(answerable.some(listsEqual)),
    f1: maxOf(
      answerable.map((groundTruth) => assignmentF1(prediction, groundTruth, scoreFunc, 1)),
    ),
  };
};

/**
 * SQA-UIC-BB. BBox-F1 and F1 use `iouThreshold`; positional exact match
 * always runs at `DEFAULT_IOU_THRESHOLD`.
 */
export const sqaBoxedElementMetrics = <Content>(
  prediction: readonly BoxedElement<Content>[],
  groundTruths: readonly (readonly BoxedElement<Content>[])[],
  iouThreshold = DEFAULT_IOU_THRESHOLD,
  equals: EqualityFunction<Content> = valuesEqual,
): BoxedElementMetrics => {
  if (prediction.length === 0) {
    const expectsNoAnswer = groundTruths.some((groundTruth) => groundTruth.length === 0);
    return expectsNoAnswer
      ? { bboxF1: 1, exactMatch: 1, f1: 1 }
      : { bboxF1: 0, exactMatch: 0, f1: 0 };
  }

  const answerable = groundTruths.filter((groundTruth) => groundTruth.length > 0);
  if (answerable.length === 0) {
    return { bboxF1: 0, exactMatch: 0, f1: 0 };
  }

  const predictionBoxes = prediction.map(([box]) => box);
  const gatedScore = contentGatedBoxScore(equals);

  return {
    bboxF1: maxOf(
      answerable.map((groundTruth) =>
        assignmentF1(
          predictionBoxes,
          groundTruth.map(([box]) => box),
          bboxScore,
          iouThreshold,
        ),
      ),
    ),
    exactMatch: toBinaryScore(
      answerable.some((groundTruth) =>
        elementsExactMatch(prediction, groundTruth, DEFAULT_IOU_THRESHOLD, equals),
      ),
    ),
    f1: maxOf(
      answerable.map((groundTruth) =>
        assignmentF1(prediction, groundTruth, gatedScore, iouThreshold),
      ),
    ),
  };
};

export function toMetricTuple(metrics: BoxedElementMetrics): [number, BinaryScore, number];
export function toMetricTuple(metrics: TextMetrics): [BinaryScore, number];
export function toMetricTuple(
  metrics: TextMetrics | BoxedElementMetrics,
): [BinaryScore, number] | [number, BinaryScore, number] {
  if ("bboxF1" in metrics) {
    return [metrics.bboxF1, metrics.exactMatch, metrics.f1];
  }

  return [metrics.exactMatch, metrics.f1];
}
