export {
  DEFAULT_IOU_THRESHOLD,
  METRIC_LABELS,
  NO_ANSWER,
  VARIANT_LABELS,
} from "@/lib/constants";
export { mean, summarizeMetrics } from "@/lib/aggregate";
export { solveLinearSumAssignment } from "@/lib/assignment";
export { getBoxArea, iou } from "@/lib/geometry";
export {
  assignmentF1,
  bboxScore,
  contentGatedBoxScore,
  elementsExactMatch,
  elementsMatch,
  equalityScore,
} from "@/lib/matching";
export {
  sqaBoxedElementMetrics,
  sqaElementListMetrics,
  sqaTextMetrics,
  toMetricTuple,
} from "@/lib/metrics";
export { normalizeAnswerText, tokenizeAnswer } from "@/lib/normalization";
export {
  parseScoringDataset,
  resolveIouThreshold,
} from "@/lib/schemas";
export { scoreDataset } from "@/lib/scoring";
export { tokenF1 } from "@/lib/token-f1";
export type * from "@/lib/types";
