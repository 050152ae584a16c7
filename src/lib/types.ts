export type MetricVariant = "text" | "elements" | "boxed_elements";

/** `[ymin, xmin, ymax, xmax]` in a coordinate space shared by both sides. */
export type BoundingBox = readonly [number, number, number, number];

export type BoxedElement<Content = unknown> = readonly [BoundingBox, Content];

export type ScoreFunction<Left, Right = Left> = (left: Left, right: Right) => number;

export type EqualityFunction<Value> = (left: Value, right: Value) => boolean;

export type BinaryScore = 0 | 1;

export type TextMetrics = {
  exactMatch: BinaryScore;
  f1: number;
};

export type ElementListMetrics = {
  exactMatch: BinaryScore;
  f1: number;
};

export type BoxedElementMetrics = {
  bboxF1: number;
  exactMatch: BinaryScore;
  f1: number;
};

export type MetricKey = keyof TextMetrics | keyof BoxedElementMetrics;

export type AssignmentResult = {
  rowIndices: number[];
  columnIndices: number[];
};
