import type { BoundingBox } from "@/lib/types";

export const getBoxWidth = (box: BoundingBox) => {
  return box[3] - box[1];
};

export const getBoxHeight = (box: BoundingBox) => {
  return box[2] - box[0];
};

export const getBoxArea = (box: BoundingBox) => {
  return getBoxWidth(box) * getBoxHeight(box);
};

/** May come back inverted when the boxes are disjoint; area is clamped separately. */
export const intersectBoxes = (left: BoundingBox, right: BoundingBox): BoundingBox => {
  return [
    Math.max(left[0], right[0]),
    Math.max(left[1], right[1]),
    Math.min(left[2], right[2]),
    Math.min(left[3], right[3]),
  ];
};

export const computeIntersectionArea = (left: BoundingBox, right: BoundingBox) => {
  const overlap = intersectBoxes(left, right);
  return Math.max(0, getBoxWidth(overlap)) * Math.max(0, getBoxHeight(overlap));
};

export const iou = (left: BoundingBox, right: BoundingBox) => {
  const intersectionArea = computeIntersectionArea(left, right);
  if (intersectionArea === 0) {
    return 0;
  }

  return (
    intersectionArea / (getBoxArea(left) + getBoxArea(right) - intersectionArea)
  );
};
