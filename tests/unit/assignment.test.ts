import { describe, expect, it } from "vitest";
import { solveLinearSumAssignment, sumAssignedCosts } from "@/lib/assignment";

const createSeededRandom = (seed: number) => {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
};

const permutations = (values: number[]): number[][] => {
  if (values.length === 0) {
    return [[]];
  }

  return values.flatMap((value, index) =>
    permutations([...values.slice(0, index), ...values.slice(index + 1)]).map((rest) => [
      value,
      ...rest,
    ]),
  );
};

// Exhaustive minimum for matrices with rows <= columns.
const bruteForceMinimum = (matrix: number[][]) => {
  const columnIndices = matrix[0].map((_, index) => index);
  return Math.min(
    ...permutations(columnIndices).map((ordering) =>
      matrix.reduce((total, row, rowIndex) => total + row[ordering[rowIndex]], 0),
    ),
  );
};

describe("linear sum assignment", () => {
  it("finds the minimum-cost assignment of a square matrix", () => {
    const costs = [
      [4, 1, 3],
      [2, 0, 5],
      [3, 2, 2],
    ];
    const result = solveLinearSumAssignment(costs);

    expect(result).toEqual({ rowIndices: [0, 1, 2], columnIndices: [1, 0, 2] });
    expect(sumAssignedCosts(costs, result)).toBe(5);
  });

  it("maximizes total weight when asked", () => {
    const scores = [
      [0.9, 0.8],
      [0.7, 0],
    ];

    expect(solveLinearSumAssignment(scores, { maximize: true })).toEqual({
      rowIndices: [0, 1],
      columnIndices: [1, 0],
    });
  });

  it("assigns every row of a wide matrix", () => {
    expect(
      solveLinearSumAssignment([
        [5, 1, 9],
        [1, 5, 9],
      ]),
    ).toEqual({ rowIndices: [0, 1], columnIndices: [1, 0] });
  });

  it("assigns every column of a tall matrix and reports pairs by row", () => {
    expect(
      solveLinearSumAssignment([
        [5, 1],
        [1, 5],
        [0, 9],
      ]),
    ).toEqual({ rowIndices: [0, 2], columnIndices: [1, 0] });
  });

  it("returns no pairs for empty matrices", () => {
    expect(solveLinearSumAssignment([])).toEqual({ rowIndices: [], columnIndices: [] });
    expect(solveLinearSumAssignment([[], []])).toEqual({ rowIndices: [], columnIndices: [] });
  });

  it("rejects ragged or non-finite matrices", () => {
    expect(() => solveLinearSumAssignment([[1, 2], [3]])).toThrow(
      "Cost matrix row 1 has 1 columns, expected 2.",
    );
    expect(() => solveLinearSumAssignment([[1, Number.NaN]])).toThrow(
      "Cost matrix entry [0, 1] is not a finite number.",
    );
  });

  it("matches exhaustive search on generated matrices", () => {
    const random = createSeededRandom(42);
    const shapes: Array<[number, number]> = [
      [2, 2],
      [3, 3],
      [3, 5],
      [4, 4],
      [4, 6],
      [5, 5],
    ];

    shapes.forEach(([rowCount, columnCount]) => {
      for (let trial = 0; trial < 10; trial += 1) {
        const costs = Array.from({ length: rowCount }, () =>
          Array.from({ length: columnCount }, () => Math.round(random() * 100) / 10),
        );
        const result = solveLinearSumAssignment(costs);

        expect(new Set(result.columnIndices).size).toBe(rowCount);
        expect(sumAssignedCosts(costs, result)).toBeCloseTo(bruteForceMinimum(costs));
      }
    });
  });
});
