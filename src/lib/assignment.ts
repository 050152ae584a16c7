import type { AssignmentResult } from "@/lib/types";

export type AssignmentOptions = {
  maximize?: boolean;
};

const assertRectangular = (costMatrix: readonly (readonly number[])[]) => {
  const columnCount = costMatrix[0]?.length ?? 0;
  costMatrix.forEach((row, rowIndex) => {
    if (row.length !== columnCount) {
      throw new Error(
        `Cost matrix row ${rowIndex} has ${row.length} columns, expected ${columnCount}.`,
      );
    }

    row.forEach((cost, columnIndex) => {
      if (!Number.isFinite(cost)) {
        throw new Error(
          `Cost matrix entry [${rowIndex}, ${columnIndex}] is not a finite number.`,
        );
      }
    });
  });

  return columnCount;
};

const transpose = (matrix: readonly (readonly number[])[], columnCount: number) => {
  return Array.from({ length: columnCount }, (_, columnIndex) =>
    matrix.map((row) => row[columnIndex]),
  );
};

/**
 * Shortest augmenting path Hungarian method with row/column potentials.
 * Requires `rows <= columns`; every row ends up assigned. Indices inside are
 * 1-based with column 0 acting as the virtual source of each augmentation.
 */
const solveMinimumCost = (costs: readonly (readonly number[])[], columnCount: number) => {
  const rowCount = costs.length;
  const rowPotential = new Array<number>(rowCount + 1).fill(0);
  const columnPotential = new Array<number>(columnCount + 1).fill(0);
  const rowForColumn = new Array<number>(columnCount + 1).fill(0);
  const previousColumn = new Array<number>(columnCount + 1).fill(0);

  for (let row = 1; row <= rowCount; row += 1) {
    rowForColumn[0] = row;
    let currentColumn = 0;
    const minSlack = new Array<number>(columnCount + 1).fill(Number.POSITIVE_INFINITY);
    const visited = new Array<boolean>(columnCount + 1).fill(false);

    do {
      visited[currentColumn] = true;
      const currentRow = rowForColumn[currentColumn];
      let delta = Number.POSITIVE_INFINITY;
      let nextColumn = 0;

      for (let column = 1; column <= columnCount; column += 1) {
        if (visited[column]) {
          continue;
        }

        const reducedCost =
          costs[currentRow - 1][column - 1] -
          rowPotential[currentRow] -
          columnPotential[column];
        if (reducedCost < minSlack[column]) {
          minSlack[column] = reducedCost;
          previousColumn[column] = currentColumn;
        }

        if (minSlack[column] < delta) {
          delta = minSlack[column];
          nextColumn = column;
        }
      }

      for (let column = 0; column <= columnCount; column += 1) {
        if (visited[column]) {
          rowPotential[rowForColumn[column]] += delta;
          columnPotential[column] -= delta;
        } else {
          minSlack[column] -= delta;
        }
      }

      currentColumn = nextColumn;
    } while (rowForColumn[currentColumn] !== 0);

    do {
      const column = previousColumn[currentColumn];
      rowForColumn[currentColumn] = rowForColumn[column];
      currentColumn = column;
    } while (currentColumn !== 0);
  }

  const columnForRow = new Array<number>(rowCount).fill(-1);
  for (let column = 1; column <= columnCount; column += 1) {
    if (rowForColumn[column] !== 0) {
      columnForRow[rowForColumn[column] - 1] = column - 1;
    }
  }

  return columnForRow;
};

/**
 * Globally optimal one-to-one assignment between the rows and columns of a
 * dense cost matrix. Rectangular input pairs `min(rows, columns)` entries;
 * the remaining rows or columns stay unassigned. Pairs are ordered by row.
 */
export const solveLinearSumAssignment = (
  costMatrix: readonly (readonly number[])[],
  { maximize = false }: AssignmentOptions = {},
): AssignmentResult => {
  const columnCount = assertRectangular(costMatrix);
  if (costMatrix.length === 0 || columnCount === 0) {
    return { rowIndices: [], columnIndices: [] };
  }

  const costs = maximize
    ? costMatrix.map((row) => row.map((cost) => -cost))
    : costMatrix.map((row) => [...row]);
  const isTall = costs.length > columnCount;
  const oriented = isTall ? transpose(costs, columnCount) : costs;
  const orientedColumnCount = isTall ? costs.length : columnCount;
  const assignment = solveMinimumCost(oriented, orientedColumnCount);

  const pairs = assignment.map((assignedColumn, orientedRow) =>
    isTall ? [assignedColumn, orientedRow] : [orientedRow, assignedColumn],
  );
  pairs.sort((left, right) => left[0] - right[0]);

  return {
    rowIndices: pairs.map(([row]) => row),
    columnIndices: pairs.map(([, column]) => column),
  };
};

export const sumAssignedCosts = (
  costMatrix: readonly (readonly number[])[],
  { rowIndices, columnIndices }: AssignmentResult,
) => {
  return rowIndices.reduce(
    (total, row, pairIndex) => total + costMatrix[row][columnIndices[pairIndex]],
    0,
  );
};
