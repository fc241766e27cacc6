import { AssignmentError } from '../evals/errors.js';

export type Matrix = readonly (readonly number[])[];

export interface Assignment {
  /** `rowToColumn[i]` is the column assigned to row `i`. */
  rowToColumn: number[];
  total: number;
}

/**
 * Solves the square assignment problem, maximizing the sum of the selected
 * entries. Hungarian algorithm with row/column potentials, O(k^3).
 */
export function solveAssignment(matrix: Matrix): Assignment {
  assertSquare(matrix);
  const k = matrix.length;
  if (k === 0) {
    return { rowToColumn: [], total: 0 };
  }

  // Potentials and matching are 1-indexed; index 0 is the virtual start column.
  const u = new Array<number>(k + 1).fill(0);
  const v = new Array<number>(k + 1).fill(0);
  const rowOfColumn = new Array<number>(k + 1).fill(0);
  const way = new Array<number>(k + 1).fill(0);
  const cost = (row: number, col: number) => -matrix[row - 1][col - 1];

  for (let row = 1; row <= k; row++) {
    rowOfColumn[0] = row;
    let col0 = 0;
    const minSlack = new Array<number>(k + 1).fill(Infinity);
    const used = new Array<boolean>(k + 1).fill(false);

    do {
      used[col0] = true;
      const row0 = rowOfColumn[col0];
      let delta = Infinity;
      let col1 = 0;

      for (let col = 1; col <= k; col++) {
        if (used[col]) continue;
        const slack = cost(row0, col) - u[row0] - v[col];
        if (slack < minSlack[col]) {
          minSlack[col] = slack;
          way[col] = col0;
        }
        if (minSlack[col] < delta) {
          delta = minSlack[col];
          col1 = col;
        }
      }

      for (let col = 0; col <= k; col++) {
        if (used[col]) {
          u[rowOfColumn[col]] += delta;
          v[col] -= delta;
        } else {
          minSlack[col] -= delta;
        }
      }
      col0 = col1;
    } while (rowOfColumn[col0] !== 0);

    do {
      const col1 = way[col0];
      rowOfColumn[col0] = rowOfColumn[col1];
      col0 = col1;
    } while (col0 !== 0);
  }

  const rowToColumn = new Array<number>(k).fill(-1);
  for (let col = 1; col <= k; col++) {
    rowToColumn[rowOfColumn[col] - 1] = col - 1;
  }

  const total = rowToColumn.reduce((sum, col, row) => sum + matrix[row][col], 0);
  return { rowToColumn, total };
}

function assertSquare(matrix: Matrix): void {
  const k = matrix.length;
  matrix.forEach((row, i) => {
    if (row.length !== k) {
      throw new AssignmentError(`Cost matrix must be square: row ${i} has ${row.length} columns, expected ${k}`);
    }
    row.forEach((value, j) => {
      if (!Number.isFinite(value)) {
        throw new AssignmentError(`Cost matrix entry [${i}][${j}] is not finite: ${value}`);
      }
    });
  });
}
