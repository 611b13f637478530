import { getCandy, mintCandy, setCandy } from "../core/board";
import { pickOne } from "../core/rng/helpers";
import {
  type Board,
  type FallMove,
  type Refill,
  CANDY_KINDS,
  pos,
} from "../core/types";

import type { RandomGenerator } from "../core/rng/interface";

/**
 * Compact every column downward, keeping the candies' relative order.
 * Empties collect at the top. No candy changes column.
 */
export function applyGravity(board: Board): {
  board: Board;
  moves: Array<FallMove>;
} {
  let next = board;
  const moves: Array<FallMove> = [];

  for (let col = 0; col < board.cols; col++) {
    let writeRow = board.rows - 1;
    for (let readRow = board.rows - 1; readRow >= 0; readRow--) {
      const candy = getCandy(next, pos(readRow, col));
      if (candy === null) continue;
      if (readRow !== writeRow) {
        next = setCandy(next, pos(readRow, col), null);
        next = setCandy(next, pos(writeRow, col), candy);
        const moved = getCandy(next, pos(writeRow, col)) ?? candy;
        moves.push({ candy: moved, col, fromRow: readRow, toRow: writeRow });
      }
      writeRow--;
    }
  }

  return { board: next, moves };
}

/**
 * Fill every empty cell with a random plain candy, column by column and
 * top to bottom within a column. No match avoidance: refills are what
 * drive cascades.
 */
export function refillBoard(
  board: Board,
  rng: RandomGenerator,
): { board: Board; rng: RandomGenerator; refills: Array<Refill> } {
  let next = board;
  let current = rng;
  const refills: Array<Refill> = [];

  for (let col = 0; col < board.cols; col++) {
    for (let row = 0; row < board.rows; row++) {
      if (getCandy(next, pos(row, col)) !== null) continue;
      const draw = pickOne(current, CANDY_KINDS);
      current = draw.newRng;
      const minted = mintCandy(next, draw.value, pos(row, col));
      next = setCandy(minted.board, pos(row, col), minted.candy);
      refills.push({ candy: minted.candy, col, row });
    }
  }

  return { board: next, refills, rng: current };
}
