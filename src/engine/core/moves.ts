import { allPositions, getCandy, setCandy, swapCandies } from "./board";
import { isSpecial } from "./candy";
import { findMatches } from "./matching";
import { shuffle } from "./rng/helpers";
import {
  type Board,
  type Candy,
  type Position,
  type SwapPair,
  pos,
} from "./types";

import type { RandomGenerator } from "./rng/interface";

export const SHUFFLE_RETRIES = 10;

/**
 * Would swapping `a` and `b` leave at least one match on the board?
 * Boards are values, so the probe cannot disturb the caller's board.
 */
export function wouldCreateMatch(
  board: Board,
  a: Position,
  b: Position,
): boolean {
  return findMatches(swapCandies(board, a, b)).length > 0;
}

/** Two specials swapped onto each other fire as a combo, match or not. */
export function isComboSwap(board: Board, a: Position, b: Position): boolean {
  const first = getCandy(board, a);
  const second = getCandy(board, b);
  return (
    first !== null && second !== null && isSpecial(first) && isSpecial(second)
  );
}

function isPlayable(board: Board, { a, b }: SwapPair): boolean {
  return isComboSwap(board, a, b) || wouldCreateMatch(board, a, b);
}

function neighbourPairs(board: Board): Array<SwapPair> {
  const pairs: Array<SwapPair> = [];
  for (let row = 0; row < board.rows; row++) {
    for (let col = 0; col < board.cols; col++) {
      if (col < board.cols - 1) {
        pairs.push({ a: pos(row, col), b: pos(row, col + 1) });
      }
      if (row < board.rows - 1) {
        pairs.push({ a: pos(row, col), b: pos(row + 1, col) });
      }
    }
  }
  return pairs;
}

/** Every right- and down-neighbour swap that makes a match or a combo. */
export function findValidMoves(board: Board): Array<SwapPair> {
  return neighbourPairs(board).filter((pair) => isPlayable(board, pair));
}

export function hasValidMoves(board: Board): boolean {
  return neighbourPairs(board).some((pair) => isPlayable(board, pair));
}

// Deal onto an emptied grid in scan order
function deal(board: Board, candies: ReadonlyArray<Candy>): Board {
  let next: Board = {
    ...board,
    cells: new Array<Candy | null>(board.cells.length).fill(null),
  };
  allPositions(board).forEach((p, i) => {
    const candy = candies[i];
    if (candy !== undefined) next = setCandy(next, p, candy);
  });
  return next;
}

/**
 * Collect every candy, Fisher-Yates them and deal back in scan order.
 * Re-deals up to SHUFFLE_RETRIES times while the result holds a match, then
 * accepts whatever came out: the result is not guaranteed match-free.
 */
export function shuffleBoard(
  board: Board,
  rng: RandomGenerator,
): { board: Board; rng: RandomGenerator } {
  const candies = allPositions(board)
    .map((p) => getCandy(board, p))
    .filter((c): c is Candy => c !== null);

  let pass = shuffle(candies, rng);
  let dealt = deal(board, pass.shuffled);

  for (let i = 0; i < SHUFFLE_RETRIES; i++) {
    if (findMatches(dealt).length === 0) break;
    pass = shuffle(pass.shuffled, pass.newRng);
    dealt = deal(board, pass.shuffled);
  }

  return { board: dealt, rng: pass.newRng };
}
