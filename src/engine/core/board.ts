import { createCandy, withPosition } from "./candy";
import { pickOne } from "./rng/helpers";
import {
  type Board,
  type Candy,
  type CandyKind,
  type Position,
  CANDY_KINDS,
  createCandyId,
  pos,
} from "./types";

import type { RandomGenerator } from "./rng/interface";

export function createEmptyBoard(rows: number, cols: number): Board {
  return {
    cells: new Array<Candy | null>(rows * cols).fill(null),
    cols,
    nextId: 0,
    rows,
  };
}

export function inBounds(board: Board, p: Position): boolean {
  return (
    Number.isInteger(p.row) &&
    Number.isInteger(p.col) &&
    p.row >= 0 &&
    p.row < board.rows &&
    p.col >= 0 &&
    p.col < board.cols
  );
}

function idx(board: Board, p: Position): number {
  return p.row * board.cols + p.col;
}

// Out-of-bounds reads are empty, never errors: special geometry clips for free
export function getCandy(board: Board, p: Position): Candy | null {
  if (!inBounds(board, p)) return null;
  return board.cells[idx(board, p)] ?? null;
}

/**
 * Place a candy (or empty the cell). The candy's recorded position is
 * rewritten to the target cell. Out-of-bounds writes are ignored.
 */
export function setCandy(
  board: Board,
  p: Position,
  candy: Candy | null,
): Board {
  if (!inBounds(board, p)) return board;
  const cells = [...board.cells];
  cells[idx(board, p)] =
    candy === null ? null : withPosition(candy, pos(p.row, p.col));
  return { ...board, cells };
}

export function isAdjacent(a: Position, b: Position): boolean {
  const rowDiff = Math.abs(a.row - b.row);
  const colDiff = Math.abs(a.col - b.col);
  return (rowDiff === 1 && colDiff === 0) || (rowDiff === 0 && colDiff === 1);
}

export function swapCandies(board: Board, a: Position, b: Position): Board {
  if (!inBounds(board, a) || !inBounds(board, b)) return board;
  const first = getCandy(board, a);
  const second = getCandy(board, b);
  return setCandy(setCandy(board, a, second), b, first);
}

/**
 * Empty every listed cell. Idempotent: cells already empty, out of bounds,
 * or listed twice are skipped and not reported.
 */
export function clearPositions(
  board: Board,
  positions: Iterable<Position>,
): { board: Board; cleared: Array<Candy> } {
  const cells = [...board.cells];
  const cleared: Array<Candy> = [];
  for (const p of positions) {
    if (!inBounds(board, p)) continue;
    const i = idx(board, p);
    const candy = cells[i];
    if (candy === null || candy === undefined) continue;
    cleared.push(candy);
    cells[i] = null;
  }
  if (cleared.length === 0) return { board, cleared };
  return { board: { ...board, cells }, cleared };
}

/** Allocate a fresh plain candy id-stamped by this board. */
export function mintCandy(
  board: Board,
  kind: CandyKind,
  position: Position | null,
): { board: Board; candy: Candy } {
  const candy = createCandy(kind, createCandyId(board.nextId), position);
  return { board: { ...board, nextId: board.nextId + 1 }, candy };
}

export function allPositions(board: Board): Array<Position> {
  const out: Array<Position> = [];
  for (let row = 0; row < board.rows; row++) {
    for (let col = 0; col < board.cols; col++) {
      out.push(pos(row, col));
    }
  }
  return out;
}

export function isFull(board: Board): boolean {
  return board.cells.every((c) => c !== null);
}

export function countEmpty(board: Board): number {
  return board.cells.filter((c) => c === null).length;
}

function runKindAt(board: Board, a: Position, b: Position): CandyKind | null {
  const first = getCandy(board, a);
  const second = getCandy(board, b);
  if (first === null || second === null) return null;
  return first.kind === second.kind ? first.kind : null;
}

/**
 * Fill a new board top-to-bottom, left-to-right. Each cell excludes the kind
 * that would complete a run of three with the two cells to its left or the
 * two cells above it, then draws uniformly from what remains.
 */
export function createBoard(
  rows: number,
  cols: number,
  rng: RandomGenerator,
): { board: Board; rng: RandomGenerator } {
  let board = createEmptyBoard(rows, cols);
  let current = rng;

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const excluded = new Set<CandyKind>();
      const left = runKindAt(board, pos(row, col - 1), pos(row, col - 2));
      if (left !== null) excluded.add(left);
      const up = runKindAt(board, pos(row - 1, col), pos(row - 2, col));
      if (up !== null) excluded.add(up);

      const available = CANDY_KINDS.filter((k) => !excluded.has(k));
      const draw = pickOne(current, available);
      current = draw.newRng;

      const minted = mintCandy(board, draw.value, pos(row, col));
      board = setCandy(minted.board, pos(row, col), minted.candy);
    }
  }

  return { board, rng: current };
}
