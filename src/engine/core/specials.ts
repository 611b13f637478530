import { allPositions, getCandy, inBounds } from "./board";
import { PositionSet } from "./positions";
import {
  type Board,
  type CandyKind,
  type MatchShape,
  type Position,
  type SpecialKind,
  pos,
} from "./types";

function fullRow(board: Board, row: number): Array<Position> {
  if (row < 0 || row >= board.rows) return [];
  return Array.from({ length: board.cols }, (_, col) => pos(row, col));
}

function fullColumn(board: Board, col: number): Array<Position> {
  if (col < 0 || col >= board.cols) return [];
  return Array.from({ length: board.rows }, (_, row) => pos(row, col));
}

// Square of side 2*radius+1 around center, clipped to the board
function block(
  board: Board,
  center: Position,
  radius: number,
): Array<Position> {
  const out: Array<Position> = [];
  for (let dr = -radius; dr <= radius; dr++) {
    for (let dc = -radius; dc <= radius; dc++) {
      const p = pos(center.row + dr, center.col + dc);
      if (inBounds(board, p)) out.push(p);
    }
  }
  return out;
}

function cellsOfKind(board: Board, kind: CandyKind): Array<Position> {
  return allPositions(board).filter((p) => getCandy(board, p)?.kind === kind);
}

function midpoint(a: Position, b: Position): Position {
  return pos(Math.floor((a.row + b.row) / 2), Math.floor((a.col + b.col) / 2));
}

function isStriped(special: SpecialKind): boolean {
  return special === "StripedH" || special === "StripedV";
}

/**
 * Cells cleared when the special at `at` goes off. A color bomb clears itself
 * plus every candy of `targetKind` when one is given. Empty or plain cells
 * clear nothing.
 */
export function activateSpecial(
  board: Board,
  at: Position,
  targetKind?: CandyKind,
): Array<Position> {
  const candy = getCandy(board, at);
  if (candy === null) return [];

  switch (candy.special) {
    case "None":
      return [];
    case "StripedH":
      return fullRow(board, at.row);
    case "StripedV":
      return fullColumn(board, at.col);
    case "Wrapped":
      return block(board, at, 1);
    case "ColorBomb": {
      const cleared = new PositionSet([at]);
      if (targetKind !== undefined) {
        cleared.addAll(cellsOfKind(board, targetKind));
      }
      return cleared.toSortedArray();
    }
  }
}

/**
 * Clear set for two pieces swapped directly onto each other. Precedence:
 * color bomb cases, wrapped+wrapped, wrapped+striped, striped+striped.
 * Any other pairing is not a combo and clears nothing.
 */
export function activateCombo(
  board: Board,
  a: Position,
  b: Position,
): Array<Position> {
  const first = getCandy(board, a);
  const second = getCandy(board, b);
  if (first === null || second === null) return [];

  const s1 = first.special;
  const s2 = second.special;
  const cleared = new PositionSet();

  if (s1 === "ColorBomb" && s2 === "ColorBomb") {
    cleared.addAll(allPositions(board));
  } else if (s1 === "ColorBomb" || s2 === "ColorBomb") {
    const bombAt = s1 === "ColorBomb" ? a : b;
    const other = s1 === "ColorBomb" ? second : first;
    cleared.addAll(cellsOfKind(board, other.kind));
    cleared.add(bombAt);
  } else if (s1 === "Wrapped" && s2 === "Wrapped") {
    cleared.addAll(block(board, midpoint(a, b), 2));
  } else if (
    (s1 === "Wrapped" && isStriped(s2)) ||
    (s2 === "Wrapped" && isStriped(s1))
  ) {
    const center = midpoint(a, b);
    for (let d = -1; d <= 1; d++) {
      cleared.addAll(fullRow(board, center.row + d));
      cleared.addAll(fullColumn(board, center.col + d));
    }
  } else if (isStriped(s1) && isStriped(s2)) {
    cleared.addAll(fullRow(board, a.row));
    cleared.addAll(fullRow(board, b.row));
    cleared.addAll(fullColumn(board, a.col));
    cleared.addAll(fullColumn(board, b.col));
  }

  return cleared.toSortedArray();
}

/** The special a classified match leaves behind, if any. */
export function specialForShape(
  shape: MatchShape,
): Exclude<SpecialKind, "None"> | null {
  switch (shape.kind) {
    case "Basic":
      return null;
    case "Striped":
      return shape.direction === "horizontal" ? "StripedH" : "StripedV";
    case "Wrapped":
      return "Wrapped";
    case "ColorBomb":
      return "ColorBomb";
  }
}
