import { getCandy } from "./board";
import { candiesMatch, isSpecial } from "./candy";
import { PositionSet } from "./positions";
import {
  type Board,
  type Match,
  type MatchShape,
  type Position,
  pos,
} from "./types";

type Axis = Readonly<{ dRow: 0 | 1; dCol: 0 | 1 }>;

const HORIZONTAL: Axis = { dCol: 1, dRow: 0 };
const VERTICAL: Axis = { dCol: 0, dRow: 1 };

/**
 * Collect the run that starts at `start` and extends along `axis`.
 * Only the anchor's equality rule applies, so a color bomb anchor takes any
 * neighbour, but the run never extends onto a special candy.
 */
function runFrom(board: Board, start: Position, axis: Axis): Array<Position> {
  const anchor = getCandy(board, start);
  if (anchor === null) return [];

  const run: Array<Position> = [start];
  let next = pos(start.row + axis.dRow, start.col + axis.dCol);
  for (;;) {
    const other = getCandy(board, next);
    if (other === null || !candiesMatch(anchor, other) || isSpecial(other)) {
      break;
    }
    run.push(next);
    next = pos(next.row + axis.dRow, next.col + axis.dCol);
  }
  return run;
}

function scanLine(
  board: Board,
  first: Position,
  axis: Axis,
  length: number,
  into: Array<PositionSet>,
): void {
  let offset = 0;
  while (offset < length) {
    const start = pos(
      first.row + axis.dRow * offset,
      first.col + axis.dCol * offset,
    );
    const run = runFrom(board, start, axis);
    if (run.length >= 3) {
      into.push(new PositionSet(run));
      offset += run.length;
    } else {
      offset += 1;
    }
  }
}

// Union runs until no two share a cell, so L and T shapes come out whole
function mergeOverlapping(
  runs: ReadonlyArray<PositionSet>,
): Array<PositionSet> {
  const merged = runs.map((r) => new PositionSet(r.toSortedArray()));
  let changed = true;
  while (changed) {
    changed = false;
    outer: for (let i = 0; i < merged.length; i++) {
      for (let j = i + 1; j < merged.length; j++) {
        const a = merged[i];
        const b = merged[j];
        if (a === undefined || b === undefined) continue;
        if (a.overlaps(b)) {
          a.addAll(b.toSortedArray());
          merged.splice(j, 1);
          changed = true;
          break outer;
        }
      }
    }
  }
  return merged;
}

/**
 * Every match of three or more currently on the board: rows first, then
 * columns, merged across axes. Positions inside a match are row-major.
 */
export function findMatches(board: Board): Array<Match> {
  const runs: Array<PositionSet> = [];

  for (let row = 0; row < board.rows; row++) {
    scanLine(board, pos(row, 0), HORIZONTAL, board.cols, runs);
  }
  for (let col = 0; col < board.cols; col++) {
    scanLine(board, pos(0, col), VERTICAL, board.rows, runs);
  }

  return mergeOverlapping(runs).map((set) => set.toSortedArray());
}

function medianPosition(sorted: ReadonlyArray<Position>): Position {
  const center = sorted[Math.floor(sorted.length / 2)];
  if (center === undefined) {
    throw new Error("Cannot find the center of an empty match");
  }
  return center;
}

function mostFrequent(values: ReadonlyArray<number>): number | undefined {
  const counts = new Map<number, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  let best: number | undefined;
  let bestCount = 0;
  for (const [v, n] of counts) {
    if (n > bestCount) {
      best = v;
      bestCount = n;
    }
  }
  return best;
}

// Crossing cell of an L/T: busiest row meets busiest column, if it matched
function intersection(sorted: ReadonlyArray<Position>): Position {
  const row = mostFrequent(sorted.map((p) => p.row));
  const col = mostFrequent(sorted.map((p) => p.col));
  if (row !== undefined && col !== undefined) {
    const hit = sorted.find((p) => p.row === row && p.col === col);
    if (hit !== undefined) return hit;
  }
  return medianPosition(sorted);
}

/**
 * Decide which special a match produces. Checks run in precedence order:
 * color bomb (5+ in a line), wrapped (5+ spanning 3×3), striped (4+ in a
 * line), basic.
 */
export function classifyMatch(match: ReadonlyArray<Position>): MatchShape {
  const sorted = new PositionSet(match).toSortedArray();
  const count = sorted.length;
  if (count === 0) return { count, kind: "Basic" };

  const rows = sorted.map((p) => p.row);
  const cols = sorted.map((p) => p.col);
  const rowSpan = Math.max(...rows) - Math.min(...rows) + 1;
  const colSpan = Math.max(...cols) - Math.min(...cols) + 1;

  if (count >= 5 && (rowSpan === 1 || colSpan === 1)) {
    return { center: medianPosition(sorted), count, kind: "ColorBomb" };
  }
  if (rowSpan >= 3 && colSpan >= 3 && count >= 5) {
    return { center: intersection(sorted), count, kind: "Wrapped" };
  }
  if (count >= 4 && rowSpan === 1) {
    return {
      center: medianPosition(sorted),
      count,
      direction: "horizontal",
      kind: "Striped",
    };
  }
  if (count >= 4 && colSpan === 1) {
    return {
      center: medianPosition(sorted),
      count,
      direction: "vertical",
      kind: "Striped",
    };
  }
  return { count, kind: "Basic" };
}
