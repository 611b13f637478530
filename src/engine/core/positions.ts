import { type Position } from "./types";

// Row-major: the order every position list in the engine is reported in
export function comparePositions(a: Position, b: Position): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function positionKey(p: Position): string {
  return `${String(p.row)},${String(p.col)}`;
}

/**
 * Insertion-ordered set of positions keyed by (row, col).
 * Used to union clear sets without double counting.
 */
export class PositionSet {
  private readonly items = new Map<string, Position>();

  constructor(initial: Iterable<Position> = []) {
    for (const p of initial) this.add(p);
  }

  add(p: Position): void {
    const key = positionKey(p);
    if (!this.items.has(key)) this.items.set(key, { col: p.col, row: p.row });
  }

  addAll(ps: Iterable<Position>): void {
    for (const p of ps) this.add(p);
  }

  delete(p: Position): void {
    this.items.delete(positionKey(p));
  }

  overlaps(other: PositionSet): boolean {
    for (const key of this.items.keys()) {
      if (other.items.has(key)) return true;
    }
    return false;
  }

  toSortedArray(): Array<Position> {
    return [...this.items.values()].sort(comparePositions);
  }
}
