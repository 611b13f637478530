// Base candy kinds, in the order random draws index into
export const CANDY_KINDS = [
  "blackhat",
  "defcon",
  "ronin",
  "lock",
  "key",
  "virus",
] as const;

export type CandyKind = (typeof CANDY_KINDS)[number];

export type SpecialKind =
  | "None"
  | "StripedH"
  | "StripedV"
  | "Wrapped"
  | "ColorBomb";

// Candy identity - serial number handed out by the board that created it
declare const CandyIdBrand: unique symbol;
export type CandyId = number & { readonly [CandyIdBrand]: true };

export function createCandyId(value: number): CandyId {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("CandyId must be a non-negative integer");
  }
  return value as CandyId;
}

export const candyIdAsNumber = (id: CandyId): number => id as number;

export type Position = Readonly<{ row: number; col: number }>;

export type Candy = Readonly<{
  id: CandyId;
  kind: CandyKind;
  position: Position | null;
  special: SpecialKind;
}>;

/**
 * Row-major grid of candies. A `null` cell is only legal transiently,
 * between a clear and the refill that follows it.
 */
export type Board = Readonly<{
  rows: number;
  cols: number;
  cells: ReadonlyArray<Candy | null>;
  nextId: number;
}>;

/** A match: unique positions, sorted row-major. */
export type Match = ReadonlyArray<Position>;

export type StripeDirection = "horizontal" | "vertical";

export type MatchShape =
  | Readonly<{ kind: "Basic"; count: number }>
  | Readonly<{
      kind: "Striped";
      count: number;
      direction: StripeDirection;
      center: Position;
    }>
  | Readonly<{ kind: "Wrapped"; count: number; center: Position }>
  | Readonly<{ kind: "ColorBomb"; count: number; center: Position }>;

export type FallMove = Readonly<{
  candy: Candy;
  fromRow: number;
  toRow: number;
  col: number;
}>;

export type Refill = Readonly<{
  candy: Candy;
  row: number;
  col: number;
}>;

export type SwapPair = Readonly<{ a: Position; b: Position }>;

export function isCandyKind(u: unknown): u is CandyKind {
  return (
    typeof u === "string" && (CANDY_KINDS as ReadonlyArray<string>).includes(u)
  );
}

export function pos(row: number, col: number): Position {
  return { col, row };
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}
