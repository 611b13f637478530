// Tests for @/engine/core/specials.ts
import { createEmptyBoard, mintCandy, setCandy } from "@/engine/core/board";
import { makeSpecial } from "@/engine/core/candy";
import { boardFromLayout } from "@/engine/core/layout";
import {
  activateCombo,
  activateSpecial,
  specialForShape,
} from "@/engine/core/specials";
import {
  type Board,
  type CandyKind,
  type Position,
  type SpecialKind,
  pos,
} from "@/engine/core/types";

// Empty 8×8 board with the given pieces placed; geometry ignores empties
function boardWith(
  pieces: ReadonlyArray<{
    row: number;
    col: number;
    kind: CandyKind;
    special: SpecialKind;
  }>,
): Board {
  let board = createEmptyBoard(8, 8);
  for (const piece of pieces) {
    const minted = mintCandy(board, piece.kind, null);
    const candy =
      piece.special === "None"
        ? minted.candy
        : makeSpecial(minted.candy, piece.special);
    board = setCandy(minted.board, pos(piece.row, piece.col), candy);
  }
  return board;
}

const row = (r: number): Array<Position> =>
  Array.from({ length: 8 }, (_, c) => pos(r, c));
const col = (c: number): Array<Position> =>
  Array.from({ length: 8 }, (_, r) => pos(r, c));

describe("@/engine/core/specials - activateSpecial", () => {
  test("a horizontal stripe at (3,3) clears row 3", () => {
    const board = boardWith([
      { col: 3, kind: "ronin", row: 3, special: "StripedH" },
    ]);
    const cleared = activateSpecial(board, pos(3, 3));
    expect(cleared).toHaveLength(8);
    expect(cleared).toEqual(row(3));
  });

  test("a vertical stripe clears its column", () => {
    const board = boardWith([
      { col: 5, kind: "key", row: 2, special: "StripedV" },
    ]);
    expect(activateSpecial(board, pos(2, 5))).toEqual(col(5));
  });

  test("a wrapped candy clears the 3×3 block around it", () => {
    const board = boardWith([
      { col: 3, kind: "lock", row: 3, special: "Wrapped" },
    ]);
    expect(activateSpecial(board, pos(3, 3))).toEqual([
      pos(2, 2),
      pos(2, 3),
      pos(2, 4),
      pos(3, 2),
      pos(3, 3),
      pos(3, 4),
      pos(4, 2),
      pos(4, 3),
      pos(4, 4),
    ]);
  });

  test("a wrapped candy in the corner clips to the board", () => {
    const board = boardWith([
      { col: 0, kind: "lock", row: 0, special: "Wrapped" },
    ]);
    expect(activateSpecial(board, pos(0, 0))).toEqual([
      pos(0, 0),
      pos(0, 1),
      pos(1, 0),
      pos(1, 1),
    ]);
  });

  describe("color bomb", () => {
    const board = boardFromLayout([
      "B* D R L",
      "D R L K",
      "R L K V",
      "L K V B",
    ]);

    test("clears itself and every candy of the target kind", () => {
      expect(activateSpecial(board, pos(0, 0), "ronin")).toEqual([
        pos(0, 0),
        pos(0, 2),
        pos(1, 1),
        pos(2, 0),
      ]);
    });

    test("clears only itself without a target", () => {
      expect(activateSpecial(board, pos(0, 0))).toEqual([pos(0, 0)]);
    });
  });

  test("plain and empty cells clear nothing", () => {
    const board = boardWith([
      { col: 0, kind: "virus", row: 0, special: "None" },
    ]);
    expect(activateSpecial(board, pos(0, 0))).toEqual([]);
    expect(activateSpecial(board, pos(4, 4))).toEqual([]);
  });
});

describe("@/engine/core/specials - activateCombo", () => {
  test("two color bombs clear the whole board", () => {
    const board = boardWith([
      { col: 3, kind: "key", row: 3, special: "ColorBomb" },
      { col: 4, kind: "lock", row: 3, special: "ColorBomb" },
    ]);
    expect(activateCombo(board, pos(3, 3), pos(3, 4))).toHaveLength(64);
  });

  test("a color bomb with any partner clears the partner's kind", () => {
    const board = boardFromLayout([
      "B* Dw R L",
      "D R L K",
      "R L K V",
      "L K V B",
    ]);
    expect(activateCombo(board, pos(0, 0), pos(0, 1))).toEqual([
      pos(0, 0),
      pos(0, 1),
      pos(1, 0),
    ]);
  });

  test("color bomb takes precedence over wrapped", () => {
    const board = boardWith([
      { col: 3, kind: "key", row: 3, special: "Wrapped" },
      { col: 4, kind: "lock", row: 3, special: "ColorBomb" },
      { col: 0, kind: "key", row: 7, special: "None" },
    ]);
    expect(activateCombo(board, pos(3, 3), pos(3, 4))).toEqual([
      pos(3, 3),
      pos(3, 4),
      pos(7, 0),
    ]);
  });

  test("two wrapped candies clear a 5×5 block at their midpoint", () => {
    const board = boardWith([
      { col: 3, kind: "key", row: 3, special: "Wrapped" },
      { col: 4, kind: "lock", row: 3, special: "Wrapped" },
    ]);
    const cleared = activateCombo(board, pos(3, 3), pos(3, 4));
    expect(cleared).toHaveLength(25);
    expect(cleared[0]).toEqual(pos(1, 1));
    expect(cleared[24]).toEqual(pos(5, 5));
  });

  test("wrapped with striped clears three rows and three columns", () => {
    const board = boardWith([
      { col: 3, kind: "key", row: 3, special: "Wrapped" },
      { col: 4, kind: "lock", row: 3, special: "StripedV" },
    ]);
    const cleared = activateCombo(board, pos(3, 3), pos(3, 4));
    // Rows 2..4 and columns 2..4 overlap in nine cells
    expect(cleared).toHaveLength(3 * 8 + 3 * 8 - 9);
    expect(cleared).toContainEqual(pos(0, 2));
    expect(cleared).toContainEqual(pos(4, 7));
    expect(cleared).not.toContainEqual(pos(0, 5));
  });

  test("two stripes clear both rows and both columns", () => {
    const board = boardWith([
      { col: 3, kind: "key", row: 3, special: "StripedH" },
      { col: 3, kind: "lock", row: 4, special: "StripedH" },
    ]);
    const cleared = activateCombo(board, pos(3, 3), pos(4, 3));
    // Rows 3 and 4 plus column 3, which they share two cells with
    expect(cleared).toHaveLength(8 + 8 + 8 - 2);
  });

  test("a special next to a plain candy is no combo", () => {
    const board = boardWith([
      { col: 3, kind: "key", row: 3, special: "StripedH" },
      { col: 4, kind: "lock", row: 3, special: "None" },
    ]);
    expect(activateCombo(board, pos(3, 3), pos(3, 4))).toEqual([]);
  });
});

describe("@/engine/core/specials - specialForShape", () => {
  test("maps each shape to the special it leaves", () => {
    const center = pos(1, 1);
    expect(specialForShape({ count: 3, kind: "Basic" })).toBeNull();
    expect(
      specialForShape({
        center,
        count: 4,
        direction: "horizontal",
        kind: "Striped",
      }),
    ).toBe("StripedH");
    expect(
      specialForShape({
        center,
        count: 4,
        direction: "vertical",
        kind: "Striped",
      }),
    ).toBe("StripedV");
    expect(specialForShape({ center, count: 5, kind: "Wrapped" })).toBe(
      "Wrapped",
    );
    expect(specialForShape({ center, count: 5, kind: "ColorBomb" })).toBe(
      "ColorBomb",
    );
  });
});
