// Text form of a board, for tests, fixtures and debug output.
//
//   "B D R L"   one row per string, one token per cell
//   B D R L K V = blackhat defcon ronin lock key virus
//   suffix h / v / w / * = StripedH / StripedV / Wrapped / ColorBomb
//   "."         = empty cell

import { createEmptyBoard, getCandy, mintCandy, setCandy } from "./board";
import { makeSpecial, specialTag } from "./candy";
import { type Board, type CandyKind, type SpecialKind, pos } from "./types";

const KIND_CODES: Record<string, CandyKind> = {
  B: "blackhat",
  D: "defcon",
  K: "key",
  L: "lock",
  R: "ronin",
  V: "virus",
};

const CODE_FOR_KIND: Record<CandyKind, string> = {
  blackhat: "B",
  defcon: "D",
  key: "K",
  lock: "L",
  ronin: "R",
  virus: "V",
};

const SPECIAL_SUFFIXES: Record<string, Exclude<SpecialKind, "None">> = {
  "*": "ColorBomb",
  h: "StripedH",
  v: "StripedV",
  w: "Wrapped",
};

function tokenize(line: string): Array<string> {
  return line.trim().split(/\s+/).filter((t) => t.length > 0);
}

export function boardFromLayout(lines: ReadonlyArray<string>): Board {
  const grid = lines.map(tokenize);
  const rows = grid.length;
  const cols = grid[0]?.length ?? 0;
  if (rows === 0 || cols === 0) {
    throw new Error("Board layout must have at least one row and column");
  }

  let board = createEmptyBoard(rows, cols);
  grid.forEach((tokens, row) => {
    if (tokens.length !== cols) {
      throw new Error(
        `Layout row ${String(row)} has ${String(tokens.length)} cells, expected ${String(cols)}`,
      );
    }
    tokens.forEach((token, col) => {
      if (token === ".") return;
      const kind = KIND_CODES[token.charAt(0)];
      if (kind === undefined) {
        throw new Error(`Unknown candy code "${token}"`);
      }
      const suffix = token.slice(1);
      const special = suffix === "" ? undefined : SPECIAL_SUFFIXES[suffix];
      if (suffix !== "" && special === undefined) {
        throw new Error(`Unknown special suffix in "${token}"`);
      }
      const minted = mintCandy(board, kind, pos(row, col));
      const candy =
        special === undefined
          ? minted.candy
          : makeSpecial(minted.candy, special);
      board = setCandy(minted.board, pos(row, col), candy);
    });
  });
  return board;
}

export function describeBoard(board: Board): Array<string> {
  const lines: Array<string> = [];
  for (let row = 0; row < board.rows; row++) {
    const tokens: Array<string> = [];
    for (let col = 0; col < board.cols; col++) {
      const candy = getCandy(board, pos(row, col));
      tokens.push(
        candy === null
          ? "."
          : CODE_FOR_KIND[candy.kind] + specialTag(candy.special),
      );
    }
    lines.push(tokens.join(" "));
  }
  return lines;
}
