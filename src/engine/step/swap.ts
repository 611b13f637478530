import { getCandy, inBounds, isAdjacent, swapCandies } from "../core/board";
import { isColorBomb } from "../core/candy";
import { isComboSwap, wouldCreateMatch } from "../core/moves";

import type { CandyKind, Position } from "../core/types";
import type { DomainEvent, SwapRejectReason } from "../events";
import type { GameState } from "../types";

export type PendingCombo = Readonly<{
  a: Position;
  b: Position;
  /** Kind a color bomb fires on; null without exactly one bomb. */
  targetKind: CandyKind | null;
}>;

export type SwapEvaluation =
  | Readonly<{
      kind: "Rejected";
      a: Position;
      b: Position;
      reason: SwapRejectReason;
    }>
  | Readonly<{ kind: "Match"; a: Position; b: Position }>
  | Readonly<{ kind: "Combo"; a: Position; b: Position; combo: PendingCombo }>;

export type AcceptedSwap = Exclude<SwapEvaluation, { kind: "Rejected" }>;

/** A turn in flight: the session plus what the resolver still owes it. */
export type Turn = Readonly<{
  state: GameState;
  pendingCombo: PendingCombo | null;
  startScore: number;
  /** Passes that cleared something, the combo pass included. */
  passes: number;
}>;

function reject(
  a: Position,
  b: Position,
  reason: SwapRejectReason,
): SwapEvaluation {
  return { a, b, kind: "Rejected", reason };
}

/**
 * Decide what a swap of `a` and `b` would do, without touching the state.
 * Two specials make a combo; any other swap, a color bomb with a plain candy
 * included, must produce a match.
 */
export function evaluateSwap(
  state: GameState,
  a: Position,
  b: Position,
): SwapEvaluation {
  if (state.gameOver) return reject(a, b, "gameOver");
  const { board } = state;
  if (!inBounds(board, a) || !inBounds(board, b)) {
    return reject(a, b, "outOfBounds");
  }
  if (!isAdjacent(a, b)) return reject(a, b, "notAdjacent");

  const first = getCandy(board, a);
  const second = getCandy(board, b);
  if (first === null || second === null) return reject(a, b, "emptyCell");

  if (isComboSwap(board, a, b)) {
    let targetKind: CandyKind | null = null;
    if (isColorBomb(first) && !isColorBomb(second)) targetKind = second.kind;
    if (isColorBomb(second) && !isColorBomb(first)) targetKind = first.kind;
    return { a, b, combo: { a, b, targetKind }, kind: "Combo" };
  }

  if (!wouldCreateMatch(board, a, b)) return reject(a, b, "noMatch");
  return { a, b, kind: "Match" };
}

/** Commit an accepted swap and open a turn at cascade level 1. */
export function startTurn(
  state: GameState,
  swap: AcceptedSwap,
): { turn: Turn; events: Array<DomainEvent> } {
  const board = swapCandies(state.board, swap.a, swap.b);
  return {
    events: [{ a: swap.a, b: swap.b, kind: "SwapAccepted" }],
    turn: {
      passes: 0,
      pendingCombo: swap.kind === "Combo" ? swap.combo : null,
      startScore: state.score,
      state: { ...state, board, cascadeLevel: 1 },
    },
  };
}
