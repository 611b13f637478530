import { onCascadePass, onCombo, onSpecialCreated } from "../../modes";
import { debugLog, debugTable, isDebugEnabled } from "../../utils/debug";
import { clearPositions, getCandy, mintCandy, setCandy } from "../core/board";
import { isColorBomb, isSpecial, makeSpecial } from "../core/candy";
import { describeBoard } from "../core/layout";
import { classifyMatch, findMatches } from "../core/matching";
import { PositionSet } from "../core/positions";
import {
  activateCombo,
  activateSpecial,
  specialForShape,
} from "../core/specials";
import { applyGravity, refillBoard } from "../physics/gravity";
import { addMatchScore, addSpecialBonus } from "../scoring/score";

import type { Turn } from "./swap";
import type {
  Board,
  CandyKind,
  Match,
  Position,
  SpecialKind,
} from "../core/types";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

export type PassResult = Readonly<{
  turn: Turn;
  events: ReadonlyArray<DomainEvent>;
  /** True when the pass found nothing to clear: the board is quiescent. */
  settled: boolean;
}>;

// Kind a color bomb caught in a match fires on: the match's first plain kind
function bombTarget(board: Board, match: Match): CandyKind | undefined {
  for (const p of match) {
    const candy = getCandy(board, p);
    if (candy !== null && !isColorBomb(candy)) return candy.kind;
  }
  return undefined;
}

/**
 * Promote the candy at `center` to `special` in place. A candy that is
 * already special cannot change, so a fresh one of the same kind replaces it.
 */
function placeSpecial(
  board: Board,
  center: Position,
  special: Exclude<SpecialKind, "None">,
): Board {
  const candy = getCandy(board, center);
  if (candy === null) return board;
  if (!isSpecial(candy)) {
    return setCandy(board, center, makeSpecial(candy, special));
  }
  const minted = mintCandy(board, candy.kind, center);
  return setCandy(minted.board, center, makeSpecial(minted.candy, special));
}

// Clear, drop, refill and step the cascade level. Shared by both pass kinds.
function settleBoard(
  state: GameState,
  toClear: Iterable<Position>,
): { state: GameState; events: Array<DomainEvent> } {
  const cleared = clearPositions(state.board, toClear);
  const fallen = applyGravity(cleared.board);
  const refilled = refillBoard(fallen.board, state.rng);
  const next = onCascadePass({
    ...state,
    board: refilled.board,
    rng: refilled.rng,
  });
  return {
    events: [
      { kind: "PiecesFell", moves: fallen.moves },
      { kind: "PiecesRefilled", refills: refilled.refills },
    ],
    state: { ...next, cascadeLevel: next.cascadeLevel + 1 },
  };
}

function resolveCombo(turn: Turn): PassResult {
  const combo = turn.pendingCombo;
  if (combo === null) return resolveMatches(turn);

  let state = turn.state;
  const positions = activateCombo(state.board, combo.a, combo.b);
  const occupied = positions.filter((p) => getCandy(state.board, p) !== null);
  const scored = addMatchScore(state, occupied.length);
  state = onCombo(scored.state);
  debugLog("turn", "combo", { count: occupied.length, points: scored.points });

  const events: Array<DomainEvent> = [
    {
      a: combo.a,
      b: combo.b,
      kind: "ComboActivated",
      points: scored.points,
      positions,
      targetKind: combo.targetKind,
    },
  ];
  const settled = settleBoard(state, positions);
  return {
    events: [...events, ...settled.events],
    settled: false,
    turn: {
      ...turn,
      passes: turn.passes + 1,
      pendingCombo: null,
      state: settled.state,
    },
  };
}

function resolveMatches(turn: Turn): PassResult {
  const detected = turn.state.board;
  const matches = findMatches(detected);
  if (matches.length === 0) {
    return { events: [], settled: true, turn };
  }

  let state = turn.state;
  let board = detected;
  const events: Array<DomainEvent> = [];
  const toClear = new PositionSet();
  const created = new PositionSet();

  for (const match of matches) {
    toClear.addAll(match);

    // Specials already on the board go off before anything is replaced
    for (const p of match) {
      const candy = getCandy(detected, p);
      if (candy === null || candy.special === "None") continue;
      const area = activateSpecial(detected, p, bombTarget(detected, match));
      toClear.addAll(area);
      events.push({
        at: p,
        kind: "SpecialActivated",
        positions: area,
        special: candy.special,
      });
    }

    const shape = classifyMatch(match);
    const special = specialForShape(shape);
    const scored = addMatchScore(state, match.length);
    state = scored.state;
    let points = scored.points;

    if (special !== null && shape.kind !== "Basic") {
      board = placeSpecial(board, shape.center, special);
      created.add(shape.center);
      const bonus = addSpecialBonus(state, special);
      state = onSpecialCreated(bonus.state);
      points += bonus.bonus;
    }

    events.push({
      cascadeLevel: state.cascadeLevel,
      kind: "MatchCleared",
      pieceCount: match.length,
      points,
      positions: match,
      specialCreated: special,
    });
  }

  // Created specials survive their own clear
  for (const p of created.toSortedArray()) toClear.delete(p);

  const settled = settleBoard({ ...state, board }, toClear.toSortedArray());
  if (settled.state.cascadeLevel > 2) {
    debugLog("turn", "cascade", { level: settled.state.cascadeLevel - 1 });
  }
  if (isDebugEnabled("board")) {
    debugTable("board", "after pass", describeBoard(settled.state.board));
  }

  return {
    events: [...events, ...settled.events],
    settled: false,
    turn: { ...turn, passes: turn.passes + 1, state: settled.state },
  };
}

/**
 * Run one cascade pass: the pending combo if there is one, otherwise detect,
 * classify, score and clear every match, then drop and refill.
 */
export function resolvePass(turn: Turn): PassResult {
  return turn.pendingCombo === null ? resolveMatches(turn) : resolveCombo(turn);
}
