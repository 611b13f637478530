import { hasValidMoves } from "@/engine/core/moves";
import { createSeededRng } from "@/engine/core/rng/seeded";
import { finishModeTurn, tickMode } from "@/modes";
import { type ModeDataOf } from "@/modes/base";

import { BASIC_MATCH, ONLY_COMBO_3X3, STUCK_3X3 } from "../fixtures/boards";
import { createTestState, findEvents } from "../test-helpers";

function endless(reshufflesRemaining: number): ModeDataOf<"Endless"> {
  return { reshufflesRemaining, tag: "Endless" };
}

describe("@/modes/endless - stuck boards", () => {
  test("a playable board needs no reshuffle", () => {
    const state = createTestState(BASIC_MATCH.after, { modeData: endless(3) });
    expect(finishModeTurn(state)).toEqual({ events: [], state });
  });

  test("a board whose only move is a combo keeps its reshuffles", () => {
    const state = createTestState(ONLY_COMBO_3X3, { modeData: endless(3) });
    expect(finishModeTurn(state)).toEqual({ events: [], state });
  });

  test("with no reshuffles left a stuck board ends the game", () => {
    const state = createTestState(STUCK_3X3, {
      modeData: endless(0),
      score: 1234,
    });
    const r = finishModeTurn(state);
    expect(r.state.gameOver).toBe(true);
    expect(r.events).toEqual([
      { finalScore: 1234, kind: "GameOver", reason: "ReshuffleExhausted" },
    ]);
  });

  test("a stuck board spends a reshuffle", () => {
    const state = createTestState(STUCK_3X3, {
      modeData: endless(1),
      rng: createSeededRng("reshuffle"),
    });
    const r = finishModeTurn(state);

    expect(r.events[0]).toEqual({ kind: "Reshuffled", reshufflesRemaining: 0 });
    expect(r.state.modeData).toEqual(endless(0));
    expect(r.state.board).not.toBe(state.board);
    // Either the new deal is playable or the allowance is gone
    expect(r.state.gameOver).toBe(!hasValidMoves(r.state.board));
  });

  test("reshuffles stop as soon as a move exists", () => {
    const state = createTestState(STUCK_3X3, {
      modeData: endless(50),
      rng: createSeededRng("until-playable"),
    });
    const r = finishModeTurn(state);
    const spent = findEvents(r.events, "Reshuffled").length;

    expect(spent).toBeGreaterThan(0);
    expect(r.state.modeData).toEqual(endless(50 - spent));
    expect(hasValidMoves(r.state.board)).toBe(r.state.gameOver === false);
  });

  test("ticks do nothing", () => {
    const state = createTestState(BASIC_MATCH.after, { modeData: endless(3) });
    expect(tickMode(state, 10)).toEqual({ events: [], state });
  });
});
