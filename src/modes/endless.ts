import { hasValidMoves, shuffleBoard } from "../engine/core/moves";

import { endGame, withModeData } from "./base";

import type { ModeRules, ModeStepResult } from "./base";
import type { DomainEvent } from "../engine/events";
import type { GameState } from "../engine/types";

/**
 * Spend reshuffles until the board has a move again. Game over once the
 * allowance is gone and the board is still stuck.
 */
function recoverStuckBoard(state: GameState): ModeStepResult {
  const events: Array<DomainEvent> = [];
  let s = state;

  while (!hasValidMoves(s.board)) {
    const data = s.modeData;
    if (data.tag !== "Endless" || data.reshufflesRemaining <= 0) {
      const over = endGame(s, "ReshuffleExhausted");
      return { events: [...events, ...over.events], state: over.state };
    }
    const shuffled = shuffleBoard(s.board, s.rng);
    const reshufflesRemaining = data.reshufflesRemaining - 1;
    s = withModeData(
      { ...s, board: shuffled.board, rng: shuffled.rng },
      { ...data, reshufflesRemaining },
    );
    events.push({ kind: "Reshuffled", reshufflesRemaining });
  }

  return { events, state: s };
}

export const endlessRules: ModeRules<"Endless"> = {
  finishTurn: (state) => recoverStuckBoard(state),
  onCascadePass: (data) => data,
  onCombo: (data) => data,
  onSpecialCreated: (data) => data,
  tag: "Endless",
  tick: (state) => ({ events: [], state }),
};
