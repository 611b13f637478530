import { finishModeTurn } from "../../modes";
import { debugLog } from "../../utils/debug";

import type { Turn } from "./swap";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Close a quiescent turn: report it, then let the mode consume its move,
 * pay level bonuses, reshuffle, or end the game.
 */
export function finishTurn(turn: Turn): {
  state: GameState;
  events: Array<DomainEvent>;
} {
  const resolved = turn.state;
  const scoreDelta = resolved.score - turn.startScore;
  const finished: DomainEvent = {
    cascadeLevels: turn.passes,
    kind: "TurnFinished",
    scoreDelta,
  };

  const mode = finishModeTurn({ ...resolved, cascadeLevel: 1 });
  debugLog("turn", "finished", {
    gameOver: mode.state.gameOver,
    passes: turn.passes,
    scoreDelta,
  });
  return { events: [finished, ...mode.events], state: mode.state };
}
