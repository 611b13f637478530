import { hasValidMoves } from "../engine/core/moves";

import { endGame, withModeData } from "./base";

import type { ModeDataOf, ModeRules, ModeStepResult } from "./base";
import type { GameState } from "../engine/types";

type TimedData = ModeDataOf<"Timed">;

function addSeconds(data: TimedData, seconds: number): TimedData {
  return { ...data, secondsRemaining: data.secondsRemaining + seconds };
}

/** Count down by `deltaSeconds`, clamping at zero; expiry ends the game. */
export function updateTime(
  state: GameState,
  data: TimedData,
  deltaSeconds: number,
): ModeStepResult {
  if (state.gameOver || !(deltaSeconds > 0)) return { events: [], state };

  const secondsRemaining = Math.max(0, data.secondsRemaining - deltaSeconds);
  const next = withModeData(state, { ...data, secondsRemaining });
  return secondsRemaining <= 0
    ? endGame(next, "TimeExpired")
    : { events: [], state: next };
}

function finishTurn(state: GameState, data: TimedData): ModeStepResult {
  if (data.secondsRemaining <= 0) return endGame(state, "TimeExpired");
  if (!hasValidMoves(state.board)) return endGame(state, "NoValidMoves");
  return { events: [], state };
}

export const timedRules: ModeRules<"Timed"> = {
  finishTurn,
  onCascadePass: (data, cfg, cascadeLevel) =>
    cascadeLevel >= 2 ? addSeconds(data, cfg.timed.comboBonusSeconds) : data,
  onCombo: (data, cfg) => addSeconds(data, cfg.timed.comboBonusSeconds),
  onSpecialCreated: (data, cfg) =>
    addSeconds(data, cfg.timed.specialBonusSeconds),
  tag: "Timed",
  tick: updateTime,
};
