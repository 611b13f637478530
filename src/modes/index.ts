import { assertNever } from "../engine/types";

import { withModeData } from "./base";
import { endlessRules } from "./endless";
import { movesRules } from "./moves";
import { timedRules } from "./timed";

import type { ModeStepResult } from "./base";
import type { GameState } from "../engine/types";

export {
  calculateStars,
  checkLevelComplete,
  levelInfo,
  targetForLevel,
  type LevelInfo,
} from "./moves";
export { endGame, type ModeRules, type ModeStepResult } from "./base";
export { endlessRules, movesRules, timedRules };

export function onSpecialCreated(state: GameState): GameState {
  const { cfg, modeData: data } = state;
  switch (data.tag) {
    case "Endless":
      return withModeData(state, endlessRules.onSpecialCreated(data, cfg));
    case "Moves":
      return withModeData(state, movesRules.onSpecialCreated(data, cfg));
    case "Timed":
      return withModeData(state, timedRules.onSpecialCreated(data, cfg));
    default:
      return assertNever(data);
  }
}

export function onCascadePass(state: GameState): GameState {
  const { cascadeLevel: level, cfg, modeData: data } = state;
  switch (data.tag) {
    case "Endless":
      return withModeData(state, endlessRules.onCascadePass(data, cfg, level));
    case "Moves":
      return withModeData(state, movesRules.onCascadePass(data, cfg, level));
    case "Timed":
      return withModeData(state, timedRules.onCascadePass(data, cfg, level));
    default:
      return assertNever(data);
  }
}

export function onCombo(state: GameState): GameState {
  const data = state.modeData;
  switch (data.tag) {
    case "Endless":
      return withModeData(state, endlessRules.onCombo(data, state.cfg));
    case "Moves":
      return withModeData(state, movesRules.onCombo(data, state.cfg));
    case "Timed":
      return withModeData(state, timedRules.onCombo(data, state.cfg));
    default:
      return assertNever(data);
  }
}

export function finishModeTurn(state: GameState): ModeStepResult {
  const data = state.modeData;
  switch (data.tag) {
    case "Endless":
      return endlessRules.finishTurn(state, data);
    case "Moves":
      return movesRules.finishTurn(state, data);
    case "Timed":
      return timedRules.finishTurn(state, data);
    default:
      return assertNever(data);
  }
}

export function tickMode(
  state: GameState,
  deltaSeconds: number,
): ModeStepResult {
  const data = state.modeData;
  switch (data.tag) {
    case "Endless":
      return endlessRules.tick(state, data, deltaSeconds);
    case "Moves":
      return movesRules.tick(state, data, deltaSeconds);
    case "Timed":
      return timedRules.tick(state, data, deltaSeconds);
    default:
      return assertNever(data);
  }
}
