import { hasValidMoves } from "../engine/core/moves";

import { endGame, withModeData } from "./base";

import type { ModeDataOf, ModeRules, ModeStepResult } from "./base";
import type { DomainEvent } from "../engine/events";
import type { GameState, MovesConfig } from "../engine/types";

type MovesData = ModeDataOf<"Moves">;

export type LevelInfo = Readonly<{
  level: number;
  target: number;
  /** Percent of the target reached, 0 to 100. */
  progress: number;
}>;

export function targetForLevel(cfg: MovesConfig, level: number): number {
  return Math.floor(
    cfg.targetBase * Math.pow(cfg.targetMultiplier, Math.max(0, level - 1)),
  );
}

/** Decrement the move counter, never below zero. */
export function useMove(data: MovesData): MovesData {
  return { ...data, movesRemaining: Math.max(0, data.movesRemaining - 1) };
}

/**
 * Advance one level if the score has reached the target. Unused moves are
 * paid out before they reset.
 */
export function checkLevelComplete(
  state: GameState,
  data: MovesData,
): ModeStepResult {
  const cfg = state.cfg.moves;
  if (!cfg.levelProgression || state.score < data.targetScore) {
    return { events: [], state: withModeData(state, data) };
  }

  const bonus = data.movesRemaining * cfg.bonusPerUnusedMove;
  const level = data.level + 1;
  const targetScore = targetForLevel(cfg, level);
  return {
    events: [
      {
        bonus,
        kind: "LevelCompleted",
        level: data.level,
        nextTarget: targetScore,
      },
    ],
    state: withModeData(
      { ...state, score: state.score + bonus },
      { level, movesRemaining: cfg.initialMoves, tag: "Moves", targetScore },
    ),
  };
}

/** 0 below target, then one star each at 1×, 1.5× and 2× the target. */
export function calculateStars(score: number, data: MovesData): number {
  const target = data.targetScore;
  if (score >= target * 2) return 3;
  if (score >= target * 1.5) return 2;
  if (score >= target) return 1;
  return 0;
}

export function levelInfo(score: number, data: MovesData): LevelInfo {
  const target = data.targetScore;
  const progress =
    target <= 0 ? 100 : Math.min(100, Math.floor((score / target) * 100));
  return { level: data.level, progress, target };
}

function finishTurn(state: GameState, data: MovesData): ModeStepResult {
  const leveled = checkLevelComplete(state, useMove(data));
  const events: Array<DomainEvent> = [...leveled.events];
  const s = leveled.state;

  if (s.modeData.tag === "Moves" && s.modeData.movesRemaining <= 0) {
    const over = endGame(s, "MovesExhausted");
    return { events: [...events, ...over.events], state: over.state };
  }
  if (!hasValidMoves(s.board)) {
    const over = endGame(s, "NoValidMoves");
    return { events: [...events, ...over.events], state: over.state };
  }
  return { events, state: s };
}

export const movesRules: ModeRules<"Moves"> = {
  finishTurn,
  onCascadePass: (data) => data,
  onCombo: (data) => data,
  onSpecialCreated: (data) => data,
  tag: "Moves",
  tick: (state) => ({ events: [], state }),
};
