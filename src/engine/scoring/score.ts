import type { SpecialKind } from "../core/types";
import type { GameState, ScoringConfig } from "../types";

/**
 * Points for clearing `count` pieces at `cascadeLevel` (1-based):
 * floor(count × base × multiplier^(level-1)).
 */
export function matchPoints(
  scoring: ScoringConfig,
  count: number,
  cascadeLevel: number,
): number {
  const level = Math.max(1, cascadeLevel);
  return Math.floor(
    count * scoring.baseScore * Math.pow(scoring.cascadeMultiplier, level - 1),
  );
}

/** Flat bonus paid once per special created. */
export function specialBonus(
  scoring: ScoringConfig,
  special: SpecialKind,
): number {
  switch (special) {
    case "None":
      return 0;
    case "StripedH":
    case "StripedV":
      return scoring.stripedBonus;
    case "Wrapped":
      return scoring.wrappedBonus;
    case "ColorBomb":
      return scoring.colorBombBonus;
  }
}

export function addPoints(state: GameState, points: number): GameState {
  if (points <= 0) return state;
  return { ...state, score: state.score + points };
}

export function addMatchScore(
  state: GameState,
  count: number,
): { state: GameState; points: number } {
  const points = matchPoints(state.cfg.scoring, count, state.cascadeLevel);
  return { points, state: addPoints(state, points) };
}

export function addSpecialBonus(
  state: GameState,
  special: SpecialKind,
): { state: GameState; bonus: number } {
  const bonus = specialBonus(state.cfg.scoring, special);
  return { bonus, state: addPoints(state, bonus) };
}
