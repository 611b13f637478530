import { createBoard } from "./core/board";

import type { Board } from "./core/types";
import type { RandomGenerator } from "./core/rng/interface";

export * from "./core/types";
export { type RandomGenerator } from "./core/rng/interface";
export { createSeededRng } from "./core/rng/seeded";

export type GameMode = "endless" | "moves" | "timed";

export const GAME_MODES: ReadonlyArray<GameMode> = [
  "endless",
  "moves",
  "timed",
];

export type ScoringConfig = Readonly<{
  baseScore: number;
  cascadeMultiplier: number;
  stripedBonus: number;
  wrappedBonus: number;
  colorBombBonus: number;
}>;

export type MovesConfig = Readonly<{
  initialMoves: number;
  targetBase: number;
  targetMultiplier: number;
  bonusPerUnusedMove: number;
  levelProgression: boolean;
}>;

export type TimedConfig = Readonly<{
  initialSeconds: number;
  specialBonusSeconds: number;
  comboBonusSeconds: number;
}>;

export type EndlessConfig = Readonly<{
  reshuffles: number;
}>;

export type EngineConfig = Readonly<{
  rows: number;
  cols: number;
  scoring: ScoringConfig;
  moves: MovesConfig;
  timed: TimedConfig;
  endless: EndlessConfig;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  cols: 8,
  endless: { reshuffles: 3 },
  moves: {
    bonusPerUnusedMove: 50,
    initialMoves: 30,
    levelProgression: true,
    targetBase: 1000,
    targetMultiplier: 1.5,
  },
  rows: 8,
  scoring: {
    baseScore: 10,
    cascadeMultiplier: 1.5,
    colorBombBonus: 500,
    stripedBonus: 50,
    wrappedBonus: 100,
  },
  timed: {
    comboBonusSeconds: 5,
    initialSeconds: 60,
    specialBonusSeconds: 3,
  },
};

// Mode-specific data as a tagged union; mode logic switches on `tag`
export type ModeData =
  | Readonly<{ tag: "Endless"; reshufflesRemaining: number }>
  | Readonly<{
      tag: "Moves";
      movesRemaining: number;
      targetScore: number;
      level: number;
    }>
  | Readonly<{ tag: "Timed"; secondsRemaining: number }>;

export type GameState = Readonly<{
  cfg: EngineConfig;
  board: Board;
  rng: RandomGenerator;
  score: number;
  cascadeLevel: number;
  gameOver: boolean;
  modeData: ModeData;
}>;

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`);
}

export function initialModeData(cfg: EngineConfig, mode: GameMode): ModeData {
  switch (mode) {
    case "endless":
      return { reshufflesRemaining: cfg.endless.reshuffles, tag: "Endless" };
    case "moves":
      return {
        level: 1,
        movesRemaining: cfg.moves.initialMoves,
        tag: "Moves",
        targetScore: cfg.moves.targetBase,
      };
    case "timed":
      return { secondsRemaining: cfg.timed.initialSeconds, tag: "Timed" };
    default:
      return assertNever(mode);
  }
}

export function modeOf(modeData: ModeData): GameMode {
  switch (modeData.tag) {
    case "Endless":
      return "endless";
    case "Moves":
      return "moves";
    case "Timed":
      return "timed";
    default:
      return assertNever(modeData);
  }
}

export function mkInitialState(
  cfg: EngineConfig,
  mode: GameMode,
  rng: RandomGenerator,
): GameState {
  const created = createBoard(cfg.rows, cfg.cols, rng);
  return {
    board: created.board,
    cascadeLevel: 1,
    cfg,
    gameOver: false,
    modeData: initialModeData(cfg, mode),
    rng: created.rng,
    score: 0,
  };
}
