import type { DomainEvent, GameOverReason } from "../engine/events";
import type { EngineConfig, GameState, ModeData } from "../engine/types";

export type ModeTag = ModeData["tag"];

export type ModeDataOf<T extends ModeTag> = Extract<ModeData, { tag: T }>;

export type ModeStepResult = Readonly<{
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
}>;

/**
 * Pure per-mode rules. Each hook receives the mode's own data already
 * narrowed, so no rule ever probes for fields of another mode.
 */
export type ModeRules<T extends ModeTag> = Readonly<{
  tag: T;

  /** Called once for every special created during resolution. */
  onSpecialCreated(data: ModeDataOf<T>, cfg: EngineConfig): ModeDataOf<T>;

  /** Called after each cascade pass that cleared something. */
  onCascadePass(
    data: ModeDataOf<T>,
    cfg: EngineConfig,
    cascadeLevel: number,
  ): ModeDataOf<T>;

  /** Called when a swap of two specials fires a combo. */
  onCombo(data: ModeDataOf<T>, cfg: EngineConfig): ModeDataOf<T>;

  /** End-of-turn bookkeeping and game-over checks. */
  finishTurn(state: GameState, data: ModeDataOf<T>): ModeStepResult;

  /** Frame clock. Only the timed mode reacts. */
  tick(
    state: GameState,
    data: ModeDataOf<T>,
    deltaSeconds: number,
  ): ModeStepResult;
}>;

export function endGame(
  state: GameState,
  reason: GameOverReason,
): ModeStepResult {
  if (state.gameOver) return { events: [], state };
  return {
    events: [{ finalScore: state.score, kind: "GameOver", reason }],
    state: { ...state, gameOver: true },
  };
}

export function withModeData(state: GameState, modeData: ModeData): GameState {
  return modeData === state.modeData ? state : { ...state, modeData };
}
