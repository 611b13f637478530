import { TurnControllerService } from "../control/turn.machine";
import { init } from "../engine";
import { DEFAULT_ENGINE_CONFIG, modeOf } from "../engine/types";
import { err } from "../leaderboard/types";
import { sanitizeHandle } from "../leaderboard/validation";

import type { RandomGenerator } from "../engine/core/rng/interface";
import type { EngineConfig, GameMode, GameState } from "../engine/types";
import type { LeaderboardService, Sourced } from "../leaderboard/service";
import type { LeaderboardError, Result } from "../leaderboard/types";

export type GameSessionOptions = {
  mode: GameMode;
  cfg?: EngineConfig;
  seed?: string | RandomGenerator;
  /** Passed in by whoever owns the session; there is no shared instance. */
  leaderboard?: LeaderboardService;
};

/**
 * One player's run: a turn controller over a fresh engine state, plus the
 * leaderboard the final score goes to.
 */
export class GameSession {
  readonly controller: TurnControllerService;
  private readonly leaderboard: LeaderboardService | null;

  constructor(options: GameSessionOptions) {
    const { state } = init(
      options.cfg ?? DEFAULT_ENGINE_CONFIG,
      options.mode,
      options.seed ?? "default",
    );
    this.controller = new TurnControllerService(state);
    this.leaderboard = options.leaderboard ?? null;
  }

  get state(): GameState {
    return this.controller.getState().game;
  }

  /** Submit the final score under a sanitized handle once the game is over. */
  async submitFinalScore(
    rawHandle: string,
  ): Promise<Result<Sourced<number | null>, LeaderboardError>> {
    const game = this.state;
    if (!game.gameOver) {
      return err({ kind: "Invalid", problems: ["game is not over"] });
    }
    if (this.leaderboard === null) {
      return err({ kind: "Invalid", problems: ["no leaderboard configured"] });
    }
    return this.leaderboard.submitScore({
      handle: sanitizeHandle(rawHandle),
      mode: modeOf(game.modeData),
      score: game.score,
    });
  }
}
