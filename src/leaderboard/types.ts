import type { GameMode } from "../engine/types";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ error, ok: false });

export type LeaderboardError =
  | { kind: "Invalid"; problems: ReadonlyArray<string> }
  | { kind: "Network"; message: string }
  | { kind: "Http"; status: number; message: string }
  | { kind: "BadResponse"; message: string };

export type ScoreSubmission = Readonly<{
  handle: string;
  score: number;
  mode: GameMode;
}>;

export type LeaderboardEntry = Readonly<{
  handle: string;
  score: number;
  rank: number;
}>;

/** Anything that can take a score and list the top of a mode. */
export type Leaderboard = {
  submitScore(
    submission: ScoreSubmission,
  ): Promise<Result<number, LeaderboardError>>;
  fetchTop(
    mode: GameMode,
    limit?: number,
  ): Promise<Result<Array<LeaderboardEntry>, LeaderboardError>>;
};
