import { debugLog } from "../utils/debug";

import { err, ok } from "./types";
import { validateSubmission } from "./validation";

import type { LocalScoreCache } from "./local-cache";
import type {
  Leaderboard,
  LeaderboardEntry,
  LeaderboardError,
  Result,
} from "./types";
import type { GameMode } from "../engine/types";

/**
 * What to do when the remote fails:
 * - localCacheOnNetworkError: answer from the local cache instead
 * - propagate: hand the error to the caller
 * Validation errors are never masked.
 */
export type FallbackPolicy = "localCacheOnNetworkError" | "propagate";

export type Sourced<T> = Readonly<{ source: "remote" | "local"; value: T }>;

function isTransportError(e: LeaderboardError): boolean {
  return e.kind !== "Invalid";
}

export class LeaderboardService {
  constructor(
    private readonly remote: Leaderboard,
    private readonly cache: LocalScoreCache,
    private readonly policy: FallbackPolicy = "localCacheOnNetworkError",
  ) {}

  private fallsBack(e: LeaderboardError): boolean {
    return this.policy === "localCacheOnNetworkError" && isTransportError(e);
  }

  /**
   * Validate, record locally, then submit remotely. The value is the rank:
   * the remote one, or the local one (null when outside the local top list)
   * after a fallback.
   */
  async submitScore(input: {
    handle: string;
    score: number;
    mode: string;
  }): Promise<Result<Sourced<number | null>, LeaderboardError>> {
    const valid = validateSubmission(input);
    if (!valid.ok) return valid;

    const localRank = this.cache.record(valid.value);
    const remote = await this.remote.submitScore(valid.value);
    if (remote.ok) return ok({ source: "remote", value: remote.value });

    if (!this.fallsBack(remote.error)) return remote;
    debugLog("leaderboard", "submit fell back to local cache", remote.error);
    return ok({ source: "local", value: localRank });
  }

  async fetchTop(
    mode: GameMode,
    limit = 10,
  ): Promise<Result<Sourced<Array<LeaderboardEntry>>, LeaderboardError>> {
    const remote = await this.remote.fetchTop(mode, limit);
    if (remote.ok) return ok({ source: "remote", value: remote.value });

    if (!this.fallsBack(remote.error)) return err(remote.error);
    debugLog("leaderboard", "fetch fell back to local cache", remote.error);
    return ok({ source: "local", value: this.cache.top(mode, limit) });
  }

  isHighScore(score: number, mode: GameMode): boolean {
    return this.cache.isHighScore(score, mode);
  }
}
