export {
  HttpLeaderboard,
  MAX_FETCH_LIMIT,
  clampLimit,
  type FetchLike,
  type HttpLeaderboardOptions,
  type ResponseLike,
} from "./http-client";
export { LOCAL_TOP_N, LocalScoreCache } from "./local-cache";
export {
  LeaderboardService,
  type FallbackPolicy,
  type Sourced,
} from "./service";
export {
  err,
  ok,
  type Leaderboard,
  type LeaderboardEntry,
  type LeaderboardError,
  type Result,
  type ScoreSubmission,
} from "./types";
export {
  MAX_HANDLE_LENGTH,
  MAX_SCORE,
  isGameMode,
  isValidHandle,
  isValidScore,
  sanitizeHandle,
  validateSubmission,
} from "./validation";
