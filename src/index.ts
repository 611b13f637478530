export * from "./engine/types";
export type {
  DomainEvent,
  DomainEventKind,
  GameOverReason,
  SwapRejectReason,
} from "./engine/events";
export {
  InvalidCandyKindError,
  InvalidConfigError,
  SpecialTransitionError,
} from "./engine/errors";
export {
  evaluateSwap,
  finishTurn,
  init,
  playSwap,
  resolvePass,
  restart,
  startTurn,
  tick,
  type AcceptedSwap,
  type EngineResult,
  type PassResult,
  type PendingCombo,
  type SwapEvaluation,
  type Turn,
} from "./engine";
export {
  allPositions,
  clearPositions,
  createBoard,
  createEmptyBoard,
  getCandy,
  inBounds,
  isAdjacent,
  setCandy,
  swapCandies,
} from "./engine/core/board";
export { candiesMatch, createCandy, makeSpecial } from "./engine/core/candy";
export { boardFromLayout, describeBoard } from "./engine/core/layout";
export { classifyMatch, findMatches } from "./engine/core/matching";
export {
  findValidMoves,
  hasValidMoves,
  shuffleBoard,
  wouldCreateMatch,
} from "./engine/core/moves";
export { SequenceRng } from "./engine/core/rng/sequence";
export { activateCombo, activateSpecial } from "./engine/core/specials";
export { applyGravity, refillBoard } from "./engine/physics/gravity";
export { matchPoints, specialBonus } from "./engine/scoring/score";
export { calculateStars, levelInfo, type LevelInfo } from "./modes";
export * from "./control";
export * from "./leaderboard";
export { FileStore, MemoryStore, type KeyValueStore } from "./adapters/storage";
export {
  configFromEnv,
  loadConfig,
  loadConfigFile,
  validateConfig,
} from "./app/config";
export { GameSession, type GameSessionOptions } from "./app/session";
export { setDebugTopics } from "./utils/debug";
