import { tickMode } from "../modes";

import { createSeededRng } from "./core/rng/seeded";
import { finishTurn } from "./step/finish";
import { resolvePass } from "./step/resolve";
import { evaluateSwap, startTurn } from "./step/swap";
import { mkInitialState, modeOf } from "./types";

import type { Position } from "./core/types";
import type { RandomGenerator } from "./core/rng/interface";
import type { DomainEvent } from "./events";
import type { EngineConfig, GameMode, GameState } from "./types";

export type EngineResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
};

/**
 * Start a session. A string seed builds the default seeded generator; tests
 * pass their own generator to script the board.
 */
export function init(
  cfg: EngineConfig,
  mode: GameMode,
  seed: string | RandomGenerator = "default",
): EngineResult {
  const rng = typeof seed === "string" ? createSeededRng(seed) : seed;
  return { events: [], state: mkInitialState(cfg, mode, rng) };
}

/**
 * Play one swap to a quiescent board. A rejected swap leaves the state
 * untouched and reports why.
 */
export function playSwap(
  state: GameState,
  a: Position,
  b: Position,
): EngineResult {
  const evaluation = evaluateSwap(state, a, b);
  if (evaluation.kind === "Rejected") {
    return {
      events: [{ a, b, kind: "SwapRejected", reason: evaluation.reason }],
      state,
    };
  }

  const started = startTurn(state, evaluation);
  const events: Array<DomainEvent> = [...started.events];
  let turn = started.turn;
  for (;;) {
    const pass = resolvePass(turn);
    events.push(...pass.events);
    turn = pass.turn;
    if (pass.settled) break;
  }

  const finished = finishTurn(turn);
  events.push(...finished.events);
  return { events, state: finished.state };
}

/** Advance the frame clock. Only the timed mode counts down. */
export function tick(state: GameState, deltaSeconds: number): EngineResult {
  const r = tickMode(state, deltaSeconds);
  return { events: r.events, state: r.state };
}

/** Fresh session on the current generator, in the same or another mode. */
export function restart(state: GameState, mode?: GameMode): EngineResult {
  return {
    events: [],
    state: mkInitialState(state.cfg, mode ?? modeOf(state.modeData), state.rng),
  };
}

export { evaluateSwap, startTurn } from "./step/swap";
export { resolvePass } from "./step/resolve";
export { finishTurn } from "./step/finish";
export type {
  AcceptedSwap,
  PendingCombo,
  SwapEvaluation,
  Turn,
} from "./step/swap";
export type { PassResult } from "./step/resolve";
