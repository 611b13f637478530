import type { Position } from "../engine/core/types";
import type { DomainEvent } from "../engine/events";
import type { Turn } from "../engine/step/swap";
import type { GameMode, GameState } from "../engine/types";

export type TurnState =
  | "idle"
  | "rejecting"
  | "swapping"
  | "resolving"
  | "gameOver";

/**
 * Inputs to the turn controller. SETTLED is the presentation layer's single
 * "animations finished" signal; each resolving step waits for one.
 */
export type TurnEvent =
  | { type: "SWAP"; a: Position; b: Position }
  | { type: "SETTLED" }
  | { type: "TICK"; deltaSeconds: number }
  | { type: "RESTART"; mode?: GameMode };

export type TurnEventType = TurnEvent["type"];

export type TurnContext = {
  /** Session between turns. Mid-turn the live state is `turn.state`. */
  game: GameState;
  turn: Turn | null;
  /** Domain events produced by the last transition, published by its action. */
  outbox: ReadonlyArray<DomainEvent>;
};
