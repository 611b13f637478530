/*
 * Turn controller built on robot3.
 *
 * The engine functions are pure; this machine only decides WHEN each one
 * runs. Every step of a turn waits for SETTLED from the presentation layer,
 * so a renderer can animate the events of one step before asking for the
 * next. Headless callers use runUntilIdle().
 *
 * STATE FLOW:
 * idle → rejecting (SWAP that evaluates to Rejected) → idle (SETTLED)
 * idle → swapping (accepted SWAP) → resolving (SETTLED, first pass)
 * resolving → resolving (SETTLED, another pass cleared something)
 * resolving → idle | gameOver (SETTLED, quiescent board, turn finished)
 * gameOver → idle (RESTART)
 *
 * Events with no transition in the current state are dropped by robot3:
 * a SWAP mid-turn is ignored, never queued. RESTART is only wired in idle
 * and gameOver.
 */

import {
  action,
  createMachine,
  guard,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import { restart, tick } from "../engine";
import { finishTurn } from "../engine/step/finish";
import { resolvePass } from "../engine/step/resolve";
import { evaluateSwap, startTurn } from "../engine/step/swap";
import { debugLog } from "../utils/debug";

import type {
  TurnContext,
  TurnEvent,
  TurnEventType,
  TurnState,
} from "./types";
import type { Position } from "../engine/core/types";
import type { DomainEvent } from "../engine/events";
import type { PassResult } from "../engine/step/resolve";
import type { Turn } from "../engine/step/swap";
import type { GameMode, GameState } from "../engine/types";
import type { Machine, MachineState, MachineStates, Service } from "robot3";

// Guards for one SETTLED all look at the same pass; compute it once per turn
const passCache = new WeakMap<Turn, PassResult>();

function nextPass(turn: Turn): PassResult {
  const cached = passCache.get(turn);
  if (cached !== undefined) return cached;
  const pass = resolvePass(turn);
  passCache.set(turn, pass);
  return pass;
}

export function liveState(ctx: TurnContext): GameState {
  return ctx.turn === null ? ctx.game : ctx.turn.state;
}

/*
 * GUARDS
 */

const isRejectedSwap = (ctx: TurnContext, event: TurnEvent): boolean =>
  event.type === "SWAP" &&
  evaluateSwap(ctx.game, event.a, event.b).kind === "Rejected";

const isAcceptedSwap = (ctx: TurnContext, event: TurnEvent): boolean =>
  event.type === "SWAP" &&
  evaluateSwap(ctx.game, event.a, event.b).kind !== "Rejected";

const isGameOver = (ctx: TurnContext): boolean => liveState(ctx).gameOver;

const turnKeepsCascading = (ctx: TurnContext): boolean =>
  ctx.turn !== null && !nextPass(ctx.turn).settled;

const turnEndsGame = (ctx: TurnContext): boolean => {
  if (ctx.turn === null || !nextPass(ctx.turn).settled) return false;
  return finishTurn(nextPass(ctx.turn).turn).state.gameOver;
};

const tickEndsGame = (ctx: TurnContext, event: TurnEvent): boolean =>
  event.type === "TICK" && tick(ctx.game, event.deltaSeconds).state.gameOver;

/*
 * REDUCERS - always return a new context
 */

const clearOutbox = (ctx: TurnContext): TurnContext => ({
  ...ctx,
  outbox: [],
});

const rejectSwap = (ctx: TurnContext, event: TurnEvent): TurnContext => {
  if (event.type !== "SWAP") return ctx;
  const evaluation = evaluateSwap(ctx.game, event.a, event.b);
  if (evaluation.kind !== "Rejected") return ctx;
  return {
    ...ctx,
    outbox: [
      {
        a: event.a,
        b: event.b,
        kind: "SwapRejected",
        reason: evaluation.reason,
      },
    ],
  };
};

const acceptSwap = (ctx: TurnContext, event: TurnEvent): TurnContext => {
  if (event.type !== "SWAP") return ctx;
  const evaluation = evaluateSwap(ctx.game, event.a, event.b);
  if (evaluation.kind === "Rejected") return ctx;
  const started = startTurn(ctx.game, evaluation);
  return { ...ctx, outbox: started.events, turn: started.turn };
};

const applyPass = (ctx: TurnContext): TurnContext => {
  if (ctx.turn === null) return clearOutbox(ctx);
  const pass = nextPass(ctx.turn);
  return { ...ctx, outbox: pass.events, turn: pass.turn };
};

const closeTurn = (ctx: TurnContext): TurnContext => {
  if (ctx.turn === null) return clearOutbox(ctx);
  const finished = finishTurn(nextPass(ctx.turn).turn);
  return { game: finished.state, outbox: finished.events, turn: null };
};

const applyTick = (ctx: TurnContext, event: TurnEvent): TurnContext => {
  if (event.type !== "TICK") return ctx;
  const r = tick(liveState(ctx), event.deltaSeconds);
  if (ctx.turn === null) return { ...ctx, game: r.state, outbox: r.events };
  return { ...ctx, outbox: r.events, turn: { ...ctx.turn, state: r.state } };
};

const applyRestart = (ctx: TurnContext, event: TurnEvent): TurnContext => {
  if (event.type !== "RESTART") return ctx;
  const r = restart(ctx.game, event.mode);
  return { game: r.state, outbox: r.events, turn: null };
};

/*
 * STATES
 */

type Publish = (ctx: TurnContext) => void;

// Waiting for input
const createIdleState = (publish: Publish): MachineState<TurnEventType> =>
  state(
    transition(
      "SWAP",
      "rejecting",
      guard(isRejectedSwap),
      reduce(rejectSwap),
      action(publish),
    ),
    transition(
      "SWAP",
      "swapping",
      guard(isAcceptedSwap),
      reduce(acceptSwap),
      action(publish),
    ),
    transition(
      "TICK",
      "gameOver",
      guard(tickEndsGame),
      reduce(applyTick),
      action(publish),
    ),
    transition("TICK", "idle", reduce(applyTick), action(publish)),
    transition("RESTART", "idle", reduce(applyRestart), action(publish)),
  );

// Reject feedback playing; the board is untouched
const createRejectingState = (publish: Publish): MachineState<TurnEventType> =>
  state(
    transition(
      "SETTLED",
      "gameOver",
      guard(isGameOver),
      reduce(clearOutbox),
      action(publish),
    ),
    transition("SETTLED", "idle", reduce(clearOutbox), action(publish)),
    transition("TICK", "rejecting", reduce(applyTick), action(publish)),
  );

// Swap animation playing; SETTLED runs the first pass
const createSwappingState = (publish: Publish): MachineState<TurnEventType> =>
  state(
    transition(
      "SETTLED",
      "resolving",
      guard(turnKeepsCascading),
      reduce(applyPass),
      action(publish),
    ),
    transition(
      "SETTLED",
      "gameOver",
      guard(turnEndsGame),
      reduce(closeTurn),
      action(publish),
    ),
    transition("SETTLED", "idle", reduce(closeTurn), action(publish)),
    transition("TICK", "swapping", reduce(applyTick), action(publish)),
  );

// A pass has been reported; SETTLED runs the next one or closes the turn
const createResolvingState = (publish: Publish): MachineState<TurnEventType> =>
  state(
    transition(
      "SETTLED",
      "resolving",
      guard(turnKeepsCascading),
      reduce(applyPass),
      action(publish),
    ),
    transition(
      "SETTLED",
      "gameOver",
      guard(turnEndsGame),
      reduce(closeTurn),
      action(publish),
    ),
    transition("SETTLED", "idle", reduce(closeTurn), action(publish)),
    transition("TICK", "resolving", reduce(applyTick), action(publish)),
  );

const createGameOverState = (publish: Publish): MachineState<TurnEventType> =>
  state(transition("RESTART", "idle", reduce(applyRestart), action(publish)));

/*
 * MACHINE
 */
type TurnStatesObject = Record<TurnState, MachineState<TurnEventType>>;
export type TurnMachine = Machine<
  TurnStatesObject,
  TurnContext,
  TurnState,
  TurnEventType
>;

export const createTurnMachine = (
  initialGame: GameState,
  onEvents?: (events: ReadonlyArray<DomainEvent>) => void,
): TurnMachine => {
  const publish: Publish = (ctx) => {
    if (onEvents !== undefined && ctx.outbox.length > 0) onEvents(ctx.outbox);
  };

  const states = {
    gameOver: createGameOverState(publish),
    idle: createIdleState(publish),
    rejecting: createRejectingState(publish),
    resolving: createResolvingState(publish),
    swapping: createSwappingState(publish),
  } as const;

  // robot3 widens the event type to string; cast back to keep it exact here
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<TurnStatesObject, TurnEventType>,
    (): TurnContext => ({ game: initialGame, outbox: [], turn: null }),
  ) as unknown as TurnMachine;
};

type TurnService = Service<TurnMachine>;

const BUSY_STATES: ReadonlyArray<TurnState> = [
  "rejecting",
  "swapping",
  "resolving",
];

/*
 * Thin wrapper around the robot3 service: collects the domain events each
 * transition publishes and exposes intent-level methods.
 */
export class TurnControllerService {
  private service: TurnService;
  private eventQueue: Array<DomainEvent> = [];
  private currentStateName: TurnState = "idle";

  constructor(initialGame: GameState) {
    const machine = createTurnMachine(initialGame, (events) => {
      this.eventQueue.push(...events);
    });
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
      debugLog("turn", `state ${this.currentStateName}`);
    });
  }

  /** Send an event and return the domain events it produced. */
  send(event: TurnEvent): Array<DomainEvent> {
    this.service.send(event);
    const events = [...this.eventQueue];
    this.eventQueue = [];
    return events;
  }

  swap(a: Position, b: Position): Array<DomainEvent> {
    return this.send({ a, b, type: "SWAP" });
  }

  settle(): Array<DomainEvent> {
    return this.send({ type: "SETTLED" });
  }

  tick(deltaSeconds: number): Array<DomainEvent> {
    return this.send({ deltaSeconds, type: "TICK" });
  }

  restart(mode?: GameMode): Array<DomainEvent> {
    return this.send(
      mode === undefined ? { type: "RESTART" } : { mode, type: "RESTART" },
    );
  }

  isBusy(): boolean {
    return BUSY_STATES.includes(this.currentStateName);
  }

  /** Settle every pending step, as a renderer with no animations would. */
  runUntilIdle(): Array<DomainEvent> {
    const events: Array<DomainEvent> = [];
    while (this.isBusy()) events.push(...this.settle());
    return events;
  }

  getState(): { state: TurnState; game: GameState } {
    return {
      game: liveState(this.service.context),
      state: this.currentStateName,
    };
  }
}
