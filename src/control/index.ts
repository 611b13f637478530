export {
  TurnControllerService,
  createTurnMachine,
  liveState,
  type TurnMachine,
} from "./turn.machine";
export type {
  TurnContext,
  TurnEvent,
  TurnEventType,
  TurnState,
} from "./types";
