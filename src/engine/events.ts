import type {
  CandyKind,
  FallMove,
  Position,
  Refill,
  SpecialKind,
} from "./core/types";

export type SwapRejectReason =
  | "outOfBounds"
  | "notAdjacent"
  | "emptyCell"
  | "gameOver"
  | "noMatch";

export type GameOverReason =
  | "MovesExhausted"
  | "TimeExpired"
  | "ReshuffleExhausted"
  | "NoValidMoves";

export type DomainEvent =
  | { kind: "SwapRejected"; a: Position; b: Position; reason: SwapRejectReason }
  | { kind: "SwapAccepted"; a: Position; b: Position }
  | {
      kind: "MatchCleared";
      positions: ReadonlyArray<Position>;
      pieceCount: number;
      specialCreated: Exclude<SpecialKind, "None"> | null;
      cascadeLevel: number;
      points: number;
    }
  | {
      kind: "SpecialActivated";
      at: Position;
      special: Exclude<SpecialKind, "None">;
      positions: ReadonlyArray<Position>;
    }
  | {
      kind: "ComboActivated";
      a: Position;
      b: Position;
      positions: ReadonlyArray<Position>;
      targetKind: CandyKind | null;
      points: number;
    }
  | { kind: "PiecesFell"; moves: ReadonlyArray<FallMove> }
  | { kind: "PiecesRefilled"; refills: ReadonlyArray<Refill> }
  | { kind: "TurnFinished"; scoreDelta: number; cascadeLevels: number }
  | { kind: "LevelCompleted"; level: number; bonus: number; nextTarget: number }
  | { kind: "Reshuffled"; reshufflesRemaining: number }
  | { kind: "GameOver"; finalScore: number; reason: GameOverReason };

export type DomainEventKind = DomainEvent["kind"];
