import { describeBoard } from "@/engine/core/layout";
import { candyIdAsNumber, pos } from "@/engine/core/types";
import { finishTurn } from "@/engine/step/finish";
import { resolvePass } from "@/engine/step/resolve";
import { evaluateSwap, startTurn, type Turn } from "@/engine/step/swap";

import {
  BASIC_MATCH,
  STRIPE_COMBO,
  STRIPE_FROM_FOUR,
  STRIPE_IN_MATCH,
  TWO_PASS_CASCADE,
  type TurnFixture,
} from "../../fixtures/boards";
import {
  candyAt,
  createTestState,
  eventKinds,
  findEvent,
  fixedRng,
  type TestStateOptions,
} from "../../test-helpers";

function openTurn(
  fixture: TurnFixture,
  options: TestStateOptions = {},
): Turn {
  const state = createTestState(fixture.layout, {
    rng: fixedRng(...fixture.refills),
    ...options,
  });
  const evaluation = evaluateSwap(state, fixture.a, fixture.b);
  if (evaluation.kind === "Rejected") {
    throw new Error(`fixture swap rejected: ${evaluation.reason}`);
  }
  return startTurn(state, evaluation).turn;
}

describe("@/engine/step/resolve - match passes", () => {
  test("clears, scores, drops and refills one match", () => {
    const pass = resolvePass(openTurn(BASIC_MATCH));

    expect(pass.settled).toBe(false);
    expect(eventKinds(pass.events)).toEqual([
      "MatchCleared",
      "PiecesFell",
      "PiecesRefilled",
    ]);
    expect(findEvent(pass.events, "MatchCleared")).toEqual({
      cascadeLevel: 1,
      kind: "MatchCleared",
      pieceCount: 3,
      points: 30,
      positions: [pos(0, 0), pos(0, 1), pos(0, 2)],
      specialCreated: null,
    });
    expect(findEvent(pass.events, "PiecesFell")?.moves).toEqual([]);
    expect(findEvent(pass.events, "PiecesRefilled")?.refills).toHaveLength(3);
    expect(describeBoard(pass.turn.state.board)).toEqual(BASIC_MATCH.after);
    expect(pass.turn.state.score).toBe(30);
    expect(pass.turn.state.cascadeLevel).toBe(2);
    expect(pass.turn.passes).toBe(1);
  });

  test("a quiescent board settles without touching the turn", () => {
    const first = resolvePass(openTurn(BASIC_MATCH));
    const second = resolvePass(first.turn);

    expect(second.settled).toBe(true);
    expect(second.events).toEqual([]);
    expect(second.turn).toBe(first.turn);
  });

  test("the second pass of a cascade scores at the higher level", () => {
    const first = resolvePass(openTurn(TWO_PASS_CASCADE));
    const second = resolvePass(first.turn);

    expect(findEvent(second.events, "MatchCleared")).toMatchObject({
      cascadeLevel: 2,
      points: 45,
    });
    expect(second.turn.state.score).toBe(75);
    expect(describeBoard(second.turn.state.board)).toEqual(
      TWO_PASS_CASCADE.after,
    );
    expect(resolvePass(second.turn).settled).toBe(true);
  });

  test("a run of four leaves a stripe that survives its own clear", () => {
    const turn = openTurn(STRIPE_FROM_FOUR);
    const swappedIn = candyAt(turn.state.board, 0, 2);
    const pass = resolvePass(turn);

    expect(findEvent(pass.events, "MatchCleared")).toEqual({
      cascadeLevel: 1,
      kind: "MatchCleared",
      pieceCount: 4,
      points: 40 + 50,
      positions: [pos(0, 0), pos(0, 1), pos(0, 2), pos(0, 3)],
      specialCreated: "StripedH",
    });
    const stripe = candyAt(pass.turn.state.board, 0, 2);
    expect(stripe.special).toBe("StripedH");
    expect(stripe.kind).toBe("blackhat");
    expect(candyIdAsNumber(stripe.id)).toBe(candyIdAsNumber(swappedIn.id));
    expect(findEvent(pass.events, "PiecesRefilled")?.refills).toHaveLength(3);
    expect(describeBoard(pass.turn.state.board)).toEqual(
      STRIPE_FROM_FOUR.after,
    );
  });

  test("a special caught in a match goes off before the clear", () => {
    const pass = resolvePass(openTurn(STRIPE_IN_MATCH));

    expect(eventKinds(pass.events)).toEqual([
      "SpecialActivated",
      "MatchCleared",
      "PiecesFell",
      "PiecesRefilled",
    ]);
    expect(findEvent(pass.events, "SpecialActivated")).toEqual({
      at: pos(0, 0),
      kind: "SpecialActivated",
      positions: [pos(0, 0), pos(1, 0), pos(2, 0), pos(3, 0)],
      special: "StripedV",
    });
    // Only the three matched pieces score; the column is a free extra
    expect(pass.turn.state.score).toBe(30);
    expect(findEvent(pass.events, "PiecesRefilled")?.refills).toHaveLength(6);
    expect(describeBoard(pass.turn.state.board)).toEqual(
      STRIPE_IN_MATCH.after,
    );
  });

  test("specials created add seconds in timed mode", () => {
    const pass = resolvePass(openTurn(STRIPE_FROM_FOUR, { mode: "timed" }));
    expect(pass.turn.state.modeData).toEqual({
      secondsRemaining: 63,
      tag: "Timed",
    });
  });

  test("cascade passes from level 2 add seconds in timed mode", () => {
    const first = resolvePass(openTurn(TWO_PASS_CASCADE, { mode: "timed" }));
    expect(first.turn.state.modeData).toEqual({
      secondsRemaining: 60,
      tag: "Timed",
    });
    const second = resolvePass(first.turn);
    expect(second.turn.state.modeData).toEqual({
      secondsRemaining: 65,
      tag: "Timed",
    });
  });
});

describe("@/engine/step/resolve - combo pass", () => {
  test("fires the combo before any match detection", () => {
    const turn = openTurn(STRIPE_COMBO);
    expect(turn.pendingCombo).toEqual({
      a: pos(0, 0),
      b: pos(0, 1),
      targetKind: null,
    });

    const pass = resolvePass(turn);
    expect(eventKinds(pass.events)).toEqual([
      "ComboActivated",
      "PiecesFell",
      "PiecesRefilled",
    ]);
    expect(findEvent(pass.events, "ComboActivated")).toEqual({
      a: pos(0, 0),
      b: pos(0, 1),
      kind: "ComboActivated",
      points: 100,
      positions: [
        pos(0, 0),
        pos(0, 1),
        pos(0, 2),
        pos(0, 3),
        pos(1, 0),
        pos(1, 1),
        pos(2, 0),
        pos(2, 1),
        pos(3, 0),
        pos(3, 1),
      ],
      targetKind: null,
    });
    expect(pass.turn.pendingCombo).toBeNull();
    expect(pass.turn.passes).toBe(1);
    expect(describeBoard(pass.turn.state.board)).toEqual(STRIPE_COMBO.after);
    expect(resolvePass(pass.turn).settled).toBe(true);
  });

  test("a combo adds seconds in timed mode", () => {
    const pass = resolvePass(openTurn(STRIPE_COMBO, { mode: "timed" }));
    expect(pass.turn.state.modeData).toEqual({
      secondsRemaining: 65,
      tag: "Timed",
    });
  });
});

describe("@/engine/step/finish - finishTurn", () => {
  test("reports the turn and resets the cascade level", () => {
    const second = resolvePass(resolvePass(openTurn(TWO_PASS_CASCADE)).turn);
    const done = resolvePass(second.turn);
    const { events, state } = finishTurn(done.turn);

    expect(events).toEqual([
      { cascadeLevels: 2, kind: "TurnFinished", scoreDelta: 75 },
    ]);
    expect(state.cascadeLevel).toBe(1);
    expect(state.score).toBe(75);
  });

  test("scoreDelta counts from the score the turn started with", () => {
    const first = resolvePass(openTurn(BASIC_MATCH, { score: 500 }));
    const { events } = finishTurn(first.turn);
    expect(events[0]).toEqual({
      cascadeLevels: 1,
      kind: "TurnFinished",
      scoreDelta: 30,
    });
  });
});
