import { describeBoard } from "@/engine/core/layout";
import { pos } from "@/engine/core/types";
import { evaluateSwap, startTurn } from "@/engine/step/swap";

import { BASIC_MATCH, STRIPE_COMBO } from "../../fixtures/boards";
import { createTestState } from "../../test-helpers";

describe("@/engine/step/swap - evaluateSwap", () => {
  const state = createTestState(BASIC_MATCH.layout);

  test("accepts a swap that makes a match", () => {
    expect(evaluateSwap(state, BASIC_MATCH.a, BASIC_MATCH.b)).toEqual({
      a: BASIC_MATCH.a,
      b: BASIC_MATCH.b,
      kind: "Match",
    });
  });

  test.each([
    ["outOfBounds", pos(0, 3), pos(0, 4)],
    ["notAdjacent", pos(0, 0), pos(1, 1)],
    ["notAdjacent", pos(0, 0), pos(0, 0)],
    ["noMatch", pos(3, 2), pos(3, 3)],
  ] as const)("rejects with %s for %j -> %j", (reason, a, b) => {
    expect(evaluateSwap(state, a, b)).toEqual({
      a,
      b,
      kind: "Rejected",
      reason,
    });
  });

  test("rejects swaps touching an empty cell", () => {
    const holey = createTestState(["B . D", "R L K", "V B R"]);
    expect(evaluateSwap(holey, pos(0, 0), pos(0, 1))).toMatchObject({
      kind: "Rejected",
      reason: "emptyCell",
    });
  });

  test("rejects everything once the game is over", () => {
    const over = createTestState(BASIC_MATCH.layout, { gameOver: true });
    expect(evaluateSwap(over, BASIC_MATCH.a, BASIC_MATCH.b)).toMatchObject({
      kind: "Rejected",
      reason: "gameOver",
    });
  });

  test("the game-over check comes before the bounds check", () => {
    const over = createTestState(BASIC_MATCH.layout, { gameOver: true });
    expect(evaluateSwap(over, pos(-1, 0), pos(9, 9))).toMatchObject({
      reason: "gameOver",
    });
  });

  describe("combos", () => {
    test("two specials make a combo with no target kind", () => {
      const combo = createTestState(STRIPE_COMBO.layout);
      expect(evaluateSwap(combo, pos(0, 0), pos(0, 1))).toEqual({
        a: pos(0, 0),
        b: pos(0, 1),
        combo: { a: pos(0, 0), b: pos(0, 1), targetKind: null },
        kind: "Combo",
      });
    });

    test("a color bomb with another special targets that kind", () => {
      const combo = createTestState(["Rh D* L", "K Vw B", "L R D"]);
      expect(evaluateSwap(combo, pos(0, 0), pos(0, 1))).toMatchObject({
        combo: { targetKind: "ronin" },
        kind: "Combo",
      });
      expect(evaluateSwap(combo, pos(0, 1), pos(1, 1))).toMatchObject({
        combo: { targetKind: "virus" },
        kind: "Combo",
      });
    });

    test("a color bomb with a plain candy is a match, not a combo", () => {
      const state = createTestState(["R D* L", "K V B", "L R D"]);
      expect(evaluateSwap(state, pos(0, 1), pos(0, 0))).toEqual({
        a: pos(0, 1),
        b: pos(0, 0),
        kind: "Match",
      });
    });

    test("a color bomb with a plain candy and no match is rejected", () => {
      const state = createTestState(["B D R", "L K V", "R B D*"]);
      expect(evaluateSwap(state, pos(2, 2), pos(2, 1))).toEqual({
        a: pos(2, 2),
        b: pos(2, 1),
        kind: "Rejected",
        reason: "noMatch",
      });
    });

    test("two color bombs have no target kind", () => {
      const combo = createTestState(["R* D* L", "K V B", "L R D"]);
      expect(evaluateSwap(combo, pos(0, 0), pos(0, 1))).toMatchObject({
        combo: { targetKind: null },
        kind: "Combo",
      });
    });

    test("a stripe next to a plain candy still needs a match", () => {
      const combo = createTestState(["Rh D L", "K V B", "L R D"]);
      expect(evaluateSwap(combo, pos(0, 0), pos(0, 1))).toMatchObject({
        kind: "Rejected",
        reason: "noMatch",
      });
    });
  });

  test("evaluation leaves the state untouched", () => {
    const before = describeBoard(state.board);
    evaluateSwap(state, BASIC_MATCH.a, BASIC_MATCH.b);
    expect(describeBoard(state.board)).toEqual(before);
  });
});

describe("@/engine/step/swap - startTurn", () => {
  test("commits the swap and opens the turn at cascade level 1", () => {
    const state = createTestState(BASIC_MATCH.layout, { score: 120 });
    const evaluation = evaluateSwap(state, BASIC_MATCH.a, BASIC_MATCH.b);
    if (evaluation.kind === "Rejected") throw new Error("swap was rejected");

    const { events, turn } = startTurn(state, evaluation);

    expect(events).toEqual([
      { a: BASIC_MATCH.a, b: BASIC_MATCH.b, kind: "SwapAccepted" },
    ]);
    expect(describeBoard(turn.state.board)[0]).toBe("B B B D");
    expect(turn.state.cascadeLevel).toBe(1);
    expect(turn.startScore).toBe(120);
    expect(turn.passes).toBe(0);
    expect(turn.pendingCombo).toBeNull();
  });
});
