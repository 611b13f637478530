// Tests for @/engine/core/candy.ts
import {
  candiesMatch,
  createCandy,
  isColorBomb,
  makeSpecial,
} from "@/engine/core/candy";
import { createCandyId } from "@/engine/core/types";
import { InvalidCandyKindError, SpecialTransitionError } from "@/engine/errors";

describe("@/engine/core/candy - candy values", () => {
  const id = createCandyId(7);

  test("createCandy builds a plain, unplaced candy", () => {
    expect(createCandy("lock", id)).toEqual({
      id,
      kind: "lock",
      position: null,
      special: "None",
    });
  });

  test("createCandy rejects unknown kinds", () => {
    expect(() => createCandy("teapot", id)).toThrow(InvalidCandyKindError);
    expect(() => createCandy("teapot", id)).toThrow(
      "Invalid candy kind: teapot",
    );
  });

  test("createCandyId rejects negative and fractional ids", () => {
    expect(() => createCandyId(-1)).toThrow(
      "CandyId must be a non-negative integer",
    );
    expect(() => createCandyId(1.5)).toThrow(
      "CandyId must be a non-negative integer",
    );
  });

  test("same kinds match, different kinds do not", () => {
    const a = createCandy("ronin", createCandyId(1));
    const b = createCandy("ronin", createCandyId(2));
    const c = createCandy("virus", createCandyId(3));
    expect(candiesMatch(a, b)).toBe(true);
    expect(candiesMatch(a, c)).toBe(false);
  });

  test("a color bomb matches anything, from either side", () => {
    const bomb = makeSpecial(createCandy("key", createCandyId(1)), "ColorBomb");
    const other = createCandy("defcon", createCandyId(2));
    expect(isColorBomb(bomb)).toBe(true);
    expect(candiesMatch(bomb, other)).toBe(true);
    expect(candiesMatch(other, bomb)).toBe(true);
  });

  test("makeSpecial promotes a plain candy once", () => {
    const plain = createCandy("key", id);
    const striped = makeSpecial(plain, "StripedH");
    expect(striped).toEqual({ ...plain, special: "StripedH" });
    expect(plain.special).toBe("None");

    expect(() => makeSpecial(striped, "Wrapped")).toThrow(
      SpecialTransitionError,
    );
    expect(() => makeSpecial(striped, "Wrapped")).toThrow(
      "Cannot turn a StripedH candy into Wrapped",
    );
  });
});
