import { InvalidCandyKindError, SpecialTransitionError } from "../errors";

import {
  type Candy,
  type CandyId,
  type Position,
  type SpecialKind,
  isCandyKind,
} from "./types";

/**
 * Create a plain candy. The kind is checked at runtime because boards built
 * from text or JSON reach this with unvalidated strings.
 */
export function createCandy(
  kind: string,
  id: CandyId,
  position: Position | null = null,
): Candy {
  if (!isCandyKind(kind)) {
    throw new InvalidCandyKindError(kind);
  }
  return { id, kind, position, special: "None" };
}

export function isSpecial(candy: Candy): boolean {
  return candy.special !== "None";
}

export function isColorBomb(candy: Candy): boolean {
  return candy.special === "ColorBomb";
}

// Color bombs are wildcards; everything else compares by kind
export function candiesMatch(a: Candy, b: Candy): boolean {
  if (isColorBomb(a) || isColorBomb(b)) return true;
  return a.kind === b.kind;
}

// Specials only ever go None -> one of the four, never back or sideways
export function makeSpecial(
  candy: Candy,
  special: Exclude<SpecialKind, "None">,
): Candy {
  if (candy.special !== "None") {
    throw new SpecialTransitionError(candy.special, special);
  }
  return { ...candy, special };
}

export function withPosition(candy: Candy, position: Position | null): Candy {
  if (
    candy.position !== null &&
    position !== null &&
    candy.position.row === position.row &&
    candy.position.col === position.col
  ) {
    return candy;
  }
  return { ...candy, position };
}

const SPECIAL_TAGS: Record<SpecialKind, string> = {
  ColorBomb: "*",
  None: "",
  StripedH: "h",
  StripedV: "v",
  Wrapped: "w",
};

export function specialTag(special: SpecialKind): string {
  return SPECIAL_TAGS[special];
}
