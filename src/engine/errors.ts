// Programmer errors. Gameplay outcomes (rejected swaps, game over) are values.

export class InvalidCandyKindError extends Error {
  constructor(readonly kind: unknown) {
    super(`Invalid candy kind: ${String(kind)}`);
    this.name = "InvalidCandyKindError";
  }
}

export class SpecialTransitionError extends Error {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Cannot turn a ${from} candy into ${to}`);
    this.name = "SpecialTransitionError";
  }
}

export class InvalidConfigError extends Error {
  constructor(readonly problems: ReadonlyArray<string>) {
    super(`Invalid engine config: ${problems.join("; ")}`);
    this.name = "InvalidConfigError";
  }
}
