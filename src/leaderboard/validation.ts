import { GAME_MODES } from "../engine/types";

import { err, ok } from "./types";

import type { LeaderboardError, Result, ScoreSubmission } from "./types";
import type { GameMode } from "../engine/types";

// Above anything a bounded session can score, below obviously forged values
export const MAX_SCORE = 10_000_000;

export const MAX_HANDLE_LENGTH = 12;

const HANDLE_PATTERN = /^[A-Za-z0-9_]{1,12}$/;

export function isValidHandle(handle: string): boolean {
  return HANDLE_PATTERN.test(handle);
}

export function isValidScore(score: number): boolean {
  return Number.isInteger(score) && score >= 0 && score <= MAX_SCORE;
}

export function isGameMode(u: unknown): u is GameMode {
  return typeof u === "string" && GAME_MODES.some((m) => m === u);
}

/** Drop every character outside [A-Za-z0-9_] and cut to the length limit. */
export function sanitizeHandle(raw: string): string {
  return raw.replace(/[^A-Za-z0-9_]/g, "").slice(0, MAX_HANDLE_LENGTH);
}

export function validateSubmission(input: {
  handle: string;
  score: number;
  mode: string;
}): Result<ScoreSubmission, LeaderboardError> {
  const problems: Array<string> = [];
  if (!isValidHandle(input.handle)) {
    problems.push("handle must be 1-12 letters, digits or underscores");
  }
  if (!isValidScore(input.score)) {
    problems.push(`score must be an integer from 0 to ${String(MAX_SCORE)}`);
  }
  const mode = input.mode;
  if (!isGameMode(mode)) {
    problems.push(`unknown mode "${mode}"`);
    return err({ kind: "Invalid", problems });
  }
  if (problems.length > 0) return err({ kind: "Invalid", problems });
  return ok({ handle: input.handle, mode, score: input.score });
}
