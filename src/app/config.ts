// Engine configuration: defaults, JSON files and HACKER_CRUSH_* overrides.
// Unknown or mistyped keys are dropped. A merged config out of bounds throws.

import { readFileSync } from "node:fs";

import { InvalidConfigError } from "../engine/errors";
import { DEFAULT_ENGINE_CONFIG } from "../engine/types";
import { debugLog } from "../utils/debug";

import type {
  EndlessConfig,
  EngineConfig,
  MovesConfig,
  ScoringConfig,
  TimedConfig,
} from "../engine/types";

export { DEFAULT_ENGINE_CONFIG };

export const MIN_BOARD_SIZE = 3;

type Section = Record<string, unknown>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function section(raw: Section, key: string): Section {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

function num(s: Section, key: string, fallback: number): number {
  const v = s[key];
  return isNumber(v) ? v : fallback;
}

function bool(s: Section, key: string, fallback: boolean): boolean {
  const v = s[key];
  return isBoolean(v) ? v : fallback;
}

function extractScoring(s: Section, base: ScoringConfig): ScoringConfig {
  return {
    baseScore: num(s, "baseScore", base.baseScore),
    cascadeMultiplier: num(s, "cascadeMultiplier", base.cascadeMultiplier),
    colorBombBonus: num(s, "colorBombBonus", base.colorBombBonus),
    stripedBonus: num(s, "stripedBonus", base.stripedBonus),
    wrappedBonus: num(s, "wrappedBonus", base.wrappedBonus),
  };
}

function extractMoves(s: Section, base: MovesConfig): MovesConfig {
  return {
    bonusPerUnusedMove: num(s, "bonusPerUnusedMove", base.bonusPerUnusedMove),
    initialMoves: num(s, "initialMoves", base.initialMoves),
    levelProgression: bool(s, "levelProgression", base.levelProgression),
    targetBase: num(s, "targetBase", base.targetBase),
    targetMultiplier: num(s, "targetMultiplier", base.targetMultiplier),
  };
}

function extractTimed(s: Section, base: TimedConfig): TimedConfig {
  return {
    comboBonusSeconds: num(s, "comboBonusSeconds", base.comboBonusSeconds),
    initialSeconds: num(s, "initialSeconds", base.initialSeconds),
    specialBonusSeconds: num(
      s,
      "specialBonusSeconds",
      base.specialBonusSeconds,
    ),
  };
}

function extractEndless(s: Section, base: EndlessConfig): EndlessConfig {
  return { reshuffles: num(s, "reshuffles", base.reshuffles) };
}

/** Every bound the merged config breaks, as human-readable lines. */
export function validateConfig(cfg: EngineConfig): Array<string> {
  const problems: Array<string> = [];
  const positiveInt = (label: string, v: number, min = 1): void => {
    if (!Number.isInteger(v) || v < min) {
      problems.push(`${label} must be an integer >= ${String(min)}`);
    }
  };
  const atLeast = (label: string, v: number, min: number): void => {
    if (v < min) problems.push(`${label} must be >= ${String(min)}`);
  };

  positiveInt("rows", cfg.rows, MIN_BOARD_SIZE);
  positiveInt("cols", cfg.cols, MIN_BOARD_SIZE);
  atLeast("scoring.baseScore", cfg.scoring.baseScore, 1);
  atLeast("scoring.cascadeMultiplier", cfg.scoring.cascadeMultiplier, 1);
  atLeast("scoring.stripedBonus", cfg.scoring.stripedBonus, 0);
  atLeast("scoring.wrappedBonus", cfg.scoring.wrappedBonus, 0);
  atLeast("scoring.colorBombBonus", cfg.scoring.colorBombBonus, 0);
  positiveInt("moves.initialMoves", cfg.moves.initialMoves);
  atLeast("moves.targetBase", cfg.moves.targetBase, 1);
  atLeast("moves.targetMultiplier", cfg.moves.targetMultiplier, 1);
  atLeast("moves.bonusPerUnusedMove", cfg.moves.bonusPerUnusedMove, 0);
  atLeast("timed.initialSeconds", cfg.timed.initialSeconds, 1);
  atLeast("timed.specialBonusSeconds", cfg.timed.specialBonusSeconds, 0);
  atLeast("timed.comboBonusSeconds", cfg.timed.comboBonusSeconds, 0);
  positiveInt("endless.reshuffles", cfg.endless.reshuffles, 0);
  return problems;
}

/**
 * Merge a parsed JSON value over `base`. Keys of the wrong type are ignored;
 * the result must still pass validateConfig.
 */
export function loadConfig(
  raw: unknown,
  base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  if (!isRecord(raw)) {
    throw new InvalidConfigError(["config must be a JSON object"]);
  }
  const cfg: EngineConfig = {
    cols: num(raw, "cols", base.cols),
    endless: extractEndless(section(raw, "endless"), base.endless),
    moves: extractMoves(section(raw, "moves"), base.moves),
    rows: num(raw, "rows", base.rows),
    scoring: extractScoring(section(raw, "scoring"), base.scoring),
    timed: extractTimed(section(raw, "timed"), base.timed),
  };
  const problems = validateConfig(cfg);
  if (problems.length > 0) throw new InvalidConfigError(problems);
  debugLog("config", "loaded", cfg);
  return cfg;
}

export function loadConfigFile(
  path: string,
  base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  const text = readFileSync(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigError([`${path} is not valid JSON: ${reason}`]);
  }
  return loadConfig(parsed, base);
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return true;
  if (v === "0" || v === "false" || v === "off") return false;
  return undefined;
}

/**
 * Overrides from the environment:
 * HACKER_CRUSH_ROWS, HACKER_CRUSH_COLS, HACKER_CRUSH_MOVES,
 * HACKER_CRUSH_SECONDS, HACKER_CRUSH_RESHUFFLES, HACKER_CRUSH_LEVELS.
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
  return loadConfig(
    {
      cols: envNumber(env["HACKER_CRUSH_COLS"]),
      endless: { reshuffles: envNumber(env["HACKER_CRUSH_RESHUFFLES"]) },
      moves: {
        initialMoves: envNumber(env["HACKER_CRUSH_MOVES"]),
        levelProgression: envBoolean(env["HACKER_CRUSH_LEVELS"]),
      },
      rows: envNumber(env["HACKER_CRUSH_ROWS"]),
      timed: { initialSeconds: envNumber(env["HACKER_CRUSH_SECONDS"]) },
    },
    base,
  );
}
