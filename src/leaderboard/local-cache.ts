// Local top-10 per mode, persisted as one JSON document under a versioned key

import { debugLog } from "../utils/debug";

import { isGameMode } from "./validation";

import type { LeaderboardEntry, ScoreSubmission } from "./types";
import type { KeyValueStore } from "../adapters/storage";
import type { GameMode } from "../engine/types";

const STORAGE_KEY = "hacker-crush/scores/v1" as const;

export const LOCAL_TOP_N = 10;

type PersistedScoresV1 = {
  version: 1;
  modes: Record<GameMode, Array<LeaderboardEntry>>;
};

function emptyModes(): Record<GameMode, Array<LeaderboardEntry>> {
  return { endless: [], moves: [], timed: [] };
}

function isObject(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null;
}

function isEntry(u: unknown): u is LeaderboardEntry {
  return (
    isObject(u) &&
    typeof u["handle"] === "string" &&
    typeof u["score"] === "number" &&
    typeof u["rank"] === "number"
  );
}

function migrate(u: unknown): Record<GameMode, Array<LeaderboardEntry>> {
  const modes = emptyModes();
  if (!isObject(u) || u["version"] !== 1 || !isObject(u["modes"])) {
    return modes;
  }
  for (const [mode, entries] of Object.entries(u["modes"])) {
    if (!isGameMode(mode) || !Array.isArray(entries)) continue;
    modes[mode] = entries.filter(isEntry).slice(0, LOCAL_TOP_N);
  }
  return modes;
}

function ranked(
  entries: ReadonlyArray<LeaderboardEntry>,
): Array<LeaderboardEntry> {
  return entries.map((e, i) => ({ ...e, rank: i + 1 }));
}

export class LocalScoreCache {
  private modes: Record<GameMode, Array<LeaderboardEntry>>;

  constructor(private readonly store: KeyValueStore) {
    this.modes = this.load();
  }

  private load(): Record<GameMode, Array<LeaderboardEntry>> {
    const raw = this.store.getItem(STORAGE_KEY);
    if (raw === null || raw === "") return emptyModes();
    try {
      return migrate(JSON.parse(raw));
    } catch (e) {
      debugLog("leaderboard", "discarding unreadable local scores", e);
      return emptyModes();
    }
  }

  private persist(): void {
    const data: PersistedScoresV1 = { modes: this.modes, version: 1 };
    this.store.setItem(STORAGE_KEY, JSON.stringify(data));
  }

  /**
   * Insert a score, keep the best LOCAL_TOP_N and reassign ranks. Returns
   * the new entry's rank, or null if it did not make the cut.
   */
  record(submission: ScoreSubmission): number | null {
    const current = this.modes[submission.mode];
    const entry: LeaderboardEntry = {
      handle: submission.handle,
      rank: 0,
      score: submission.score,
    };
    // Stable: an equal score lands below the ones already there
    const index = current.findIndex((e) => e.score < entry.score);
    const insertAt = index === -1 ? current.length : index;
    const next = [
      ...current.slice(0, insertAt),
      entry,
      ...current.slice(insertAt),
    ];
    this.modes = {
      ...this.modes,
      [submission.mode]: ranked(next.slice(0, LOCAL_TOP_N)),
    };
    this.persist();
    return insertAt < LOCAL_TOP_N ? insertAt + 1 : null;
  }

  top(mode: GameMode, limit = LOCAL_TOP_N): Array<LeaderboardEntry> {
    return this.modes[mode].slice(0, Math.max(0, limit));
  }

  /** Would `score` make this mode's local top list? */
  isHighScore(score: number, mode: GameMode): boolean {
    const entries = this.modes[mode];
    const last = entries[entries.length - 1];
    if (entries.length < LOCAL_TOP_N || last === undefined) return score > 0;
    return score > last.score;
  }

  clear(): void {
    this.modes = emptyModes();
    this.persist();
  }
}
