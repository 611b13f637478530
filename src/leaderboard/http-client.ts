import { debugLog } from "../utils/debug";

import { err, ok } from "./types";
import { validateSubmission } from "./validation";

import type {
  Leaderboard,
  LeaderboardEntry,
  LeaderboardError,
  Result,
  ScoreSubmission,
} from "./types";
import type { GameMode } from "../engine/types";

export const MAX_FETCH_LIMIT = 100;

export type ResponseLike = {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
};

export type FetchLike = (
  url: string,
  init?: {
    method?: string;
    headers?: Record<string, string>;
    body?: string;
  },
) => Promise<ResponseLike>;

export type HttpLeaderboardOptions = {
  /** Endpoint taking POST submissions and GET ?mode=&limit= queries. */
  baseUrl: string;
  fetch?: FetchLike;
};

function isRecord(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null && !Array.isArray(u);
}

function isEntry(u: unknown): u is LeaderboardEntry {
  return (
    isRecord(u) &&
    typeof u["handle"] === "string" &&
    typeof u["score"] === "number" &&
    typeof u["rank"] === "number"
  );
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Clamp a requested page size to 1..MAX_FETCH_LIMIT. */
export function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return MAX_FETCH_LIMIT;
  return Math.min(MAX_FETCH_LIMIT, Math.max(1, Math.floor(limit)));
}

/**
 * Leaderboard over HTTP. Every outcome, transport failures included, comes
 * back as a Result; nothing here throws.
 */
export class HttpLeaderboard implements Leaderboard {
  private readonly fetchFn: FetchLike;
  private readonly baseUrl: string;

  constructor(options: HttpLeaderboardOptions) {
    this.baseUrl = options.baseUrl;
    this.fetchFn = options.fetch ?? fetch;
  }

  private async request(
    url: string,
    init?: Parameters<FetchLike>[1],
  ): Promise<Result<unknown, LeaderboardError>> {
    let response: ResponseLike;
    try {
      response = await this.fetchFn(url, init);
    } catch (e) {
      debugLog("leaderboard", "network error", describe(e));
      return err({ kind: "Network", message: describe(e) });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e) {
      return err({ kind: "BadResponse", message: describe(e) });
    }

    if (!response.ok) {
      const message =
        isRecord(body) && typeof body["error"] === "string"
          ? body["error"]
          : `HTTP ${String(response.status)}`;
      return err({ kind: "Http", message, status: response.status });
    }
    return ok(body);
  }

  async submitScore(
    submission: ScoreSubmission,
  ): Promise<Result<number, LeaderboardError>> {
    const valid = validateSubmission(submission);
    if (!valid.ok) return valid;

    const res = await this.request(this.baseUrl, {
      body: JSON.stringify(valid.value),
      headers: { "Content-Type": "application/json" },
      method: "POST",
    });
    if (!res.ok) return res;

    const rank = isRecord(res.value) ? res.value["rank"] : undefined;
    if (typeof rank !== "number" || !Number.isInteger(rank) || rank < 1) {
      return err({ kind: "BadResponse", message: "missing rank" });
    }
    debugLog("leaderboard", "submitted", { rank, ...valid.value });
    return ok(rank);
  }

  async fetchTop(
    mode: GameMode,
    limit = 10,
  ): Promise<Result<Array<LeaderboardEntry>, LeaderboardError>> {
    const query = new URLSearchParams({
      limit: String(clampLimit(limit)),
      mode,
    });
    const res = await this.request(`${this.baseUrl}?${query.toString()}`, {
      method: "GET",
    });
    if (!res.ok) return res;

    const body = res.value;
    if (!Array.isArray(body) || !body.every(isEntry)) {
      return err({
        kind: "BadResponse",
        message: "expected a list of entries",
      });
    }
    return ok(
      body.map((e) => ({ handle: e.handle, rank: e.rank, score: e.score })),
    );
  }
}
