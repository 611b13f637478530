// Lightweight, opt-in debug logging for the engine and its collaborators

// Topics can be enabled via:
// - env HACKER_CRUSH_DEBUG: "true", "1", "on", or a comma list of topics
//   e.g. HACKER_CRUSH_DEBUG=turn,leaderboard
// - setDebugTopics(["turn"]) from code or tests (overrides the environment)

export type DebugTopic =
  | "turn"
  | "board"
  | "leaderboard"
  | "config"
  | "storage";

export const DEBUG_ENV_VAR = "HACKER_CRUSH_DEBUG";

let overrideTopics: ReadonlyArray<string> | null = null;

export function parseDebugTopics(raw: string | undefined): Array<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readEnvTopics(): ReadonlyArray<string> {
  if (typeof process === "undefined") return [];
  return parseDebugTopics(process.env[DEBUG_ENV_VAR]);
}

/** Replace the active topics; pass null to fall back to the environment. */
export function setDebugTopics(topics: ReadonlyArray<string> | null): void {
  overrideTopics = topics === null ? null : [...topics];
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const topics = overrideTopics ?? readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}

export function debugTable(
  topic: DebugTopic,
  label: string,
  rows: ReadonlyArray<string>,
): void {
  if (!isDebugEnabled(topic)) return;
  console.warn(`[DBG:${topic}] ${label}\n${rows.join("\n")}`);
}
