// Lightweight, opt-in debug logging for the engine host and tests

// Topics are enabled through the BLOCKFALL_DEBUG environment variable:
// - "true", "1" or "on" enables every topic
// - a comma list enables only those topics, e.g. BLOCKFALL_DEBUG=session,clock

export type DebugTopic = "session" | "clock" | "lifecycle" | "snapshot";

const ENV_KEY = "BLOCKFALL_DEBUG" as const;

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[ENV_KEY];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const topics = readEnvTopics();
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
