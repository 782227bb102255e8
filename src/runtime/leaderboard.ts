import { fromNow, type Timestamp } from "../types/timestamp";

import type { Difficulty, SessionState } from "../engine/types";

/**
 * The single fact the leaderboard collaborator receives about a session.
 */
export type ScoreEntry = Readonly<{
  player: string;
  score: number;
  difficulty: Difficulty;
  timestamp: Timestamp;
}>;

// Storage mechanics live behind this port; the engine never reads it back
export type LeaderboardSink = {
  submit(entry: ScoreEntry): Promise<void> | void;
};

export function createScoreEntry(
  state: SessionState,
  timestamp: Timestamp = fromNow(),
): ScoreEntry {
  return {
    difficulty: state.difficulty,
    player: state.player,
    score: state.score,
    timestamp,
  };
}
