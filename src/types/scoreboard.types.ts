/**
 * One team/problem cell of the upstream scoreboard.
 * `attempts` counts rejected submissions only; an accepted one is signalled by `isAccepted`.
 */
export interface ScoreboardCell {
  isAccepted: boolean;
  attempts: number;
  pendingAttempts: number;
  timeMs: number; // last improvement, relative to contest start
  penaltyMs: number;
  isFirstAccepted: boolean;
}

export interface ScoreboardRow {
  teamId: string; // upstream id, not yet mapped
  teamName: string;
  rank: number | null;
  score: number;
  penaltyMs: number;
  isUnofficial: boolean;
  group: string;
  results: Record<string, ScoreboardCell>; // keyed by upstream problem id
}

/**
 * Everything observed in one poll.
 */
export interface ScoreboardSnapshot {
  rows: ScoreboardRow[];
}
