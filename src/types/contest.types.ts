import { Contest, Problem, Team } from './ccs.types';

/**
 * Absolute anchors of the contest clock.
 * `utcOffsetMinutes` is kept so that absolute times are written in the contest's own zone.
 */
export interface ContestTimeline {
  startEpochMs: number;
  utcOffsetMinutes: number;
  durationMs: number;
  freezeDurationMs: number;
}

export interface ContestPackage {
  contest: Contest;
  problems: Problem[];
  teams: Team[];
  timeline: ContestTimeline;
}

export interface IdentityTables {
  teams: ReadonlyMap<string, string>;
  problems: ReadonlyMap<string, string>;
}
