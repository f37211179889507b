import { Verdict } from "@/const/verdict.const";

/**
 * Represents the schema for the 'judgements' collection, keyed by judgement id.
 */
export interface IJudgementRecord {
  _id: string;
  submissionId: string;
  verdict: Verdict | null; // null while pending
  startTime: string;
  startContestTime: string;
  endTime: string | null;
  endContestTime: string | null;
  token: number;
}
