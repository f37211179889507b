import { ContestState, EventDraft, Judgement, Submission } from './ccs.types';
import { Verdict } from '@/const/verdict.const';

export const TRANSITION_KIND = {
  NEW_SUBMISSION: 'new-submission',
  NEW_JUDGEMENT: 'new-judgement',
  JUDGEMENT_VERDICT_CHANGED: 'judgement-verdict-changed',
  CONTEST_STATE_CHANGED: 'contest-state-changed',
  STATIC_ENTITY: 'static-entity',
} as const

export type NewSubmissionTransition = {
  kind: typeof TRANSITION_KIND.NEW_SUBMISSION;
  submission: Submission;
}

export type NewJudgementTransition = {
  kind: typeof TRANSITION_KIND.NEW_JUDGEMENT;
  judgement: Judgement;
}

export type JudgementVerdictChangedTransition = {
  kind: typeof TRANSITION_KIND.JUDGEMENT_VERDICT_CHANGED;
  judgement: Judgement;
  previous: Verdict | null;
}

export type ContestStateChangedTransition = {
  kind: typeof TRANSITION_KIND.CONTEST_STATE_CHANGED;
  state: ContestState;
  isFirst: boolean;
}

// contest package objects published once when the log is empty
export type StaticEntityTransition = {
  kind: typeof TRANSITION_KIND.STATIC_ENTITY;
  draft: EventDraft;
}

export type Transition =
  | NewSubmissionTransition
  | NewJudgementTransition
  | JudgementVerdictChangedTransition
  | ContestStateChangedTransition
  | StaticEntityTransition;
