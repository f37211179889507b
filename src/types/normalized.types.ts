import { Judgement, Submission } from './ccs.types';
import { UnmappedIdentifierError } from '@/utils/errors';

export interface SubmissionCandidate {
  submission: Submission;
  contestTimeMs: number;
}

export interface NormalizedSnapshot {
  submissions: SubmissionCandidate[]; // ordered by (contestTimeMs, id)
  judgements: Judgement[]; // one per submission, same order
  dropped: UnmappedIdentifierError[];
}
