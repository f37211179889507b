import { z } from 'zod';
import {
    ContestSchema, ContestStateSchema, FeedEventSchema, FileRefSchema, JudgementSchema,
    JudgementTypeSchema, LanguageSchema, ProblemSchema, SubmissionSchema, TeamSchema,
} from '@/schemas/ccs.schema';

export type FileRef = z.infer<typeof FileRefSchema>;
export type Submission = z.infer<typeof SubmissionSchema>;
export type Judgement = z.infer<typeof JudgementSchema>;
export type ContestState = z.infer<typeof ContestStateSchema>;
export type Contest = z.infer<typeof ContestSchema>;
export type JudgementType = z.infer<typeof JudgementTypeSchema>;
export type Language = z.infer<typeof LanguageSchema>;
export type Problem = z.infer<typeof ProblemSchema>;
export type Team = z.infer<typeof TeamSchema>;

/**
 * One entry of the event log. `token` is the position in the feed, starting at 1.
 */
export type FeedEvent = z.infer<typeof FeedEventSchema>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * An event before the store has assigned it a token.
 */
export type EventDraft = DistributiveOmit<FeedEvent, 'token'>;
