import { z } from 'zod';
import { EVENT_OP, EVENT_TYPE } from '@/const/eventType.const';
import { VERDICT } from '@/const/verdict.const';

/**
 * Contest API object shapes, as they appear in the `data` of feed events and in
 * the REST projections. Field names follow the wire protocol.
 */

export const VerdictSchema = z.enum([
    VERDICT.ACCEPTED,
    VERDICT.WRONG_ANSWER,
    VERDICT.TIME_LIMIT,
    VERDICT.RUN_TIME_ERROR,
    VERDICT.COMPILE_ERROR,
]);

export const FileRefSchema = z.object({
    href : z.string(),
    mime : z.string(),
});

export const SubmissionSchema = z.object({
    id : z.string(),
    team_id : z.string(),
    problem_id : z.string(),
    language_id : z.string(),
    time : z.string(),
    contest_time : z.string(),
    files : z.array(FileRefSchema),
});

export const JudgementSchema = z.object({
    id : z.string(),
    submission_id : z.string(),
    judgement_type_id : VerdictSchema.nullable(),
    start_time : z.string(),
    start_contest_time : z.string(),
    end_time : z.string().nullable(),
    end_contest_time : z.string().nullable(),
});

export const ContestStateSchema = z.object({
    started : z.string().nullable(),
    frozen : z.string().nullable(),
    ended : z.string().nullable(),
    thawed : z.string().nullable(),
    finalized : z.string().nullable(),
    end_of_updates : z.string().nullable(),
});

export const ContestSchema = z.object({
    id : z.string(),
    name : z.string(),
    formal_name : z.string(),
    start_time : z.string().nullable(),
    duration : z.string(),
    scoreboard_freeze_duration : z.string(),
    penalty_time : z.number(),
});

export const JudgementTypeSchema = z.object({
    id : z.string(),
    name : z.string(),
    penalty : z.boolean(),
    solved : z.boolean(),
});

export const LanguageSchema = z.object({
    id : z.string(),
    name : z.string(),
});

export const ProblemSchema = z.object({
    id : z.string(),
    label : z.string(),
    name : z.string(),
    ordinal : z.number(),
    rgb : z.string(),
    color : z.string(),
    time_limit : z.number(),
    test_data_count : z.number(),
});

export const TeamSchema = z.object({
    id : z.string(),
    name : z.string(),
    display_name : z.string(),
    group_ids : z.array(z.string()),
    organization_id : z.string().nullable(),
    icpc_id : z.string().nullable(),
});

const EventOpSchema = z.enum([EVENT_OP.CREATE, EVENT_OP.UPDATE]);

const eventOf = <T extends string, D extends z.ZodTypeAny, I extends z.ZodTypeAny>(type : T, data : D, id : I) =>
    z.object({
        token : z.number().int().positive(),
        type : z.literal(type),
        op : EventOpSchema,
        id,
        data,
    });

export const FeedEventSchema = z.discriminatedUnion('type', [
    eventOf(EVENT_TYPE.CONTESTS, ContestSchema, z.string()),
    eventOf(EVENT_TYPE.JUDGEMENT_TYPES, JudgementTypeSchema, z.string()),
    eventOf(EVENT_TYPE.LANGUAGES, LanguageSchema, z.string()),
    eventOf(EVENT_TYPE.PROBLEMS, ProblemSchema, z.string()),
    eventOf(EVENT_TYPE.TEAMS, TeamSchema, z.string()),
    eventOf(EVENT_TYPE.STATE, ContestStateSchema, z.null()),
    eventOf(EVENT_TYPE.SUBMISSIONS, SubmissionSchema, z.string()),
    eventOf(EVENT_TYPE.JUDGEMENTS, JudgementSchema, z.string()),
]);
