import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { Contest, Problem, Team } from '@/types/ccs.types';
import { ContestPackage, ContestTimeline } from '@/types/contest.types';
import { formatAbsoluteTime, formatReltime, parseContestStart, parseDuration } from '@/utils/contestTime';
import logger from '@/utils/pinoLogger';

/*
 * The package files are trusted; these schemas only give the loose input a type
 * and fill the defaults the Contest API objects need.
 */

const DurationSchema = z.union([z.string(), z.number()]);
const IdSchema = z.union([z.string(), z.number()]).transform(String);

const ContestFileSchema = z.object({
    id : IdSchema,
    name : z.string().optional(),
    formal_name : z.string().optional(),
    start_time : z.string().nullable().optional(),
    duration : DurationSchema.default('5:00:00'),
    scoreboard_freeze_duration : DurationSchema.default('1:00:00'),
    penalty_time : z.number().default(20),
});

const ProblemsFileSchema = z.array(z.object({
    id : IdSchema,
    label : z.string(),
    name : z.string(),
    rgb : z.string().default('#000000'),
    color : z.string().default('black'),
    time_limit : z.number().default(1.0),
    test_data_count : z.number().default(1),
})).nullable();

const TeamsFileSchema = z.array(z.object({
    id : IdSchema,
    name : z.string(),
    display_name : z.string().optional(),
    group_ids : z.array(IdSchema).default([]),
    organization_id : IdSchema.nullable().optional(),
    icpc_id : IdSchema.nullable().optional(),
}));

export const buildContest = (raw : unknown, nowMs : number) : { contest : Contest; timeline : ContestTimeline } => {
    const file = ContestFileSchema.parse(raw);
    const start = file.start_time
        ? parseContestStart(file.start_time)
        : { epochMs: nowMs, utcOffsetMinutes: 0 };
    const durationMs = parseDuration(file.duration);
    const freezeDurationMs = parseDuration(file.scoreboard_freeze_duration);

    return {
        contest : {
            id : file.id,
            name : file.name ?? file.formal_name ?? '',
            formal_name : file.formal_name ?? file.name ?? '',
            start_time : formatAbsoluteTime(start.epochMs, start.utcOffsetMinutes),
            duration : formatReltime(durationMs),
            scoreboard_freeze_duration : formatReltime(freezeDurationMs),
            penalty_time : file.penalty_time,
        },
        timeline : {
            startEpochMs : start.epochMs,
            utcOffsetMinutes : start.utcOffsetMinutes,
            durationMs,
            freezeDurationMs,
        },
    };
}

export const buildProblems = (raw : unknown) : Problem[] =>
    (ProblemsFileSchema.parse(raw) ?? []).map((problem, ordinal) => ({ ...problem, ordinal }));

export const buildTeams = (raw : unknown) : Team[] =>
    TeamsFileSchema.parse(raw).map((team) => ({
        id : team.id,
        name : team.name,
        display_name : team.display_name ?? team.name,
        group_ids : team.group_ids,
        organization_id : team.organization_id ?? null,
        icpc_id : team.icpc_id ?? null,
    }));

/**
 * Loads `contest.yaml`, `problems.yaml` and the optional `teams.json` of a contest package.
 */
export const loadContestPackage = (packagePath : string, nowMs : number = Date.now()) : ContestPackage => {
    const read = (file : string) => fs.readFileSync(path.join(packagePath, file), 'utf8');

    const { contest, timeline } = buildContest(parse(read('contest.yaml')), nowMs);
    const problems = buildProblems(parse(read('problems.yaml')));

    const teamsFile = path.join(packagePath, 'teams.json');
    const teams = fs.existsSync(teamsFile) ? buildTeams(JSON.parse(read('teams.json'))) : [];

    logger.info(`[package] Loaded contest ${contest.id}`, {
        problems : problems.length,
        teams : teams.length,
        startTime : contest.start_time,
    });

    return { contest, problems, teams, timeline };
}
