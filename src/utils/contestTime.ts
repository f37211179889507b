import { ContestState } from '@/types/ccs.types';
import { ContestTimeline } from '@/types/contest.types';

const pad = (value : number, width = 2) : string => String(value).padStart(width, '0');

/**
 * Formats a contest-relative duration as RELTIME (`H:MM:SS.sss`).
 */
export const formatReltime = (ms : number) : string => {
    const sign = ms < 0 ? '-' : '';
    const total = Math.floor(Math.abs(ms));
    const hours = Math.floor(total / 3_600_000);
    const minutes = Math.floor((total % 3_600_000) / 60_000);
    const seconds = Math.floor((total % 60_000) / 1000);
    const millis = total % 1000;
    return `${sign}${hours}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
}

/**
 * Parses `H:MM:SS[.sss]`, `MM:SS`, a bare number of seconds, or a numeric value
 * (seconds) into milliseconds.
 */
export const parseDuration = (value : string | number) : number => {
    if (typeof value === 'number') return Math.round(value * 1000);

    const trimmed = value.trim();
    const negative = trimmed.startsWith('-');
    const parts = (negative ? trimmed.slice(1) : trimmed).split(':').map(Number);
    if (parts.length === 0 || parts.length > 3 || parts.some((part) => Number.isNaN(part))) {
        throw new Error(`Invalid duration: ${value}`);
    }
    const seconds = parts.reduce((acc, part) => acc * 60 + part, 0);
    const ms = Math.round(seconds * 1000);
    return negative ? -ms : ms;
}

export const parseReltime = (value : string) : number => parseDuration(value);

const OFFSET_PATTERN = /(?:([+-])(\d{2}):?(\d{2})|Z)$/i;

/**
 * Reads an ISO-8601 start time, keeping its UTC offset.
 * A value without an offset is taken as UTC.
 */
export const parseContestStart = (value : string) : { epochMs : number; utcOffsetMinutes : number } => {
    const trimmed = value.trim();
    const match = OFFSET_PATTERN.exec(trimmed);
    let utcOffsetMinutes = 0;
    let normalized = trimmed;

    if (match && match[1]) {
        const sign = match[1] === '-' ? -1 : 1;
        utcOffsetMinutes = sign * (Number(match[2]) * 60 + Number(match[3]));
    } else if (!match) {
        normalized = `${trimmed}Z`;
    }

    const epochMs = Date.parse(normalized);
    if (Number.isNaN(epochMs)) {
        throw new Error(`Invalid start time: ${value}`);
    }
    return { epochMs, utcOffsetMinutes };
}

/**
 * Formats an instant as TIME (`yyyy-MM-ddTHH:mm:ss.SSS±HH:MM`, `Z` for UTC).
 */
export const formatAbsoluteTime = (epochMs : number, utcOffsetMinutes = 0) : string => {
    const shifted = new Date(epochMs + utcOffsetMinutes * 60_000);
    const date = `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
    const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}.${pad(shifted.getUTCMilliseconds(), 3)}`;

    if (utcOffsetMinutes === 0) return `${date}T${time}Z`;

    const sign = utcOffsetMinutes > 0 ? '+' : '-';
    const abs = Math.abs(utcOffsetMinutes);
    return `${date}T${time}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

export const contestTimeToAbsolute = (timeline : ContestTimeline, contestTimeMs : number) : string =>
    formatAbsoluteTime(timeline.startEpochMs + contestTimeMs, timeline.utcOffsetMinutes);

/**
 * Contest state as seen at `nowMs`. Each field holds the instant the contest
 * passed that point, so the value only changes when a threshold is crossed.
 */
export const contestStateAt = (timeline : ContestTimeline, nowMs : number) : ContestState => {
    const endMs = timeline.startEpochMs + timeline.durationMs;
    const freezeMs = endMs - timeline.freezeDurationMs;
    const at = (instant : number) : string | null =>
        nowMs >= instant ? formatAbsoluteTime(instant, timeline.utcOffsetMinutes) : null;

    return {
        started : at(timeline.startEpochMs),
        frozen : timeline.freezeDurationMs > 0 ? at(freezeMs) : null,
        ended : at(endMs),
        thawed : null,
        finalized : null,
        end_of_updates : null,
    };
}
