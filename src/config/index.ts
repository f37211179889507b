import dotenv from 'dotenv';
dotenv.config();

interface Config {
    SERVICE_NAME : string;
    LOG_LEVEL : string;
    DATABASE_URL : string;
    SCOREBOARD_API_KEY : string;
    SCOREBOARD_SUBDOMAIN : string;
    SCOREBOARD_CONTEST_ID : number;
    SCOREBOARD_SHOW_UNOFFICIAL : boolean;
    SCOREBOARD_TIMEOUT_MS : number;
    POLLING_INTERVAL_SECONDS : number;
    CONTEST_PACKAGE_PATH : string;
    TEAM_MAPPING_FILE : string;
    PROBLEM_MAPPING_FILE : string;
    HTTP_HOST : string;
    HTTP_PORT : number;
    FEED_AUTH_USERNAME : string;
    FEED_AUTH_PASSWORD : string;
    FEED_KEEPALIVE_SECONDS : number;
    DEFAULT_LANGUAGE_ID : string;
    EMIT_PENDING_JUDGEMENTS : boolean;
}

const toNumber = (value : string | undefined, fallback : number) : number => {
    const parsed = Number(value);
    return value === undefined || value === '' || Number.isNaN(parsed) ? fallback : parsed;
}

const toBoolean = (value : string | undefined, fallback : boolean) : boolean => {
    if (value === undefined || value === '') return fallback;
    return value.toLowerCase() === 'true';
}

export const config : Config = {
    SERVICE_NAME : 'SCOREBOARD_FEED_SYNC',
    LOG_LEVEL : process.env.LOG_LEVEL || '',
    DATABASE_URL : process.env.DATABASE_URL || '',
    SCOREBOARD_API_KEY : process.env.SCOREBOARD_API_KEY || '',
    SCOREBOARD_SUBDOMAIN : process.env.SCOREBOARD_SUBDOMAIN || '',
    SCOREBOARD_CONTEST_ID : toNumber(process.env.SCOREBOARD_CONTEST_ID, 0),
    SCOREBOARD_SHOW_UNOFFICIAL : toBoolean(process.env.SCOREBOARD_SHOW_UNOFFICIAL, false),
    SCOREBOARD_TIMEOUT_MS : toNumber(process.env.SCOREBOARD_TIMEOUT_MS, 30_000),
    POLLING_INTERVAL_SECONDS : toNumber(process.env.POLLING_INTERVAL_SECONDS, 30),
    CONTEST_PACKAGE_PATH : process.env.CONTEST_PACKAGE_PATH || './contest',
    TEAM_MAPPING_FILE : process.env.TEAM_MAPPING_FILE || './team_mapping.yaml',
    PROBLEM_MAPPING_FILE : process.env.PROBLEM_MAPPING_FILE || './problem_mapping.yaml',
    HTTP_HOST : process.env.HTTP_HOST || '0.0.0.0',
    HTTP_PORT : toNumber(process.env.HTTP_PORT, 8080),
    FEED_AUTH_USERNAME : process.env.FEED_AUTH_USERNAME || '',
    FEED_AUTH_PASSWORD : process.env.FEED_AUTH_PASSWORD || '',
    FEED_KEEPALIVE_SECONDS : toNumber(process.env.FEED_KEEPALIVE_SECONDS, 120),
    DEFAULT_LANGUAGE_ID : process.env.DEFAULT_LANGUAGE_ID || 'cpp',
    EMIT_PENDING_JUDGEMENTS : toBoolean(process.env.EMIT_PENDING_JUDGEMENTS, false),
}
