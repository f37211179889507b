import fs from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { IdentityTables } from '@/types/contest.types';
import logger from '@/utils/pinoLogger';

const MappingFileSchema = z
    .record(z.union([z.string(), z.number()]))
    .nullable();

/**
 * Parses a mapping table: a YAML map of `externalId: contestId`.
 * Keys and values are stringified, since scoreboard ids are often numeric.
 */
export const parseMappingTable = (content : string, source = 'mapping') : Map<string, string> => {
    let raw : unknown;
    try {
        raw = parse(content);
    } catch (error) {
        throw new Error(`[mapping] Failed to parse ${source}; ensure valid YAML`, { cause: error });
    }

    const result = MappingFileSchema.safeParse(raw ?? null);
    if (!result.success) {
        throw new Error(`[mapping] ${source} must be a map of externalId: contestId`, { cause: result.error });
    }

    const table = new Map<string, string>();
    for (const [externalId, contestId] of Object.entries(result.data ?? {})) {
        table.set(String(externalId), String(contestId));
    }
    return table;
}

/**
 * Reads a mapping table from disk. A missing file is an empty table.
 */
export const loadMappingTable = (filePath : string) : Map<string, string> => {
    if (!fs.existsSync(filePath)) {
        logger.warn(`[mapping] ${filePath} not found, using an empty table`);
        return new Map();
    }
    const table = parseMappingTable(fs.readFileSync(filePath, 'utf8'), filePath);
    logger.info(`[mapping] Loaded ${table.size} entries from ${filePath}`);
    return table;
}

export const loadIdentityTables = (teamFile : string, problemFile : string) : IdentityTables => ({
    teams : loadMappingTable(teamFile),
    problems : loadMappingTable(problemFile),
});
