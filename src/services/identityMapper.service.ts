import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { IdentityTables } from '@/types/contest.types';
import { UnmappedIdentifierError } from '@/utils/errors';

/**
 * Translates scoreboard identifiers into contest-package identifiers.
 * Tables are fixed for the lifetime of the process.
 *
 * @class
 */
@injectable()
export class IdentityMapper {
    #_teams : ReadonlyMap<string, string>
    #_problems : ReadonlyMap<string, string>

    constructor(
        @inject(TYPES.IdentityTables) tables : IdentityTables
    ){
        this.#_teams = new Map(tables.teams);
        this.#_problems = new Map(tables.problems);
    }

    /**
     * @throws {UnmappedIdentifierError} when the team has no mapping entry.
     */
    mapTeam(externalId : string) : string {
        const mapped = this.#_teams.get(externalId);
        if (mapped === undefined) throw new UnmappedIdentifierError('team', externalId);
        return mapped;
    }

    /**
     * @throws {UnmappedIdentifierError} when the problem has no mapping entry.
     */
    mapProblem(externalId : string) : string {
        const mapped = this.#_problems.get(externalId);
        if (mapped === undefined) throw new UnmappedIdentifierError('problem', externalId);
        return mapped;
    }
}
