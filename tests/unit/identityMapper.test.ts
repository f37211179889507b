import { IdentityMapper } from '@/services/identityMapper.service';
import { UnmappedIdentifierError } from '@/utils/errors';
import { FEED_ERROR_CODES } from '@/const/errorType.const';

describe('IdentityMapper', () => {
    const mapper = new IdentityMapper({
        teams : new Map([['101', 't1']]),
        problems : new Map([['p1', 'A']]),
    });

    it('maps known identifiers', () => {
        expect(mapper.mapTeam('101')).toBe('t1');
        expect(mapper.mapProblem('p1')).toBe('A');
    });

    it('throws UnmappedIdentifierError for an unknown team', () => {
        let caught : unknown;
        try {
            mapper.mapTeam('999');
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(UnmappedIdentifierError);
        expect(caught).toMatchObject({
            code : FEED_ERROR_CODES.UNMAPPED_IDENTIFIER,
            kind : 'team',
            externalId : '999',
            message : 'No team mapping for external id "999"',
        });
    });

    it('throws for an unknown problem', () => {
        expect(() => mapper.mapProblem('p9')).toThrow('No problem mapping for external id "p9"');
    });

    it('does not map a team id as a problem', () => {
        expect(() => mapper.mapProblem('101')).toThrow(UnmappedIdentifierError);
    });
});
