import { IdentityMapper } from '@/services/identityMapper.service';
import { SnapshotNormalizer, compareSubmissionIds } from '@/services/snapshotNormalizer.service';
import { UnmappedIdentifierError } from '@/utils/errors';
import { MINUTE, cell, contestPackage, identityTables, row, snapshotOf } from '../fakes/contestFixture';

const createNormalizer = () => new SnapshotNormalizer(
    new IdentityMapper(identityTables),
    contestPackage,
    { defaultLanguageId : 'cpp', emitPendingJudgements : false },
);

describe('SnapshotNormalizer', () => {

    it('expands a first-try accept into one submission and one judgement', () => {
        const result = createNormalizer().normalize(snapshotOf(
            row('101', { p1 : cell({ isAccepted : true, timeMs : 10 * MINUTE }) }),
        ));

        expect(result.submissions).toEqual([{
            contestTimeMs : 600_000,
            submission : {
                id : 't1-A-1',
                team_id : 't1',
                problem_id : 'A',
                language_id : 'cpp',
                time : '2024-03-10T09:10:00.000Z',
                contest_time : '0:10:00.000',
                files : [],
            },
        }]);
        expect(result.judgements).toEqual([{
            id : 't1-A-1',
            submission_id : 't1-A-1',
            judgement_type_id : 'AC',
            start_time : '2024-03-10T09:10:00.000Z',
            start_contest_time : '0:10:00.000',
            end_time : '2024-03-10T09:10:00.000Z',
            end_contest_time : '0:10:00.000',
        }]);
        expect(result.dropped).toEqual([]);
    });

    it('spreads rejected attempts before the accepted one and keeps pending last', () => {
        const result = createNormalizer().normalize(snapshotOf(
            row('101', { p1 : cell({ isAccepted : true, attempts : 2, pendingAttempts : 1, timeMs : 15 * MINUTE }) }),
        ));

        expect(result.submissions.map(({ submission, contestTimeMs }) => [submission.id, contestTimeMs])).toEqual([
            ['t1-A-1', 225_000],
            ['t1-A-2', 450_000],
            ['t1-A-3', 900_000],
            ['t1-A-4', 900_000],
        ]);
        expect(result.judgements.map((judgement) => judgement.judgement_type_id)).toEqual(['WA', 'WA', 'AC', null]);
        expect(result.judgements[3]).toMatchObject({ end_time : null, end_contest_time : null });
    });

    it('produces nothing for an untouched cell', () => {
        const result = createNormalizer().normalize(snapshotOf(row('101', { p1 : cell() })));
        expect(result.submissions).toEqual([]);
        expect(result.judgements).toEqual([]);
    });

    it('is deterministic for the same snapshot', () => {
        const snapshot = snapshotOf(
            row('102', { p2 : cell({ attempts : 3, timeMs : 40 * MINUTE }) }),
            row('101', { p1 : cell({ isAccepted : true, attempts : 1, timeMs : 20 * MINUTE }) }),
        );
        const normalizer = createNormalizer();
        expect(normalizer.normalize(snapshot)).toEqual(normalizer.normalize(snapshot));
    });

    it('orders across teams by contest time, then by id', () => {
        const result = createNormalizer().normalize(snapshotOf(
            row('102', { p1 : cell({ isAccepted : true, timeMs : 5 * MINUTE }) }),
            row('101', { p2 : cell({ isAccepted : true, timeMs : 5 * MINUTE }), p1 : cell({ isAccepted : true, timeMs : 30 * MINUTE }) }),
        ));
        expect(result.submissions.map(({ submission }) => submission.id)).toEqual(['t1-B-1', 't2-A-1', 't1-A-1']);
    });

    it('drops rows of unmapped teams and keeps the rest', () => {
        const result = createNormalizer().normalize(snapshotOf(
            row('999', { p1 : cell({ isAccepted : true, timeMs : MINUTE }) }),
            row('101', { p1 : cell({ isAccepted : true, timeMs : 2 * MINUTE }), p7 : cell({ attempts : 1, timeMs : MINUTE }) }),
        ));

        expect(result.submissions.map(({ submission }) => submission.id)).toEqual(['t1-A-1']);
        expect(result.dropped).toHaveLength(2);
        expect(result.dropped[0]).toBeInstanceOf(UnmappedIdentifierError);
        expect(result.dropped.map((error) => [error.kind, error.externalId])).toEqual([['team', '999'], ['problem', 'p7']]);
    });
});

describe('compareSubmissionIds', () => {
    it('compares the numeric parts as numbers', () => {
        expect(['t1-A-10', 't1-A-2', 't1-A-1'].sort(compareSubmissionIds)).toEqual(['t1-A-1', 't1-A-2', 't1-A-10']);
    });
});
