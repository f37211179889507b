import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildContest, buildProblems, buildTeams, loadContestPackage } from '@/providers/contestPackageProvider';

const NOW = Date.UTC(2024, 2, 10, 8, 0, 0);

describe('contestPackageProvider', () => {

    describe('buildContest', () => {
        it('fills the defaults and formats times', () => {
            const { contest, timeline } = buildContest({ id: 'spring-open', name: 'Spring Open', start_time: '2024-03-10T12:00:00+03:00' }, NOW);

            expect(contest).toEqual({
                id : 'spring-open',
                name : 'Spring Open',
                formal_name : 'Spring Open',
                start_time : '2024-03-10T12:00:00.000+03:00',
                duration : '5:00:00.000',
                scoreboard_freeze_duration : '1:00:00.000',
                penalty_time : 20,
            });
            expect(timeline).toEqual({
                startEpochMs : Date.UTC(2024, 2, 10, 9, 0, 0),
                utcOffsetMinutes : 180,
                durationMs : 18_000_000,
                freezeDurationMs : 3_600_000,
            });
        });

        it('starts now when no start time is given', () => {
            const { contest, timeline } = buildContest({ id: 42, duration: '3:00:00', scoreboard_freeze_duration: 0 }, NOW);

            expect(contest.id).toBe('42');
            expect(contest.start_time).toBe('2024-03-10T08:00:00.000Z');
            expect(timeline.startEpochMs).toBe(NOW);
            expect(timeline.freezeDurationMs).toBe(0);
        });

        it('requires an id', () => {
            expect(() => buildContest({ name: 'No id' }, NOW)).toThrow();
        });
    });

    it('numbers problems in file order', () => {
        const problems = buildProblems([
            { id: 'A', label: 'A', name: 'Arrays' },
            { id: 'B', label: 'B', name: 'Bridges', rgb: '#0000ff', color: 'blue', time_limit: 2 },
        ]);

        expect(problems.map((problem) => [problem.id, problem.ordinal])).toEqual([['A', 0], ['B', 1]]);
        expect(problems[0]).toEqual({
            id : 'A', label : 'A', name : 'Arrays', ordinal : 0,
            rgb : '#000000', color : 'black', time_limit : 1, test_data_count : 1,
        });
        expect(problems[1]?.time_limit).toBe(2);
    });

    it('fills team display names', () => {
        expect(buildTeams([{ id: 7, name: 'Seven', group_ids: [3] }])).toEqual([{
            id : '7', name : 'Seven', display_name : 'Seven', group_ids : ['3'], organization_id : null, icpc_id : null,
        }]);
    });

    it('loads a package directory', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'package-'));
        try {
            fs.writeFileSync(path.join(dir, 'contest.yaml'), [
                'id: spring-open',
                'formal_name: Spring Open 2024',
                'start_time: 2024-03-10T09:00:00',
                'duration: "4:00:00"',
                'penalty_time: 10',
            ].join('\n'));
            fs.writeFileSync(path.join(dir, 'problems.yaml'), '- id: A\n  label: A\n  name: Arrays\n');

            const loaded = loadContestPackage(dir, NOW);

            expect(loaded.contest.name).toBe('Spring Open 2024');
            expect(loaded.contest.start_time).toBe('2024-03-10T09:00:00.000Z');
            expect(loaded.contest.duration).toBe('4:00:00.000');
            expect(loaded.contest.penalty_time).toBe(10);
            expect(loaded.problems).toHaveLength(1);
            expect(loaded.teams).toEqual([]);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
