export const VERDICT = {
    ACCEPTED : 'AC',
    WRONG_ANSWER : 'WA',
    TIME_LIMIT : 'TLE',
    RUN_TIME_ERROR : 'RTE',
    COMPILE_ERROR : 'CE',
} as const

export type Verdict = typeof VERDICT[keyof typeof VERDICT];

export const VERDICTS = Object.values(VERDICT);

export const JUDGEMENT_TYPES = [
    { id: VERDICT.ACCEPTED, name: 'Accepted', penalty: false, solved: true },
    { id: VERDICT.WRONG_ANSWER, name: 'Wrong Answer', penalty: true, solved: false },
    { id: VERDICT.TIME_LIMIT, name: 'Time Limit Exceeded', penalty: true, solved: false },
    { id: VERDICT.RUN_TIME_ERROR, name: 'Run-Time Error', penalty: true, solved: false },
    { id: VERDICT.COMPILE_ERROR, name: 'Compile Error', penalty: false, solved: false },
]

export const LANGUAGES = [
    { id: 'c', name: 'C' },
    { id: 'cpp', name: 'C++' },
    { id: 'java', name: 'Java' },
    { id: 'kotlin', name: 'Kotlin' },
    { id: 'python3', name: 'Python 3' },
]
