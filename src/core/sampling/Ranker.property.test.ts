import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { topN_select } from './Ranker.js';
import { SORT_FIELDS, type ProcessSample, type SortField } from '../models/process.js';
import { sample_build } from '../../test/procFixture.js';

/** Rows with unique (pid, kind) and a small value range so ties are common. */
const rowsArb: fc.Arbitrary<ProcessSample[]> = fc
    .uniqueArray(
        fc.record({
            pid: fc.integer({ min: 1, max: 500 }),
            thread: fc.boolean(),
            cpu: fc.integer({ min: 0, max: 5 }),
            mem: fc.integer({ min: 0, max: 5 }),
            time: fc.integer({ min: 0, max: 5 }),
            command: fc.constantFrom('bash', 'sshd', 'Xorg', 'nginx')
        }),
        { selector: (r): string => `${r.pid}/${r.thread}`, maxLength: 120 }
    )
    .map((records): ProcessSample[] => records.map((r): ProcessSample => sample_build({
        pid: r.pid,
        kind: r.thread ? 'thread' : 'process',
        cpuPercent: r.cpu,
        memoryKB: r.mem,
        cpuTimeSeconds: r.time,
        commandLine: r.command
    })));

/** Rows paired with a reordering of themselves. */
const rowsWithPermutationArb: fc.Arbitrary<[ProcessSample[], ProcessSample[]]> = rowsArb.chain(
    (rows: ProcessSample[]): fc.Arbitrary<[ProcessSample[], ProcessSample[]]> => fc.tuple(
        fc.constant(rows),
        fc.shuffledSubarray(rows, { minLength: rows.length, maxLength: rows.length })
    )
);

const NUMERIC_KEYS: Record<Exclude<SortField, 'command'>, (row: ProcessSample) => number> = {
    cpu: (row: ProcessSample): number => row.cpuPercent,
    mem: (row: ProcessSample): number => row.memoryKB,
    pid: (row: ProcessSample): number => row.pid,
    time: (row: ProcessSample): number => row.cpuTimeSeconds
};

/**
 * Expected rank order written out from the raw fields: the sort field
 * descending, then pid ascending, then processes before threads.
 */
function expected_compare(field: SortField, a: ProcessSample, b: ProcessSample): number {
    if (field === 'command') {
        if (a.commandLine !== b.commandLine) return a.commandLine > b.commandLine ? -1 : 1;
    } else {
        const left: number = NUMERIC_KEYS[field](a);
        const right: number = NUMERIC_KEYS[field](b);
        if (left !== right) return left > right ? -1 : 1;
    }
    if (a.pid !== b.pid) return a.pid < b.pid ? -1 : 1;
    const kindRank: (row: ProcessSample) => number = (row: ProcessSample): number => (row.kind === 'process' ? 0 : 1);
    return kindRank(a) - kindRank(b);
}

describe('Ranker — property invariants', (): void => {
    it('selects the field-descending, pid-ascending top N', (): void => {
        fc.assert(
            fc.property(
                rowsArb,
                fc.constantFrom<SortField>(...SORT_FIELDS),
                fc.integer({ min: 0, max: 150 }),
                (rows: ProcessSample[], field: SortField, n: number): void => {
                    const expected: ProcessSample[] = [...rows]
                        .sort((a: ProcessSample, b: ProcessSample): number => expected_compare(field, a, b))
                        .slice(0, n);
                    expect(topN_select(rows, field, n)).toEqual(expected);
                }
            )
        );
    });

    it('does not depend on input order', (): void => {
        fc.assert(
            fc.property(
                rowsWithPermutationArb,
                fc.constantFrom<SortField>(...SORT_FIELDS),
                fc.integer({ min: 0, max: 150 }),
                ([rows, permuted]: [ProcessSample[], ProcessSample[]], field: SortField, n: number): void => {
                    expect(topN_select(permuted, field, n)).toEqual(topN_select(rows, field, n));
                }
            )
        );
    });

    it('returns min(n, rows) entries', (): void => {
        fc.assert(
            fc.property(rowsArb, fc.integer({ min: 0, max: 150 }), (rows: ProcessSample[], n: number): void => {
                expect(topN_select(rows, 'cpu', n)).toHaveLength(Math.min(n, rows.length));
            })
        );
    });
});
