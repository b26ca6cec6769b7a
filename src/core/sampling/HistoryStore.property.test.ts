import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { HistoryStore } from './HistoryStore.js';

interface PutOp {
    identity: string;
    ticks: number;
    timestamp: number;
}

const putOp: fc.Arbitrary<PutOp> = fc.record({
    identity: fc.integer({ min: 1, max: 50 }).map(String),
    ticks: fc.nat(),
    timestamp: fc.integer({ min: 0, max: 1000 })
});

describe('HistoryStore — property invariants', (): void => {
    it('never exceeds its capacity', (): void => {
        fc.assert(
            fc.property(fc.integer({ min: 1, max: 20 }), fc.array(putOp, { maxLength: 200 }), (capacity: number, ops: PutOp[]): void => {
                const store: HistoryStore = new HistoryStore(capacity);
                for (const op of ops) {
                    store.put(op.identity, op.ticks, op.timestamp);
                    expect(store.size).toBeLessThanOrEqual(capacity);
                }
            })
        );
    });

    it('leaves no entry older than the window after stale eviction', (): void => {
        fc.assert(
            fc.property(
                fc.array(putOp, { maxLength: 100 }),
                fc.integer({ min: 0, max: 2000 }),
                fc.integer({ min: 0, max: 500 }),
                (ops: PutOp[], now: number, maxAge: number): void => {
                    const store: HistoryStore = new HistoryStore(1000);
                    for (const op of ops) store.put(op.identity, op.ticks, op.timestamp);
                    store.evictStale(now, maxAge);

                    for (const op of ops) {
                        const entry = store.get(op.identity);
                        if (entry) expect(now - entry.timestamp).toBeLessThanOrEqual(maxAge);
                    }
                }
            )
        );
    });

    it('always retains the most recent put when it carries the newest timestamp', (): void => {
        fc.assert(
            fc.property(fc.integer({ min: 1, max: 10 }), fc.array(putOp, { minLength: 1, maxLength: 100 }), (capacity: number, ops: PutOp[]): void => {
                const store: HistoryStore = new HistoryStore(capacity);
                const newest: number = Math.max(...ops.map((op: PutOp): number => op.timestamp));
                for (const op of ops) store.put(op.identity, op.ticks, op.timestamp);
                store.put('last', 1, newest);
                expect(store.get('last')).toEqual({ identity: 'last', totalTicks: 1, timestamp: newest });
            })
        );
    });
});
