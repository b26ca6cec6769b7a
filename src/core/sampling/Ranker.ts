/**
 * @file Ranker
 *
 * Top-N selection under a sort field. Rows are ordered descending by the
 * field, then ascending by pid, then processes before threads, which makes
 * the order total: any selection strategy yields the same sequence as a
 * full sort followed by truncation.
 *
 * @module core/sampling/Ranker
 */

import type { ProcessSample, SortField } from '../models/process.js';

/**
 * Below this ratio of `n` to row count, a bounded heap is cheaper than a
 * full sort.
 */
const HEAP_RATIO: number = 4;

type Comparator = (a: ProcessSample, b: ProcessSample) => number;

function field_compare(field: SortField, a: ProcessSample, b: ProcessSample): number {
    switch (field) {
        case 'cpu':     return a.cpuPercent - b.cpuPercent;
        case 'mem':     return a.memoryKB - b.memoryKB;
        case 'pid':     return a.pid - b.pid;
        case 'time':    return a.cpuTimeSeconds - b.cpuTimeSeconds;
        case 'command': return a.commandLine < b.commandLine ? -1 : a.commandLine > b.commandLine ? 1 : 0;
    }
}

/**
 * Reference ordering: negative when `a` ranks before `b`.
 */
export function row_compare(field: SortField, a: ProcessSample, b: ProcessSample): number {
    const primary: number = field_compare(field, b, a);
    if (primary !== 0) return primary;
    if (a.pid !== b.pid) return a.pid - b.pid;
    if (a.kind !== b.kind) return a.kind === 'process' ? -1 : 1;
    return 0;
}

/**
 * The best `n` rows by `field`, in rank order.
 */
export function topN_select(rows: readonly ProcessSample[], field: SortField, n: number): ProcessSample[] {
    const limit: number = Math.max(0, Math.floor(n));
    if (limit === 0 || rows.length === 0) return [];

    const compare: Comparator = (a: ProcessSample, b: ProcessSample): number => row_compare(field, a, b);

    if (limit * HEAP_RATIO >= rows.length) {
        return [...rows].sort(compare).slice(0, limit);
    }

    const heap: BoundedHeap = new BoundedHeap(limit, compare);
    for (const row of rows) heap.offer(row);
    return heap.drain().sort(compare);
}

// ─── Bounded Heap ───────────────────────────────────────────────────────────

/**
 * Keeps the `capacity` best rows seen. The root is the worst row retained,
 * so a better newcomer replaces it in O(log n).
 */
class BoundedHeap {
    private readonly items: ProcessSample[] = [];

    constructor(
        private readonly capacity: number,
        private readonly compare: Comparator
    ) {}

    public offer(row: ProcessSample): void {
        if (this.items.length < this.capacity) {
            this.items.push(row);
            this.up_sift(this.items.length - 1);
            return;
        }
        // Replace the root only when the newcomer ranks strictly earlier.
        if (this.compare(row, this.items[0]) < 0) {
            this.items[0] = row;
            this.down_sift(0);
        }
    }

    public drain(): ProcessSample[] {
        return this.items.splice(0);
    }

    /** True when `a` ranks later than `b` (belongs nearer the root). */
    private worse(a: ProcessSample, b: ProcessSample): boolean {
        return this.compare(a, b) > 0;
    }

    private up_sift(index: number): void {
        let child: number = index;
        while (child > 0) {
            const parent: number = (child - 1) >> 1;
            if (!this.worse(this.items[child], this.items[parent])) break;
            this.swap(child, parent);
            child = parent;
        }
    }

    private down_sift(index: number): void {
        let parent: number = index;
        const length: number = this.items.length;
        for (;;) {
            const left: number = parent * 2 + 1;
            const right: number = left + 1;
            let worst: number = parent;
            if (left < length && this.worse(this.items[left], this.items[worst])) worst = left;
            if (right < length && this.worse(this.items[right], this.items[worst])) worst = right;
            if (worst === parent) return;
            this.swap(parent, worst);
            parent = worst;
        }
    }

    private swap(i: number, j: number): void {
        const tmp: ProcessSample = this.items[i];
        this.items[i] = this.items[j];
        this.items[j] = tmp;
    }
}
