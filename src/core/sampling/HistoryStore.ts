/**
 * @file History Store
 *
 * Per-identity memory of the last observed cumulative tick counters, used
 * as the baseline for delta-mode CPU percentages. Bounded two ways:
 * entries not refreshed within a staleness window are evicted, and the
 * total count is capped, keeping the most recently updated entries.
 *
 * The store doubles as a short-lived row cache so that one identity is not
 * re-parsed twice within a single refresh interval.
 *
 * Owned by one Scanner; its lifetime is one run.
 *
 * @module core/sampling/HistoryStore
 */

import type { HistoryEntry, ProcessSample } from '../models/process.js';

/** Hard ceiling on tracked identities, whatever the scan size. */
export const HISTORY_CAPACITY_MAX: number = 1000000;

/** Seconds a cached row stays servable. */
export const ROW_CACHE_TTL_SECONDS: number = 1;

interface CachedRow {
    sample: ProcessSample;
    cachedAt: number;
}

/**
 * Bounded identity → counters map with an attached row cache.
 */
export class HistoryStore {
    private readonly entries: Map<string, HistoryEntry> = new Map();
    private readonly rows: Map<string, CachedRow> = new Map();
    private readonly capacity: number;

    /**
     * @param capacity - Maximum entries held at any time (at least 1).
     * @param rowTtlSeconds - Lifetime of cached rows.
     */
    constructor(capacity: number, private readonly rowTtlSeconds: number = ROW_CACHE_TTL_SECONDS) {
        this.capacity = Math.max(1, Math.min(Math.floor(capacity), HISTORY_CAPACITY_MAX));
    }

    public get size(): number {
        return this.entries.size;
    }

    public capacity_get(): number {
        return this.capacity;
    }

    /**
     * Last counters recorded for an identity.
     */
    public get(identity: string): HistoryEntry | null {
        return this.entries.get(identity) ?? null;
    }

    /**
     * Record counters for an identity, replacing any previous entry. The
     * store never holds more than its capacity afterwards.
     */
    public put(identity: string, totalTicks: number, timestamp: number): void {
        // Re-insert so Map order tracks update order.
        this.entries.delete(identity);
        this.entries.set(identity, { identity, totalTicks, timestamp });
        if (this.entries.size > this.capacity) {
            this.evictOverCapacity(this.capacity);
        }
    }

    /**
     * Drop entries older than `maxAgeSeconds` at time `now`, along with
     * cached rows past their TTL.
     *
     * @returns Number of history entries removed.
     */
    public evictStale(now: number, maxAgeSeconds: number): number {
        let removed: number = 0;
        for (const [key, entry] of this.entries) {
            if (now - entry.timestamp > maxAgeSeconds) {
                this.entries.delete(key);
                removed++;
            }
        }
        for (const [key, row] of this.rows) {
            if (now - row.cachedAt >= this.rowTtlSeconds) {
                this.rows.delete(key);
            }
        }
        return removed;
    }

    /**
     * Keep at most `maxEntries` entries, preferring later timestamps and,
     * among equal timestamps, later updates.
     *
     * @returns Number of history entries removed.
     */
    public evictOverCapacity(maxEntries: number): number {
        const limit: number = Math.max(0, Math.floor(maxEntries));
        if (this.entries.size <= limit) return 0;

        const ordered: Array<[number, HistoryEntry]> = [...this.entries.values()]
            .map((entry: HistoryEntry, index: number): [number, HistoryEntry] => [index, entry])
            .sort((a: [number, HistoryEntry], b: [number, HistoryEntry]): number =>
                b[1].timestamp - a[1].timestamp || b[0] - a[0]);

        const doomed: Array<[number, HistoryEntry]> = ordered.slice(limit);
        for (const [, entry] of doomed) {
            this.entries.delete(entry.identity);
            this.rows.delete(entry.identity);
        }
        return doomed.length;
    }

    // ─── Row Cache ──────────────────────────────────────────────

    /**
     * Cached row for an identity if it was built less than the TTL ago.
     */
    public row_get(identity: string, now: number): ProcessSample | null {
        const cached: CachedRow | undefined = this.rows.get(identity);
        if (!cached) return null;
        if (now - cached.cachedAt >= this.rowTtlSeconds) {
            this.rows.delete(identity);
            return null;
        }
        return cached.sample;
    }

    public row_put(identity: string, sample: ProcessSample, now: number): void {
        this.rows.delete(identity);
        this.rows.set(identity, { sample, cachedAt: now });
        if (this.rows.size > this.capacity) {
            const oldest: string | undefined = this.rows.keys().next().value;
            if (oldest !== undefined) this.rows.delete(oldest);
        }
    }

    /**
     * Forget everything.
     */
    public clear(): void {
        this.entries.clear();
        this.rows.clear();
    }
}
