/**
 * @file Scanner
 *
 * Orchestrates one sampling pass: enumerate process identities under the
 * procfs root, read each through the SampleReader, derive CPU percentages
 * against the HistoryStore, and (optionally) expand every process into its
 * threads. Entities that vanish or fail to parse mid-scan are counted and
 * skipped; only an unreadable root or uptime source aborts the pass.
 *
 * @module core/sampling/Scanner
 */

import type {
    HistoryEntry,
    ProcessSample,
    ResolvedCpuMode,
    SampleIdentity,
    ScanOptions,
    ScanResult,
    ScanStats,
    StatRecord
} from '../models/process.js';
import { identity_key } from '../models/process.js';
import type { ProcfsBackend } from '../../procfs/types.js';
import type { Clock } from '../../procfs/SystemClock.js';
import { identity_isValid } from '../../procfs/PathValidator.js';
import { SampleReader, statRecord_parse, statState_peek } from '../../procfs/SampleReader.js';
import { text_sanitize } from '../../procfs/text.js';
import { ProcfsUnavailableError } from '../errors.js';
import { sleep_ms } from '../watch/CancellationToken.js';
import { HistoryStore, HISTORY_CAPACITY_MAX } from './HistoryStore.js';
import { cpuMode_resolve, cpuPercent_compute, cpuPercent_sinceStart, value_round1 } from './RateCalculator.js';

/** Identities read between cooperative pauses. */
export const BATCH_SIZE: number = 100;

/** Pause between batches, in milliseconds. */
export const BATCH_DELAY_MS: number = 1;

/** Floor on the history staleness window, in seconds. */
export const MIN_STALE_SECONDS: number = 5;

/** History entries survive this many refresh intervals without a sighting. */
export const STALE_INTERVALS: number = 3;

/** Wall time assumed for a delta pass that has no previous pass. */
export const DEFAULT_DELTA_SECONDS: number = 1;

const ZOMBIE_STATE: string = 'Z';

export interface ScannerDependencies {
    backend: ProcfsBackend;
    reader: SampleReader;
    clock: Clock;
    ticksPerSecond: number;
    root?: string;
    history?: HistoryStore;
    pause?: (ms: number) => Promise<void>;
    debug?: (message: string) => void;
}

/**
 * Inputs shared by every row built within one pass.
 */
interface PassContext {
    options: ScanOptions;
    mode: ResolvedCpuMode;
    uptime: number;
    now: number;
    cycleElapsed: number;
    stats: ScanStats;
}

/**
 * History capacity for a given scan shape. Every thread row takes an entry
 * of its own, so thread expansion widens the store by the per-process
 * thread limit.
 */
export function historyCapacity_resolve(
    options: Pick<ScanOptions, 'maxScanCount' | 'includeThreads' | 'threadLimitPerProcess'>
): number {
    const perProcess: number = options.includeThreads ? 1 + options.threadLimitPerProcess : 2;
    return Math.min(options.maxScanCount * perProcess, HISTORY_CAPACITY_MAX);
}

/**
 * Drives one sampling pass per call and keeps the cross-pass state
 * (history baseline, time of the previous pass).
 */
export class Scanner {
    private readonly backend: ProcfsBackend;
    private readonly reader: SampleReader;
    private readonly clock: Clock;
    private readonly hz: number;
    private readonly root: string;
    private readonly pause: (ms: number) => Promise<void>;
    private readonly debug: (message: string) => void;
    private history: HistoryStore | null;
    private lastPassAt: number | null = null;

    constructor(deps: ScannerDependencies) {
        this.backend = deps.backend;
        this.reader = deps.reader;
        this.clock = deps.clock;
        this.hz = deps.ticksPerSecond;
        this.root = deps.root ?? '/proc';
        this.history = deps.history ?? null;
        this.pause = deps.pause ?? sleep_ms;
        this.debug = deps.debug ?? ((): void => {});
    }

    /**
     * The store backing delta computation (created on the first pass when
     * none was injected).
     */
    public history_get(options: ScanOptions): HistoryStore {
        if (!this.history) {
            this.history = new HistoryStore(historyCapacity_resolve(options));
        }
        return this.history;
    }

    /**
     * Run one sampling pass.
     *
     * @throws ProcfsUnavailableError when the root cannot be listed.
     * @throws ClockUnavailableError when uptime cannot be read.
     */
    public async processes_sample(options: ScanOptions): Promise<ScanResult> {
        const started: number = Date.now();
        const pids: number[] = await this.pids_enumerate(options.maxScanCount);

        const uptime: number = await this.clock.uptime_read();
        const now: number = this.clock.now();
        const mode: ResolvedCpuMode = cpuMode_resolve(options.cpuMode, this.lastPassAt !== null);
        const cycleElapsed: number = this.lastPassAt === null ? DEFAULT_DELTA_SECONDS : now - this.lastPassAt;

        const history: HistoryStore = this.history_get(options);
        const staleAfter: number = Math.max(MIN_STALE_SECONDS, STALE_INTERVALS * options.watchIntervalSeconds);
        history.evictStale(now, staleAfter);
        history.evictOverCapacity(history.capacity_get());

        const ctx: PassContext = {
            options, mode, uptime, now, cycleElapsed,
            stats: { scanned: 0, sampled: 0, threads: 0, cached: 0, skipped: 0, filtered: 0, errors: 0, durationMs: 0 }
        };

        const samples: ProcessSample[] = [];
        for (let start: number = 0; start < pids.length; start += BATCH_SIZE) {
            if (start > 0) await this.pause(BATCH_DELAY_MS);
            for (const pid of pids.slice(start, start + BATCH_SIZE)) {
                ctx.stats.scanned++;
                const sample: ProcessSample | null = await this.process_sample(pid, ctx);
                if (sample) samples.push(sample);
            }
        }

        if (options.includeThreads) {
            const threadsStarted: number = Date.now();
            const processes: ProcessSample[] = [...samples];
            for (const proc of processes) {
                samples.push(...await this.threads_sample(proc, ctx));
            }
            this.debug(`Read ${ctx.stats.threads} threads in ${Date.now() - threadsStarted}ms`);
        }

        this.lastPassAt = now;
        ctx.stats.durationMs = Date.now() - started;
        return { samples, uptime, mode, stats: ctx.stats };
    }

    // ─── Enumeration ────────────────────────────────────────────

    private async pids_enumerate(maxScanCount: number): Promise<number[]> {
        const entries: string[] | null = await this.backend.dir_list(this.root);
        if (entries === null) {
            throw new ProcfsUnavailableError(`Cannot access ${this.root} directory. Check permissions.`);
        }
        const pids: number[] = entries
            .filter(identity_isValid)
            .map((entry: string): number => Number.parseInt(entry, 10))
            .sort((a: number, b: number): number => a - b);
        if (pids.length > maxScanCount) {
            this.debug(`Scan capped at ${maxScanCount} of ${pids.length} identities`);
        }
        return pids.slice(0, maxScanCount);
    }

    // ─── Per-Entity Sampling ────────────────────────────────────

    private async process_sample(pid: number, ctx: PassContext): Promise<ProcessSample | null> {
        const identity: SampleIdentity = { kind: 'process', pid };
        const cached: ProcessSample | null = this.cached_peek(identity, ctx);
        if (cached) {
            ctx.stats.cached++;
            return cached;
        }

        const record: StatRecord | null = await this.record_load(this.reader.processStat_path(pid), ctx);
        if (record === null) return null;

        const memoryKB: number = await this.reader.memoryKB_read(pid);
        const commandLine: string = await this.reader.commandLine_read(pid, record.name);
        const totalTicks: number = record.utime + record.stime + record.cutime + record.cstime;

        return this.row_build(identity, record, totalTicks, {
            ppid: record.ppid, memoryKB, commandLine
        }, ctx);
    }

    private async threads_sample(proc: ProcessSample, ctx: PassContext): Promise<ProcessSample[]> {
        const threads: ProcessSample[] = [];
        const limit: number = ctx.options.threadLimitPerProcess;
        const tids: number[] = await this.reader.threadIds_list(proc.pid);

        for (const tid of tids) {
            if (threads.length >= limit) {
                this.debug(`Reached thread limit ${limit} for PID ${proc.pid}`);
                break;
            }
            if (tid === proc.pid) continue;

            const identity: SampleIdentity = { kind: 'thread', pid: proc.pid, tid };
            const cached: ProcessSample | null = this.cached_peek(identity, ctx);
            if (cached) {
                ctx.stats.cached++;
                threads.push(cached);
                continue;
            }

            const record: StatRecord | null = await this.record_load(this.reader.threadStat_path(proc.pid, tid), ctx);
            if (record === null) continue;

            const commandName: string = text_sanitize(record.name);
            threads.push(this.row_build(identity, record, record.utime + record.stime, {
                ppid: proc.pid, memoryKB: proc.memoryKB, commandLine: commandName
            }, ctx));
        }

        ctx.stats.threads += threads.length;
        return threads;
    }

    /**
     * Read, zombie-filter and parse one stat record. Null means "no row",
     * with the reason already counted.
     */
    private async record_load(path: string, ctx: PassContext): Promise<StatRecord | null> {
        const raw: string | null = await this.reader.record_read(path);
        if (raw === null) {
            ctx.stats.skipped++;
            return null;
        }
        if (!ctx.options.includeZombies && statState_peek(raw) === ZOMBIE_STATE) {
            ctx.stats.filtered++;
            return null;
        }
        const record: StatRecord | null = statRecord_parse(raw);
        if (record === null) {
            ctx.stats.errors++;
            return null;
        }
        return record;
    }

    private cached_peek(identity: SampleIdentity, ctx: PassContext): ProcessSample | null {
        return this.history_get(ctx.options).row_get(identity_key(identity), ctx.now);
    }

    /**
     * Derive CPU%, record the new baseline, and freeze the row.
     */
    private row_build(
        identity: SampleIdentity,
        record: StatRecord,
        totalTicks: number,
        extra: { ppid: number; memoryKB: number; commandLine: string },
        ctx: PassContext
    ): ProcessSample {
        const key: string = identity_key(identity);
        const history: HistoryStore = this.history_get(ctx.options);

        let cpuPercent: number;
        if (ctx.mode === 'since-start') {
            cpuPercent = cpuPercent_sinceStart(totalTicks, record.startTimeTicks, ctx.uptime, this.hz);
        } else {
            const prior: HistoryEntry | null = history.get(key);
            const elapsed: number = prior ? ctx.now - prior.timestamp : ctx.cycleElapsed;
            cpuPercent = cpuPercent_compute(totalTicks, prior ? prior.totalTicks : 0, elapsed, this.hz);
        }
        history.put(key, totalTicks, ctx.now);

        const sample: ProcessSample = Object.freeze({
            pid: identity.kind === 'process' ? identity.pid : identity.tid,
            ppid: extra.ppid,
            state: record.state,
            commandName: text_sanitize(record.name),
            commandLine: extra.commandLine,
            cpuPercent: value_round1(cpuPercent),
            memoryKB: extra.memoryKB,
            memoryMB: value_round1(extra.memoryKB / 1024),
            cpuTimeSeconds: value_round1(totalTicks / this.hz),
            kind: identity.kind
        });

        history.row_put(key, sample, ctx.now);
        ctx.stats.sampled++;
        return sample;
    }
}
