/**
 * @file Process Sample Model
 *
 * Fixed-shape records flowing through the sampling pipeline: raw stat
 * records, history entries, and the frozen per-cycle sample rows handed
 * to the renderers.
 *
 * @module core/models/process
 */

// ─── Identity ───────────────────────────────────────────────────────────────

export type SampleKind = 'process' | 'thread';

/**
 * Identity of one sampled entity. Threads are keyed by their owning
 * process and their own thread id.
 */
export type SampleIdentity =
    | { kind: 'process'; pid: number }
    | { kind: 'thread'; pid: number; tid: number };

/**
 * Stable string key for an identity: `"<pid>"` or `"<pid>/<tid>"`.
 */
export function identity_key(identity: SampleIdentity): string {
    return identity.kind === 'process' ? `${identity.pid}` : `${identity.pid}/${identity.tid}`;
}

// ─── Raw Records ────────────────────────────────────────────────────────────

/**
 * Fields pulled out of one `stat` record. Tick counters are cumulative
 * since the entity started.
 *
 * @property name - Short command name (between the first `(` and the last `)`)
 * @property state - Single-character scheduler state (R, S, D, Z, T, ...)
 * @property startTimeTicks - Start time in ticks since boot
 */
export interface StatRecord {
    name: string;
    state: string;
    ppid: number;
    utime: number;
    stime: number;
    cutime: number;
    cstime: number;
    startTimeTicks: number;
}

/**
 * Last observed cumulative counters for one identity.
 */
export interface HistoryEntry {
    identity: string;
    totalTicks: number;
    timestamp: number;
}

// ─── Sample Rows ────────────────────────────────────────────────────────────

/**
 * One observation of a process or thread, built once per cycle and frozen.
 *
 * Thread rows carry the thread id in `pid` and the owning process id in
 * `ppid`; their memory figures are the owning process's.
 */
export interface ProcessSample {
    readonly pid: number;
    readonly ppid: number;
    readonly state: string;
    readonly commandName: string;
    readonly commandLine: string;
    readonly cpuPercent: number;
    readonly memoryKB: number;
    readonly memoryMB: number;
    readonly cpuTimeSeconds: number;
    readonly kind: SampleKind;
}

// ─── Options ────────────────────────────────────────────────────────────────

export const SORT_FIELDS = ['cpu', 'mem', 'pid', 'command', 'time'] as const;
export type SortField = typeof SORT_FIELDS[number];

export const MEMORY_UNITS = ['MB', 'KB'] as const;
export type MemoryUnit = typeof MEMORY_UNITS[number];

export const CPU_MODES = ['auto', 'since-start', 'delta'] as const;
export type CpuMode = typeof CPU_MODES[number];

/** The mode a single pass actually ran in, after `auto` is resolved. */
export type ResolvedCpuMode = Exclude<CpuMode, 'auto'>;

export type OutputMode = 'table' | 'json';

/**
 * Options that shape one sampling pass.
 */
export interface ScanOptions {
    includeZombies: boolean;
    includeThreads: boolean;
    threadLimitPerProcess: number;
    maxScanCount: number;
    cpuMode: CpuMode;
    watchIntervalSeconds: number;
}

/**
 * Per-pass counters surfaced in verbose mode.
 */
export interface ScanStats {
    scanned: number;
    sampled: number;
    threads: number;
    cached: number;
    skipped: number;
    filtered: number;
    errors: number;
    durationMs: number;
}

/**
 * Output of one sampling pass. `samples` is unordered; ranking is the
 * Ranker's job.
 */
export interface ScanResult {
    samples: ProcessSample[];
    uptime: number;
    mode: ResolvedCpuMode;
    stats: ScanStats;
}
