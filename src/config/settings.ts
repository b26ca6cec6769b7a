/**
 * @file Runtime Settings Service
 *
 * Resolves every monitor option with central validation and deterministic
 * precedence (cli flag > env > config file > defaults). Out-of-range
 * numbers clamp to the nearest bound and unrecognized values fall back to
 * the default; both report a warning and neither is ever fatal.
 *
 * @module
 */

import type { CpuMode, MemoryUnit, OutputMode, ScanOptions, SortField } from '../core/models/process.js';
import { CPU_MODES, MEMORY_UNITS, SORT_FIELDS } from '../core/models/process.js';

export interface ResolvedSettings {
    limit: number;
    sortField: SortField;
    watch: boolean;
    watchIntervalSeconds: number;
    includeZombies: boolean;
    includeThreads: boolean;
    threadLimitPerProcess: number;
    maxScanCount: number;
    memoryUnit: MemoryUnit;
    output: OutputMode;
    verbose: boolean;
    cpuMode: CpuMode;
    procRoot: string;
}

export type SettingsKey = keyof ResolvedSettings;

/** One configuration layer: raw, unvalidated values by key. */
export type RawSettings = Partial<Record<SettingsKey, unknown>>;

export type SettingSource = 'cli' | 'env' | 'file' | 'default';

export interface SettingsLayers {
    cli?: RawSettings;
    env?: Record<string, string | undefined>;
    file?: RawSettings;
}

interface NumericBounds {
    min: number;
    max: number;
}

type NumericKey = 'limit' | 'watchIntervalSeconds' | 'threadLimitPerProcess' | 'maxScanCount';
type BooleanKey = 'watch' | 'includeZombies' | 'includeThreads' | 'verbose';

export const DEFAULT_SETTINGS: Readonly<ResolvedSettings> = Object.freeze({
    limit: 20,
    sortField: 'cpu',
    watch: false,
    watchIntervalSeconds: 2,
    includeZombies: false,
    includeThreads: false,
    threadLimitPerProcess: 1000,
    maxScanCount: 131072,
    memoryUnit: 'MB',
    output: 'table',
    verbose: false,
    cpuMode: 'auto',
    procRoot: '/proc'
});

export const SETTING_BOUNDS: Readonly<Record<NumericKey, NumericBounds>> = Object.freeze({
    limit: { min: 1, max: 1000 },
    watchIntervalSeconds: { min: 1, max: 3600 },
    threadLimitPerProcess: { min: 1, max: 10000 },
    maxScanCount: { min: 100, max: 1000000 }
});

/** Environment variable read for each key, where one exists. */
export const ENV_KEYS: Readonly<Partial<Record<SettingsKey, string>>> = Object.freeze({
    limit: 'PROCTOP_LIMIT',
    sortField: 'PROCTOP_SORT',
    watchIntervalSeconds: 'PROCTOP_INTERVAL',
    threadLimitPerProcess: 'PROCTOP_THREAD_LIMIT',
    maxScanCount: 'PROCTOP_MAX_SCAN',
    memoryUnit: 'PROCTOP_MEMORY_UNIT',
    cpuMode: 'PROCTOP_CPU_MODE',
    procRoot: 'PROCTOP_PROC_ROOT'
});

/** Names used in warnings, matching the CLI flags users type. */
const LABELS: Readonly<Record<SettingsKey, string>> = Object.freeze({
    limit: 'Limit',
    sortField: 'sort',
    watch: 'watch',
    watchIntervalSeconds: 'Interval',
    includeZombies: 'zombie',
    includeThreads: 'threads',
    threadLimitPerProcess: 'Thread limit',
    maxScanCount: 'Max scan',
    memoryUnit: 'memory unit',
    output: 'output',
    verbose: 'verbose',
    cpuMode: 'cpu mode',
    procRoot: 'proc root'
});

const OUTPUT_MODES: readonly OutputMode[] = ['table', 'json'];

export class SettingsService {
    private readonly resolved: ResolvedSettings;
    private readonly sources: Map<SettingsKey, SettingSource> = new Map();
    private readonly warnings: string[] = [];

    constructor(layers: SettingsLayers = {}) {
        const cli: RawSettings = layers.cli ?? {};
        const file: RawSettings = layers.file ?? {};
        const env: Record<string, string | undefined> = layers.env ?? {};

        const pick = <K extends SettingsKey>(key: K): { raw: unknown; source: SettingSource } => {
            if (cli[key] !== undefined) return { raw: cli[key], source: 'cli' };
            const envKey: string | undefined = ENV_KEYS[key];
            const envRaw: string | undefined = envKey ? env[envKey] : undefined;
            if (envRaw !== undefined && envRaw !== '') return { raw: envRaw, source: 'env' };
            if (file[key] !== undefined) return { raw: file[key], source: 'file' };
            return { raw: undefined, source: 'default' };
        };

        const numeric = (key: NumericKey): number => {
            const { raw, source } = pick(key);
            this.sources.set(key, source);
            return raw === undefined ? DEFAULT_SETTINGS[key] : this.numeric_resolve(key, raw);
        };
        const flag = (key: BooleanKey): boolean => {
            const { raw, source } = pick(key);
            this.sources.set(key, source);
            return raw === undefined ? DEFAULT_SETTINGS[key] : this.boolean_resolve(key, raw);
        };
        const choice = <K extends 'sortField' | 'memoryUnit' | 'cpuMode' | 'output'>(
            key: K,
            allowed: readonly ResolvedSettings[K][]
        ): ResolvedSettings[K] => {
            const { raw, source } = pick(key);
            this.sources.set(key, source);
            return raw === undefined ? DEFAULT_SETTINGS[key] : this.choice_resolve(key, raw, allowed);
        };

        this.resolved = {
            limit: numeric('limit'),
            sortField: choice('sortField', SORT_FIELDS),
            watch: flag('watch'),
            watchIntervalSeconds: numeric('watchIntervalSeconds'),
            includeZombies: flag('includeZombies'),
            includeThreads: flag('includeThreads'),
            threadLimitPerProcess: numeric('threadLimitPerProcess'),
            maxScanCount: numeric('maxScanCount'),
            memoryUnit: choice('memoryUnit', MEMORY_UNITS),
            output: choice('output', OUTPUT_MODES),
            verbose: flag('verbose'),
            cpuMode: choice('cpuMode', CPU_MODES),
            procRoot: this.procRoot_resolve(pick('procRoot'))
        };
    }

    /**
     * Effective settings.
     */
    public snapshot(): ResolvedSettings {
        return { ...this.resolved };
    }

    /**
     * Where the effective value of `key` came from.
     */
    public source_get(key: SettingsKey): SettingSource {
        return this.sources.get(key) ?? 'default';
    }

    /**
     * Warnings raised while resolving, in resolution order.
     */
    public warnings_get(): string[] {
        return [...this.warnings];
    }

    /**
     * The subset of settings one sampling pass needs.
     */
    public scanOptions_get(): ScanOptions {
        const s: ResolvedSettings = this.resolved;
        return {
            includeZombies: s.includeZombies,
            includeThreads: s.includeThreads,
            threadLimitPerProcess: s.threadLimitPerProcess,
            maxScanCount: s.maxScanCount,
            cpuMode: s.cpuMode,
            watchIntervalSeconds: s.watchIntervalSeconds
        };
    }

    // ─── Validation ─────────────────────────────────────────────

    private numeric_resolve(key: NumericKey, raw: unknown): number {
        const parsed: number = typeof raw === 'number' ? raw : Number.parseInt(String(raw).trim(), 10);
        const fallback: number = DEFAULT_SETTINGS[key];
        if (!Number.isFinite(parsed) || (typeof raw === 'string' && !/^-?\d+$/.test(raw.trim()))) {
            this.warnings.push(`Invalid value for ${LABELS[key].toLowerCase()}: '${String(raw)}'. Using ${fallback}.`);
            return fallback;
        }

        const bounds: NumericBounds = SETTING_BOUNDS[key];
        const rounded: number = Math.round(parsed);
        const clamped: number = Math.max(bounds.min, Math.min(bounds.max, rounded));
        if (clamped !== rounded) {
            this.warnings.push(`${LABELS[key]} must be between ${bounds.min} and ${bounds.max}. Using ${clamped}.`);
        }
        return clamped;
    }

    private boolean_resolve(key: BooleanKey, raw: unknown): boolean {
        if (typeof raw === 'boolean') return raw;
        const normalized: string = String(raw).trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
        const fallback: boolean = DEFAULT_SETTINGS[key];
        this.warnings.push(`Invalid ${LABELS[key]} option '${String(raw)}'. Using '${fallback}'.`);
        return fallback;
    }

    private choice_resolve<K extends 'sortField' | 'memoryUnit' | 'cpuMode' | 'output'>(
        key: K,
        raw: unknown,
        allowed: readonly ResolvedSettings[K][]
    ): ResolvedSettings[K] {
        const text: string = String(raw).trim();
        const match: ResolvedSettings[K] | undefined = allowed.find(
            (option: ResolvedSettings[K]): boolean => option.toLowerCase() === text.toLowerCase()
        );
        if (match !== undefined) return match;

        const fallback: ResolvedSettings[K] = DEFAULT_SETTINGS[key];
        this.warnings.push(`Invalid ${LABELS[key]} option '${text}'. Using '${fallback}'.`);
        return fallback;
    }

    private procRoot_resolve(picked: { raw: unknown; source: SettingSource }): string {
        this.sources.set('procRoot', picked.source);
        if (picked.raw === undefined) return DEFAULT_SETTINGS.procRoot;

        const text: string = String(picked.raw).trim();
        if (!text.startsWith('/') || text.split('/').includes('..')) {
            this.warnings.push(`Invalid proc root '${text}': must be an absolute path. Using '${DEFAULT_SETTINGS.procRoot}'.`);
            return DEFAULT_SETTINGS.procRoot;
        }
        const normalized: string = '/' + text.split('/').filter(Boolean).join('/');
        return normalized;
    }
}
