/**
 * @file Process Monitor Application
 *
 * Wires arguments, config, the sampling engine and the renderers into one
 * run. Every host dependency (filesystem backend, output, environment,
 * tick-rate detection, cancellation) arrives through `AppHost`, so the
 * whole run can execute against an in-memory procfs.
 *
 * @module cli/app
 */

import type { ProcfsBackend } from '../procfs/types.js';
import type { Clock } from '../procfs/SystemClock.js';
import { ProcClock, procfs_validate } from '../procfs/SystemClock.js';
import { PathValidator } from '../procfs/PathValidator.js';
import { SampleReader } from '../procfs/SampleReader.js';
import type { ProcessSample, ScanOptions, ScanResult, ScanStats } from '../core/models/process.js';
import { Scanner } from '../core/sampling/Scanner.js';
import { topN_select } from '../core/sampling/Ranker.js';
import { ProctopError, error_message, type ProctopErrorCode } from '../core/errors.js';
import type { Diagnostics } from '../core/logging/Diagnostics.js';
import type { CancellationToken } from '../core/watch/CancellationToken.js';
import { watchLoop_run } from '../core/watch/WatchLoop.js';
import { SettingsService, type ResolvedSettings, type RawSettings } from '../config/settings.js';
import { configFile_load, type ConfigFileLoad } from '../config/file.js';
import { args_parse, type ParsedArgs } from './args.js';
import { help_render } from './help.js';
import { table_render, watchHeader_render } from '../ui/tui/TableRenderer.js';
import { json_render } from '../ui/json/JsonRenderer.js';

/** Clears the terminal and homes the cursor. */
export const SCREEN_CLEAR: string = '\x1b[2J\x1b[;H';

const ERROR_HINTS: Record<ProctopErrorCode, string> = {
    PROCFS_UNAVAILABLE: 'Run with sudo, or point --proc-root at a mounted proc filesystem.',
    CLOCK_UNAVAILABLE: 'Check permissions or run with appropriate privileges.'
};

export interface AppHost {
    programName: string;
    backend: ProcfsBackend;
    diagnostics: Diagnostics;
    token: CancellationToken;
    env: Record<string, string | undefined>;
    /** Receives output text verbatim (newlines included). */
    stdout: (text: string) => void;
    /** Kernel tick rate; receives a debug channel for where the value came from. */
    hertz_detect: (debug: (message: string) => void) => Promise<number>;
    /** Whether the run has root privileges. */
    privileged: boolean;
    color: boolean;
    clock_create?: (backend: ProcfsBackend, root: string) => Clock;
    date_now?: () => Date;
}

/**
 * One-line summary of a pass's counters.
 */
export function scanStats_format(stats: ScanStats): string {
    return `${stats.scanned} scanned, ${stats.sampled} sampled, ${stats.threads} threads, ` +
        `${stats.cached} cached, ${stats.skipped} skipped, ${stats.filtered} filtered, ` +
        `${stats.errors} errors in ${stats.durationMs}ms`;
}

/**
 * Run the monitor.
 *
 * @returns Process exit code.
 */
export async function app_run(argv: readonly string[], host: AppHost): Promise<number> {
    const diagnostics: Diagnostics = host.diagnostics;
    const args: ParsedArgs = args_parse(argv);
    if (args.help) {
        host.stdout(help_render(host.programName));
        return 0;
    }

    const service: SettingsService = await settings_resolve(args, host);
    const settings: ResolvedSettings = service.snapshot();
    const options: ScanOptions = service.scanOptions_get();

    try {
        await procfs_validate(host.backend, settings.procRoot);
        const hz: number = await host.hertz_detect((message: string): void => diagnostics.debug(message));
        const scanner: Scanner = scanner_create(settings, hz, host);

        if (settings.output === 'json' || !settings.watch) {
            await pass_runOnce(scanner, settings, options, host);
        } else {
            await pass_runWatch(scanner, settings, options, host);
        }
        return 0;
    } catch (e: unknown) {
        diagnostics.error(error_message(e));
        if (e instanceof ProctopError) diagnostics.hint(ERROR_HINTS[e.code]);
        return 1;
    }
}

// ─── Setup ──────────────────────────────────────────────────────────────────

async function settings_resolve(args: ParsedArgs, host: AppHost): Promise<SettingsService> {
    const diagnostics: Diagnostics = host.diagnostics;
    for (const warning of args.warnings) diagnostics.warn(warning);

    let file: RawSettings = {};
    const configPath: string | undefined = args.configPath ?? host.env.PROCTOP_CONFIG;
    if (configPath) {
        const loaded: ConfigFileLoad = await configFile_load(configPath);
        for (const warning of loaded.warnings) diagnostics.warn(warning);
        file = loaded.settings;
    }

    const service: SettingsService = new SettingsService({ cli: args.settings, env: host.env, file });
    for (const warning of service.warnings_get()) diagnostics.warn(warning);

    const resolved: ResolvedSettings = service.snapshot();
    diagnostics.verbose_set(resolved.verbose);
    if (resolved.output === 'json' && resolved.watch) {
        diagnostics.debug('JSON output runs a single pass; ignoring --watch');
    }
    return service;
}

function scanner_create(settings: ResolvedSettings, hz: number, host: AppHost): Scanner {
    const root: string = settings.procRoot;
    const validator: PathValidator = new PathValidator(host.backend, root);
    const reader: SampleReader = new SampleReader(host.backend, validator, root);
    const clock: Clock = host.clock_create ? host.clock_create(host.backend, root) : new ProcClock(host.backend, root);
    return new Scanner({
        backend: host.backend,
        reader,
        clock,
        ticksPerSecond: hz,
        root,
        debug: (message: string): void => host.diagnostics.debug(message)
    });
}

// ─── Passes ─────────────────────────────────────────────────────────────────

async function pass_runOnce(
    scanner: Scanner,
    settings: ResolvedSettings,
    options: ScanOptions,
    host: AppHost
): Promise<void> {
    const result: ScanResult = await scanner.processes_sample(options);
    const rows: ProcessSample[] = topN_select(result.samples, settings.sortField, settings.limit);
    host.diagnostics.debug(scanStats_format(result.stats));

    if (settings.output === 'json') {
        const now: Date = host.date_now ? host.date_now() : new Date();
        host.stdout(json_render(rows, result.uptime, settings.memoryUnit, Math.floor(now.getTime() / 1000)) + '\n');
        return;
    }

    const lines: string[] = table_render(rows, {
        memoryUnit: settings.memoryUnit,
        summary: true,
        totalEntries: result.samples.length,
        privileged: host.privileged,
        color: host.color
    });
    host.stdout(lines.join('\n') + '\n');
}

async function pass_runWatch(
    scanner: Scanner,
    settings: ResolvedSettings,
    options: ScanOptions,
    host: AppHost
): Promise<void> {
    host.stdout(`Process Monitor - Refresh every ${settings.watchIntervalSeconds}s (Ctrl+C to stop)\n`);

    await watchLoop_run({
        intervalSeconds: settings.watchIntervalSeconds,
        token: host.token,
        screen_clear: (): void => host.stdout(SCREEN_CLEAR),
        iteration_run: async (iteration: number): Promise<void> => {
            const result: ScanResult = await scanner.processes_sample(options);
            const rows: ProcessSample[] = topN_select(result.samples, settings.sortField, settings.limit);
            host.diagnostics.debug(scanStats_format(result.stats));

            const header: string[] = watchHeader_render({
                iteration,
                timestamp: host.date_now ? host.date_now() : new Date(),
                uptime: result.uptime,
                sortField: settings.sortField,
                limit: settings.limit,
                intervalSeconds: settings.watchIntervalSeconds,
                memoryUnit: settings.memoryUnit,
                includeZombies: settings.includeZombies,
                includeThreads: settings.includeThreads,
                color: host.color
            });
            const table: string[] = table_render(rows, {
                memoryUnit: settings.memoryUnit,
                summary: false,
                totalEntries: result.samples.length,
                privileged: host.privileged,
                color: host.color
            });
            host.stdout([...header, ...table].join('\n') + '\n');
        }
    });

    host.stdout('\nShutting down...\n');
}
