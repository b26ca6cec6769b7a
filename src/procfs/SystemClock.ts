/**
 * @file System Clock
 *
 * Process-wide time facts: wall clock, system uptime (re-read every
 * cycle) and the kernel clock-tick rate (detected once per run). Also
 * the startup check that the procfs root really is a proc filesystem.
 *
 * @module procfs/SystemClock
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ProcfsBackend } from './types.js';
import { ClockUnavailableError, ProcfsUnavailableError, error_message } from '../core/errors.js';

/** Conventional USER_HZ when detection fails. */
export const DEFAULT_HERTZ: number = 100;

/** Values at or below this are treated as zero. */
export const FLOAT_EPSILON: number = 0.00001;

const execFileAsync = promisify(execFile);

/**
 * Time source consumed by the scanner. Both values are in seconds.
 */
export interface Clock {
    now(): number;
    uptime_read(): Promise<number>;
}

/**
 * Runs an external command and returns its stdout.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

/** Default runner: `execFile`, no shell. */
export const commandRunner_exec: CommandRunner = async (command: string, args: string[]): Promise<string> => {
    const { stdout } = await execFileAsync(command, args, { timeout: 2000 });
    return stdout;
};

// ─── Uptime ─────────────────────────────────────────────────────────────────

/**
 * Parse the first field of an uptime record. Throws ClockUnavailableError
 * for malformed content or a non-positive value.
 */
export function uptime_parse(raw: string): number {
    const parts: string[] = raw.trim().split(/\s+/);
    if (parts.length < 2) {
        throw new ClockUnavailableError('Invalid format in uptime record');
    }
    const uptime: number = Number.parseFloat(parts[0]);
    if (!Number.isFinite(uptime) || uptime <= FLOAT_EPSILON) {
        throw new ClockUnavailableError('Invalid uptime value in uptime record');
    }
    return uptime;
}

/**
 * Clock backed by `<root>/uptime` and `Date.now()`.
 */
export class ProcClock implements Clock {
    constructor(
        private readonly backend: ProcfsBackend,
        private readonly root: string = '/proc'
    ) {}

    public now(): number {
        return Date.now() / 1000;
    }

    public async uptime_read(): Promise<number> {
        const raw: string | null = await this.backend.text_read(`${this.root}/uptime`);
        if (raw === null) {
            throw new ClockUnavailableError(
                `Cannot read ${this.root}/uptime. Check permissions or run with appropriate privileges`
            );
        }
        return uptime_parse(raw);
    }
}

// ─── Tick Rate ──────────────────────────────────────────────────────────────

/**
 * Detect the kernel clock-tick rate via `getconf CLK_TCK`, falling back
 * to DEFAULT_HERTZ. Never throws.
 *
 * @param runner - Command runner (injectable for tests).
 * @param debug - Receives one line describing where the value came from.
 */
export async function hertz_detect(
    runner: CommandRunner = commandRunner_exec,
    debug: (message: string) => void = (): void => {}
): Promise<number> {
    try {
        const output: string = await runner('getconf', ['CLK_TCK']);
        const hz: number = Number.parseInt(output.trim(), 10);
        if (Number.isFinite(hz) && hz > 0) {
            debug(`Detected HERTZ from getconf: ${hz}`);
            return hz;
        }
    } catch (e: unknown) {
        debug(`getconf CLK_TCK failed: ${error_message(e)}`);
    }
    debug(`Using default HERTZ value: ${DEFAULT_HERTZ}`);
    return DEFAULT_HERTZ;
}

// ─── Startup Validation ─────────────────────────────────────────────────────

/**
 * Confirm that `root` is a readable proc filesystem. Throws
 * ProcfsUnavailableError otherwise.
 */
export async function procfs_validate(backend: ProcfsBackend, root: string = '/proc'): Promise<void> {
    if ((await backend.node_kind(root)) !== 'dir') {
        throw new ProcfsUnavailableError(`${root} filesystem not available or not mounted`);
    }

    const hasSelf: boolean = (await backend.node_kind(`${root}/self`)) !== null;
    const hasVersion: boolean = (await backend.node_kind(`${root}/version`)) !== null;
    if (!hasSelf && !hasVersion) {
        throw new ProcfsUnavailableError(`${root} does not appear to be a valid proc filesystem`);
    }

    if ((await backend.text_read(`${root}/uptime`)) === null) {
        throw new ProcfsUnavailableError(`${root}/uptime is not readable. Check permissions or run with sudo`);
    }
}
