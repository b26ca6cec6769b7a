/**
 * @file Error Taxonomy
 *
 * Fatal startup/cycle errors. Per-entity failures are never thrown; they
 * are counted in the scan statistics instead.
 *
 * @module core/errors
 */

export type ProctopErrorCode = 'PROCFS_UNAVAILABLE' | 'CLOCK_UNAVAILABLE';

/**
 * Base class for errors that abort a run.
 */
export class ProctopError extends Error {
    public readonly code: ProctopErrorCode;

    constructor(code: ProctopErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** The pseudo-filesystem root is absent, unreadable, or not a proc filesystem. */
export class ProcfsUnavailableError extends ProctopError {
    constructor(message: string) {
        super('PROCFS_UNAVAILABLE', message);
    }
}

/** The system uptime source is unreadable or malformed. */
export class ClockUnavailableError extends ProctopError {
    constructor(message: string) {
        super('CLOCK_UNAVAILABLE', message);
    }
}

/**
 * Extract a printable message from anything thrown.
 */
export function error_message(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
