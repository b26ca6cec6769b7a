/**
 * @file Diagnostics
 *
 * One-line stderr messages: `Debug:` (verbose runs only), `Warning:`,
 * `Error:` and `Hint:`. Colour comes from chalk and is off when the sink
 * is not a terminal.
 *
 * @module core/logging/Diagnostics
 */

import { Chalk, type ChalkInstance } from 'chalk';

export type DiagnosticLevel = 'debug' | 'warning' | 'error' | 'hint';

/** Receives one fully formatted line, without a trailing newline. */
export type DiagnosticSink = (line: string) => void;

export interface DiagnosticsOptions {
    verbose?: boolean;
    color?: boolean;
    sink?: DiagnosticSink;
}

const PREFIXES: Record<DiagnosticLevel, string> = {
    debug: 'Debug:',
    warning: 'Warning:',
    error: 'Error:',
    hint: 'Hint:'
};

export class Diagnostics {
    private readonly sink: DiagnosticSink;
    private readonly chalk: ChalkInstance;
    private verbose: boolean;

    constructor(options: DiagnosticsOptions = {}) {
        this.verbose = options.verbose ?? false;
        this.sink = options.sink ?? ((line: string): void => { process.stderr.write(line + '\n'); });
        const color: boolean = options.color ?? Boolean(process.stderr.isTTY);
        this.chalk = new Chalk({ level: color ? 1 : 0 });
    }

    /** Toggle debug output (settings are resolved after construction). */
    public verbose_set(verbose: boolean): void {
        this.verbose = verbose;
    }

    public verbose_get(): boolean {
        return this.verbose;
    }

    public debug(message: string): void {
        if (!this.verbose) return;
        this.sink(this.chalk.dim(`${PREFIXES.debug} ${message}`));
    }

    public warn(message: string): void {
        this.sink(this.chalk.yellow(`${PREFIXES.warning} ${message}`));
    }

    public error(message: string): void {
        this.sink(this.chalk.red(`${PREFIXES.error} ${message}`));
    }

    /** Follow-up advice printed after an error. */
    public hint(message: string): void {
        this.sink(this.chalk.dim(`${PREFIXES.hint} ${message}`));
    }
}
