/**
 * @file Sample Reader
 *
 * Parses the three per-process records the monitor needs: `stat` (tick
 * counters, state, short name), `status` (resident set size) and
 * `cmdline` (argument vector). Every read is gated by the PathValidator;
 * a rejected path, a vanished process and malformed content all read as
 * absent rather than raising.
 *
 * @module procfs/SampleReader
 */

import type { StatRecord } from '../core/models/process.js';
import type { ProcfsBackend } from './types.js';
import type { PathValidator } from './PathValidator.js';
import { text_sanitize, text_truncate } from './text.js';

/** Tokens required after the name field: state through starttime. */
export const STAT_MIN_TOKENS: number = 20;

const FIELD_STATE: number = 0;
const FIELD_PPID: number = 1;
const FIELD_UTIME: number = 11;
const FIELD_STIME: number = 12;
const FIELD_CUTIME: number = 13;
const FIELD_CSTIME: number = 14;
const FIELD_STARTTIME: number = 19;

// ─── Pure Parsers ───────────────────────────────────────────────────────────

/**
 * Return the state code of a raw stat record without a full parse, or
 * null when the record has no closing `)`.
 *
 * The name may itself contain `)`, so the state is the first token after
 * the LAST `)`.
 */
export function statState_peek(raw: string): string | null {
    const lastParen: number = raw.lastIndexOf(')');
    if (lastParen === -1) return null;
    const token: string | undefined = raw.slice(lastParen + 1).trim().split(/\s+/)[0];
    return token ? token : null;
}

/**
 * Parse a raw stat record. Returns null when the name delimiters are
 * missing, fewer than STAT_MIN_TOKENS fields follow the name, or a
 * required numeric field is not a non-negative integer.
 */
export function statRecord_parse(raw: string): StatRecord | null {
    const content: string = raw.trim();
    const firstParen: number = content.indexOf('(');
    const lastParen: number = content.lastIndexOf(')');
    if (firstParen === -1 || lastParen === -1 || lastParen < firstParen) return null;

    const name: string = content.slice(firstParen + 1, lastParen);
    const rest: string = content.slice(lastParen + 1).trim();
    if (!rest) return null;

    const tokens: string[] = rest.split(/\s+/);
    if (tokens.length < STAT_MIN_TOKENS) return null;

    const state: string = tokens[FIELD_STATE];
    const numbers: Array<number | null> = [
        FIELD_PPID, FIELD_UTIME, FIELD_STIME, FIELD_CUTIME, FIELD_CSTIME, FIELD_STARTTIME
    ].map((index: number): number | null => counter_parse(tokens[index]));

    const [ppid, utime, stime, cutime, cstime, startTimeTicks] = numbers;
    if (ppid === null || utime === null || stime === null || cutime === null ||
        cstime === null || startTimeTicks === null) {
        return null;
    }

    return { name, state, ppid, utime, stime, cutime, cstime, startTimeTicks };
}

/**
 * Parse the `VmRSS:` line of a status record, in kB. Returns 0 when the
 * line is missing or malformed (kernel threads have no VmRSS).
 */
export function statusRss_parse(raw: string): number {
    for (const line of raw.split('\n')) {
        if (!line.startsWith('VmRSS:')) continue;
        const match: RegExpMatchArray | null = line.match(/^VmRSS:\s+(\d+)\s*kB/);
        return match ? Number.parseInt(match[1], 10) : 0;
    }
    return 0;
}

/**
 * Turn a raw NUL-separated argument vector into a display string, or
 * `[name]` when the vector is empty.
 */
export function commandLine_format(raw: string | null, fallbackName: string): string {
    const joined: string = raw === null ? '' : raw.replace(/\0/g, ' ').trim();
    if (joined === '') {
        return `[${text_sanitize(fallbackName)}]`;
    }
    return text_truncate(text_sanitize(joined));
}

function counter_parse(token: string | undefined): number | null {
    if (token === undefined || !/^\d+$/.test(token)) return null;
    const value: number = Number(token);
    return Number.isSafeInteger(value) ? value : null;
}

// ─── Reader ─────────────────────────────────────────────────────────────────

/**
 * Reads and parses process and thread records under one procfs root.
 */
export class SampleReader {
    constructor(
        private readonly backend: ProcfsBackend,
        private readonly validator: PathValidator,
        private readonly root: string = '/proc'
    ) {}

    /** Path of a process's stat record. */
    public processStat_path(pid: number): string {
        return `${this.root}/${pid}/stat`;
    }

    /** Path of a thread's stat record. */
    public threadStat_path(pid: number, tid: number): string {
        return `${this.root}/${pid}/task/${tid}/stat`;
    }

    /**
     * Read a record through the validator. Null for rejected paths and
     * failed reads alike.
     */
    public async record_read(path: string): Promise<string | null> {
        if (!(await this.validator.path_check(path))) return null;
        return this.backend.text_read(path);
    }

    /**
     * Read and parse a process's stat record.
     */
    public async processRecord_read(pid: number): Promise<StatRecord | null> {
        const raw: string | null = await this.record_read(this.processStat_path(pid));
        return raw === null ? null : statRecord_parse(raw);
    }

    /**
     * Read and parse one thread's stat record.
     */
    public async threadRecord_read(pid: number, tid: number): Promise<StatRecord | null> {
        const raw: string | null = await this.record_read(this.threadStat_path(pid, tid));
        return raw === null ? null : statRecord_parse(raw);
    }

    /**
     * Resident set size in kB; 0 when unreadable.
     */
    public async memoryKB_read(pid: number): Promise<number> {
        const raw: string | null = await this.record_read(`${this.root}/${pid}/status`);
        return raw === null ? 0 : statusRss_parse(raw);
    }

    /**
     * Resident set size in MB; 0.0 when unreadable.
     */
    public async memoryMB_read(pid: number): Promise<number> {
        return (await this.memoryKB_read(pid)) / 1024;
    }

    /**
     * Sanitized, truncated command line, or `[name]` for kernel threads,
     * zombies and unreadable records.
     */
    public async commandLine_read(pid: number, fallbackName: string): Promise<string> {
        const raw: string | null = await this.record_read(`${this.root}/${pid}/cmdline`);
        return commandLine_format(raw, fallbackName);
    }

    /**
     * Numeric entries of a process's task directory, in listing order.
     * Empty when the directory is unreadable or rejected.
     */
    public async threadIds_list(pid: number): Promise<number[]> {
        const taskDir: string = `${this.root}/${pid}/task`;
        if (!(await this.validator.path_check(taskDir))) return [];
        const entries: string[] | null = await this.backend.dir_list(taskDir);
        if (!entries) return [];
        return entries
            .filter((entry: string): boolean => /^\d+$/.test(entry))
            .map((entry: string): number => Number.parseInt(entry, 10));
    }
}
