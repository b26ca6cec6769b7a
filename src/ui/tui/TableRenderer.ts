/**
 * @file Table Renderer
 *
 * Fixed-column terminal table for ranked samples, plus the watch-mode
 * header and the empty-result notice. Functions return lines; the CLI
 * decides where they go.
 *
 * @module ui/tui/TableRenderer
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { MemoryUnit, ProcessSample, SortField } from '../../core/models/process.js';

/** Width of the horizontal rules. */
export const RULE_WIDTH: number = 80;

/** Rows above this CPU percentage are highlighted. */
export const CPU_HOT_PERCENT: number = 80;

const THREAD_PREFIX: string = '  └─ ';

export interface TableRenderOptions {
    memoryUnit: MemoryUnit;
    /** One-shot mode: append the totals footer and the entry count. */
    summary: boolean;
    /** Entries sampled this pass, before truncation to the display limit. */
    totalEntries: number;
    /** Whether the run has root privileges (suppresses the sudo hint). */
    privileged: boolean;
    color?: boolean;
}

export interface WatchHeaderOptions {
    iteration: number;
    timestamp: Date;
    uptime: number;
    sortField: SortField;
    limit: number;
    intervalSeconds: number;
    memoryUnit: MemoryUnit;
    includeZombies: boolean;
    includeThreads: boolean;
    color?: boolean;
}

function chalk_create(color: boolean | undefined): ChalkInstance {
    return new Chalk({ level: color ? 1 : 0 });
}

// ─── Cell Formatting ────────────────────────────────────────────────────────

/**
 * Memory figure in the configured unit.
 */
export function memory_value(sample: ProcessSample, unit: MemoryUnit): number {
    return unit === 'MB' ? sample.memoryMB : sample.memoryKB;
}

/**
 * Command text as displayed: thread rows carry a tree prefix.
 */
export function command_display(sample: ProcessSample): string {
    return sample.kind === 'thread' ? THREAD_PREFIX + sample.commandLine : sample.commandLine;
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function timestamp_format(date: Date): string {
    const pad = (value: number): string => String(value).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function columns_join(pid: string, cpu: string, mem: string, state: string, command: string): string {
    return `${pid.padEnd(6)} ${cpu.padEnd(6)} ${mem.padEnd(12)} ${state.padEnd(6)} ${command}`;
}

// ─── Table ──────────────────────────────────────────────────────────────────

/**
 * Lines announcing that nothing could be sampled.
 */
export function emptyResult_render(privileged: boolean): string[] {
    const lines: string[] = ['No processes found or insufficient permissions.'];
    if (!privileged) lines.push('Try running with sudo for more complete results.');
    return lines;
}

/**
 * Render ranked rows as table lines.
 */
export function table_render(rows: readonly ProcessSample[], options: TableRenderOptions): string[] {
    if (rows.length === 0) return emptyResult_render(options.privileged);

    const chalk: ChalkInstance = chalk_create(options.color);
    const rule: string = '-'.repeat(RULE_WIDTH);
    const lines: string[] = [
        chalk.bold(columns_join('PID', 'CPU%', `MEM(${options.memoryUnit})`, 'STATE', 'COMMAND')),
        rule
    ];

    let totalCpu: number = 0;
    let totalMemory: number = 0;
    for (const row of rows) {
        const memory: number = memory_value(row, options.memoryUnit);
        const line: string = columns_join(
            row.kind === 'thread' ? `  ${row.pid}` : String(row.pid),
            row.cpuPercent.toFixed(1),
            memory.toFixed(1),
            row.state,
            command_display(row)
        );
        lines.push(row.cpuPercent > CPU_HOT_PERCENT ? chalk.red(line) : line);
        totalCpu += row.cpuPercent;
        totalMemory += memory;
    }

    if (options.summary) {
        lines.push(rule);
        lines.push(
            `Top ${rows.length} processes: ${totalCpu.toFixed(1)}% CPU, ` +
            `${totalMemory.toFixed(1)} ${options.memoryUnit}`
        );
        lines.push('');
        lines.push(`Total entries displayed: ${options.totalEntries}`);
    }
    return lines;
}

// ─── Watch Mode ─────────────────────────────────────────────────────────────

/**
 * Header printed above the table on every watch iteration.
 */
export function watchHeader_render(options: WatchHeaderOptions): string[] {
    const chalk: ChalkInstance = chalk_create(options.color);
    const modes: string[] = [];
    if (options.includeZombies) modes.push('Zombies');
    if (options.includeThreads) modes.push('Threads');

    let status: string =
        `Sorting by: ${options.sortField.toUpperCase()} | Showing top: ${options.limit} | ` +
        `Refresh: ${options.intervalSeconds}s | Memory: ${options.memoryUnit}`;
    if (modes.length > 0) status += ` | Modes: ${modes.join(', ')}`;

    return [
        chalk.cyan(
            `Process Monitor - Iteration #${options.iteration} - ${timestamp_format(options.timestamp)}` +
            ` - Uptime: ${options.uptime.toFixed(0)}s`
        ),
        status,
        '='.repeat(RULE_WIDTH),
        ''
    ];
}
