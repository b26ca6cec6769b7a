/**
 * @file JSON Renderer
 *
 * Machine-readable output of one sampling pass.
 *
 * @module ui/json/JsonRenderer
 */

import type { MemoryUnit, ProcessSample, SampleKind } from '../../core/models/process.js';
import { command_display, memory_value } from '../tui/TableRenderer.js';

export interface JsonProcess {
    pid: number;
    ppid: number;
    cpu: number;
    memory: number;
    command: string;
    state: string;
    time: number;
    type: SampleKind;
}

export interface JsonReport {
    timestamp: number;
    uptime: number;
    total_processes: number;
    processes: JsonProcess[];
}

/**
 * Build the report object.
 *
 * @param timestamp - Unix time in whole seconds.
 */
export function jsonReport_build(
    rows: readonly ProcessSample[],
    uptime: number,
    memoryUnit: MemoryUnit,
    timestamp: number
): JsonReport {
    return {
        timestamp,
        uptime,
        total_processes: rows.length,
        processes: rows.map((row: ProcessSample): JsonProcess => ({
            pid: row.pid,
            ppid: row.ppid,
            cpu: row.cpuPercent,
            memory: memory_value(row, memoryUnit),
            command: command_display(row),
            state: row.state,
            time: row.cpuTimeSeconds,
            type: row.kind
        }))
    };
}

/**
 * Pretty-printed report text (two-space indent, no trailing newline).
 */
export function json_render(
    rows: readonly ProcessSample[],
    uptime: number,
    memoryUnit: MemoryUnit,
    timestamp: number = Math.floor(Date.now() / 1000)
): string {
    return JSON.stringify(jsonReport_build(rows, uptime, memoryUnit, timestamp), null, 2);
}
