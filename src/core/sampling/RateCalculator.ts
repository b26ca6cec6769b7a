/**
 * @file Rate Calculator
 *
 * Converts cumulative tick counters into a CPU percentage. Two modes:
 *
 *   since-start  lifetime average: CPU seconds over seconds since the
 *                entity started (system uptime minus start time).
 *   delta        current rate: ticks consumed since the previous sample
 *                over the wall time since that sample.
 *
 * Every result is clamped to [0, 100].
 *
 * @module core/sampling/RateCalculator
 */

import type { CpuMode, ResolvedCpuMode } from '../models/process.js';

/** Elapsed lifetimes at or below this report 0% (the process just started). */
export const MIN_ELAPSED_SECONDS: number = 0.1;

/** Floor on the delta-mode denominator. */
export const ELAPSED_EPSILON: number = 0.00001;

/**
 * Clamp to [0, 100]; anything non-finite becomes 0.
 */
export function percent_clamp(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(Math.max(value, 0), 100);
}

/**
 * Round to one decimal place.
 */
export function value_round1(value: number): number {
    return Math.round(value * 10) / 10;
}

/**
 * Delta-mode CPU percentage.
 *
 * A negative tick delta (identity reuse, counter anomalies) counts as zero.
 * An unseen identity passes `priorTicks = 0`.
 */
export function cpuPercent_compute(
    totalTicks: number,
    priorTicks: number,
    elapsedSeconds: number,
    ticksPerSecond: number
): number {
    if (!(ticksPerSecond > 0)) return 0;
    const delta: number = Math.max(0, totalTicks - priorTicks);
    const percent: number = 100 * (delta / ticksPerSecond) / Math.max(elapsedSeconds, ELAPSED_EPSILON);
    return percent_clamp(percent);
}

/**
 * Since-start CPU percentage: lifetime CPU time over lifetime.
 */
export function cpuPercent_sinceStart(
    totalTicks: number,
    startTimeTicks: number,
    uptimeSeconds: number,
    ticksPerSecond: number
): number {
    if (!(ticksPerSecond > 0)) return 0;
    const elapsed: number = uptimeSeconds - startTimeTicks / ticksPerSecond;
    if (!(elapsed > MIN_ELAPSED_SECONDS)) return 0;
    return percent_clamp(100 * (totalTicks / ticksPerSecond) / elapsed);
}

/**
 * Resolve the mode one pass runs in. `auto` measures since start until a
 * previous pass exists to take a delta against.
 */
export function cpuMode_resolve(mode: CpuMode, hasBaseline: boolean): ResolvedCpuMode {
    if (mode === 'auto') return hasBaseline ? 'delta' : 'since-start';
    return mode;
}
