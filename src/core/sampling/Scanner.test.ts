import { describe, it, expect, vi } from 'vitest';
import { Scanner, historyCapacity_resolve, type ScannerDependencies } from './Scanner.js';
import type { ProcessSample, ScanOptions, ScanResult } from '../models/process.js';
import { MemoryProcfs } from '../../procfs/backend/memory.js';
import { PathValidator } from '../../procfs/PathValidator.js';
import { SampleReader } from '../../procfs/SampleReader.js';
import { ProcfsUnavailableError } from '../errors.js';
import { FakeClock, procfs_create, statLine_build, type FakeProcess } from '../../test/procFixture.js';

const OPTIONS: ScanOptions = {
    includeZombies: false,
    includeThreads: false,
    threadLimitPerProcess: 1000,
    maxScanCount: 131072,
    cpuMode: 'auto',
    watchIntervalSeconds: 2
};

const SERVER: FakeProcess = {
    pid: 100, name: 'server', utime: 10000, stime: 5000, starttime: 50000,
    rssKB: 2048, cmdline: 'server\0--port\x008080\0'
};

function scanner_build(
    procfs: MemoryProcfs,
    clock: FakeClock,
    extra: Partial<ScannerDependencies> = {}
): Scanner {
    const reader: SampleReader = new SampleReader(procfs, new PathValidator(procfs));
    return new Scanner({
        backend: procfs,
        reader,
        clock,
        ticksPerSecond: 100,
        pause: async (): Promise<void> => {},
        ...extra
    });
}

function pids_of(result: ScanResult): number[] {
    return result.samples.map((row: ProcessSample): number => row.pid);
}

describe('Scanner', (): void => {
    it('computes since-start CPU on the first pass', async (): Promise<void> => {
        const scanner: Scanner = scanner_build(procfs_create([SERVER]), new FakeClock(1000, 1000));
        const result: ScanResult = await scanner.processes_sample(OPTIONS);

        expect(result.mode).toBe('since-start');
        expect(result.uptime).toBe(1000);
        expect(result.samples).toEqual([{
            pid: 100,
            ppid: 1,
            state: 'S',
            commandName: 'server',
            commandLine: 'server --port 8080',
            cpuPercent: 30,
            memoryKB: 2048,
            memoryMB: 2,
            cpuTimeSeconds: 150,
            kind: 'process'
        }]);
        expect(Object.isFrozen(result.samples[0])).toBe(true);
        expect(result.stats.scanned).toBe(1);
        expect(result.stats.sampled).toBe(1);
    });

    it('switches to delta CPU once a previous pass exists', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([SERVER]);
        const clock: FakeClock = new FakeClock(1000, 1000);
        const scanner: Scanner = scanner_build(procfs, clock);
        await scanner.processes_sample(OPTIONS);

        procfs.file_write('/proc/100/stat', statLine_build({ ...SERVER, utime: 10100 }));
        clock.advance(2);
        const result: ScanResult = await scanner.processes_sample(OPTIONS);

        // 100 ticks = 1s of CPU over 2s of wall time
        expect(result.mode).toBe('delta');
        expect(result.samples[0].cpuPercent).toBe(50);
        expect(result.samples[0].cpuTimeSeconds).toBe(151);
    });

    it('measures a newcomer in a delta pass over the time since the last pass', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([SERVER]);
        const clock: FakeClock = new FakeClock(1000, 1000);
        const scanner: Scanner = scanner_build(procfs, clock);
        await scanner.processes_sample(OPTIONS);

        procfs.file_write('/proc/200/stat', statLine_build({ pid: 200, name: 'job', utime: 10 }));
        clock.advance(2);
        const result: ScanResult = await scanner.processes_sample(OPTIONS);

        const job: ProcessSample | undefined = result.samples.find((row: ProcessSample): boolean => row.pid === 200);
        expect(job?.cpuPercent).toBe(5);
    });

    it('assumes one second for a forced delta first pass', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([{ pid: 7, name: 'busy', utime: 30, stime: 20 }]);
        const scanner: Scanner = scanner_build(procfs, new FakeClock());
        const result: ScanResult = await scanner.processes_sample({ ...OPTIONS, cpuMode: 'delta' });

        expect(result.mode).toBe('delta');
        expect(result.samples[0].cpuPercent).toBe(50);
    });

    it('filters zombies unless asked for them', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([SERVER, { pid: 101, name: 'defunct', state: 'Z', cmdline: '' }]);

        const filtered: ScanResult = await scanner_build(procfs, new FakeClock()).processes_sample(OPTIONS);
        expect(pids_of(filtered)).toEqual([100]);
        expect(filtered.stats.filtered).toBe(1);

        const kept: ScanResult = await scanner_build(procfs, new FakeClock())
            .processes_sample({ ...OPTIONS, includeZombies: true });
        const zombie: ProcessSample | undefined = kept.samples.find((row: ProcessSample): boolean => row.pid === 101);
        expect(zombie?.state).toBe('Z');
        expect(zombie?.commandLine).toBe('[defunct]');
    });

    it('skips vanished and malformed entries without failing the pass', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([SERVER]);
        procfs.file_write('/proc/102/stat', '102 (broken) S 1');
        procfs.dir_create('/proc/103');

        const result: ScanResult = await scanner_build(procfs, new FakeClock()).processes_sample(OPTIONS);
        expect(pids_of(result)).toEqual([100]);
        expect(result.stats.scanned).toBe(3);
        expect(result.stats.errors).toBe(1);
        expect(result.stats.skipped).toBe(1);
    });

    it('scans the lowest identities up to the scan cap', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([
            { pid: 5, name: 'e' }, { pid: 3, name: 'c' }, { pid: 9, name: 'i' }
        ]);
        const result: ScanResult = await scanner_build(procfs, new FakeClock())
            .processes_sample({ ...OPTIONS, maxScanCount: 2 });
        expect(pids_of(result)).toEqual([3, 5]);
        expect(result.stats.scanned).toBe(2);
    });

    it('expands processes into threads up to the per-process limit', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([{
            pid: 200, name: 'pool', rssKB: 4096,
            threads: [{ pid: 201, name: 'worker', utime: 40 }, { pid: 202, name: 'io', utime: 10 }]
        }]);
        const debug: string[] = [];
        const scanner: Scanner = scanner_build(procfs, new FakeClock(), {
            debug: (message: string): void => { debug.push(message); }
        });

        const result: ScanResult = await scanner.processes_sample({
            ...OPTIONS, includeThreads: true, threadLimitPerProcess: 1
        });

        expect(pids_of(result)).toEqual([200, 201]);
        expect(result.samples[1]).toEqual({
            pid: 201,
            ppid: 200,
            state: 'S',
            commandName: 'worker',
            commandLine: 'worker',
            cpuPercent: 0,
            memoryKB: 4096,
            memoryMB: 4,
            cpuTimeSeconds: 0.4,
            kind: 'thread'
        });
        expect(result.stats.threads).toBe(1);
        expect(debug).toContain('Reached thread limit 1 for PID 200');
    });

    it('reads every thread when under the limit', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([{
            pid: 200, name: 'pool',
            threads: [{ pid: 201, name: 'worker' }, { pid: 202, name: 'io' }]
        }]);
        const result: ScanResult = await scanner_build(procfs, new FakeClock())
            .processes_sample({ ...OPTIONS, includeThreads: true });
        expect(pids_of(result)).toEqual([200, 201, 202]);
    });

    it('serves rows from the cache within the TTL', async (): Promise<void> => {
        const scanner: Scanner = scanner_build(procfs_create([SERVER]), new FakeClock());
        const first: ScanResult = await scanner.processes_sample(OPTIONS);
        const second: ScanResult = await scanner.processes_sample(OPTIONS);

        expect(second.stats.cached).toBe(1);
        expect(second.samples[0]).toBe(first.samples[0]);
    });

    it('forgets identities that stop appearing', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([SERVER, { pid: 300, name: 'short' }]);
        const clock: FakeClock = new FakeClock(1000, 1000);
        const scanner: Scanner = scanner_build(procfs, clock);
        await scanner.processes_sample(OPTIONS);

        procfs.node_remove('/proc/300');
        clock.advance(10);
        await scanner.processes_sample(OPTIONS);

        const history = scanner.history_get(OPTIONS);
        expect(history.get('300')).toBeNull();
        expect(history.get('100')?.timestamp).toBe(1010);
    });

    it('pauses between batches', async (): Promise<void> => {
        const processes: FakeProcess[] = Array.from({ length: 150 }, (_: unknown, i: number): FakeProcess => ({
            pid: i + 1, name: `p${i + 1}`
        }));
        const pause = vi.fn(async (_ms: number): Promise<void> => {});
        const result: ScanResult = await scanner_build(procfs_create(processes), new FakeClock(), { pause })
            .processes_sample(OPTIONS);

        expect(result.samples).toHaveLength(150);
        expect(pause).toHaveBeenCalledTimes(1);
        expect(pause).toHaveBeenCalledWith(1);
    });

    it('fails the pass when the root cannot be listed', async (): Promise<void> => {
        const scanner: Scanner = scanner_build(new MemoryProcfs(), new FakeClock());
        await expect(scanner.processes_sample(OPTIONS)).rejects.toBeInstanceOf(ProcfsUnavailableError);
    });

    it('sizes the history from the scan cap', (): void => {
        const scanner: Scanner = scanner_build(procfs_create([]), new FakeClock());
        expect(scanner.history_get(OPTIONS).capacity_get()).toBe(262144);
        expect(historyCapacity_resolve({ ...OPTIONS, maxScanCount: 600000 })).toBe(1000000);
    });

    it('leaves room in the history for every thread', (): void => {
        expect(historyCapacity_resolve({
            ...OPTIONS, maxScanCount: 100, includeThreads: true, threadLimitPerProcess: 300
        })).toBe(30100);
        expect(historyCapacity_resolve({ ...OPTIONS, includeThreads: true })).toBe(1000000);
    });

    it('keeps the baseline of a process with more threads than the scan cap', async (): Promise<void> => {
        const threads: FakeProcess[] = Array.from({ length: 300 }, (_: unknown, i: number): FakeProcess => ({
            pid: 1001 + i, name: 'worker'
        }));
        const procfs: MemoryProcfs = procfs_create([{
            pid: 10, name: 'idle', utime: 500, stime: 100, starttime: 1000, threads
        }]);
        const clock: FakeClock = new FakeClock(1000, 1000);
        const scanner: Scanner = scanner_build(procfs, clock);
        const options: ScanOptions = { ...OPTIONS, maxScanCount: 100, includeThreads: true };

        await scanner.processes_sample(options);
        clock.advance(2);
        const result: ScanResult = await scanner.processes_sample(options);

        expect(result.mode).toBe('delta');
        expect(result.samples).toHaveLength(301);
        expect(result.samples[0].pid).toBe(10);
        expect(result.samples[0].cpuPercent).toBe(0);
        expect(scanner.history_get(options).get('10')?.timestamp).toBe(1002);
    });
});
