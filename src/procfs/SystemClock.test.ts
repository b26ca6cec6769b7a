import { describe, it, expect } from 'vitest';
import { MemoryProcfs } from './backend/memory.js';
import { ProcClock, hertz_detect, procfs_validate, uptime_parse, DEFAULT_HERTZ } from './SystemClock.js';
import { ClockUnavailableError, ProcfsUnavailableError } from '../core/errors.js';
import { procfs_create } from '../test/procFixture.js';

describe('uptime_parse', (): void => {
    it('reads the first field in seconds', (): void => {
        expect(uptime_parse('1000.50 3000.00\n')).toBe(1000.5);
    });

    it('rejects malformed or non-positive values', (): void => {
        expect((): number => uptime_parse('12')).toThrow(ClockUnavailableError);
        expect((): number => uptime_parse('abc 1.0')).toThrow(ClockUnavailableError);
        expect((): number => uptime_parse('0.000001 1.0')).toThrow(ClockUnavailableError);
    });
});

describe('ProcClock', (): void => {
    it('re-reads uptime from the root', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([], { uptime: 42 });
        const clock: ProcClock = new ProcClock(procfs);
        expect(await clock.uptime_read()).toBe(42);

        procfs.file_write('/proc/uptime', '43.00 1.00\n');
        expect(await clock.uptime_read()).toBe(43);
    });

    it('throws when uptime is unreadable', async (): Promise<void> => {
        const clock: ProcClock = new ProcClock(new MemoryProcfs());
        await expect(clock.uptime_read()).rejects.toBeInstanceOf(ClockUnavailableError);
    });
});

describe('hertz_detect', (): void => {
    it('uses the getconf answer', async (): Promise<void> => {
        const messages: string[] = [];
        const hz: number = await hertz_detect(async (): Promise<string> => '250\n', (m: string): void => {
            messages.push(m);
        });
        expect(hz).toBe(250);
        expect(messages).toEqual(['Detected HERTZ from getconf: 250']);
    });

    it('falls back when the command fails', async (): Promise<void> => {
        const messages: string[] = [];
        const hz: number = await hertz_detect(async (): Promise<string> => {
            throw new Error('getconf: not found');
        }, (m: string): void => {
            messages.push(m);
        });
        expect(hz).toBe(DEFAULT_HERTZ);
        expect(messages).toEqual([
            'getconf CLK_TCK failed: getconf: not found',
            'Using default HERTZ value: 100'
        ]);
    });

    it('falls back on unusable output', async (): Promise<void> => {
        expect(await hertz_detect(async (): Promise<string> => 'undefined\n')).toBe(DEFAULT_HERTZ);
        expect(await hertz_detect(async (): Promise<string> => '0\n')).toBe(DEFAULT_HERTZ);
    });
});

describe('procfs_validate', (): void => {
    it('accepts a proc-like root', async (): Promise<void> => {
        await expect(procfs_validate(procfs_create([]))).resolves.toBeUndefined();
    });

    it('rejects a missing root', async (): Promise<void> => {
        await expect(procfs_validate(new MemoryProcfs())).rejects.toBeInstanceOf(ProcfsUnavailableError);
    });

    it('rejects a directory without self or version', async (): Promise<void> => {
        const procfs: MemoryProcfs = new MemoryProcfs();
        procfs.file_write('/proc/uptime', '1.00 1.00\n');
        await expect(procfs_validate(procfs)).rejects.toThrow(/does not appear to be a valid proc filesystem/);
    });

    it('rejects a root without a readable uptime', async (): Promise<void> => {
        const procfs: MemoryProcfs = procfs_create([]);
        procfs.node_remove('/proc/uptime');
        await expect(procfs_validate(procfs)).rejects.toThrow(/uptime is not readable/);
    });
});
