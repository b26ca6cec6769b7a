#!/usr/bin/env node
/**
 * @file proctop CLI
 *
 * Top-style process monitor for Linux. Reads per-process and per-thread
 * counters from the proc filesystem and prints the busiest entries.
 *
 * Usage:
 *   npx tsx src/cli/proctop.ts --limit=10 --sort=mem
 *   proctop --watch=5 --threads
 *
 * @module
 */

import path from 'path';
import { NodeFsBackend } from '../procfs/backend/node.js';
import { hertz_detect } from '../procfs/SystemClock.js';
import { Diagnostics } from '../core/logging/Diagnostics.js';
import { CancellationToken } from '../core/watch/CancellationToken.js';
import { app_run } from './app.js';

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

async function main(): Promise<number> {
    const token: CancellationToken = new CancellationToken();
    const shutdown = (): void => token.cancel();
    for (const signal of SHUTDOWN_SIGNALS) process.once(signal, shutdown);

    try {
        return await app_run(process.argv.slice(2), {
            programName: path.basename(process.argv[1] ?? 'proctop'),
            backend: new NodeFsBackend(),
            diagnostics: new Diagnostics(),
            token,
            env: process.env,
            stdout: (text: string): void => { process.stdout.write(text); },
            hertz_detect: (debug: (message: string) => void): Promise<number> => hertz_detect(undefined, debug),
            privileged: typeof process.geteuid === 'function' && process.geteuid() === 0,
            color: Boolean(process.stdout.isTTY)
        });
    } finally {
        for (const signal of SHUTDOWN_SIGNALS) process.removeListener(signal, shutdown);
    }
}

main().then((code: number): void => {
    process.exitCode = code;
}).catch((e: unknown): void => {
    console.error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
});
