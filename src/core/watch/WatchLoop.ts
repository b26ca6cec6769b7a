/**
 * @file Watch Loop
 *
 * Continuous refresh: run an iteration, sleep for the interval, repeat
 * until the cancellation token fires. The screen is cleared before every
 * iteration after the first.
 *
 * @module core/watch/WatchLoop
 */

import type { CancellationToken } from './CancellationToken.js';

export interface WatchLoopOptions {
    intervalSeconds: number;
    token: CancellationToken;
    /** Runs one refresh. A rejection ends the loop and propagates. */
    iteration_run: (iteration: number) => Promise<void>;
    /** Called before every iteration except the first. */
    screen_clear: () => void;
}

/**
 * Run until cancelled.
 *
 * @returns Number of iterations completed.
 */
export async function watchLoop_run(options: WatchLoopOptions): Promise<number> {
    let iteration: number = 0;
    while (!options.token.cancelled) {
        iteration++;
        if (iteration > 1) options.screen_clear();
        await options.iteration_run(iteration);
        await options.token.sleep(options.intervalSeconds * 1000);
    }
    return iteration;
}
