/**
 * @file Cancellation Token
 *
 * Cooperative shutdown flag. The CLI's signal handlers call `cancel()`;
 * the watch loop checks `cancelled` at the top of each iteration, and a
 * pending `sleep()` resolves early. In-flight reads are never interrupted.
 *
 * @module core/watch/CancellationToken
 */

/** Sleep for specified milliseconds. */
export function sleep_ms(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CancellationToken {
    private cancelledFlag: boolean = false;
    private readonly wakers: Set<() => void> = new Set();

    public get cancelled(): boolean {
        return this.cancelledFlag;
    }

    /**
     * Request shutdown. Idempotent; wakes every pending sleep.
     */
    public cancel(): void {
        if (this.cancelledFlag) return;
        this.cancelledFlag = true;
        for (const wake of this.wakers) wake();
        this.wakers.clear();
    }

    /**
     * Sleep for `ms`, or less if the token is cancelled meanwhile.
     * Resolves immediately when already cancelled.
     */
    public sleep(ms: number): Promise<void> {
        if (this.cancelledFlag) return Promise.resolve();
        return new Promise((resolve) => {
            const wake = (): void => {
                clearTimeout(timer);
                this.wakers.delete(wake);
                resolve();
            };
            const timer: NodeJS.Timeout = setTimeout(wake, ms);
            this.wakers.add(wake);
        });
    }
}
