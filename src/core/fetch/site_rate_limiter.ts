import { Mutex } from 'async-mutex';

export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Per-site request pacing. One mutex per site serializes requests to that site,
 * and the site's clock keeps consecutive request starts at least `minDelayMs` apart.
 * Different sites never wait on each other.
 */
export class SiteRateLimiter {
    private locks = new Map<string, Mutex>();
    private lastAccess = new Map<string, number>();

    constructor(private readonly clock: Clock = systemClock) { }

    async schedule<T>(siteId: string, minDelayMs: number, task: () => Promise<T>): Promise<T> {
        return this.getLock(siteId).runExclusive(async () => {
            const last = this.lastAccess.get(siteId);
            if (last !== undefined) {
                const wait = last + minDelayMs - this.clock.now();
                if (wait > 0) {
                    await this.clock.sleep(wait);
                }
            }
            this.lastAccess.set(siteId, this.clock.now());
            return task();
        });
    }

    isBusy(siteId: string): boolean {
        return this.locks.get(siteId)?.isLocked() ?? false;
    }

    private getLock(siteId: string): Mutex {
        let lock = this.locks.get(siteId);
        if (!lock) {
            lock = new Mutex();
            this.locks.set(siteId, lock);
        }
        return lock;
    }
}
