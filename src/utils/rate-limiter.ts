import type { RateLimitConfig } from '../types/config.types.js';
import { sleep } from './retry.js';

/**
 * Time source for the limiter, replaced by a fake clock in tests
 */
export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep,
};

/**
 * Spaces successive model calls at least `minIntervalMs` apart.
 *
 * The interval is measured from the start of the previous unit of work and is
 * only charged when that work succeeded; failed work (which usually already
 * spent time in backoff) releases the next call immediately.
 */
export class RateLimiter {
    private readonly config: RateLimitConfig;
    private readonly clock: Clock;
    private nextAllowedTime = 0;
    private startedAt: number | undefined;

    constructor(config: RateLimitConfig, clock: Clock = systemClock) {
        this.config = config;
        this.clock = clock;
    }

    /**
     * Wait until the next call is allowed
     * @returns Milliseconds waited
     */
    async waitTurn(): Promise<number> {
        const waitMs = Math.max(0, this.nextAllowedTime - this.clock.now());
        if (waitMs > 0) {
            await this.clock.sleep(waitMs);
        }
        return waitMs;
    }

    /**
     * Mark the start of a unit of work
     */
    begin(): void {
        this.startedAt = this.clock.now();
    }

    /**
     * Mark the end of the current unit of work
     */
    complete(succeeded: boolean): void {
        const now = this.clock.now();
        this.nextAllowedTime = succeeded
            ? (this.startedAt ?? now) + this.config.minIntervalMs
            : now;
        this.startedAt = undefined;
    }

    /**
     * Get current limiter status
     */
    getStatus(): { nextAllowedTime: number; msUntilNext: number } {
        return {
            nextAllowedTime: this.nextAllowedTime,
            msUntilNext: Math.max(0, this.nextAllowedTime - this.clock.now()),
        };
    }
}
