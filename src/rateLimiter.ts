import { RateLimitTimeoutError } from './errors';
import { sleep } from './utils/http';

export interface RateLimiterOptions {
	/** Requests per second across the whole engine; null disables the gate. */
	rateLimit: number | null;
	/** Upper bound on how long a caller may wait for its slot. */
	maxWaitMs?: number | null;
}

/**
 * Global admission gate. Each caller reserves the next free slot in a single
 * synchronous step before it awaits, so two callers can never claim slots
 * closer than `1000 / rateLimit` ms apart.
 */
export class RateLimiter {
	readonly intervalMs: number;
	private readonly maxWaitMs: number | null;
	private nextSlot = 0;

	constructor(options: RateLimiterOptions) {
		this.intervalMs = options.rateLimit ? 1000 / options.rateLimit : 0;
		this.maxWaitMs = options.maxWaitMs ?? null;
	}

	get enabled(): boolean {
		return this.intervalMs > 0;
	}

	async acquire(signal?: AbortSignal): Promise<void> {
		if (!this.enabled) return;

		const now = Date.now();
		const slot = Math.max(now, this.nextSlot);
		const waitMs = slot - now;
		if (this.maxWaitMs !== null && waitMs > this.maxWaitMs) {
			throw new RateLimitTimeoutError(waitMs, this.maxWaitMs);
		}
		this.nextSlot = slot + this.intervalMs;

		if (waitMs > 0) {
			await sleep(waitMs, signal);
		}
	}
}
