import defaultUserAgents from './data/user-agents.json';
import type { RotationStrategy } from './config';
import { ConfigurationError } from './errors';

export const DEFAULT_USER_AGENTS: readonly string[] = Object.freeze([...defaultUserAgents]);

export interface IdentityPoolOptions {
	userAgents?: readonly string[];
	strategy?: RotationStrategy;
	rotate?: boolean;
	fixedIdentity?: string;
}

/**
 * Read-only set of User-Agent identities. The round-robin cursor is the only
 * mutable state and advances exactly once per `next()` call.
 */
export class IdentityPool {
	private readonly pool: readonly string[];
	private readonly strategy: RotationStrategy;
	private readonly rotate: boolean;
	private readonly fixed: string;
	private cursor = 0;

	constructor(options: IdentityPoolOptions = {}) {
		this.pool = Object.freeze([...(options.userAgents ?? DEFAULT_USER_AGENTS)]);
		this.strategy = options.strategy ?? 'random';
		this.rotate = options.rotate ?? true;

		// a fixed identity only stands in for an empty pool when rotation is off
		if (this.pool.length === 0 && (this.rotate || options.fixedIdentity === undefined)) {
			throw new ConfigurationError('Identity pool must not be empty');
		}
		this.fixed = options.fixedIdentity ?? this.pool[0];
	}

	next(): string {
		if (!this.rotate || this.pool.length === 0) return this.fixed;
		if (this.strategy === 'random') {
			return this.pool[Math.floor(Math.random() * this.pool.length)];
		}
		const identity = this.pool[this.cursor % this.pool.length];
		this.cursor = (this.cursor + 1) % this.pool.length;
		return identity;
	}

	has(identity: string): boolean {
		return this.pool.includes(identity) || identity === this.fixed;
	}

	get identities(): readonly string[] {
		return this.pool;
	}

	get size(): number {
		return this.pool.length;
	}
}
