import { addMilliseconds, format } from 'date-fns';
import type { RotationStrategy } from './config';
import { NoHealthyBackendError } from './errors';
import { BackendDescriptor, proxyLabel, proxyUrl } from './proxy';

export interface BackendHealth {
	isHealthy: boolean;
	unhealthySince: number | null;
	consecutiveFailures: number;
}

export interface RegistrySnapshot {
	total: number;
	healthy: number;
}

export interface BackendRegistryOptions {
	/** Consecutive failures that quarantine a backend. */
	failureThreshold?: number;
	/** How long a quarantined backend stays out of selection. */
	recoveryWindowMs?: number;
}

interface Entry {
	key: string;
	backend: BackendDescriptor;
	health: BackendHealth;
}

/**
 * Owns every backend descriptor together with its health record and the
 * round-robin cursor. All methods run to completion without awaiting, so
 * each read-modify-write is atomic with respect to concurrent dispatches.
 */
export class BackendRegistry {
	private readonly entries: Entry[] = [];
	private readonly byKey = new Map<string, Entry>();
	private readonly failureThreshold: number;
	private readonly recoveryWindowMs: number;
	private cursor = 0;

	constructor(backends: readonly BackendDescriptor[] = [], options: BackendRegistryOptions = {}) {
		this.failureThreshold = options.failureThreshold ?? 1;
		this.recoveryWindowMs = options.recoveryWindowMs ?? 5 * 60_000;
		this.registerAll(backends);
	}

	/** Returns false when the descriptor was already known. */
	register(backend: BackendDescriptor): boolean {
		const key = proxyUrl(backend);
		if (this.byKey.has(key)) return false;
		const entry: Entry = {
			key,
			backend: Object.freeze({ ...backend }),
			health: { isHealthy: true, unhealthySince: null, consecutiveFailures: 0 },
		};
		this.entries.push(entry);
		this.byKey.set(key, entry);
		return true;
	}

	registerAll(backends: readonly BackendDescriptor[]): number {
		let added = 0;
		for (const backend of backends) {
			if (this.register(backend)) added++;
		}
		return added;
	}

	select(strategy: RotationStrategy): BackendDescriptor {
		return this.selectExcluding(strategy, []);
	}

	selectExcluding(strategy: RotationStrategy, excluded: Iterable<BackendDescriptor>): BackendDescriptor {
		const now = Date.now();
		const excludedKeys = new Set(Array.from(excluded, proxyUrl));
		const eligible = (entry: Entry) => {
			this.recover(entry, now);
			return entry.health.isHealthy && !excludedKeys.has(entry.key);
		};

		if (strategy === 'random') {
			const candidates = this.entries.filter(eligible);
			if (candidates.length === 0) throw new NoHealthyBackendError(this.entries.length, excludedKeys.size);
			return candidates[Math.floor(Math.random() * candidates.length)].backend;
		}

		const count = this.entries.length;
		for (let i = 0; i < count; i++) {
			const index = (this.cursor + i) % count;
			const entry = this.entries[index];
			if (eligible(entry)) {
				this.cursor = (index + 1) % count;
				return entry.backend;
			}
		}
		throw new NoHealthyBackendError(count, excludedKeys.size);
	}

	markSuccess(backend: BackendDescriptor): void {
		const entry = this.byKey.get(proxyUrl(backend));
		if (!entry) return;
		if (!entry.health.isHealthy) {
			console.log(`[registry] ${proxyLabel(backend)} is healthy again`);
		}
		entry.health = { isHealthy: true, unhealthySince: null, consecutiveFailures: 0 };
	}

	markFailure(backend: BackendDescriptor): BackendHealth | null {
		const entry = this.byKey.get(proxyUrl(backend));
		if (!entry) return null;
		const consecutiveFailures = entry.health.consecutiveFailures + 1;
		if (consecutiveFailures >= this.failureThreshold) {
			const now = Date.now();
			entry.health = { isHealthy: false, unhealthySince: now, consecutiveFailures };
			const until = format(addMilliseconds(now, this.recoveryWindowMs), 'HH:mm:ss');
			console.warn(`[registry] Quarantined ${proxyLabel(backend)} after ${consecutiveFailures} failure(s), back in rotation at ${until}`);
		} else {
			entry.health = { ...entry.health, consecutiveFailures };
		}
		return { ...entry.health };
	}

	health(backend: BackendDescriptor): BackendHealth | null {
		const entry = this.byKey.get(proxyUrl(backend));
		if (!entry) return null;
		this.recover(entry, Date.now());
		return { ...entry.health };
	}

	has(backend: BackendDescriptor): boolean {
		return this.byKey.has(proxyUrl(backend));
	}

	snapshot(): RegistrySnapshot {
		const now = Date.now();
		let healthy = 0;
		for (const entry of this.entries) {
			this.recover(entry, now);
			if (entry.health.isHealthy) healthy++;
		}
		return { total: this.entries.length, healthy };
	}

	get size(): number {
		return this.entries.length;
	}

	/** Lazy auto-recovery: re-admits the backend but keeps its failure count. */
	private recover(entry: Entry, now: number): void {
		const { health } = entry;
		if (health.isHealthy || health.unhealthySince === null) return;
		if (now - health.unhealthySince >= this.recoveryWindowMs) {
			entry.health = { isHealthy: true, unhealthySince: null, consecutiveFailures: health.consecutiveFailures };
		}
	}
}

