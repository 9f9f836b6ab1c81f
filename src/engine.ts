import type { RotationConfig, RotationOptions, RotationStrategy } from './config';
import { resolveRotationConfig } from './config';
import {
	AttemptRecord,
	DispatchCancelledError,
	DispatchFailureError,
	NoHealthyBackendError,
	TransportError,
} from './errors';
import { IdentityPool } from './identity';
import { BackendDescriptor, proxyLabel, proxyUrl } from './proxy';
import { RateLimiter } from './rateLimiter';
import { BackendRegistry } from './registry';
import { AxiosTransport, HeaderMap, ResponseHeaders, Transport } from './transport';
import { sleep } from './utils/http';

export type DispatchState = 'validating' | 'selecting' | 'executing' | 'retrying' | 'succeeded' | 'failed';

export interface ExecuteRequest {
	method: string;
	url: string;
	headers?: HeaderMap;
	body?: Buffer;
	params?: Record<string, string>;
	signal?: AbortSignal;
	onStateChange?: (state: DispatchState) => void;
}

export interface RelayResponse {
	status: number;
	statusText: string;
	headers: ResponseHeaders;
	body: Buffer;
	attempts: number;
	identity: string;
	/** Label of the backend that carried the response; null for direct requests. */
	backend: string | null;
}

export interface EngineStats {
	total_proxies: number;
	healthy_proxies: number;
	total_user_agents: number;
	rotation_strategy: RotationStrategy;
	rate_limit: number | null;
}

export interface EngineDeps {
	transport?: Transport;
}

/**
 * Later sources win; names compare case-insensitively and the winning
 * source's spelling is kept.
 */
export function mergeHeaders(...sources: Array<Readonly<HeaderMap> | undefined>): HeaderMap {
	const merged = new Map<string, [string, string]>();
	for (const source of sources) {
		if (!source) continue;
		for (const [name, value] of Object.entries(source)) {
			merged.set(name.toLowerCase(), [name, value]);
		}
	}
	return Object.fromEntries(merged.values());
}

export class RotationEngine {
	readonly config: RotationConfig;
	readonly identities: IdentityPool;
	readonly registry: BackendRegistry;
	readonly rateLimiter: RateLimiter;
	private readonly transport: Transport;

	constructor(options: RotationOptions = {}, deps: EngineDeps = {}) {
		this.config = resolveRotationConfig(options);
		this.identities = new IdentityPool({
			userAgents: this.config.userAgents,
			strategy: this.config.strategy,
			rotate: this.config.rotateIdentity,
			fixedIdentity: this.config.fixedIdentity,
		});
		this.registry = new BackendRegistry(this.config.backends, {
			failureThreshold: this.config.failureThreshold,
			recoveryWindowMs: this.config.recoveryWindowMs,
		});
		this.rateLimiter = new RateLimiter({
			rateLimit: this.config.rateLimit,
			maxWaitMs: this.config.rateLimitMaxWaitMs,
		});
		this.transport = deps.transport ?? new AxiosTransport({ followRedirects: this.config.followRedirects });
	}

	register(backend: BackendDescriptor): boolean {
		return this.registry.register(backend);
	}

	async execute(request: ExecuteRequest): Promise<RelayResponse> {
		const { signal } = request;
		const emit = (state: DispatchState) => request.onStateChange?.(state);
		const maxAttempts = this.config.maxRetries + 1;
		const history: AttemptRecord[] = [];
		const excluded: BackendDescriptor[] = [];
		let lastError: TransportError | null = null;

		emit('selecting');
		try {
			await this.rateLimiter.acquire(signal);
		} catch (err) {
			emit('failed');
			throw signal?.aborted ? new DispatchCancelledError(0) : err;
		}

		for (let attempt = 1; ; attempt++) {
			if (signal?.aborted) {
				emit('failed');
				throw new DispatchCancelledError(attempt - 1);
			}

			const identity = this.identities.next();
			let backend: BackendDescriptor | null;
			try {
				backend = this.selectBackend(excluded);
			} catch (err) {
				emit('failed');
				if (err instanceof NoHealthyBackendError && lastError) {
					throw new DispatchFailureError(history, lastError, err);
				}
				throw err;
			}
			const headers = mergeHeaders(this.config.defaultHeaders, { 'User-Agent': identity }, request.headers);
			const label = backend ? proxyLabel(backend) : null;

			emit('executing');
			try {
				const resp = await this.transport.send({
					method: request.method,
					url: request.url,
					headers,
					body: request.body,
					params: request.params,
					backend,
					verifyTls: this.config.verifyTls,
					timeoutMs: this.config.requestTimeoutMs,
					signal,
				});
				if (backend) this.registry.markSuccess(backend);
				emit('succeeded');
				return { ...resp, attempts: attempt, identity, backend: label };
			} catch (err) {
				if (signal?.aborted) {
					emit('failed');
					throw new DispatchCancelledError(attempt);
				}
				if (!(err instanceof TransportError)) {
					emit('failed');
					throw err;
				}

				lastError = err;
				if (backend) {
					this.registry.markFailure(backend);
					excluded.push(backend);
				}
				history.push({ attempt, identity, backend: label, error: err.message, kind: err.kind });
				console.warn(`[engine] Attempt ${attempt}/${maxAttempts} ${request.method} ${request.url} via ${label ?? 'direct'} failed: ${err.message}`);

				if (attempt === maxAttempts) {
					emit('failed');
					throw new DispatchFailureError(history, err);
				}

				emit('retrying');
				try {
					await sleep(this.config.baseRetryDelayMs * attempt, signal);
				} catch {
					emit('failed');
					throw new DispatchCancelledError(attempt);
				}
				emit('selecting');
			}
		}
	}

	stats(): EngineStats {
		const { total, healthy } = this.registry.snapshot();
		return {
			total_proxies: total,
			healthy_proxies: healthy,
			total_user_agents: this.identities.size,
			rotation_strategy: this.config.strategy,
			rate_limit: this.config.rateLimit,
		};
	}

	close(): void {
		this.transport.close();
	}

	/**
	 * Picks the egress backend for one attempt, avoiding backends that already
	 * failed in this dispatch. If only excluded backends are still healthy
	 * (possible when the failure threshold is above one) they are reused.
	 * With no backends registered at all, requests go direct.
	 */
	private selectBackend(excluded: BackendDescriptor[]): BackendDescriptor | null {
		if (!this.config.rotateBackend || this.registry.size === 0) return null;
		try {
			return this.registry.selectExcluding(this.config.strategy, excluded);
		} catch (err) {
			if (!(err instanceof NoHealthyBackendError) || excluded.length === 0) throw err;
		}
		try {
			return this.registry.select(this.config.strategy);
		} catch (err) {
			if (err instanceof NoHealthyBackendError) {
				throw new NoHealthyBackendError(this.registry.size, new Set(excluded.map(proxyUrl)).size);
			}
			throw err;
		}
	}
}
