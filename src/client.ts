import type { AxiosRequestConfig } from 'axios';
import type { RotationOptions } from './config';
import { DispatchFrontend } from './dispatch';
import { EngineDeps, EngineStats, RelayResponse, RotationEngine, mergeHeaders } from './engine';
import { AxiosTransport } from './transport';
import type { HeaderMap, Transport } from './transport';

export interface RequestOptions {
	headers?: HeaderMap;
	body?: Buffer | string;
	params?: Record<string, string>;
	signal?: AbortSignal;
}

/**
 * Library face of the relay: rotation, retries and rate limiting for code
 * that makes its own outbound requests.
 *
 * ```ts
 * const client = new RotatingClient({ strategy: 'round_robin', backends });
 * try {
 *   const res = await client.get('https://example.com/');
 * } finally {
 *   client.close();
 * }
 * ```
 */
export class RotatingClient {
	readonly engine: RotationEngine;
	readonly frontend: DispatchFrontend;
	private readonly transport: Transport;
	private closed = false;

	constructor(options: RotationOptions = {}, deps: EngineDeps = {}) {
		this.transport = deps.transport ?? new AxiosTransport({ followRedirects: options.followRedirects ?? true });
		this.engine = new RotationEngine(options, { transport: this.transport });
		this.frontend = new DispatchFrontend(this.engine);
	}

	/** Rejects with the outcome's `RelayError` when the dispatch fails. */
	async request(method: string, url: string, options: RequestOptions = {}): Promise<RelayResponse> {
		if (this.closed) {
			throw new Error('RotatingClient is closed');
		}
		const outcome = await this.frontend.handle({
			method,
			target: url,
			headers: options.headers,
			body: typeof options.body === 'string' ? Buffer.from(options.body) : options.body,
			params: options.params,
			signal: options.signal,
		});
		if (outcome.state === 'failed') throw outcome.error;
		return outcome.response;
	}

	get(url: string, options?: RequestOptions): Promise<RelayResponse> {
		return this.request('GET', url, options);
	}

	post(url: string, options?: RequestOptions): Promise<RelayResponse> {
		return this.request('POST', url, options);
	}

	put(url: string, options?: RequestOptions): Promise<RelayResponse> {
		return this.request('PUT', url, options);
	}

	delete(url: string, options?: RequestOptions): Promise<RelayResponse> {
		return this.request('DELETE', url, options);
	}

	head(url: string, options?: RequestOptions): Promise<RelayResponse> {
		return this.request('HEAD', url, options);
	}

	options(url: string, options?: RequestOptions): Promise<RelayResponse> {
		return this.request('OPTIONS', url, options);
	}

	/**
	 * Request settings for callers that keep their own axios instance: a
	 * rotated User-Agent plus the agents of a selected backend. Health is
	 * not tracked for requests made this way.
	 */
	requestConfig(): AxiosRequestConfig {
		const { config } = this.engine;
		const headers = mergeHeaders(config.defaultHeaders, { 'User-Agent': this.engine.identities.next() });
		const backend = config.rotateBackend && this.engine.registry.size > 0 ? this.engine.registry.select(config.strategy) : null;
		const agents = this.transport instanceof AxiosTransport ? this.transport.agentsFor(backend, config.verifyTls) : undefined;
		return {
			headers,
			timeout: config.requestTimeoutMs,
			...(agents ? { httpAgent: agents.httpAgent, httpsAgent: agents.httpsAgent, proxy: false } : {}),
		};
	}

	stats(): EngineStats {
		return this.engine.stats();
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.engine.close();
	}
}

/** Runs `fn` with a fresh client and always releases its pooled connections. */
export async function withRotatingClient<T>(options: RotationOptions, fn: (client: RotatingClient) => Promise<T>): Promise<T> {
	const client = new RotatingClient(options);
	try {
		return await fn(client);
	} finally {
		client.close();
	}
}
