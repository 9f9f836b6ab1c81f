import type { DispatchState, EngineStats, RelayResponse, RotationEngine } from './engine';
import { PayloadTooLargeError, RelayError, isRelayError } from './errors';
import { parseTarget } from './target';
import type { HeaderMap } from './transport';

/** Request headers that describe the inbound connection, not the forwarded request. */
const HOP_BY_HOP = new Set([
	'host',
	'connection',
	'proxy-connection',
	'keep-alive',
	'transfer-encoding',
	'upgrade',
	'te',
	'trailer',
	'content-length',
]);

export interface DispatchRequest {
	method: string;
	/** Absolute or path-embedded target, e.g. `/https://example.com/a?b=1`. */
	target: string;
	headers?: Record<string, string | string[] | undefined>;
	body?: Buffer;
	params?: Record<string, string>;
	signal?: AbortSignal;
	onStateChange?: (state: DispatchState) => void;
}

export type DispatchOutcome = { state: 'succeeded'; response: RelayResponse } | { state: 'failed'; error: RelayError };

export function forwardableHeaders(headers: DispatchRequest['headers']): HeaderMap {
	const out: HeaderMap = {};
	if (!headers) return out;
	for (const [name, value] of Object.entries(headers)) {
		const lower = name.toLowerCase();
		if (value === undefined || HOP_BY_HOP.has(lower)) continue;
		out[name] = Array.isArray(value) ? value.join(', ') : value;
	}
	return out;
}

/**
 * Single entry point for forwarded requests, used identically by the HTTP
 * server and by direct library calls through `RotatingClient`.
 */
export class DispatchFrontend {
	constructor(
		private readonly engine: RotationEngine,
		private readonly maxBodyBytes: number = engine.config.maxBodyBytes,
	) {}

	async handle(request: DispatchRequest): Promise<DispatchOutcome> {
		request.onStateChange?.('validating');

		let url: URL;
		try {
			url = parseTarget(request.target);
			if (request.body && request.body.length > this.maxBodyBytes) {
				throw new PayloadTooLargeError(request.body.length, this.maxBodyBytes);
			}
		} catch (err) {
			request.onStateChange?.('failed');
			return this.fail(err);
		}

		try {
			const response = await this.engine.execute({
				method: request.method.toUpperCase(),
				url: url.toString(),
				headers: forwardableHeaders(request.headers),
				body: request.body && request.body.length > 0 ? request.body : undefined,
				params: request.params,
				signal: request.signal,
				onStateChange: request.onStateChange,
			});
			return { state: 'succeeded', response };
		} catch (err) {
			return this.fail(err);
		}
	}

	health(): { status: 'healthy' } {
		return { status: 'healthy' };
	}

	stats(): EngineStats {
		return this.engine.stats();
	}

	private fail(err: unknown): DispatchOutcome {
		if (isRelayError(err)) return { state: 'failed', error: err };
		throw err;
	}
}
