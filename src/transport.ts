import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { InvalidTargetError, TransportError, TransportErrorKind } from './errors';
import { BackendDescriptor, ProxyAgents, createProxyAgents, proxyUrl } from './proxy';
import { isForbiddenHost } from './target';
import { createHttpClient } from './utils/http';

export type HeaderMap = Record<string, string>;
export type ResponseHeaders = Record<string, string | string[]>;

export interface TransportRequest {
	method: string;
	url: string;
	headers: HeaderMap;
	body?: Buffer;
	params?: Record<string, string>;
	/** null sends the request directly, without an egress proxy. */
	backend: BackendDescriptor | null;
	verifyTls: boolean;
	timeoutMs: number;
	signal?: AbortSignal;
}

export interface TransportResponse {
	status: number;
	statusText: string;
	headers: ResponseHeaders;
	body: Buffer;
}

/**
 * Executes one attempt. Resolves with any HTTP response, whatever its status;
 * rejects with a TransportError for connection, TLS and timeout failures.
 */
export interface Transport {
	send(request: TransportRequest): Promise<TransportResponse>;
	close(): void;
}

const TLS_ERROR_CODES = new Set([
	'CERT_HAS_EXPIRED',
	'DEPTH_ZERO_SELF_SIGNED_CERT',
	'SELF_SIGNED_CERT_IN_CHAIN',
	'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
	'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
	'ERR_TLS_CERT_ALTNAME_INVALID',
	'EPROTO',
]);

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

export function classifyTransportError(err: unknown, timedOut: boolean): TransportError {
	const code = axios.isAxiosError(err) ? err.code : err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
	const message = err instanceof Error ? err.message : String(err);
	let kind: TransportErrorKind = 'connection';
	if (timedOut || (code !== undefined && TIMEOUT_ERROR_CODES.has(code))) {
		kind = 'timeout';
	} else if (code !== undefined && TLS_ERROR_CODES.has(code)) {
		kind = 'tls';
	}
	return new TransportError(timedOut ? `Timed out after the per-attempt limit: ${message}` : message, kind, code);
}

export function normalizeResponseHeaders(headers: Record<string, unknown>): ResponseHeaders {
	const out: ResponseHeaders = {};
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined || value === null) continue;
		out[name.toLowerCase()] = Array.isArray(value) ? value.map(String) : String(value);
	}
	return out;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 10;
/** Dropped when a redirect leaves the original host. */
const CREDENTIAL_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie']);

export interface RedirectHop {
	method: string;
	url: string;
	headers: HeaderMap;
	body?: Buffer;
}

/**
 * Request for the next hop of a redirect chain, or null when the response is
 * not a redirect. Each hop is held to the same host rules as the original
 * target.
 */
export function nextRedirect(current: RedirectHop, status: number, location: string | undefined): RedirectHop | null {
	if (!REDIRECT_STATUSES.has(status) || !location) return null;

	let next: URL;
	try {
		next = new URL(location, current.url);
	} catch {
		throw new InvalidTargetError('Invalid redirect location', 'malformed', location);
	}
	if (next.protocol !== 'http:' && next.protocol !== 'https:') {
		throw new InvalidTargetError('Redirect to an unsupported scheme', 'unsupported_scheme', next.toString());
	}
	if (isForbiddenHost(next.hostname)) {
		throw new InvalidTargetError('Redirect to an internal network is forbidden', 'forbidden_host', next.toString());
	}

	const method = current.method.toUpperCase();
	const toGet = status === 303 ? method !== 'HEAD' : (status === 301 || status === 302) && method === 'POST';
	const crossHost = new URL(current.url).host !== next.host;
	const headers: HeaderMap = {};
	for (const [name, value] of Object.entries(current.headers)) {
		const lower = name.toLowerCase();
		if (crossHost && CREDENTIAL_HEADERS.has(lower)) continue;
		if (toGet && lower === 'content-type') continue;
		headers[name] = value;
	}
	return { method: toGet ? 'GET' : method, url: next.toString(), headers, body: toGet ? undefined : current.body };
}

export interface AxiosTransportOptions {
	followRedirects?: boolean;
	/** Injected for tests; defaults to a fresh axios instance. */
	client?: AxiosInstance;
}

/**
 * Default transport. Keeps one pair of keep-alive agents per backend (and per
 * TLS mode for direct requests) until `close()` destroys them. Redirects are
 * followed one hop at a time through `nextRedirect`.
 */
export class AxiosTransport implements Transport {
	private readonly client: AxiosInstance;
	private readonly followRedirects: boolean;
	private readonly agents = new Map<string, ProxyAgents>();
	private closed = false;

	constructor(options: AxiosTransportOptions = {}) {
		this.client = options.client ?? createHttpClient();
		this.followRedirects = options.followRedirects ?? true;
	}

	agentsFor(backend: BackendDescriptor | null, verifyTls: boolean): ProxyAgents {
		const key = `${backend ? proxyUrl(backend) : 'direct'}|${verifyTls ? 'verify' : 'insecure'}`;
		let pair = this.agents.get(key);
		if (!pair) {
			pair = backend
				? createProxyAgents(backend, verifyTls)
				: {
						httpAgent: new http.Agent({ keepAlive: true }),
						httpsAgent: new https.Agent({ keepAlive: true, rejectUnauthorized: verifyTls }),
					};
			this.agents.set(key, pair);
		}
		return pair;
	}

	async send(request: TransportRequest): Promise<TransportResponse> {
		if (this.closed) {
			throw new Error('Transport is closed');
		}
		const { httpAgent, httpsAgent } = this.agentsFor(request.backend, request.verifyTls);

		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, request.timeoutMs);
		const onCallerAbort = () => controller.abort();
		request.signal?.addEventListener('abort', onCallerAbort, { once: true });

		try {
			let hop: RedirectHop = { method: request.method, url: request.url, headers: request.headers, body: request.body };
			for (let redirects = 0; ; redirects++) {
				const resp = await this.client.request<ArrayBuffer>({
					method: hop.method,
					url: hop.url,
					headers: hop.headers,
					data: hop.body,
					// the first hop carries the caller's query; later hops follow Location as given
					params: redirects === 0 ? request.params : undefined,
					timeout: request.timeoutMs,
					signal: controller.signal,
					httpAgent,
					httpsAgent,
					proxy: false,
					responseType: 'arraybuffer',
					decompress: false,
					maxRedirects: 0,
					validateStatus: () => true,
				});
				const headers = normalizeResponseHeaders({ ...resp.headers });
				const location = typeof headers.location === 'string' ? headers.location : undefined;
				const next = this.followRedirects && redirects < MAX_REDIRECTS ? nextRedirect(hop, resp.status, location) : null;
				if (!next) {
					return { status: resp.status, statusText: resp.statusText, headers, body: Buffer.from(resp.data) };
				}
				hop = next;
			}
		} catch (err) {
			if (request.signal?.aborted || err instanceof InvalidTargetError) throw err;
			throw classifyTransportError(err, timedOut);
		} finally {
			clearTimeout(timer);
			request.signal?.removeEventListener('abort', onCallerAbort);
		}
	}

	close(): void {
		this.closed = true;
		for (const { httpAgent, httpsAgent } of this.agents.values()) {
			httpAgent.destroy();
			if (httpsAgent !== httpAgent) httpsAgent.destroy();
		}
		this.agents.clear();
	}
}
