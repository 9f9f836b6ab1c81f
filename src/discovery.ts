import type { AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import defaultSources from './data/proxy-sources.json';
import { BackendDescriptor, createProxyAgents, parseProxyLine, proxyLabel } from './proxy';
import { createHttpClient, getText, withRetry } from './utils/http';

export const DEFAULT_PROXY_SOURCES: readonly string[] = Object.freeze([...defaultSources]);

export interface DiscoveryOptions {
	/** Maximum number of backends to return; null means no cap. */
	limit?: number | null;
	/** Check every candidate and keep only those that answer 200. */
	verify?: boolean;
	sources?: readonly string[];
	client?: AxiosInstance;
	fetchTimeoutMs?: number;
	verifyUrl?: string;
	verifyTimeoutMs?: number;
	concurrency?: number;
	checkBackend?: (backend: BackendDescriptor) => Promise<boolean>;
}

/** Public lists are plain `host:port` per line; anything with a scheme is ignored. */
export function parseProxyList(text: string): BackendDescriptor[] {
	const out: BackendDescriptor[] = [];
	for (const line of text.split(/\r?\n/)) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith('#') || trimmed.includes('://')) continue;
		const backend = parseProxyLine(trimmed);
		if (backend) out.push(backend);
	}
	return out;
}

export async function fetchFromSource(client: AxiosInstance, url: string): Promise<BackendDescriptor[]> {
	try {
		console.log(`[discovery] Fetching proxies from ${url}`);
		const text = await withRetry(() => getText(client, url), 1, 500);
		const backends = parseProxyList(text);
		console.log(`[discovery] Fetched ${backends.length} proxies from ${url}`);
		return backends;
	} catch (e) {
		console.warn(`[discovery] Failed to fetch proxies from ${url}: ${e instanceof Error ? e.message : String(e)}`);
		return [];
	}
}

export function createBackendCheck(client: AxiosInstance, verifyUrl: string, timeoutMs: number): (backend: BackendDescriptor) => Promise<boolean> {
	return async (backend) => {
		const agents = createProxyAgents(backend, true);
		try {
			const resp = await client.get(verifyUrl, {
				httpAgent: agents.httpAgent,
				httpsAgent: agents.httpsAgent,
				proxy: false,
				timeout: timeoutMs,
				validateStatus: () => true,
			});
			return resp.status === 200;
		} catch {
			return false;
		} finally {
			agents.httpAgent.destroy();
			if (agents.httpsAgent !== agents.httpAgent) agents.httpsAgent.destroy();
		}
	};
}

/**
 * Collects unique `host:port` backends from public lists, in source order,
 * optionally keeping only the ones that pass a connectivity check.
 */
export async function discoverBackends(options: DiscoveryOptions = {}): Promise<BackendDescriptor[]> {
	const limit = options.limit ?? null;
	const verify = options.verify ?? false;
	const client = options.client ?? createHttpClient(undefined, options.fetchTimeoutMs ?? 10_000, undefined, {
		headers: { 'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36' },
	});

	// Unverified lists are capped while collecting; verified ones after checking.
	const collectCap = verify ? null : limit;
	const seen = new Set<string>();
	const candidates: BackendDescriptor[] = [];

	sources: for (const source of options.sources ?? DEFAULT_PROXY_SOURCES) {
		for (const backend of await fetchFromSource(client, source)) {
			const key = `${backend.host}:${backend.port}`;
			if (seen.has(key)) continue;
			seen.add(key);
			candidates.push(backend);
			if (collectCap !== null && candidates.length >= collectCap) {
				console.log(`[discovery] Reached limit of ${collectCap} proxies`);
				break sources;
			}
		}
	}

	if (!verify) {
		console.log(`[discovery] Total unique proxies: ${candidates.length}`);
		return candidates;
	}

	const checkBackend = options.checkBackend ?? createBackendCheck(client, options.verifyUrl ?? 'http://httpbin.org/ip', options.verifyTimeoutMs ?? 5000);
	const limiter = pLimit(options.concurrency ?? 10);
	console.log(`[discovery] Testing ${candidates.length} proxies...`);

	let working = 0;
	const results = await Promise.all(
		candidates.map((backend) =>
			limiter(async () => {
				if (limit !== null && working >= limit) return false;
				const ok = await checkBackend(backend);
				if (ok) working++;
				return ok;
			}),
		),
	);

	const verified = candidates.filter((_, i) => results[i]);
	const kept = limit !== null ? verified.slice(0, limit) : verified;
	console.log(`[discovery] Found ${kept.length} working proxies (${kept.map(proxyLabel).slice(0, 3).join(', ')}${kept.length > 3 ? ', ...' : ''})`);
	return kept;
}
