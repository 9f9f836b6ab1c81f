import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import type { ProxyAgents } from '../proxy';

export function createHttpClient(baseURL?: string, timeoutMs: number = 15000, agents?: ProxyAgents, config: AxiosRequestConfig = {}): AxiosInstance {
	return axios.create({
		baseURL,
		timeout: timeoutMs,
		...(agents ? { httpAgent: agents.httpAgent, httpsAgent: agents.httpsAgent, proxy: false } : {}),
		...config,
	});
}

/** Retries `fn` with exponential backoff and rethrows the last error. */
export async function withRetry<T>(fn: () => Promise<T>, retries: number = 3, baseDelayMs: number = 500): Promise<T> {
	for (let attempt = 0; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			if (attempt >= retries) throw err;
			await sleep(baseDelayMs * Math.pow(2, attempt));
		}
	}
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (signal?.aborted) return Promise.reject(abortReason(signal));
	return new Promise((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(abortReason(signal));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

function abortReason(signal: AbortSignal | undefined): unknown {
	return signal?.reason ?? new Error('Aborted');
}

export async function getText(client: AxiosInstance, url: string, config?: AxiosRequestConfig): Promise<string> {
	const resp = await client.get<string>(url, { responseType: 'text', ...config });
	return typeof resp.data === 'string' ? resp.data : String(resp.data);
}
