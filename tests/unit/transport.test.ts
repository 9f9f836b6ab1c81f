import axios, { AxiosError } from 'axios';
import type { InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { InvalidTargetError, TransportError } from '../../src/errors';
import { AxiosTransport, classifyTransportError, nextRedirect, normalizeResponseHeaders } from '../../src/transport';
import type { TransportRequest } from '../../src/transport';

function request(overrides: Partial<TransportRequest> = {}): TransportRequest {
	return {
		method: 'GET',
		url: 'https://example.com/data',
		headers: { 'User-Agent': 'UA-test' },
		backend: null,
		verifyTls: true,
		timeoutMs: 1000,
		...overrides,
	};
}

describe('classifyTransportError', () => {
	it('classifies refused connections', () => {
		const err = classifyTransportError(new AxiosError('connect ECONNREFUSED 10.0.0.1:80', 'ECONNREFUSED'), false);
		expect(err).toBeInstanceOf(TransportError);
		expect(err.kind).toBe('connection');
		expect(err.errorCode).toBe('ECONNREFUSED');
		expect(err.message).toBe('connect ECONNREFUSED 10.0.0.1:80');
	});

	it('classifies timeouts by code or by the hard timer', () => {
		expect(classifyTransportError(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'), false).kind).toBe('timeout');
		const timedOut = classifyTransportError(new AxiosError('canceled', 'ERR_CANCELED'), true);
		expect(timedOut.kind).toBe('timeout');
		expect(timedOut.message).toBe('Timed out after the per-attempt limit: canceled');
	});

	it('classifies certificate failures', () => {
		const err = Object.assign(new Error('certificate has expired'), { code: 'CERT_HAS_EXPIRED' });
		expect(classifyTransportError(err, false).kind).toBe('tls');
	});

	it('falls back to a connection failure for unknown errors', () => {
		const err = classifyTransportError('socket hang up', false);
		expect(err.kind).toBe('connection');
		expect(err.errorCode).toBeUndefined();
	});
});

describe('normalizeResponseHeaders', () => {
	it('lowercases names and drops empty values', () => {
		expect(normalizeResponseHeaders({ 'Content-Type': 'text/plain', 'Set-Cookie': ['a=1', 'b=2'], 'X-Count': 3, 'X-None': null })).toEqual({
			'content-type': 'text/plain',
			'set-cookie': ['a=1', 'b=2'],
			'x-count': '3',
		});
	});
});

describe('nextRedirect', () => {
	const hop = { method: 'POST', url: 'https://example.com/form', headers: { 'Content-Type': 'text/plain', Cookie: 'sid=1' }, body: Buffer.from('x') };

	it('ignores responses that are not redirects', () => {
		expect(nextRedirect(hop, 200, 'https://example.com/other')).toBeNull();
		expect(nextRedirect(hop, 302, undefined)).toBeNull();
	});

	it('keeps the method and body on 307', () => {
		expect(nextRedirect(hop, 307, '/again')).toEqual({ ...hop, url: 'https://example.com/again' });
	});

	it('turns a POST into a GET on 302 and drops credentials across hosts', () => {
		expect(nextRedirect(hop, 302, 'https://cdn.example.org/done')).toEqual({
			method: 'GET',
			url: 'https://cdn.example.org/done',
			headers: {},
			body: undefined,
		});
	});

	it('keeps HEAD on 303', () => {
		expect(nextRedirect({ method: 'HEAD', url: 'https://example.com/', headers: {} }, 303, '/seen')?.method).toBe('HEAD');
	});

	it('refuses internal hosts and other schemes', () => {
		expect(() => nextRedirect(hop, 301, 'http://169.254.169.254/latest')).toThrow(InvalidTargetError);
		expect(() => nextRedirect(hop, 301, 'http://[::1]:8080/')).toThrow('Redirect to an internal network is forbidden');
		expect(() => nextRedirect(hop, 302, 'file:///etc/passwd')).toThrow('Redirect to an unsupported scheme');
	});
});

describe('AxiosTransport', () => {
	it('returns any status with a raw body and sends the request unmodified', async () => {
		const seen: InternalAxiosRequestConfig[] = [];
		const client = axios.create({
			adapter: async (config) => {
				seen.push(config);
				return { data: Buffer.from('missing'), status: 404, statusText: 'Not Found', headers: { 'Content-Type': 'text/plain' }, config };
			},
		});
		const transport = new AxiosTransport({ client, followRedirects: false });

		const resp = await transport.send(request({ method: 'POST', body: Buffer.from('payload'), params: { q: '1' } }));

		expect(resp.status).toBe(404);
		expect(resp.statusText).toBe('Not Found');
		expect(resp.body.toString()).toBe('missing');
		expect(resp.headers).toEqual({ 'content-type': 'text/plain' });

		const sent = seen[0];
		expect(sent.method).toBe('post');
		expect(sent.url).toBe('https://example.com/data');
		expect(sent.params).toEqual({ q: '1' });
		expect(sent.headers.get('User-Agent')).toBe('UA-test');
		expect(sent.maxRedirects).toBe(0);
		expect(sent.decompress).toBe(false);
		expect(sent.responseType).toBe('arraybuffer');
		expect(sent.proxy).toBe(false);
		transport.close();
	});

	it('turns connection errors into transport errors', async () => {
		const client = axios.create({
			adapter: async () => {
				throw new AxiosError('connect ECONNREFUSED 203.0.113.9:8080', 'ECONNREFUSED');
			},
		});
		const transport = new AxiosTransport({ client });
		await expect(transport.send(request())).rejects.toMatchObject({ name: 'TransportError', kind: 'connection' });
		transport.close();
	});

	it('enforces the per-attempt timeout', async () => {
		const client = axios.create({
			adapter: (config) =>
				new Promise((_, reject) => {
					config.signal?.addEventListener?.('abort', () => reject(new AxiosError('canceled', 'ERR_CANCELED')));
				}),
		});
		const transport = new AxiosTransport({ client });
		await expect(transport.send(request({ timeoutMs: 20 }))).rejects.toMatchObject({ name: 'TransportError', kind: 'timeout' });
		transport.close();
	});

	it('passes caller cancellation through unclassified', async () => {
		const controller = new AbortController();
		const client = axios.create({
			adapter: async () => {
				controller.abort();
				throw new AxiosError('canceled', 'ERR_CANCELED');
			},
		});
		const transport = new AxiosTransport({ client });
		const err = await transport.send(request({ signal: controller.signal })).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(Error);
		expect(err).not.toBeInstanceOf(TransportError);
		transport.close();
	});

	it('follows redirects one hop at a time', async () => {
		const seen: InternalAxiosRequestConfig[] = [];
		const client = axios.create({
			adapter: async (config) => {
				seen.push(config);
				return seen.length === 1
					? { data: Buffer.alloc(0), status: 302, statusText: 'Found', headers: { Location: '/moved?page=2' }, config }
					: { data: Buffer.from('here'), status: 200, statusText: 'OK', headers: {}, config };
			},
		});
		const transport = new AxiosTransport({ client });

		const resp = await transport.send(request({ params: { q: '1' } }));

		expect(resp.status).toBe(200);
		expect(resp.body.toString()).toBe('here');
		expect(seen.map((c) => c.url)).toEqual(['https://example.com/data', 'https://example.com/moved?page=2']);
		expect(seen.map((c) => c.params)).toEqual([{ q: '1' }, undefined]);
		expect(seen.map((c) => c.maxRedirects)).toEqual([0, 0]);
		transport.close();
	});

	it('sends a GET without a body after a 303', async () => {
		const seen: InternalAxiosRequestConfig[] = [];
		const client = axios.create({
			adapter: async (config) => {
				seen.push(config);
				return seen.length === 1
					? { data: Buffer.alloc(0), status: 303, statusText: 'See Other', headers: { Location: 'https://other.example.net/result' }, config }
					: { data: Buffer.from('done'), status: 200, statusText: 'OK', headers: {}, config };
			},
		});
		const transport = new AxiosTransport({ client });

		await transport.send(request({ method: 'POST', body: Buffer.from('payload'), headers: { Authorization: 'Bearer test-secret' } }));

		expect(seen[1].method).toBe('get');
		expect(seen[1].url).toBe('https://other.example.net/result');
		expect(seen[1].data).toBeUndefined();
		expect(seen[1].headers.has('Authorization')).toBe(false);
		transport.close();
	});

	it('refuses a redirect into an internal network', async () => {
		const seen: InternalAxiosRequestConfig[] = [];
		const client = axios.create({
			adapter: async (config) => {
				seen.push(config);
				return { data: Buffer.alloc(0), status: 302, statusText: 'Found', headers: { Location: 'http://127.0.0.1:8080/admin' }, config };
			},
		});
		const transport = new AxiosTransport({ client });

		const err = await transport.send(request()).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(InvalidTargetError);
		expect(err).toMatchObject({ status: 400, context: { reason: 'forbidden_host', target: 'http://127.0.0.1:8080/admin' } });
		expect(seen).toHaveLength(1);
		transport.close();
	});

	it('returns the redirect itself when following is off or the hop limit is reached', async () => {
		let calls = 0;
		const client = axios.create({
			adapter: async (config) => {
				calls++;
				return { data: Buffer.alloc(0), status: 302, statusText: 'Found', headers: { Location: '/loop' }, config };
			},
		});

		const unfollowed = new AxiosTransport({ client, followRedirects: false });
		const resp = await unfollowed.send(request());
		expect(resp.status).toBe(302);
		expect(resp.headers.location).toBe('/loop');
		expect(calls).toBe(1);
		unfollowed.close();

		calls = 0;
		const looping = new AxiosTransport({ client });
		expect((await looping.send(request())).status).toBe(302);
		expect(calls).toBe(11);
		looping.close();
	});

	it('reuses agents per backend and TLS mode', () => {
		const transport = new AxiosTransport();
		const backend = { host: 'proxy.test', port: 3128, scheme: 'http' } as const;
		const first = transport.agentsFor(backend, true);
		expect(transport.agentsFor({ ...backend }, true)).toBe(first);
		expect(transport.agentsFor(backend, false)).not.toBe(first);
		expect(transport.agentsFor(null, true)).not.toBe(first);
		transport.close();
	});

	it('refuses to send after close', async () => {
		const transport = new AxiosTransport();
		transport.close();
		await expect(transport.send(request())).rejects.toThrow('Transport is closed');
	});
});
