import axios, { AxiosError } from 'axios';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { getText, sleep, withRetry } from '../../src/utils/http';

describe('withRetry', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('returns the first successful result', async () => {
		const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('done');
		await expect(withRetry(fn, 2, 0)).resolves.toBe('done');
		expect(fn).toHaveBeenCalledTimes(2);
	});

	it('throws the last error once retries run out', async () => {
		const fn = vi.fn().mockRejectedValueOnce(new Error('first')).mockRejectedValueOnce(new Error('second'));
		await expect(withRetry(fn, 1, 0)).rejects.toThrow('second');
	});

	it('backs off exponentially', async () => {
		vi.useFakeTimers();
		const calls: number[] = [];
		const start = Date.now();
		const fn = vi.fn(async () => {
			calls.push(Date.now() - start);
			throw new Error('down');
		});
		const assertion = expect(withRetry(fn, 2, 100)).rejects.toThrow('down');
		await vi.advanceTimersByTimeAsync(300);
		await assertion;
		expect(calls).toEqual([0, 100, 300]);
	});
});

describe('sleep', () => {
	it('rejects immediately for an aborted signal', async () => {
		const controller = new AbortController();
		controller.abort(new Error('gone'));
		await expect(sleep(1000, controller.signal)).rejects.toThrow('gone');
	});
});

describe('getText', () => {
	it('reads the response body as text', async () => {
		const client = axios.create({
			adapter: async (config) => {
				if (config.responseType !== 'text') throw new AxiosError('expected text', 'ERR_BAD_REQUEST');
				return { data: '{"not":"parsed"}', status: 200, statusText: 'OK', headers: {}, config };
			},
		});
		await expect(getText(client, 'https://example.com/list')).resolves.toBe('{"not":"parsed"}');
	});
});
