#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config';
import type { ServerOptions } from './config';
import { startServer } from './server';

function parseNumber(value: string): number {
	const n = Number(value);
	if (!Number.isFinite(n)) throw new InvalidArgumentError(`"${value}" is not a number`);
	return n;
}

export type CliOptions = {
	config: string;
	host?: string;
	port?: number;
	proxyFile?: string;
	freeProxies?: boolean;
	maxProxies?: number;
	verifyProxies?: boolean;
	strategy?: string;
	rateLimit?: number;
	maxRetries?: number;
	timeout?: number;
	verifyTls: boolean;
	rotateIdentity: boolean;
};

export function buildOverrides(opts: CliOptions): ServerOptions {
	const rotation: NonNullable<ServerOptions['rotation']> = {};
	if (opts.strategy === 'random' || opts.strategy === 'round_robin' || opts.strategy === 'round-robin') rotation.strategy = opts.strategy;
	if (opts.rateLimit !== undefined) rotation.rateLimit = opts.rateLimit;
	if (opts.maxRetries !== undefined) rotation.maxRetries = opts.maxRetries;
	if (opts.timeout !== undefined) rotation.requestTimeoutMs = opts.timeout;
	if (!opts.verifyTls) rotation.verifyTls = false;
	if (!opts.rotateIdentity) rotation.rotateIdentity = false;

	const discovery: NonNullable<ServerOptions['discovery']> = {};
	if (opts.freeProxies) discovery.enabled = true;
	if (opts.maxProxies !== undefined) discovery.limit = opts.maxProxies;
	if (opts.verifyProxies) discovery.verify = true;

	return {
		...(opts.host !== undefined ? { host: opts.host } : {}),
		...(opts.port !== undefined ? { port: opts.port } : {}),
		...(opts.proxyFile !== undefined ? { proxyFile: opts.proxyFile } : {}),
		rotation,
		discovery,
	};
}

export function createProgram(): Command {
	return new Command()
		.name('rotating-relay')
		.description('Forwarding proxy that rotates User-Agents and upstream proxies per request')
		.option('-c, --config <path>', 'JSON config file', 'config.json')
		.option('--host <host>', 'host to bind to (default: 0.0.0.0)')
		.option('-p, --port <port>', 'port to listen on (default: 8080)', parseNumber)
		.option('--proxy-file <path>', 'file with one backend proxy per line')
		.option('--free-proxies', 'fetch backends from public proxy lists')
		.option('--max-proxies <n>', 'maximum free proxies to fetch (default: 50)', parseNumber)
		.option('--verify-proxies', 'check free proxies before using them')
		.option('--strategy <strategy>', 'rotation strategy: random | round-robin')
		.option('--rate-limit <rps>', 'requests per second across the relay', parseNumber)
		.option('--max-retries <n>', 'retries after the first attempt (default: 3)', parseNumber)
		.option('--timeout <ms>', 'per-attempt timeout in milliseconds (default: 30000)', parseNumber)
		.option('--no-verify-tls', 'skip upstream certificate verification')
		.option('--no-rotate-identity', 'send one fixed User-Agent');
}

async function main(): Promise<void> {
	const program = createProgram();
	program.parse(process.argv);
	const opts = program.opts<CliOptions>();

	if (opts.strategy !== undefined && !['random', 'round_robin', 'round-robin'].includes(opts.strategy)) {
		program.error(`error: unknown strategy "${opts.strategy}"`);
	}

	const config = loadConfig({ configPath: opts.config, overrides: buildOverrides(opts) });
	const running = await startServer(config);

	const shutdown = (signal: string) => {
		console.log(`[server] ${signal} received, shutting down...`);
		running
			.close()
			.then(() => process.exit(0))
			.catch((e) => {
				console.error('[server] Error during shutdown:', e);
				process.exit(1);
			});
	};
	process.on('SIGTERM', () => shutdown('SIGTERM'));
	process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
	main().catch((e) => {
		console.error('[server] Failed to start:', e instanceof Error ? e.message : e);
		process.exit(1);
	});
}
