import express, { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import type { ServerConfig } from './config';
import { discoverBackends } from './discovery';
import { DispatchFrontend } from './dispatch';
import { EngineDeps, RotationEngine } from './engine';
import { PayloadTooLargeError, RelayError } from './errors';
import { BackendDescriptor, loadProxyFile } from './proxy';

/** Upstream response headers that only make sense on the upstream connection. */
const STRIPPED_RESPONSE_HEADERS = new Set(['connection', 'transfer-encoding', 'keep-alive', 'content-length']);

/**
 * Inbound request headers the relay replaces: the identity pool supplies the
 * User-Agent for forwarded traffic.
 */
function inboundHeaders(req: Request): Request['headers'] {
	const { 'user-agent': _clientAgent, ...rest } = req.headers;
	return rest;
}

function sendError(res: Response, err: RelayError): void {
	if (res.headersSent || res.destroyed) return;
	res.status(err.status).json({
		error: err.message,
		code: err.status,
		reason: err.code,
		details: err.context,
	});
}

function isBodyTooLarge(err: unknown): err is { length?: number; limit?: number } {
	return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

export function createApp(frontend: DispatchFrontend, maxBodyBytes: number): express.Express {
	const app = express();
	app.disable('x-powered-by');

	app.get('/health', (req: Request, res: Response) => {
		res.json(frontend.health());
	});

	app.get('/stats', (req: Request, res: Response) => {
		res.json(frontend.stats());
	});

	// Everything else is a forwarded request: /<scheme>://<host>/<path>?<query>
	app.all('*', express.raw({ type: () => true, limit: maxBodyBytes }), async (req: Request, res: Response, next: NextFunction) => {
		const controller = new AbortController();
		res.on('close', () => {
			if (!res.writableFinished) controller.abort();
		});

		try {
			console.log(`[server] ${req.ip ?? '-'} ${req.method} ${req.originalUrl}`);
			const outcome = await frontend.handle({
				method: req.method,
				target: req.originalUrl,
				headers: inboundHeaders(req),
				body: Buffer.isBuffer(req.body) ? req.body : undefined,
				signal: controller.signal,
			});

			if (outcome.state === 'failed') {
				if (outcome.error.status >= 500) {
					console.error(`[server] ${req.method} ${req.originalUrl} failed: ${outcome.error.message}`);
				}
				sendError(res, outcome.error);
				return;
			}

			const { response } = outcome;
			res.status(response.status);
			for (const [name, value] of Object.entries(response.headers)) {
				if (!STRIPPED_RESPONSE_HEADERS.has(name)) res.setHeader(name, value);
			}
			res.end(response.body);
		} catch (err) {
			next(err);
		}
	});

	app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
		if (res.headersSent) {
			next(err);
			return;
		}
		if (isBodyTooLarge(err)) {
			sendError(res, new PayloadTooLargeError(err.length ?? 0, err.limit ?? maxBodyBytes));
			return;
		}
		console.error('[server] Unhandled error:', err);
		res.status(500).json({ error: err instanceof Error ? err.message : 'Internal Server Error', code: 500, reason: 'INTERNAL_ERROR' });
	});

	return app;
}

export interface RunningServer {
	server: Server;
	engine: RotationEngine;
	port: number;
	close(): Promise<void>;
}

async function collectBackends(config: ServerConfig): Promise<BackendDescriptor[]> {
	const backends: BackendDescriptor[] = [...config.rotation.backends];
	if (config.proxyFile) {
		backends.push(...loadProxyFile(config.proxyFile));
	}
	if (config.discovery.enabled) {
		console.log(`[server] Discovering free proxies (max: ${config.discovery.limit})...`);
		const discovered = await discoverBackends({ limit: config.discovery.limit, verify: config.discovery.verify });
		console.log(`[server] Discovered ${discovered.length} free proxies`);
		backends.push(...discovered);
	}
	return backends;
}

export async function startServer(config: ServerConfig, deps: EngineDeps = {}): Promise<RunningServer> {
	const backends = await collectBackends(config);
	const engine = new RotationEngine({ ...config.rotation, backends }, deps);
	const frontend = new DispatchFrontend(engine);
	const app = createApp(frontend, engine.config.maxBodyBytes);

	const server = await new Promise<Server>((resolve, reject) => {
		const s = app.listen(config.port, config.host, () => resolve(s));
		s.once('error', reject);
	});
	const address = server.address();
	const port = typeof address === 'object' && address !== null ? address.port : config.port;

	const stats = engine.stats();
	console.log(`🚀 Rotating relay listening on http://${config.host}:${port}`);
	console.log(`[server] Backends: ${stats.total_proxies}, user-agents: ${stats.total_user_agents}, strategy: ${stats.rotation_strategy}`);
	console.log(`[server] Usage: http://localhost:${port}/http://target-url`);
	console.log(`[server] Health: http://localhost:${port}/health, stats: http://localhost:${port}/stats`);

	return {
		server,
		engine,
		port,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.close((err) => {
					engine.close();
					if (err) reject(err);
					else resolve();
				});
				server.closeIdleConnections();
			}),
	};
}
