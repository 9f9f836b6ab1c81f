import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { BackendDescriptorSchema } from './proxy';

const StrategySchema = z
	.enum(['random', 'round_robin', 'round-robin'])
	.transform((v) => (v === 'round-robin' ? ('round_robin' as const) : v));

export type RotationStrategy = 'random' | 'round_robin';

const RotationConfigSchema = z
	.object({
		rotateIdentity: z.boolean().default(true),
		rotateBackend: z.boolean().default(true),
		strategy: StrategySchema.default('random'),
		verifyTls: z.boolean().default(true),
		requestTimeoutMs: z.number().int().positive().default(30_000),
		maxRetries: z.number().int().nonnegative().max(20).default(3),
		baseRetryDelayMs: z.number().nonnegative().default(1000),
		rateLimit: z.number().positive().nullable().default(null),
		rateLimitMaxWaitMs: z.number().nonnegative().nullable().default(null),
		defaultHeaders: z.record(z.string()).default({}),
		userAgents: z.array(z.string().min(1)).optional(),
		fixedIdentity: z.string().min(1).optional(),
		backends: z.array(BackendDescriptorSchema).default([]),
		failureThreshold: z.number().int().positive().default(1),
		recoveryWindowMs: z.number().int().nonnegative().default(5 * 60_000),
		followRedirects: z.boolean().default(true),
		maxBodyBytes: z.number().int().positive().default(10 * 1024 * 1024),
	})
	.superRefine((cfg, ctx) => {
		if (cfg.userAgents !== undefined && cfg.userAgents.length === 0 && (cfg.rotateIdentity || cfg.fixedIdentity === undefined)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['userAgents'],
				message: 'identity pool is empty; set rotateIdentity to false and a fixedIdentity to go without one',
			});
		}
	});

export type RotationConfig = Readonly<z.infer<typeof RotationConfigSchema>>;
export type RotationOptions = z.input<typeof RotationConfigSchema>;

const ServerConfigSchema = z.object({
	host: z.string().min(1).default('0.0.0.0'),
	port: z.number().int().min(0).max(65535).default(8080),
	proxyFile: z.string().optional(),
	discovery: z
		.object({
			enabled: z.boolean().default(false),
			limit: z.number().int().positive().default(50),
			verify: z.boolean().default(false),
		})
		.default({}),
	rotation: RotationConfigSchema.default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerOptions = z.input<typeof ServerConfigSchema>;

function formatIssues(error: z.ZodError): string {
	return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

/** Validates rotation options once; the result is frozen for the engine's lifetime. */
export function resolveRotationConfig(options: RotationOptions = {}): RotationConfig {
	const parsed = RotationConfigSchema.safeParse(options);
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid rotation config: ${formatIssues(parsed.error)}`);
	}
	return Object.freeze(parsed.data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> {
	if (!fs.existsSync(configPath)) return {};
	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
	} catch (e) {
		throw new ConfigurationError(`Failed to read ${path.basename(configPath)}: ${e instanceof Error ? e.message : String(e)}`);
	}
	if (!isRecord(raw)) {
		throw new ConfigurationError(`${path.basename(configPath)} must contain a JSON object`);
	}
	return raw;
}

export interface LoadConfigOptions {
	configPath?: string;
	overrides?: ServerOptions;
	env?: NodeJS.ProcessEnv;
}

/**
 * Layers `config.json` (from the working directory), the PORT variable and
 * explicit overrides, in that order, and validates the result.
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
	const configPath = path.resolve(process.cwd(), options.configPath ?? 'config.json');
	const file = readConfigFile(configPath);
	const overrides = options.overrides ?? {};
	const env = options.env ?? process.env;

	const fromEnv: Record<string, unknown> = {};
	if (env.PORT !== undefined && env.PORT !== '') {
		fromEnv.port = Number(env.PORT);
	}

	const merged: Record<string, unknown> = {
		...file,
		...fromEnv,
		...overrides,
		discovery: { ...(isRecord(file.discovery) ? file.discovery : {}), ...overrides.discovery },
		rotation: { ...(isRecord(file.rotation) ? file.rotation : {}), ...overrides.rotation },
	};

	const parsed = ServerConfigSchema.safeParse(merged);
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid ${path.basename(configPath)}: ${formatIssues(parsed.error)}`);
	}
	return parsed.data;
}
