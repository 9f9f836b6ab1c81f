/**
 * Failure taxonomy shared by the engine, the dispatch frontend and the server.
 * Every error carries a stable `code` and the HTTP status the server answers with.
 */

export type ErrorContext = Record<string, unknown>;

export class RelayError extends Error {
	constructor(message: string, public readonly code: string, public readonly status: number, public readonly context: ErrorContext = {}) {
		super(message);
		this.name = this.constructor.name;
		Error.captureStackTrace(this, this.constructor);
	}
}

export class ConfigurationError extends RelayError {
	constructor(message: string) {
		super(message, 'CONFIG_ERROR', 500);
	}
}

export type InvalidTargetReason = 'malformed' | 'unsupported_scheme' | 'forbidden_host';

export class InvalidTargetError extends RelayError {
	constructor(message: string, public readonly reason: InvalidTargetReason, target: string) {
		super(message, 'INVALID_TARGET', 400, { reason, target });
	}
}

export class PayloadTooLargeError extends RelayError {
	constructor(size: number, limit: number) {
		super(`Request body too large: ${size} bytes (maximum ${limit})`, 'PAYLOAD_TOO_LARGE', 413, { size, limit });
	}
}

export class NoHealthyBackendError extends RelayError {
	constructor(total: number, excluded: number = 0) {
		super(`No healthy backend available (${total} registered, ${excluded} excluded)`, 'NO_HEALTHY_BACKEND', 503, { total, excluded });
	}
}

export class RateLimitTimeoutError extends RelayError {
	constructor(waitMs: number, maxWaitMs: number) {
		super(`Rate limit wait of ${waitMs}ms exceeds the ${maxWaitMs}ms bound`, 'RATE_LIMIT_TIMEOUT', 503, { waitMs, maxWaitMs });
	}
}

export type TransportErrorKind = 'timeout' | 'connection' | 'tls';

/** Connection-level failure of a single attempt. HTTP error statuses never produce one. */
export class TransportError extends Error {
	constructor(message: string, public readonly kind: TransportErrorKind, public readonly errorCode?: string) {
		super(message);
		this.name = 'TransportError';
	}
}

export interface AttemptRecord {
	attempt: number;
	identity: string;
	backend: string | null;
	error: string;
	kind: TransportErrorKind;
}

/**
 * Terminal failure after at least one attempt. `exhausted` is set when the
 * dispatch stopped early because no healthy backend was left to retry on.
 */
export class DispatchFailureError extends RelayError {
	constructor(
		public readonly attempts: AttemptRecord[],
		public readonly lastError: TransportError,
		public readonly exhausted: NoHealthyBackendError | null = null,
	) {
		super(
			`Dispatch failed after ${attempts.length} attempt(s): ${lastError.message}${exhausted ? '; no healthy backend left' : ''}`,
			'DISPATCH_FAILURE',
			lastError.kind === 'timeout' ? 504 : 502,
			{
				attempts: attempts.length,
				last_identity: attempts.length > 0 ? attempts[attempts.length - 1].identity : null,
				last_backend: attempts.length > 0 ? attempts[attempts.length - 1].backend : null,
				last_error: lastError.message,
				...(exhausted ? { no_healthy_backend: exhausted.context } : {}),
			},
		);
	}
}

export class DispatchCancelledError extends RelayError {
	constructor(attempts: number) {
		super(`Dispatch cancelled after ${attempts} attempt(s)`, 'DISPATCH_CANCELLED', 499, { attempts });
	}
}

export function isRelayError(err: unknown): err is RelayError {
	return err instanceof RelayError;
}
