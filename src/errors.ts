/**
 * Error types raised by the guider session engine and process supervisor.
 * @module
 */

/**
 * Machine-readable error codes.
 */
export type GuiderErrorCode =
	| 'NOT_CONNECTED'
	| 'CONNECTION_FAILED'
	| 'CONNECTION_LOST'
	| 'TIMEOUT'
	| 'RPC_FAILURE'
	| 'PROCESS_START_FAILED'
	| 'EXECUTABLE_NOT_FOUND'
	| 'PROCESS_ALREADY_RUNNING'
	| 'RECONNECT_FAILED'
	| 'INVALID_STATE'
	| 'FRAMING'
	| 'CONFIG';

/**
 * Additional context attached to an error.
 */
export interface ErrorDetails {
	/** Remote method involved, if any */
	method?: string;
	/** Path or field involved, if any */
	path?: string;
	[key: string]: unknown;
}

/**
 * Base class for every error raised by this package.
 */
export class GuiderError extends Error {
	/** Machine-readable error code */
	readonly code: GuiderErrorCode;
	/** Additional context about the error */
	readonly details: ErrorDetails;

	constructor(message: string, code: GuiderErrorCode, details: ErrorDetails = {}, cause?: unknown) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
		if (cause !== undefined) {
			this.cause = cause;
		}

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	toJSON(): { name: string; message: string; code: GuiderErrorCode; details: ErrorDetails } {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			details: this.details,
		};
	}
}

export class NotConnectedError extends GuiderError {
	constructor(message = 'Not connected to the guider', details?: ErrorDetails) {
		super(message, 'NOT_CONNECTED', details);
	}
}

export class ConnectionFailedError extends GuiderError {
	constructor(message: string, details?: ErrorDetails, cause?: unknown) {
		super(`Connection failed: ${message}`, 'CONNECTION_FAILED', details, cause);
	}
}

export class ConnectionLostError extends GuiderError {
	constructor(readonly reason: string, details?: ErrorDetails) {
		super(`Connection lost: ${reason}`, 'CONNECTION_LOST', details);
	}
}

export class TimeoutError extends GuiderError {
	constructor(message: string, readonly timeoutMs: number, details?: ErrorDetails) {
		super(message, 'TIMEOUT', { ...details, timeoutMs });
	}
}

/**
 * An application-level error reported by the remote side. Not a transport problem.
 */
export class RpcFailureError extends GuiderError {
	constructor(
		readonly rpcCode: number,
		readonly rpcMessage: string,
		readonly data?: unknown,
		details?: ErrorDetails,
	) {
		super(`RPC error: ${rpcCode} - ${rpcMessage}`, 'RPC_FAILURE', details);
	}
}

export class ProcessStartFailedError extends GuiderError {
	constructor(message: string, details?: ErrorDetails, cause?: unknown) {
		super(`Failed to start guider process: ${message}`, 'PROCESS_START_FAILED', details, cause);
	}
}

export class ExecutableNotFoundError extends GuiderError {
	constructor(path?: string) {
		super(
			path ? `Guider executable not found: ${path}` : 'Guider executable not found in any default location',
			'EXECUTABLE_NOT_FOUND',
			path ? { path } : {},
		);
	}
}

export class ProcessAlreadyRunningError extends GuiderError {
	constructor(pid?: number) {
		super('Guider process is already running', 'PROCESS_ALREADY_RUNNING', pid === undefined ? {} : { pid });
	}
}

export class ReconnectFailedError extends GuiderError {
	constructor(readonly reason: string) {
		super(`Reconnection failed: ${reason}`, 'RECONNECT_FAILED');
	}
}

export class InvalidStateError extends GuiderError {
	constructor(message: string, details?: ErrorDetails) {
		super(`Invalid state: ${message}`, 'INVALID_STATE', details);
	}
}

export class FramingError extends GuiderError {
	constructor(message: string, details?: ErrorDetails) {
		super(message, 'FRAMING', details);
	}
}

export class ConfigError extends GuiderError {
	constructor(message: string, details?: ErrorDetails, cause?: unknown) {
		super(`Invalid configuration: ${message}`, 'CONFIG', details, cause);
	}
}

/**
 * Type guard for errors raised by this package, optionally narrowed to one code.
 */
export function isGuiderError(value: unknown, code?: GuiderErrorCode): value is GuiderError {
	return value instanceof GuiderError && (code === undefined || value.code === code);
}

/**
 * Renders an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
