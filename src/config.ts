/**
 * Configuration for the guider session and process supervisor.
 *
 * Configuration documents are JSON. Every field is optional; missing fields
 * take the defaults below, nested sections are merged field by field.
 * @module
 */

import { readFile } from 'node:fs/promises';
import * as rt from 'runtypes';

import { ConfigError, errorMessage } from './errors.ts';

const PositiveIntegerRT = rt.Number.withConstraint(
	(n) => (Number.isInteger(n) && n > 0) || `Expected a positive integer, got ${n}`,
);

/** Longest delay a timer accepts, in milliseconds. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const TimeoutMsRT = PositiveIntegerRT.withConstraint(
	(n) => n <= MAX_TIMEOUT_MS || `Timeout must be at most ${MAX_TIMEOUT_MS}ms, got ${n}`,
);

const NonNegativeNumberRT = rt.Number.withConstraint(
	(n) => (Number.isFinite(n) && n >= 0) || `Expected a non-negative number, got ${n}`,
);

const PortRT = rt.Number.withConstraint(
	(n) => (Number.isInteger(n) && n >= 1 && n <= 65535) || `Port must be an integer in 1..65535, got ${n}`,
);

/**
 * Automatic reconnection policy.
 */
export const ReconnectPolicyRT = rt.Record({
	enabled: rt.Boolean,
	intervalMs: NonNegativeNumberRT,
	/** Unlimited when absent */
	maxRetries: rt.Number.withConstraint(
		(n) => (Number.isInteger(n) && n >= 0) || `maxRetries must be a non-negative integer, got ${n}`,
	).optional(),
});

/**
 * Settling parameters passed to guiding operations.
 */
export const SettleParamsRT = rt.Record({
	pixels: NonNegativeNumberRT,
	timeSeconds: NonNegativeNumberRT,
	timeoutSeconds: NonNegativeNumberRT,
});

export const GuiderConfigRT = rt.Record({
	host: rt.String.withConstraint((s) => s.length > 0 || 'Host cannot be empty'),
	port: PortRT,
	connectionTimeoutMs: TimeoutMsRT,
	commandTimeoutMs: TimeoutMsRT,
	executablePath: rt.String.optional(),
	autoStart: rt.Boolean,
	autoConnectEquipment: rt.Boolean,
	spawnEnv: rt.Dictionary(rt.String),
	reconnect: ReconnectPolicyRT,
	settle: SettleParamsRT,
});

export type ReconnectPolicy = rt.Static<typeof ReconnectPolicyRT>;
export type SettleParams = rt.Static<typeof SettleParamsRT>;
export type GuiderConfig = rt.Static<typeof GuiderConfigRT>;

/**
 * Shape accepted from configuration files before defaults are applied.
 */
const ConfigDocumentRT = rt.Partial({
	host: rt.String,
	port: rt.Number,
	connectionTimeoutMs: rt.Number,
	commandTimeoutMs: rt.Number,
	executablePath: rt.String,
	autoStart: rt.Boolean,
	autoConnectEquipment: rt.Boolean,
	spawnEnv: rt.Dictionary(rt.String),
	reconnect: rt.Partial({
		enabled: rt.Boolean,
		intervalMs: rt.Number,
		maxRetries: rt.Number.Or(rt.Null),
	}),
	settle: rt.Partial({
		pixels: rt.Number,
		timeSeconds: rt.Number,
		timeoutSeconds: rt.Number,
	}),
});

export type ConfigDocument = rt.Static<typeof ConfigDocumentRT>;

/**
 * Flattens nested runtypes failure details into `path: reason` entries.
 */
function describeFailure(message: string, details: unknown, prefix = ''): string {
	if (typeof details !== 'object' || details === null) {
		return message;
	}
	const reasons: string[] = [];
	const collect = (node: unknown, path: string): void => {
		if (typeof node === 'string') {
			reasons.push(`${path}: ${node}`);
		} else if (typeof node === 'object' && node !== null) {
			for (const [key, child] of Object.entries(node)) {
				collect(child, path ? `${path}.${key}` : key);
			}
		}
	};
	collect(details, prefix);
	return reasons.length > 0 ? reasons.join('; ') : message;
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function defaultConfig(): GuiderConfig {
	return {
		host: 'localhost',
		port: 4400,
		connectionTimeoutMs: 10_000,
		commandTimeoutMs: 30_000,
		autoStart: false,
		autoConnectEquipment: false,
		spawnEnv: {},
		reconnect: { enabled: true, intervalMs: 5_000 },
		settle: { pixels: 0.5, timeSeconds: 10, timeoutSeconds: 60 },
	};
}

/**
 * Merges a partial configuration document over the defaults and validates the result.
 *
 * @throws {ConfigError} If the document or the merged result is invalid.
 */
export function validateConfig(value: unknown): GuiderConfig {
	const document = ConfigDocumentRT.validate(value);
	if (!document.success) {
		throw new ConfigError(describeFailure(document.message, document.details));
	}

	const defaults = defaultConfig();
	const { reconnect, settle, ...rest } = document.value;
	const { maxRetries, ...reconnectRest } = reconnect ?? {};
	const merged = {
		...defaults,
		...rest,
		reconnect: {
			...defaults.reconnect,
			...reconnectRest,
			...(maxRetries === null || maxRetries === undefined ? {} : { maxRetries }),
		},
		settle: { ...defaults.settle, ...settle },
	};

	const result = GuiderConfigRT.validate(merged);
	if (!result.success) {
		throw new ConfigError(describeFailure(result.message, result.details));
	}
	return result.value;
}

/**
 * Reads and validates a JSON configuration file.
 *
 * @throws {ConfigError} If the file cannot be read, is not JSON, or fails validation.
 */
export async function loadConfig(path: string): Promise<GuiderConfig> {
	let text: string;
	try {
		text = await readFile(path, 'utf8');
	} catch (error) {
		throw new ConfigError(`cannot read ${path}: ${errorMessage(error)}`, { path }, error);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(`${path} is not valid JSON: ${errorMessage(error)}`, { path }, error);
	}

	console.log(`[loadConfig] Loaded configuration from ${path}`);
	return validateConfig(parsed);
}
