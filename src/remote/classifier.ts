/**
 * Sorts decoded wire messages into call responses, event notifications and
 * protocol anomalies.
 * @module
 */

import {
	GuiderEventType,
	REMOTE_EVENT_NAMES,
	RemoteEventRT,
	RpcResponseRT,
	type GuiderEvent,
	type RpcResponse,
} from './protocol.ts';

/**
 * Result of classifying one decoded message.
 *
 * - `response`: answers a call that is still outstanding.
 * - `event`: an event notification. `warning` is set when a known tag carried
 *   a payload that did not match its model and was downgraded to `Unrecognized`.
 * - `anomaly`: anything else; to be logged and dropped.
 */
export type Classified =
	| { kind: 'response'; response: RpcResponse }
	| { kind: 'event'; event: GuiderEvent; warning?: string }
	| { kind: 'anomaly'; reason: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classifies a decoded message.
 *
 * @param value - A decoded JSON value from the transport.
 * @param isOutstanding - Whether a call with the given identifier is awaiting a response.
 */
export function classifyMessage(value: unknown, isOutstanding: (id: number) => boolean): Classified {
	if (!isRecord(value)) {
		return { kind: 'anomaly', reason: `Expected a JSON object, received ${Array.isArray(value) ? 'array' : typeof value}` };
	}

	if (typeof value.id === 'number' && isOutstanding(value.id)) {
		const response = RpcResponseRT.validate(value);
		if (response.success) {
			return { kind: 'response', response: response.value };
		}
		return { kind: 'anomaly', reason: `Malformed response for id ${value.id}: ${response.message}` };
	}

	if (typeof value.Event === 'string') {
		return toEvent(value.Event, value);
	}

	if ('id' in value) {
		return { kind: 'anomaly', reason: `Response for unknown id ${JSON.stringify(value.id)} discarded` };
	}

	return { kind: 'anomaly', reason: 'Message is neither a response nor an event' };
}

function toEvent(name: string, message: Record<string, unknown>): Classified {
	const known = RemoteEventRT.validate(message);
	if (known.success) {
		return { kind: 'event', event: known.value };
	}

	const { Event: _tag, ...payload } = message;
	const event: GuiderEvent = { Event: GuiderEventType.UNRECOGNIZED, name, payload };
	if (REMOTE_EVENT_NAMES.has(name)) {
		return { kind: 'event', event, warning: `Event ${name} has an unexpected payload: ${known.message}` };
	}
	return { kind: 'event', event };
}
