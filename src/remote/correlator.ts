/**
 * Request/response correlation for guider calls.
 * @module
 */

import { MAX_TIMEOUT_MS } from '../config.ts';
import {
	ConnectionLostError,
	errorMessage,
	type GuiderError,
	NotConnectedError,
	RpcFailureError,
	TimeoutError,
} from '../errors.ts';
import { encodeRequest, type RpcParams, type RpcResponse } from './protocol.ts';
import { SerialQueue } from './serial.ts';

/**
 * An outstanding call. Removed from the table the moment it is settled.
 */
interface PendingCall {
	id: number;
	method: string;
	resolve: (value: unknown) => void;
	reject: (reason: GuiderError) => void;
	timer: ReturnType<typeof setTimeout>;
}

/**
 * Write side of the current connection generation.
 */
interface AttachedWriter {
	write: (line: string) => Promise<void>;
	onFailure: (error: unknown) => void;
	queue: SerialQueue;
}

/**
 * Issues identifiers for outgoing calls and settles each call exactly once:
 * with its result, with the remote error, on timeout, or on connection loss.
 *
 * Identifiers start at 1 for every connection generation. A generation always
 * ends with {@link detach}, which fails whatever is still outstanding, so an
 * identifier is never reused while a call holding it can still be settled.
 *
 * Writes are serialized per generation; only the write itself is queued,
 * waiting for a response happens outside the queue.
 */
export class RequestCorrelator {
	/** @internal Outstanding calls keyed by identifier. */
	private pending = new Map<number, PendingCall>();
	/** @internal Next identifier to hand out in this generation. */
	private nextId = 1;
	/** @internal Present while a connection generation is attached. */
	private writer?: AttachedWriter;

	/**
	 * Starts a connection generation.
	 *
	 * @param write - Writes one line to the transport.
	 * @param onFailure - Told about a failed write, after the affected call was settled.
	 */
	attach(write: (line: string) => Promise<void>, onFailure: (error: unknown) => void): void {
		if (this.pending.size > 0) {
			this.failAll('Connection replaced');
		}
		this.writer = { write, onFailure, queue: new SerialQueue() };
		this.nextId = 1;
	}

	/**
	 * Ends the current generation: later calls fail with NotConnected, every
	 * outstanding call fails with ConnectionLost.
	 *
	 * @returns How many calls were failed.
	 */
	detach(reason: string): number {
		this.writer = undefined;
		return this.failAll(reason);
	}

	get attached(): boolean {
		return this.writer !== undefined;
	}

	/** Number of calls awaiting a response. */
	get outstanding(): number {
		return this.pending.size;
	}

	isOutstanding(id: number): boolean {
		return this.pending.has(id);
	}

	/**
	 * Sends a call and waits for its outcome.
	 *
	 * @returns The `result` of the response (`null` when the response has none).
	 * @throws {NotConnectedError} No generation is attached.
	 * @throws {RpcFailureError} The remote side answered with an error.
	 * @param timeoutMs - Capped at {@link MAX_TIMEOUT_MS}.
	 * @throws {TimeoutError} No response within `timeoutMs`.
	 * @throws {ConnectionLostError} The connection ended, or the write failed, first.
	 */
	call(method: string, params: RpcParams | undefined, timeoutMs: number): Promise<unknown> {
		const writer = this.writer;
		if (!writer) {
			return Promise.reject(new NotConnectedError());
		}

		const id = this.nextId++;
		const line = encodeRequest({ method, params, id });
		const delayMs = Math.min(timeoutMs, MAX_TIMEOUT_MS);

		const result = new Promise<unknown>((resolve, reject) => {
			const timer = setTimeout(() => {
				const call = this.take(id);
				if (call) {
					console.warn(`[RequestCorrelator.call] Request '${method}' (id ${id}) timed out after ${timeoutMs}ms`);
					call.reject(new TimeoutError(`Request '${method}' timed out after ${timeoutMs}ms`, timeoutMs, { method }));
				}
			}, delayMs);
			this.pending.set(id, { id, method, resolve, reject, timer });
		});

		writer.queue.run(() => writer.write(line)).then(
			() => console.debug(`[RequestCorrelator.call] Sent ${method} (id ${id})`),
			(error: unknown) => {
				console.error(`[RequestCorrelator.call] Failed to send ${method} (id ${id}): ${errorMessage(error)}`);
				// A later generation reuses identifiers; its calls are not ours to fail.
				if (this.writer !== writer) {
					return;
				}
				this.take(id)?.reject(new ConnectionLostError(`Write failed: ${errorMessage(error)}`, { method }));
				writer.onFailure(error);
			},
		);

		return result;
	}

	/**
	 * Settles the call a response belongs to.
	 *
	 * @returns `false` if no call with that identifier is outstanding.
	 */
	resolve(response: RpcResponse): boolean {
		const call = this.take(response.id);
		if (!call) {
			return false;
		}

		if (response.error) {
			const { code, message, data } = response.error;
			call.reject(new RpcFailureError(code, message, data, { method: call.method }));
		} else {
			call.resolve(response.result ?? null);
		}
		return true;
	}

	/**
	 * Fails every outstanding call with ConnectionLost.
	 *
	 * @returns How many calls were failed.
	 */
	failAll(reason: string): number {
		const calls = [...this.pending.values()];
		for (const call of calls) {
			this.take(call.id)?.reject(new ConnectionLostError(reason, { method: call.method }));
		}
		if (calls.length > 0) {
			console.log(`[RequestCorrelator.failAll] Failed ${calls.length} outstanding call(s): ${reason}`);
		}
		return calls.length;
	}

	/** @internal Removes a call from the table; only the first taker gets it. */
	private take(id: number): PendingCall | undefined {
		const call = this.pending.get(id);
		if (call) {
			this.pending.delete(id);
			clearTimeout(call.timer);
		}
		return call;
	}
}
