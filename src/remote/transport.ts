/**
 * Stream transport for the guider session.
 *
 * A transport wraps one open duplex byte stream: its read half is exposed as
 * a lazy sequence of decoded JSON messages, its write half accepts whole lines.
 * @module
 */

import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';

import { errorMessage } from '../errors.ts';
import { decodeMessages, LINE_TERMINATOR, LineFramer } from './framing.ts';

/**
 * One open connection.
 */
export interface Transport {
	/**
	 * Decoded incoming messages. Ends when the peer closes the stream, throws
	 * on I/O failure or an unrecoverable framing error. Only one reader may
	 * iterate it.
	 */
	messages(): AsyncIterable<unknown>;
	/** Writes one line; the terminator is appended. */
	write(line: string): Promise<void>;
	/** Closes both halves. Safe to call more than once. */
	close(): void;
	readonly closed: boolean;
}

export interface ConnectOptions {
	host: string;
	port: number;
	timeoutMs: number;
	signal?: AbortSignal;
}

/**
 * Opens transports. Swappable so tests and alternative links can stand in
 * for TCP.
 */
export interface ConnectionFactory {
	connect(options: ConnectOptions): Promise<Transport>;
	/** Whether something is accepting connections at the address. */
	canConnect(options: ConnectOptions): Promise<boolean>;
}

/**
 * Transport over any Node.js duplex stream.
 */
export class StreamTransport implements Transport {
	private reading = false;

	constructor(private readonly stream: Duplex, private readonly maxLineLength?: number) {
		// The reader sees the same error through its iterator.
		stream.on('error', (error) => console.debug(`[StreamTransport] Stream error: ${error.message}`));
	}

	get closed(): boolean {
		return this.stream.destroyed || this.stream.writableEnded;
	}

	messages(): AsyncIterable<unknown> {
		if (this.reading) {
			throw new Error('Transport messages are already being read');
		}
		this.reading = true;
		return decodeMessages(this.stream, new LineFramer(this.maxLineLength));
	}

	write(line: string): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.closed) {
				reject(new Error('Transport is closed'));
				return;
			}
			this.stream.write(line + LINE_TERMINATOR, (error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	close(): void {
		if (!this.stream.destroyed) {
			this.stream.destroy();
		}
	}
}

/**
 * Opens TCP connections with `node:net`.
 */
export class TcpConnectionFactory implements ConnectionFactory {
	async connect(options: ConnectOptions): Promise<Transport> {
		const socket = await openSocket(options);
		socket.setNoDelay(true);
		return new StreamTransport(socket);
	}

	async canConnect(options: ConnectOptions): Promise<boolean> {
		try {
			const socket = await openSocket(options);
			socket.destroy();
			return true;
		} catch (error) {
			console.debug(`[TcpConnectionFactory.canConnect] ${options.host}:${options.port} not reachable: ${errorMessage(error)}`);
			return false;
		}
	}
}

function openSocket({ host, port, timeoutMs, signal }: ConnectOptions): Promise<Socket> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new Error('Connection attempt aborted'));
			return;
		}

		const socket = new Socket();
		const cleanup = (): void => {
			clearTimeout(timer);
			signal?.removeEventListener('abort', onAbort);
			socket.off('connect', onConnect);
			socket.off('error', onError);
		};
		const fail = (error: Error): void => {
			cleanup();
			socket.destroy();
			reject(error);
		};
		const onConnect = (): void => {
			cleanup();
			resolve(socket);
		};
		const onError = (error: Error): void => fail(error);
		const onAbort = (): void => fail(new Error('Connection attempt aborted'));
		const timer = setTimeout(() => fail(new Error(`Timed out after ${timeoutMs}ms connecting to ${host}:${port}`)), timeoutMs);

		signal?.addEventListener('abort', onAbort, { once: true });
		socket.once('connect', onConnect);
		socket.once('error', onError);
		socket.connect(port, host);
	});
}
