/**
 * Guider Session Client
 *
 * Maintains the session with the guiding application: connection lifecycle,
 * automatic reconnection, request correlation and event fan-out.
 * @module
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { defaultConfig, type ReconnectPolicy } from '../config.ts';
import { ConnectionFailedError, ConnectionLostError, errorMessage, NotConnectedError } from '../errors.ts';
import { EventBroadcaster, type Subscription, type SubscriptionOptions } from './broadcaster.ts';
import { classifyMessage } from './classifier.ts';
import { RequestCorrelator } from './correlator.ts';
import { type GuiderEvent, GuiderEventType, type RpcParams } from './protocol.ts';
import { SerialQueue } from './serial.ts';
import { type ConnectionFactory, TcpConnectionFactory, type Transport } from './transport.ts';

/**
 * Connection lifecycle states. Exactly one holds at any time.
 */
export enum ConnectionState {
	DISCONNECTED = 'disconnected',
	CONNECTING = 'connecting',
	CONNECTED = 'connected',
	RECONNECTING = 'reconnecting',
}

/**
 * Configuration options for the guider client
 */
export interface GuiderClientOptions {
	/** Host running the guiding application (defaults to localhost) */
	host?: string;
	/** TCP port of the guiding application (defaults to 4400) */
	port?: number;
	/** Time allowed to open the connection, in milliseconds (defaults to 10000) */
	connectionTimeoutMs?: number;
	/** Default per-call timeout, in milliseconds (defaults to 30000) */
	commandTimeoutMs?: number;
	/** Automatic reconnection policy */
	reconnect?: Partial<ReconnectPolicy>;
	/** Queue bound for subscriptions that do not set their own (defaults to 100) */
	subscriptionCapacity?: number;
	/** Opens transports (defaults to TCP) */
	connectionFactory?: ConnectionFactory;
}

/**
 * Something that can issue calls. Implemented by {@link GuiderClient};
 * operation layers depend only on this.
 */
export interface GuiderCaller {
	call(method: string, params?: RpcParams, timeoutMs?: number): Promise<unknown>;
	isConnected(): boolean;
}

/**
 * A caller that also controls its own connection.
 */
export interface GuiderSession extends GuiderCaller {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
}

/** @internal One run of the reconnect loop. */
interface ReconnectLoop {
	controller: AbortController;
	attempt: number;
}

/**
 * Client for the guiding application's JSON-RPC session.
 *
 * All state transitions (`connect`, `disconnect`, loss handling and every
 * step of the reconnect loop) run one at a time through a single queue, so
 * they never interleave. Cancellation of the reconnect loop is signalled
 * immediately, before queuing, so a sleeping or connecting loop wakes up at once.
 *
 * @example
 * ```typescript
 * const client = new GuiderClient({ port: 4400 });
 * const events = client.subscribe();
 * await client.connect();
 *
 * const state = await client.call('get_app_state');
 * console.log(state); // "Guiding"
 *
 * for await (const event of events) {
 *   if (event.Event === GuiderEventType.CONNECTION_LOST) console.warn(event.reason);
 * }
 * ```
 *
 * @emits {@link GuiderEventType.CONNECTION_LOST} - When an open connection ends.
 * @emits {@link GuiderEventType.RECONNECTING} - Before each reconnect attempt.
 * @emits {@link GuiderEventType.RECONNECTED} - When a reconnect attempt succeeds.
 * @emits {@link GuiderEventType.RECONNECT_FAILED} - When the reconnect loop gives up or is cancelled.
 */
export class GuiderClient implements GuiderSession {
	/** @internal Resolved options. */
	private readonly host: string;
	private readonly port: number;
	private readonly connectionTimeoutMs: number;
	private readonly commandTimeoutMs: number;
	private readonly retryIntervalMs: number;
	private readonly maxRetries?: number;
	/** @internal Runtime-toggleable part of the reconnect policy. */
	private autoReconnect: boolean;
	private readonly factory: ConnectionFactory;

	private readonly correlator = new RequestCorrelator();
	private readonly broadcaster: EventBroadcaster;
	/** @internal Serializes every state transition. */
	private readonly transitions = new SerialQueue();

	private state = ConnectionState.DISCONNECTED;
	/** @internal Open transport of the current generation. */
	private transport?: Transport;
	/** @internal Bumped whenever a transport is opened or torn down; stale callbacks compare against it. */
	private generation = 0;
	/** @internal The running reconnect loop, if any. */
	private reconnect?: ReconnectLoop;

	private version?: string;
	private appState?: string;

	constructor(options: GuiderClientOptions = {}) {
		const defaults = defaultConfig();
		this.host = options.host ?? defaults.host;
		this.port = options.port ?? defaults.port;
		this.connectionTimeoutMs = options.connectionTimeoutMs ?? defaults.connectionTimeoutMs;
		this.commandTimeoutMs = options.commandTimeoutMs ?? defaults.commandTimeoutMs;
		this.autoReconnect = options.reconnect?.enabled ?? defaults.reconnect.enabled;
		this.retryIntervalMs = options.reconnect?.intervalMs ?? defaults.reconnect.intervalMs;
		this.maxRetries = options.reconnect?.maxRetries;
		this.factory = options.connectionFactory ?? new TcpConnectionFactory();
		this.broadcaster = new EventBroadcaster(options.subscriptionCapacity);
	}

	// --- Observation ---

	getState(): ConnectionState {
		return this.state;
	}

	isConnected(): boolean {
		return this.state === ConnectionState.CONNECTED;
	}

	isReconnecting(): boolean {
		return this.state === ConnectionState.RECONNECTING;
	}

	isAutoReconnectEnabled(): boolean {
		return this.autoReconnect;
	}

	/** Version reported by the greeting of the current connection. */
	getVersion(): string | undefined {
		return this.version;
	}

	/** Last application state announced by an `AppState` event. */
	getCachedAppState(): string | undefined {
		return this.appState;
	}

	/**
	 * Creates a subscription receiving every event published from now on,
	 * across reconnects, until it is closed.
	 */
	subscribe(options?: SubscriptionOptions): Subscription {
		return this.broadcaster.subscribe(options);
	}

	// --- Calls ---

	/**
	 * Calls a remote method.
	 *
	 * @param timeoutMs - Overrides the default per-call timeout.
	 * @returns The `result` of the response, `null` when it carries none.
	 * @throws {NotConnectedError} When disconnected or still connecting.
	 * @throws {ConnectionLostError} While reconnecting, once a loss has been detected, or when the connection drops before the response.
	 * @throws {TimeoutError} When no response arrives in time.
	 * @throws {RpcFailureError} When the remote side answers with an error.
	 */
	call(method: string, params?: RpcParams, timeoutMs = this.commandTimeoutMs): Promise<unknown> {
		switch (this.state) {
			case ConnectionState.CONNECTED:
				// Loss already detected, state change still queued.
				if (!this.correlator.attached) {
					return Promise.reject(new ConnectionLostError('Connection closing', { method }));
				}
				return this.correlator.call(method, params, timeoutMs);
			case ConnectionState.RECONNECTING:
				return Promise.reject(new ConnectionLostError('Reconnection in progress', { method }));
			default:
				return Promise.reject(new NotConnectedError(undefined, { method }));
		}
	}

	// --- Lifecycle ---

	/**
	 * Opens the session. Resolves once the transport is open; the greeting is
	 * consumed in the background. Cancels a running reconnect loop first.
	 *
	 * @throws {ConnectionFailedError} If the transport cannot be opened in time.
	 */
	connect(): Promise<void> {
		this.reconnect?.controller.abort();
		return this.transitions.run(async () => {
			if (this.reconnect) {
				this.finishReconnect(this.reconnect, 'Reconnection cancelled');
			}
			if (this.state === ConnectionState.CONNECTED) {
				console.log('[GuiderClient.connect] Already connected.');
				return;
			}

			this.setState(ConnectionState.CONNECTING);
			try {
				await this.openSession();
			} catch (error) {
				this.setState(ConnectionState.DISCONNECTED);
				console.error(`[GuiderClient.connect] Connection to ${this.host}:${this.port} failed: ${errorMessage(error)}`);
				throw new ConnectionFailedError(errorMessage(error), { host: this.host, port: this.port }, error);
			}
		});
	}

	/**
	 * Closes the session from any state: cancels reconnection, closes the
	 * transport and fails outstanding calls with ConnectionLost. Idempotent.
	 */
	disconnect(): Promise<void> {
		this.reconnect?.controller.abort();
		return this.transitions.run(async () => {
			if (this.reconnect) {
				this.finishReconnect(this.reconnect, 'Reconnection cancelled');
			}
			if (this.state !== ConnectionState.CONNECTED) {
				return;
			}

			const reason = 'Client disconnected';
			this.closeSession(reason);
			this.setState(ConnectionState.DISCONNECTED);
			this.broadcaster.publish({ Event: GuiderEventType.CONNECTION_LOST, reason });
			console.log('[GuiderClient.disconnect] Disconnected.');
		});
	}

	/**
	 * Enables or disables automatic reconnection. Disabling stops a running
	 * reconnect loop; the returned promise settles once it has stopped.
	 */
	setAutoReconnectEnabled(enabled: boolean): Promise<void> {
		this.autoReconnect = enabled;
		if (enabled || !this.reconnect) {
			return Promise.resolve();
		}

		const loop = this.reconnect;
		loop.controller.abort();
		return this.transitions.run(async () => this.finishReconnect(loop, 'Auto-reconnect disabled'));
	}

	/**
	 * Stops a running reconnect loop without changing the auto-reconnect
	 * setting. No-op when not reconnecting.
	 */
	stopReconnection(): Promise<void> {
		const loop = this.reconnect;
		if (!loop) {
			return Promise.resolve();
		}

		loop.controller.abort();
		return this.transitions.run(async () => this.finishReconnect(loop, 'Reconnection cancelled'));
	}

	// --- Internals ---

	/** @internal Must run inside a transition. */
	private setState(next: ConnectionState): void {
		if (this.state !== next) {
			console.debug(`[GuiderClient.setState] ${this.state} -> ${next}`);
			this.state = next;
		}
	}

	/**
	 * Opens a transport and makes it the current generation.
	 * @internal Must run inside a transition.
	 */
	private async openSession(signal?: AbortSignal): Promise<void> {
		const transport = await this.factory.connect({
			host: this.host,
			port: this.port,
			timeoutMs: this.connectionTimeoutMs,
			signal,
		});
		if (signal?.aborted) {
			transport.close();
			throw new Error('Connection attempt cancelled');
		}

		const generation = ++this.generation;
		this.transport = transport;
		this.correlator.attach(
			(line) => transport.write(line),
			(error) => this.handleConnectionLoss(generation, `Write error: ${errorMessage(error)}`),
		);
		this.setState(ConnectionState.CONNECTED);
		console.log(`[GuiderClient.openSession] Connected to ${this.host}:${this.port}`);

		this.readMessages(transport, generation).catch((error: unknown) => {
			console.error('[GuiderClient.readMessages] Reader stopped unexpectedly:', error);
			this.handleConnectionLoss(generation, `Reader failure: ${errorMessage(error)}`);
		});
	}

	/**
	 * Tears down the current generation and fails outstanding calls.
	 * @internal Must run inside a transition.
	 */
	private closeSession(reason: string): void {
		this.generation++;
		this.transport?.close();
		this.transport = undefined;
		this.correlator.detach(reason);
		this.version = undefined;
		this.appState = undefined;
	}

	/**
	 * The only reader of a transport. Runs until the transport ends, then
	 * reports the loss for its generation.
	 * @internal
	 */
	private async readMessages(transport: Transport, generation: number): Promise<void> {
		let reason = 'Connection closed by remote';
		try {
			for await (const message of transport.messages()) {
				if (generation !== this.generation) {
					return;
				}
				this.dispatch(message);
			}
		} catch (error) {
			reason = `Read error: ${errorMessage(error)}`;
		}
		this.handleConnectionLoss(generation, reason);
	}

	/** @internal Routes one decoded message. */
	private dispatch(message: unknown): void {
		const classified = classifyMessage(message, (id) => this.correlator.isOutstanding(id));
		switch (classified.kind) {
			case 'response':
				this.correlator.resolve(classified.response);
				break;
			case 'event':
				if (classified.warning) {
					console.warn(`[GuiderClient.dispatch] ${classified.warning}`);
				}
				this.track(classified.event);
				this.broadcaster.publish(classified.event);
				break;
			case 'anomaly':
				console.warn(`[GuiderClient.dispatch] Protocol anomaly: ${classified.reason}`);
				break;
		}
	}

	/** @internal Keeps the session cache current. */
	private track(event: GuiderEvent): void {
		if (event.Event === GuiderEventType.VERSION) {
			this.version = event.PHDVersion;
		} else if (event.Event === GuiderEventType.APP_STATE) {
			this.appState = event.State;
		}
	}

	/**
	 * Reacts to a read or write failure on a generation. Outstanding calls are
	 * failed right away; the state change is queued as a transition. Reports
	 * for a generation that is no longer current are ignored.
	 * @internal
	 */
	private handleConnectionLoss(generation: number, reason: string): void {
		if (generation !== this.generation || !this.correlator.attached) {
			return;
		}
		this.correlator.detach(reason);

		this.transitions.run(async () => {
			if (generation !== this.generation || this.state !== ConnectionState.CONNECTED) {
				return;
			}
			console.warn(`[GuiderClient.handleConnectionLoss] ${reason}`);
			this.closeSession(reason);
			this.broadcaster.publish({ Event: GuiderEventType.CONNECTION_LOST, reason });

			if (this.autoReconnect) {
				this.startReconnectLoop();
			} else {
				this.setState(ConnectionState.DISCONNECTED);
			}
		}).catch((error: unknown) => console.error('[GuiderClient.handleConnectionLoss] Transition failed:', error));
	}

	/** @internal Must run inside a transition. */
	private startReconnectLoop(): void {
		const loop: ReconnectLoop = { controller: new AbortController(), attempt: 0 };
		this.reconnect = loop;
		this.setState(ConnectionState.RECONNECTING);
		this.runReconnectLoop(loop).catch((error: unknown) => {
			console.error('[GuiderClient.runReconnectLoop] Reconnect loop failed:', error);
			this.transitions
				.run(async () => this.finishReconnect(loop, `Reconnect loop failed: ${errorMessage(error)}`))
				.catch((inner: unknown) => console.error('[GuiderClient.runReconnectLoop] Transition failed:', inner));
		});
	}

	/**
	 * Waits, then attempts, until connected, out of retries, disabled or
	 * cancelled. The wait happens outside the transition queue; each attempt
	 * is one transition.
	 * @internal
	 */
	private async runReconnectLoop(loop: ReconnectLoop): Promise<void> {
		const { signal } = loop.controller;
		for (;;) {
			if (this.maxRetries === undefined || loop.attempt < this.maxRetries) {
				try {
					await sleep(this.retryIntervalMs, undefined, { signal });
				} catch (error) {
					if (signal.aborted) {
						return;
					}
					throw error;
				}
			}

			const done = await this.transitions.run(() => this.attemptReconnect(loop));
			if (done) {
				return;
			}
		}
	}

	/**
	 * One reconnect step.
	 * @internal Must run inside a transition.
	 * @returns `true` when the loop is over.
	 */
	private async attemptReconnect(loop: ReconnectLoop): Promise<boolean> {
		const { signal } = loop.controller;
		if (this.reconnect !== loop || signal.aborted) {
			return true;
		}
		if (!this.autoReconnect) {
			this.finishReconnect(loop, 'Auto-reconnect disabled');
			return true;
		}
		if (this.maxRetries !== undefined && loop.attempt >= this.maxRetries) {
			this.finishReconnect(loop, `Max retries (${this.maxRetries}) exceeded`);
			return true;
		}

		loop.attempt++;
		console.log(`[GuiderClient.attemptReconnect] Attempt ${loop.attempt}${this.maxRetries === undefined ? '' : ` of ${this.maxRetries}`}`);
		this.broadcaster.publish({
			Event: GuiderEventType.RECONNECTING,
			attempt: loop.attempt,
			...(this.maxRetries === undefined ? {} : { maxAttempts: this.maxRetries }),
		});

		try {
			await this.openSession(signal);
		} catch (error) {
			if (signal.aborted) {
				return true;
			}
			console.warn(`[GuiderClient.attemptReconnect] Attempt ${loop.attempt} failed: ${errorMessage(error)}`);
			if (this.maxRetries !== undefined && loop.attempt >= this.maxRetries) {
				this.finishReconnect(loop, `Max retries (${this.maxRetries}) exceeded`);
				return true;
			}
			return false;
		}

		this.reconnect = undefined;
		console.log(`[GuiderClient.attemptReconnect] Reconnected after ${loop.attempt} attempt(s)`);
		this.broadcaster.publish({ Event: GuiderEventType.RECONNECTED });
		return true;
	}

	/**
	 * Ends a reconnect loop that has not succeeded. No-op for a loop that is
	 * no longer current.
	 * @internal Must run inside a transition.
	 */
	private finishReconnect(loop: ReconnectLoop, reason: string): void {
		if (this.reconnect !== loop) {
			return;
		}
		loop.controller.abort();
		this.reconnect = undefined;
		if (this.state === ConnectionState.RECONNECTING) {
			this.setState(ConnectionState.DISCONNECTED);
		}
		console.warn(`[GuiderClient.finishReconnect] ${reason}`);
		this.broadcaster.publish({ Event: GuiderEventType.RECONNECT_FAILED, reason });
	}
}
