/**
 * Fan-out of guider events to any number of subscribers.
 * @module
 */

import { EventEmitter } from 'node:events';

import type { GuiderEvent } from './protocol.ts';

/** Events a subscription buffers before it starts dropping the oldest. */
export const DEFAULT_SUBSCRIPTION_CAPACITY = 100;

export interface SubscriptionOptions {
	/** Queue bound for this subscriber (defaults to 100) */
	capacity?: number;
}

const PUBLISH = 'event';

/**
 * A consumer's handle on the event stream.
 *
 * Receives every event published after it was created, in publish order.
 * Delivery is lossy by contract: when the consumer falls more than `capacity`
 * events behind, the oldest queued event is discarded and counted in
 * {@link dropped}. Publishing never waits for a consumer.
 *
 * @example
 * ```typescript
 * const subscription = client.subscribe();
 * for await (const event of subscription) {
 *   if (event.Event === GuiderEventType.STAR_LOST) console.log('star lost');
 * }
 * ```
 */
export class Subscription implements AsyncIterable<GuiderEvent> {
	/** @internal Events not yet taken by the consumer. */
	private queue: GuiderEvent[] = [];
	/** @internal Consumers parked in `next()`. */
	private waiters: ((event: GuiderEvent | undefined) => void)[] = [];
	private isClosed = false;
	private droppedCount = 0;

	constructor(private readonly capacity: number, private readonly detachFromSource: () => void) {}

	/** Events discarded because this subscriber fell behind. */
	get dropped(): number {
		return this.droppedCount;
	}

	/** Events currently queued. */
	get size(): number {
		return this.queue.length;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/** @internal Called by the broadcaster for every published event. */
	deliver(event: GuiderEvent): void {
		if (this.isClosed) {
			return;
		}
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(event);
			return;
		}
		this.queue.push(event);
		if (this.queue.length > this.capacity) {
			this.queue.shift();
			this.droppedCount++;
		}
	}

	/**
	 * Waits for the next event. Resolves `undefined` once the subscription is
	 * closed and its queue is drained.
	 */
	next(): Promise<GuiderEvent | undefined> {
		const event = this.queue.shift();
		if (event !== undefined) {
			return Promise.resolve(event);
		}
		if (this.isClosed) {
			return Promise.resolve(undefined);
		}
		return new Promise((resolve) => this.waiters.push(resolve));
	}

	/** Takes the next queued event without waiting. */
	tryNext(): GuiderEvent | undefined {
		return this.queue.shift();
	}

	/**
	 * Stops delivery. Queued events can still be read; pending `next()` calls
	 * resolve `undefined`.
	 */
	close(): void {
		if (this.isClosed) {
			return;
		}
		this.isClosed = true;
		this.detachFromSource();
		for (const waiter of this.waiters.splice(0)) {
			waiter(undefined);
		}
	}

	async *[Symbol.asyncIterator](): AsyncIterator<GuiderEvent> {
		try {
			for (;;) {
				const event = await this.next();
				if (event === undefined) {
					return;
				}
				yield event;
			}
		} finally {
			this.close();
		}
	}
}

/**
 * Publishes events to every live subscription.
 */
export class EventBroadcaster {
	private emitter = new EventEmitter();

	constructor(private readonly defaultCapacity = DEFAULT_SUBSCRIPTION_CAPACITY) {
		this.emitter.setMaxListeners(0);
	}

	subscribe(options: SubscriptionOptions = {}): Subscription {
		const capacity = options.capacity ?? this.defaultCapacity;
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Subscription capacity must be a positive integer, got ${capacity}`);
		}

		const subscription = new Subscription(capacity, () => this.emitter.off(PUBLISH, listener));
		const listener = (event: GuiderEvent): void => subscription.deliver(event);
		this.emitter.on(PUBLISH, listener);
		return subscription;
	}

	/** Delivers an event to every current subscription. Never blocks. */
	publish(event: GuiderEvent): void {
		this.emitter.emit(PUBLISH, event);
	}

	get subscriberCount(): number {
		return this.emitter.listenerCount(PUBLISH);
	}
}
