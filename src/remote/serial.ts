/**
 * Runs async tasks strictly one at a time, in submission order.
 *
 * A failed task does not stop the tasks queued after it; its rejection goes
 * only to the caller that submitted it.
 */
export class SerialQueue {
	private tail: Promise<void> = Promise.resolve();

	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
