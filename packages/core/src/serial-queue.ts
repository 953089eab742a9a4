/**
 * Runs async tasks one at a time, in submission order.
 *
 * Each task starts only after the previous one has settled, whether it
 * resolved or rejected. A rejection is delivered to the caller of
 * {@link SerialQueue.run} and never blocks the tasks queued behind it.
 */
export class SerialQueue {
	private tail: Promise<void> = Promise.resolve();

	/** Queue a task and resolve with its outcome once it has run. */
	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
