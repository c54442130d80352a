import { QueueClosedError } from "./errors.js";

/**
 * Unbounded FIFO between the listener side and a single poll consumer.
 * `offer` never waits; the consumer can block with `take` or
 * `waitForItems`, or drain without waiting.
 */
export class HandoffQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters = new Set<() => void>();
	private isClosed = false;

	get size(): number {
		return this.items.length;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	offer(item: T): void {
		if (this.isClosed) {
			throw new QueueClosedError();
		}
		this.items.push(item);
		this.wake();
	}

	poll(): T | undefined {
		return this.items.shift();
	}

	drain(max: number = Number.POSITIVE_INFINITY): T[] {
		const count = Math.min(Math.max(0, Math.floor(max)), this.items.length);
		return this.items.splice(0, count);
	}

	/** Resolves with the next item, or undefined on timeout or close. */
	async take(timeoutMs: number): Promise<T | undefined> {
		if (this.items.length === 0 && !(await this.waitForItems(timeoutMs))) {
			return undefined;
		}
		return this.items.shift();
	}

	/** Resolves true once an item is available; removes nothing. */
	waitForItems(timeoutMs: number): Promise<boolean> {
		if (this.items.length > 0) return Promise.resolve(true);
		if (this.isClosed) return Promise.resolve(false);

		return new Promise((resolve) => {
			const done = () => {
				clearTimeout(timer);
				this.waiters.delete(done);
				resolve(this.items.length > 0);
			};
			const timer = setTimeout(done, timeoutMs);
			this.waiters.add(done);
		});
	}

	/** Stop accepting items. Queued items stay drainable. */
	close(): void {
		this.isClosed = true;
		this.wake();
	}

	private wake(): void {
		for (const waiter of [...this.waiters]) {
			waiter();
		}
	}
}
