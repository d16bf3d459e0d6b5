export class QueueClosedError extends Error {
	constructor() {
		super("Queue is closed");
		this.name = "QueueClosedError";
	}
}

type PendingPush<T> = {
	item: T;
	resolve: () => void;
	reject: (err: Error) => void;
};

/**
 * FIFO queue with a fixed capacity and async consumers.
 *
 * - `tryPush` never waits: it returns false when the queue is full or closed.
 * - `push` waits for room and rejects with `QueueClosedError` once closed.
 * - `shift` waits for an item; it resolves `undefined` only after the queue
 *   is closed AND every item queued before the close has been taken.
 *
 * Items must not be `undefined` themselves.
 */
export class BoundedQueue<T> {
	private readonly items: T[] = [];
	private readonly takers: Array<(item: T | undefined) => void> = [];
	private readonly pushers: Array<PendingPush<T>> = [];
	private isClosed = false;

	constructor(readonly capacity: number) {
		if (!(capacity > 0)) {
			throw new RangeError(`Queue capacity must be positive (got ${capacity})`);
		}
	}

	get size(): number {
		return this.items.length;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	tryPush(item: T): boolean {
		if (this.isClosed) return false;

		const taker = this.takers.shift();
		if (taker) {
			taker(item);
			return true;
		}

		if (this.items.length >= this.capacity) return false;

		this.items.push(item);
		return true;
	}

	push(item: T): Promise<void> {
		if (this.tryPush(item)) return Promise.resolve();
		if (this.isClosed) return Promise.reject(new QueueClosedError());

		return new Promise<void>((resolve, reject) => {
			this.pushers.push({ item, resolve, reject });
		});
	}

	shift(): Promise<T | undefined> {
		if (this.items.length > 0) return Promise.resolve(this.dequeue());
		if (this.isClosed) return Promise.resolve(undefined);

		return new Promise<T | undefined>((resolve) => {
			this.takers.push(resolve);
		});
	}

	/**
	 * Takes up to `max` items that are already queued, without waiting.
	 */
	drain(max = Number.POSITIVE_INFINITY): T[] {
		const out: T[] = [];
		while (out.length < max && this.items.length > 0) {
			const item = this.dequeue();
			if (item !== undefined) out.push(item);
		}
		return out;
	}

	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;

		for (const taker of this.takers.splice(0)) taker(undefined);

		for (const pending of this.pushers.splice(0)) {
			pending.reject(new QueueClosedError());
		}
	}

	private dequeue(): T | undefined {
		const item = this.items.shift();

		// a slot just freed up: admit the oldest waiting producer
		const pending = this.pushers.shift();
		if (pending) {
			this.items.push(pending.item);
			pending.resolve();
		}

		return item;
	}
}
