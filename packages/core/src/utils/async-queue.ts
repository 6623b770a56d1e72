/**
 * Unbounded single-consumer queue exposed as an async iterator
 *
 * Producers push synchronously from socket callbacks; the consumer awaits
 * items with for-await. `end()` finishes iteration after queued items are
 * drained, `fail()` rejects the next pending or future read.
 */

interface Waiter<T> {
	resolve: (result: IteratorResult<T, undefined>) => void
	reject: (error: Error) => void
}

export class AsyncQueue<T extends object> implements AsyncIterableIterator<T> {
	private readonly items: T[] = []
	private readonly waiters: Waiter<T>[] = []
	private ended = false
	private error: Error | null = null

	get size(): number {
		return this.items.length
	}

	get isEnded(): boolean {
		return this.ended || this.error !== null
	}

	push(item: T): boolean {
		if (this.isEnded) {
			return false
		}

		const waiter = this.waiters.shift()
		if (waiter) {
			waiter.resolve({ done: false, value: item })
		} else {
			this.items.push(item)
		}
		return true
	}

	end(): void {
		if (this.isEnded) {
			return
		}
		this.ended = true
		for (const waiter of this.waiters.splice(0)) {
			waiter.resolve({ done: true, value: undefined })
		}
	}

	fail(error: Error): void {
		if (this.isEnded) {
			return
		}
		this.error = error
		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(error)
		}
	}

	/**
	 * Drop queued items, e.g. on reset
	 */
	clear(): T[] {
		return this.items.splice(0)
	}

	next(): Promise<IteratorResult<T, undefined>> {
		const item = this.items.shift()
		if (item !== undefined) {
			return Promise.resolve({ done: false, value: item })
		}
		if (this.error) {
			return Promise.reject(this.error)
		}
		if (this.ended) {
			return Promise.resolve({ done: true, value: undefined })
		}

		return new Promise((resolve, reject) => {
			this.waiters.push({ resolve, reject })
		})
	}

	return(): Promise<IteratorResult<T, undefined>> {
		this.end()
		this.items.length = 0
		return Promise.resolve({ done: true, value: undefined })
	}

	[Symbol.asyncIterator](): AsyncIterableIterator<T> {
		return this
	}
}
