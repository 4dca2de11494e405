/**
 * single-producer/single-consumer handoff with a fixed capacity.
 * `push` waits while the queue is full; `shift` waits while it is empty.
 * `cancel` rejects a waiting producer and every later push, and ends the consumer side.
 */
export const createBoundedQueue = <T>(capacity: number) => {
	if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`queue capacity must be >= 1, got ${capacity}`)

	const items: T[] = []
	const takers: Array<(result: IteratorResult<T, undefined>) => void> = []
	const putters: Array<{ resolve: () => void; reject: (reason: unknown) => void }> = []
	let ended = false
	let cancelled: { reason: unknown } | null = null

	const push = async (item: T): Promise<void> => {
		while (true) {
			if (cancelled) throw cancelled.reason
			if (ended) throw new Error('push after end')

			const taker = takers.shift()
			if (taker) return taker({ done: false, value: item })

			if (items.length < capacity) {
				items.push(item)
				return
			}
			await new Promise<void>((resolve, reject) => putters.push({ resolve, reject }))
		}
	}

	const shift = (): Promise<IteratorResult<T, undefined>> => {
		if (items.length > 0) {
			const value = items[0]
			items.shift()
			putters.shift()?.resolve()
			return Promise.resolve({ done: false, value })
		}
		if (ended || cancelled) return Promise.resolve({ done: true, value: undefined })
		return new Promise(resolve => takers.push(resolve))
	}

	/** no more pushes; the consumer drains what is queued then finishes */
	const end = () => {
		ended = true
		for (const taker of takers.splice(0)) taker({ done: true, value: undefined })
	}

	const cancel = (reason: unknown) => {
		if (cancelled) return
		cancelled = { reason }
		items.length = 0
		for (const putter of putters.splice(0)) putter.reject(reason)
		for (const taker of takers.splice(0)) taker({ done: true, value: undefined })
	}

	async function* drain(): AsyncGenerator<T, void, undefined> {
		while (true) {
			const next = await shift()
			if (next.done) return
			yield next.value
		}
	}

	return {
		push,
		shift,
		end,
		cancel,
		drain,
	}
}
