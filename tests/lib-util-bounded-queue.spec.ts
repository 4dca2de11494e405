import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { createBoundedQueue } from '../libs/utils/bounded-queue'

describe('bounded queue', () => {

	it('hands items over in order', async () => {
		const queue = createBoundedQueue<number>(2)
		const received: number[] = []
		const consumer = (async () => {
			for await (const n of queue.drain()) received.push(n)
		})()
		for (const n of [1, 2, 3, 4, 5]) await queue.push(n)
		queue.end()
		await consumer
		assert.deepEqual(received, [1, 2, 3, 4, 5])
	})

	it('blocks the producer while full', async () => {
		const queue = createBoundedQueue<string>(1)
		await queue.push('a')
		let pushed = false
		const pending = queue.push('b').then(() => { pushed = true })
		await new Promise(resolve => setImmediate(resolve))
		assert.equal(pushed, false)

		assert.deepEqual(await queue.shift(), { done: false, value: 'a' })
		await pending
		assert.equal(pushed, true)
		assert.deepEqual(await queue.shift(), { done: false, value: 'b' })
	})

	it('drains queued items after end', async () => {
		const queue = createBoundedQueue<number>(3)
		await queue.push(1)
		await queue.push(2)
		queue.end()
		await assert.rejects(queue.push(3), { message: 'push after end' })
		const received: number[] = []
		for await (const n of queue.drain()) received.push(n)
		assert.deepEqual(received, [1, 2])
	})

	it('cancel rejects a waiting producer and ends the consumer', async () => {
		const queue = createBoundedQueue<number>(1)
		await queue.push(1)
		const blocked = queue.push(2)
		const reason = new Error('writer failed')
		queue.cancel(reason)
		await assert.rejects(blocked, reason)
		await assert.rejects(queue.push(3), reason)
		assert.deepEqual(await queue.shift(), { done: true, value: undefined })
	})

	it('rejects a capacity below 1', () => {
		assert.throws(() => createBoundedQueue(0), RangeError)
	})
})
