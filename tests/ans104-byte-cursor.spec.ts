import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { ByteCursor, NEED_MORE } from '../libs/ans104/byte-cursor'

describe('ByteCursor', () => {

	it('tracks stream offsets from the chunk base', () => {
		const cursor = new ByteCursor(Uint8Array.of(1, 2, 3, 4), 100)
		assert.equal(cursor.offset, 100)
		assert.equal(cursor.readByte(), 1)
		assert.deepEqual(cursor.request(2), Uint8Array.of(2, 3))
		assert.equal(cursor.offset, 103)
		assert.equal(cursor.remaining, 1)
	})

	it('returns NEED_MORE without consuming when a request cannot be met', () => {
		const cursor = new ByteCursor(Uint8Array.of(1, 2), 0)
		assert.equal(cursor.request(3), NEED_MORE)
		assert.equal(cursor.offset, 0)
		assert.deepEqual(cursor.take(3), Uint8Array.of(1, 2))
		assert.equal(cursor.readByte(), NEED_MORE)
	})

	it('clamps reads to a limit and lifts the clamp again', () => {
		const cursor = new ByteCursor(Uint8Array.of(1, 2, 3, 4, 5), 10)
		cursor.setLimit(12)
		assert.equal(cursor.remaining, 2)
		assert.equal(cursor.request(3), NEED_MORE)
		assert.deepEqual(cursor.take(5), Uint8Array.of(1, 2))
		assert.deepEqual(cursor.rest(), Uint8Array.of(3, 4, 5))

		cursor.setLimit(1_000)
		assert.equal(cursor.remaining, 3)
	})
})
