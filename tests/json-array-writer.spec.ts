import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { JsonArrayWriter } from '../libs/json/array-writer'
import { OutputIoError } from '../libs/errors'
import { CollectingSink } from './mocks/chunk-server'

describe('JsonArrayWriter', () => {

	it('writes exactly [] for no elements', async () => {
		const sink = new CollectingSink()
		const writer = new JsonArrayWriter<number>(sink)
		await writer.open()
		await writer.close()
		assert.equal(sink.text, '[]')
		assert.equal(sink.writableFinished, true)
	})

	it('writes one element per line', async () => {
		const sink = new CollectingSink()
		const writer = new JsonArrayWriter<{ a: number; b: string | null }>(sink)
		await writer.open()
		await writer.writeItem({ a: 1, b: 'x' })
		await writer.writeItem({ a: 2, b: null })
		await writer.close()
		assert.equal(sink.text, '[\n{"a":1,"b":"x"},\n{"a":2,"b":null}\n]')
		assert.deepEqual(JSON.parse(sink.text), [{ a: 1, b: 'x' }, { a: 2, b: null }])
		assert.equal(writer.itemsWritten, 2)
	})

	it('leaves the array open on abort', async () => {
		const sink = new CollectingSink()
		const writer = new JsonArrayWriter<number>(sink)
		await writer.open()
		await writer.writeItem(1)
		await writer.abort()
		assert.equal(sink.text, '[\n1')
		assert.equal(sink.writableFinished, true)
		await assert.rejects(writer.writeItem(2), { message: 'cannot write to a aborted writer' })
	})

	it('refuses to write before open or after close', async () => {
		const writer = new JsonArrayWriter<number>(new CollectingSink())
		await assert.rejects(writer.writeItem(1), { message: 'cannot write to a new writer' })
		await writer.open()
		await writer.close()
		await assert.rejects(writer.close(), { message: 'cannot close a closed writer' })
	})

	it('surfaces a failing sink as OutputIoError', async () => {
		const sink = new CollectingSink(1)
		const writer = new JsonArrayWriter<number>(sink)
		await writer.open()
		await assert.rejects(async () => {
			await writer.writeItem(1)
			await writer.writeItem(2)
			await writer.close()
		}, OutputIoError)
		await writer.abort()
		assert.equal(sink.text, '[')
	})
})
