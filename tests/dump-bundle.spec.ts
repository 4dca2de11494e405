import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { dumpBundle } from '../libs/dump-bundle'
import { BundleDecodeError, NotABundleError, OutputIoError, TransportError } from '../libs/errors'
import type { DataItemRecord } from '../types'
import { encodeBundle, encodeDataItem, fill } from './mocks/bundle-builder'
import { CollectingSink, recordingSleep } from './mocks/chunk-server'
import { createFakeNetwork } from './mocks/fake-network'

const txid = 'test-bundle-txid-000000000000000000000000000'

const items = [
	encodeDataItem({ signatureType: 1, tags: [{ name: 'Content-Type', value: 'text/plain' }], data: 'hi' }),
	encodeDataItem({ signatureType: 3, target: fill(32, 0xaa), data: fill(1_000, 0x44) }),
	encodeDataItem({ signatureType: 4, anchor: fill(32, 0xbb) }),
]

const run = (network: ReturnType<typeof createFakeNetwork>['network'], sink: CollectingSink, extra: { writeQueueSize?: number } = {}) => {
	let opened = 0
	const { sleep } = recordingSleep()
	const result = dumpBundle({
		txid,
		network,
		openSink: () => {
			opened++
			return sink
		},
		chunkRetries: 1,
		chunkRetryMs: 10,
		writeQueueSize: extra.writeQueueSize ?? 16,
		sleep,
	})
	return { result, opened: () => opened }
}

describe('dumpBundle', () => {

	it('dumps every dataItem as one JSON array', async () => {
		const data = encodeBundle(items)
		const { network, requests } = createFakeNetwork(data, { chunkSize: 333 })
		const sink = new CollectingSink()
		const stats = await run(network, sink).result

		const records: DataItemRecord[] = JSON.parse(sink.text)
		assert.deepEqual(records.map(r => [r.signature_type, r.signature_name]), [[1, 'arweave'], [3, 'ethereum'], [4, 'solana']])
		assert.deepEqual(Object.keys(records[0]), ['id', 'signature_type', 'signature_name', 'signature', 'owner', 'target', 'anchor', 'tags', 'data'])
		assert.equal(records[0].data, 'aGk')
		assert.equal(records[1].target, 'qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqo')
		assert.equal(records[2].anchor, 'u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7u7s')
		assert.equal(records[2].data, '')
		assert(sink.text.startsWith('[\n{"id":"AQEB'))
		assert(sink.text.endsWith('}\n]'))

		assert.deepEqual(stats, { txid, items: 3, bytes: data.length, chunks: Math.ceil(data.length / 333) })
		assert.equal(requests[0], 0)
	})

	it('writes [] for an empty bundle', async () => {
		const { network } = createFakeNetwork(encodeBundle([]))
		const sink = new CollectingSink()
		const stats = await run(network, sink).result
		assert.equal(sink.text, '[]')
		assert.equal(stats.items, 0)
	})

	it('applies backpressure through a queue of one', async () => {
		const data = encodeBundle(items)
		const { network } = createFakeNetwork(data, { chunkSize: 50 })
		const sink = new CollectingSink()
		const stats = await run(network, sink, { writeQueueSize: 1 }).result
		assert.equal(stats.items, 3)
		assert.equal(JSON.parse(sink.text).length, 3)
	})

	it('fetches nothing and opens no output for a non-bundle', async () => {
		const { network, requests, lookups } = createFakeNetwork(encodeBundle(items), { tags: [{ name: 'Content-Type', value: 'text/plain' }] })
		const sink = new CollectingSink()
		const { result, opened } = run(network, sink)
		await assert.rejects(result, NotABundleError)
		assert.equal(requests.length, 0)
		assert.deepEqual(lookups, [`tags ${txid}`])
		assert.equal(opened(), 0)
	})

	it('leaves the array unterminated when decoding fails', async () => {
		const bad = encodeDataItem({ signatureType: 42 })
		const { network } = createFakeNetwork(encodeBundle([items[0], bad]))
		const sink = new CollectingSink()
		await assert.rejects(run(network, sink).result, (err: unknown) => {
			assert(err instanceof BundleDecodeError)
			assert.equal(err.code, 'UnknownSignatureType')
			assert.equal(err.itemIndex, 1)
			return true
		})
		assert(sink.text.startsWith('[\n{"id":"AQEB'))
		assert(!sink.text.endsWith(']'))
		assert.equal(sink.writableFinished, true)
	})

	it('retries a failing chunk then carries on', async () => {
		const data = encodeBundle(items)
		const { network, requests } = createFakeNetwork(data, { chunkSize: 500, failures: { 500: 1 } })
		const stats = await run(network, new CollectingSink()).result
		assert.equal(stats.items, 3)
		assert.deepEqual(requests.slice(0, 3), [0, 500, 500])
	})

	it('gives up with TransportError when a chunk keeps failing', async () => {
		const { network } = createFakeNetwork(encodeBundle(items), { chunkSize: 500, failures: { 500: 2 } })
		await assert.rejects(run(network, new CollectingSink()).result, (err: unknown) => {
			assert(err instanceof TransportError)
			assert.equal(err.message, 'chunk at offset 500 failed after 2 attempts')
			return true
		})
	})

	it('stops decoding when the output fails', async () => {
		const { network } = createFakeNetwork(encodeBundle(items), { chunkSize: 100 })
		await assert.rejects(run(network, new CollectingSink(1)).result, OutputIoError)
	})
})
