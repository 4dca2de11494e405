import type { Writable } from 'node:stream'
import type { DataItemRecord, DumpStats } from '../types'
import { decodeBundle, type DecodeBundleOptions } from './ans104/bundle-decoder'
import { ChunkedSource } from './ans104/chunked-source'
import { toDataItemRecord } from './ans104/data-item-record'
import { verifyBundle } from './arweave/bundle-verifier'
import type { BundleNetwork } from './arweave/network'
import { JsonArrayWriter } from './json/array-writer'
import { createBoundedQueue } from './utils/bounded-queue'

export interface DumpBundleOptions {
	txid: string
	network: BundleNetwork
	/** opened once the tx is confirmed as a bundle. ended on success and on failure */
	openSink: () => Writable
	chunkRetries: number
	chunkRetryMs: number
	writeQueueSize: number
	sleep?: (ms: number) => Promise<void>
	onItemError?: DecodeBundleOptions['onItemError']
}

/**
 * verify → offset → stream chunks → decode items → write JSON array.
 * decoding and writing run concurrently, joined by a bounded queue; either side failing stops both.
 * on failure the sink is ended without the closing bracket and the error is rethrown.
 */
export const dumpBundle = async ({ txid, network, openSink, chunkRetries, chunkRetryMs, writeQueueSize, sleep, onItemError }: DumpBundleOptions): Promise<DumpStats> => {
	await verifyBundle(txid, network.txTags)

	const { offset, size } = await network.txOffset(txid)
	const dataStart = offset - size + 1 //first byte of the tx in weave coordinates
	console.info(dumpBundle.name, txid, `data size ${size}, weave offsets ${dataStart}-${offset}`)

	const aborter = new AbortController()
	const source = new ChunkedSource(
		(relative, signal) => network.fetchChunk(dataStart + relative, signal),
		{ totalSize: size, retries: chunkRetries, retryDelayMs: chunkRetryMs, signal: aborter.signal, sleep, label: txid },
	)
	const writer = new JsonArrayWriter<DataItemRecord>(openSink())
	const queue = createBoundedQueue<DataItemRecord>(writeQueueSize)

	let writeFailure: unknown = null
	let decodeFailure: unknown = null

	try {
		await writer.open()
	} catch (err: unknown) {
		await writer.abort()
		throw err
	}

	//consumer. settles without rejecting; failures land in writeFailure
	const writing = (async () => {
		for await (const record of queue.drain()) {
			await writer.writeItem(record)
		}
	})().catch((err: unknown) => {
		writeFailure = err
		queue.cancel(err)
		aborter.abort('output failed')
	})

	try {
		for await (const item of decodeBundle(source, { onItemError })) {
			await queue.push(toDataItemRecord(item))
		}
		queue.end()
	} catch (err: unknown) {
		decodeFailure = err
		queue.cancel(err)
		aborter.abort('decode failed')
	}
	await writing

	const failure = writeFailure ?? decodeFailure
	if (failure) {
		console.error(dumpBundle.name, txid, `failed after ${writer.itemsWritten} dataItems, ${source.offset}/${size} bytes`)
		await writer.abort()
		throw failure
	}

	await writer.close()
	console.info(dumpBundle.name, txid, `done. ${writer.itemsWritten} dataItems, ${source.chunksFetched} chunks`)
	return { txid, items: writer.itemsWritten, bytes: size, chunks: source.chunksFetched }
}
