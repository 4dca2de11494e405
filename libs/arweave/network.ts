import Arweave from 'arweave'
import { arGql } from 'ar-gql'
import { z } from 'zod'
import type { Config } from '../../Config'
import { TransportError } from '../errors'
import { fetchJsonRetried, type RetryOptions } from './fetch-retry'
import { gqlTx, type GqlTxLookup, type TxTag } from './gqlTx'

/** the network collaborator a bundle dump needs */
export interface BundleNetwork {
	/** tx tags, utf-8 decoded */
	txTags(txid: string): Promise<TxTag[]>
	/** absolute weave end offset and data size of a base tx */
	txOffset(txid: string): Promise<{ offset: number; size: number }>
	/** one chunk of weave data starting at an absolute weave offset */
	fetchChunk(absoluteOffset: number, signal: AbortSignal): Promise<Uint8Array>
}

const safeNumberString = z.string().regex(/^\d+$/).transform(Number).refine(Number.isSafeInteger, 'not a safe integer')

const OffsetSchema = z.object({
	offset: safeNumberString,
	size: safeNumberString,
})

const ChunkSchema = z.object({
	chunk: z.string(),
	packing: z.string().optional(),
})

const TxSchema = z.object({
	id: z.string(),
	tags: z.array(z.object({ name: z.string(), value: z.string() })),
})

/**
 * lookup order: primary gql, secondary gql, then the node's /tx/{id} (tags are base64url there).
 * the last one also finds txs that are mined but not indexed yet.
 */
export const fetchTxTags = async (
	txid: string,
	gqls: GqlTxLookup[],
	hostUrl: string,
	retry: RetryOptions,
	gqlRetryMs?: number,
): Promise<TxTag[]> => {
	for (const gql of gqls) {
		const tx = await gqlTx(txid, gql, gqlRetryMs)
		if (tx) return tx.tags
		console.warn(fetchTxTags.name, `${txid} not found using ${gql.endpointUrl}`)
	}

	const tx = await fetchJsonRetried(`${hostUrl}/tx/${txid}`, TxSchema, retry)
	if (!tx) {
		throw new TransportError(`${txid} not found using ${[...gqls.map(g => g.endpointUrl), hostUrl].join(', ')}`, 404)
	}
	return tx.tags.map(({ name, value }) => ({
		name: Arweave.utils.b64UrlToString(name),
		value: Arweave.utils.b64UrlToString(value),
	}))
}

export const fetchTxOffset = async (txid: string, hostUrl: string, retry: RetryOptions) => {
	const offsets = await fetchJsonRetried(`${hostUrl}/tx/${txid}/offset`, OffsetSchema, retry)
	if (!offsets) throw new TransportError(`no offset for ${txid} at ${hostUrl}. not mined, or not a base tx?`, 404)
	return offsets
}

/**
 * single attempt per call (the caller owns the retry policy).
 * a failed request moves later requests on to the next node.
 */
export const createChunkFetcher = (nodes: string[]) => {
	if (nodes.length === 0) throw new Error(`${createChunkFetcher.name}: no nodes`)
	let nodeIndex = 0

	return async (absoluteOffset: number, signal: AbortSignal): Promise<Uint8Array> => {
		const url = `${nodes[nodeIndex % nodes.length]}/chunk/${absoluteOffset}`
		try {
			const res = await fetch(url, { signal, headers: { 'x-packing': 'unpacked' } })
			if (res.status !== 200) {
				await res.body?.cancel()
				throw new TransportError(`${url} failed: ${res.status} ${res.statusText}`, res.status)
			}
			const parsed = ChunkSchema.safeParse(await res.json())
			if (!parsed.success) throw new TransportError(`${url} unexpected chunk response`, res.status)
			if (parsed.data.packing && parsed.data.packing !== 'unpacked') {
				throw new TransportError(`${url} chunk not unpacked: ${parsed.data.packing}`, res.status)
			}
			return Arweave.utils.b64UrlToBuffer(parsed.data.chunk)
		} catch (err: unknown) {
			if (!signal.aborted && nodes.length > 1) {
				nodeIndex++
				console.warn(createChunkFetcher.name, `${url} ${String(err)}. next node ${nodes[nodeIndex % nodes.length]}`)
			}
			throw err
		}
	}
}

export const createArweaveNetwork = (config: Config): BundleNetwork => {
	const retry: RetryOptions = { retries: config.chunk_retries, retryMs: config.chunk_retry_ms }
	const gqls = [
		arGql({ endpointUrl: config.gql_url, retries: 3 }),
		arGql({ endpointUrl: config.gql_url_secondary, retries: 3 }),
	]
	return {
		txTags: (txid) => fetchTxTags(txid, gqls, config.host_url, retry),
		txOffset: (txid) => fetchTxOffset(txid, config.host_url, retry),
		fetchChunk: createChunkFetcher([config.host_url, ...config.http_api_nodes]),
	}
}
