import Arweave from 'arweave'
import { BundleDecodeError } from '../errors'
import type { ChunkedSource } from './chunked-source'
import { ENTRY_ID_LENGTH, ENTRY_LENGTH, ENTRY_SIZE_LENGTH, HEADER_START } from './constants-ans104'
import { readLong } from './varint'

export interface BundleEntry {
	size: number
	/** base64url dataItem id */
	id: string
}

export interface BundleHeader {
	itemCount: number
	entries: BundleEntry[]
	/** stream offset of the first dataItem body */
	bodyOffset: number
}

/**
 * read the item count and the (size, id) table from the front of the stream.
 * sizes must add up to exactly the bytes that follow the header.
 */
export const parseBundleHeader = async (source: ChunkedSource): Promise<BundleHeader> => {
	const { totalSize } = source
	if (totalSize < HEADER_START) {
		throw new BundleDecodeError('MalformedHeader', `transaction of ${totalSize} bytes is too small for a bundle header`, 0)
	}

	const itemCount = await readLong(source, HEADER_START, 'MalformedHeader', 'item count')
	const headerLength = HEADER_START + ENTRY_LENGTH * itemCount
	if (headerLength > totalSize) {
		throw new BundleDecodeError('MalformedHeader', `${itemCount} items need a ${headerLength} byte header, transaction is ${totalSize} bytes`, 0)
	}

	const bodyLength = totalSize - headerLength
	const entries: BundleEntry[] = []
	let sum = 0
	for (let i = 0; i < itemCount; i++) {
		const entryOffset = source.offset
		const size = await readLong(source, ENTRY_SIZE_LENGTH, 'MalformedHeader', `entry ${i} size`)
		const id = Arweave.utils.bufferTob64Url(await source.read(ENTRY_ID_LENGTH, `entry ${i} id`))
		sum += size
		if (sum > bodyLength) {
			throw new BundleDecodeError('MalformedHeader', `entry ${i} sizes total ${sum} bytes, body is ${bodyLength}`, entryOffset)
		}
		entries.push({ size, id })
	}
	if (sum !== bodyLength) {
		throw new BundleDecodeError('MalformedHeader', `entry sizes total ${sum} bytes, body is ${bodyLength}`, headerLength)
	}

	return { itemCount, entries, bodyOffset: headerLength }
}
