import { BundleDecodeError } from '../errors'
import { parseBundleHeader, type BundleEntry, type BundleHeader } from './bundle-header'
import type { ChunkedSource } from './chunked-source'
import { decodeDataItem, type DataItem } from './data-item'

export interface DecodeBundleOptions {
	onHeader?: (header: BundleHeader) => void
	/** decide what happens after a malformed item. default 'abort' rethrows */
	onItemError?: (err: BundleDecodeError, entry: BundleEntry, index: number) => 'skip' | 'abort'
}

/**
 * lazily decode a bundle: header first, then one dataItem per header entry, in order.
 * nothing is retained between items; the caller owns each yielded item.
 */
export async function* decodeBundle(source: ChunkedSource, options: DecodeBundleOptions = {}): AsyncGenerator<DataItem, void, undefined> {
	const header = await parseBundleHeader(source)
	console.info(decodeBundle.name, `header: ${header.itemCount} dataItems, body starts at ${header.bodyOffset}`)
	options.onHeader?.(header)

	let expectedOffset = header.bodyOffset
	for (let index = 0; index < header.entries.length; index++) {
		const entry = header.entries[index]
		//header sizes vs consumed bytes. decodeDataItem and skip both end exactly on an item boundary, so this only trips on a decoder bug
		if (source.offset !== expectedOffset) {
			throw new BundleDecodeError('ItemSizeMismatch', `dataItem ${index} should start at ${expectedOffset}`, source.offset, { itemIndex: index })
		}

		let item: DataItem
		try {
			item = await decodeDataItem(source, entry)
		} catch (err: unknown) {
			if (!(err instanceof BundleDecodeError)) throw err

			const wrapped = new BundleDecodeError(err.code, `dataItem ${index} (${entry.id}) starting at ${expectedOffset} failed`, err.offset, { itemIndex: index, cause: err })
			if (options.onItemError?.(wrapped, entry, index) !== 'skip') throw wrapped

			console.warn(decodeBundle.name, `skipping ${wrapped.message}`)
			await source.skip(expectedOffset + entry.size - source.offset, `remainder of dataItem ${index}`)
			expectedOffset += entry.size
			continue
		}

		expectedOffset += entry.size
		console.debug(decodeBundle.name, `dataItem ${index + 1}/${header.itemCount} ${entry.id} ${entry.size} bytes`)
		yield item
	}
}
