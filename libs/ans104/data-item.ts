import { BundleDecodeError } from '../errors'
import type { BundleEntry } from './bundle-header'
import type { ChunkedSource } from './chunked-source'
import { ANCHOR_LENGTH, LONG_LENGTH, SIG_CONFIG, TARGET_LENGTH } from './constants-ans104'
import { readTags, type Tag } from './tags'
import { byteArrayToLong, readLong } from './varint'

export interface DataItem {
	id: string
	signatureType: number
	signatureName: string
	signature: Uint8Array
	owner: Uint8Array
	target: Uint8Array | null
	anchor: Uint8Array | null
	tags: Tag[]
	data: Uint8Array
}

/**
 * decode one dataItem occupying exactly `entry.size` bytes from the current offset.
 * reads cannot pass the item end; any overread is ItemOverrun.
 * field order: sig type, signature, owner, target?, anchor?, tag count, tag bytes, tags, data.
 */
export const decodeDataItem = async (source: ChunkedSource, entry: BundleEntry): Promise<DataItem> => {
	const itemEnd = source.offset + entry.size

	return source.within(entry.size, 'ItemOverrun', `dataItem ${entry.id}`, async () => {
		const sigTypeOffset = source.offset
		const signatureType = byteArrayToLong(await source.read(2, 'signature type')) ?? -1
		const sigConfig = SIG_CONFIG[signatureType]
		if (!sigConfig) {
			throw new BundleDecodeError('UnknownSignatureType', `unsupported signature type ${signatureType}`, sigTypeOffset)
		}

		const signature = await source.read(sigConfig.sigLength, 'signature')
		const owner = await source.read(sigConfig.pubLength, 'owner')
		const target = await readOptional(source, TARGET_LENGTH, 'target')
		const anchor = await readOptional(source, ANCHOR_LENGTH, 'anchor')

		const tagCount = await readLong(source, LONG_LENGTH, 'TagCountMismatch', 'tag count')
		const tagBytes = await readLong(source, LONG_LENGTH, 'TagLengthMismatch', 'tag bytes')
		const tags = await readTags(source, tagCount, tagBytes)

		//data is whatever the declared size leaves over. reads above cannot pass itemEnd, so this is never negative
		const data = await source.read(itemEnd - source.offset, 'data')

		return {
			id: entry.id,
			signatureType,
			signatureName: sigConfig.sigName,
			signature,
			owner,
			target,
			anchor,
			tags,
			data,
		}
	})
}

/** one presence byte (0|1), then `length` bytes when present */
const readOptional = async (source: ChunkedSource, length: number, what: string): Promise<Uint8Array | null> => {
	const flagOffset = source.offset
	const [flag] = await source.read(1, `${what} presence byte`)
	if (flag === 0) return null
	if (flag === 1) return source.read(length, what)
	throw new BundleDecodeError('InvalidPresenceFlag', `invalid ${what} presence byte ${flag}`, flagOffset)
}
