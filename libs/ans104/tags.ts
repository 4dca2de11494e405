import { BundleDecodeError } from '../errors'
import type { ChunkedSource } from './chunked-source'
import { readLengthPrefixed, readVarint } from './varint'

/** name and value are raw bytes; no utf-8 validation */
export interface Tag {
	name: Uint8Array
	value: Uint8Array
}

/**
 * decode an avro `array<{name,value}>` tag block of exactly `tagBytes` bytes holding exactly `tagCount` tags.
 * blocks are `count, items...` until a zero count; a negative count is followed by the block's byte size.
 */
export const readTags = async (source: ChunkedSource, tagCount: number, tagBytes: number): Promise<Tag[]> => {
	const start = source.offset

	//arbundles writes no bytes at all for an empty tag list
	if (tagBytes === 0) {
		if (tagCount !== 0) throw new BundleDecodeError('TagCountMismatch', `${tagCount} tags declared in 0 tag bytes`, start)
		return []
	}

	return source.within(tagBytes, 'TagLengthMismatch', 'tag bytes', async () => {
		const tags: Tag[] = []
		while (true) {
			const blockStart = source.offset
			let count = await readVarint(source)
			if (count === 0) break
			if (count < 0) {
				count = -count
				await readVarint(source) //block size in bytes, not needed
			}
			if (tags.length + count > tagCount) {
				throw new BundleDecodeError('TagCountMismatch', `block of ${count} tags exceeds declared ${tagCount} (have ${tags.length})`, blockStart)
			}
			for (let i = 0; i < count; i++) {
				const name = await readLengthPrefixed(source, 'tag name')
				const value = await readLengthPrefixed(source, 'tag value')
				tags.push({ name, value })
			}
		}

		if (source.remaining !== 0) {
			throw new BundleDecodeError('TagLengthMismatch', `tag array ended ${source.remaining} bytes before declared ${tagBytes}`, source.offset)
		}
		if (tags.length !== tagCount) {
			throw new BundleDecodeError('TagCountMismatch', `decoded ${tags.length} tags, declared ${tagCount}`, source.offset)
		}
		return tags
	})
}
