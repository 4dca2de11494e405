import { BundleDecodeError, type DecodeErrorCode } from '../errors'
import { type ByteCursor, NEED_MORE, type NeedMore } from './byte-cursor'
import type { ChunkedSource } from './chunked-source'
import { MAX_VARINT_BYTES } from './constants-ans104'

/**
 * resumable zigzag varint (avro `long`): 7 bits per byte, little-endian, high bit = continuation.
 * `step` returns NEED_MORE when the cursor runs dry mid-sequence and keeps the partial value,
 * so the next `step` on a fresh cursor carries on where this one stopped.
 */
export class ZigZagVarint {
	private value = 0
	private scale = 1
	/** bytes consumed so far for the varint being decoded */
	length = 0

	constructor(private readonly start: number) { }

	step(cursor: ByteCursor): number | NeedMore {
		while (true) {
			const b = cursor.readByte()
			if (b === NEED_MORE) return NEED_MORE

			this.length++
			this.value += (b & 0x7f) * this.scale
			this.scale *= 128

			if ((b & 0x80) === 0) {
				if (!Number.isSafeInteger(this.value)) {
					throw new BundleDecodeError('MalformedVarint', `varint value exceeds 2^53 after ${this.length} bytes`, this.start)
				}
				return zigzag(this.value)
			}
			if (this.length >= MAX_VARINT_BYTES) {
				throw new BundleDecodeError('MalformedVarint', `varint continues past ${MAX_VARINT_BYTES} bytes`, this.start)
			}
		}
	}
}

const zigzag = (n: number) => (n % 2 === 0 ? n / 2 : -(n + 1) / 2)

/**
 * read one varint from the source, pulling chunks as needed.
 * running out of input (end of data, or end of the enclosing span) mid-sequence is TruncatedVarint.
 */
export const readVarint = async (source: ChunkedSource): Promise<number> => {
	const varint = new ZigZagVarint(source.offset)
	while (true) {
		const value = varint.step(source.current())
		if (value !== NEED_MORE) return value
		if (!(await source.refill())) {
			throw new BundleDecodeError(
				'TruncatedVarint',
				varint.length === 0 ? 'input ended before varint' : `input ended after ${varint.length} varint bytes`,
				source.offset,
			)
		}
	}
}

/** varint length followed by that many bytes */
export const readLengthPrefixed = async (source: ChunkedSource, what: string): Promise<Uint8Array> => {
	const start = source.offset
	const length = await readVarint(source)
	if (length < 0) throw new BundleDecodeError('MalformedTags', `negative ${what} length ${length}`, start)
	return source.read(length, what)
}

/** unsigned little-endian integer, as a safe number or null */
export const byteArrayToLong = (bytes: Uint8Array): number | null => {
	let value = 0n
	for (let i = bytes.length - 1; i >= 0; i--) {
		value = value * 256n + BigInt(bytes[i])
	}
	return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : null
}

/** fixed width little-endian field; `code` is raised when the value does not fit a safe integer */
export const readLong = async (source: ChunkedSource, width: number, code: DecodeErrorCode, what: string): Promise<number> => {
	const start = source.offset
	const value = byteArrayToLong(await source.read(width, what))
	if (value === null) throw new BundleDecodeError(code, `${what} exceeds 2^53-1`, start)
	return value
}
