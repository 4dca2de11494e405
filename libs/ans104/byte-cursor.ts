export const NEED_MORE = Symbol('NEED_MORE')
export type NeedMore = typeof NEED_MORE

/**
 * read position over one fetched chunk.
 * `base` is the stream offset of bytes[0]; `end` stops reads at a span limit inside the chunk.
 * a request the chunk cannot satisfy returns NEED_MORE and consumes nothing.
 */
export class ByteCursor {
	private pos = 0
	private end: number

	constructor(
		private readonly bytes: Uint8Array,
		readonly base: number,
	) {
		this.end = bytes.length
	}

	/** stream offset of the next unread byte */
	get offset() {
		return this.base + this.pos
	}

	get remaining() {
		return this.end - this.pos
	}

	/** clamp reads to stream offset `limit` (or lift the clamp when limit is past the chunk) */
	setLimit(limit: number) {
		this.end = Math.max(this.pos, Math.min(this.bytes.length, limit - this.base))
	}

	readByte(): number | NeedMore {
		if (this.pos >= this.end) return NEED_MORE
		return this.bytes[this.pos++]
	}

	request(n: number): Uint8Array | NeedMore {
		if (n > this.remaining) return NEED_MORE
		const out = this.bytes.subarray(this.pos, this.pos + n)
		this.pos += n
		return out
	}

	/** up to n bytes, possibly fewer */
	take(n: number): Uint8Array {
		const k = Math.min(n, this.remaining)
		const out = this.bytes.subarray(this.pos, this.pos + k)
		this.pos += k
		return out
	}

	/** unread bytes of the whole chunk, ignoring any limit */
	rest(): Uint8Array {
		return this.bytes.subarray(this.pos)
	}
}
