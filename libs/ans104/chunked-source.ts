import { BundleDecodeError, TransportError, type DecodeErrorCode } from '../errors'
import { ByteCursor, NEED_MORE } from './byte-cursor'

/** fetch the chunk starting at `offset` bytes into the transaction data. chunk length is decided by the node */
export type FetchChunk = (offset: number, signal: AbortSignal) => Promise<Uint8Array>

export interface ChunkedSourceOptions {
	/** declared size of the transaction data */
	totalSize: number
	/** extra attempts per chunk before giving up */
	retries?: number
	/** first backoff, doubled on each further attempt */
	retryDelayMs?: number
	signal?: AbortSignal
	sleep?: (ms: number) => Promise<void>
	/** prefix for log lines, usually the txid */
	label?: string
}

interface Span {
	end: number
	code: DecodeErrorCode
	what: string
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * pull-based byte source over a transaction's chunks.
 * holds one chunk at a time (plus the unread tail of the previous one when a read straddles chunks).
 * decoders read through `read`/`skip`, or step the current cursor themselves and call `refill` on NEED_MORE.
 * `within` opens a nested span (item, tag block); reads past its end fail with the span's error code.
 */
export class ChunkedSource {
	readonly totalSize: number
	private cursor = new ByteCursor(new Uint8Array(0), 0)
	/** stream offset just past the last fetched byte */
	private fetched = 0
	private readonly spans: Span[] = []
	private readonly retries: number
	private readonly retryDelayMs: number
	private readonly signal: AbortSignal
	private readonly sleep: (ms: number) => Promise<void>
	private readonly label: string
	chunksFetched = 0

	constructor(
		private readonly fetchChunk: FetchChunk,
		options: ChunkedSourceOptions,
	) {
		if (!Number.isSafeInteger(options.totalSize) || options.totalSize < 0) {
			throw new RangeError(`invalid totalSize ${options.totalSize}`)
		}
		this.totalSize = options.totalSize
		this.retries = options.retries ?? 1
		this.retryDelayMs = options.retryDelayMs ?? 1_000
		this.signal = options.signal ?? new AbortController().signal
		this.sleep = options.sleep ?? sleep
		this.label = options.label ?? ChunkedSource.name
	}

	/** stream offset of the next unread byte */
	get offset() {
		return this.cursor.offset
	}

	/** end of the innermost open span */
	get limit() {
		return this.spans.length > 0 ? this.spans[this.spans.length - 1].end : this.totalSize
	}

	/** bytes left before the innermost span ends */
	get remaining() {
		return this.limit - this.offset
	}

	get exhausted() {
		return this.offset === this.totalSize
	}

	current(): ByteCursor {
		return this.cursor
	}

	/**
	 * fetch the next chunk and make it the current cursor, carrying over any unread bytes.
	 * resolves false, without fetching, when the innermost span (or the transaction) has no bytes past the current chunk.
	 */
	async refill(): Promise<boolean> {
		if (this.fetched >= this.limit) return false

		const chunk = await this.fetchWithRetry(this.fetched)
		const wanted = this.totalSize - this.fetched
		const bytes = chunk.length > wanted ? chunk.subarray(0, wanted) : chunk

		const leftover = this.cursor.rest()
		let merged = bytes
		if (leftover.length > 0) {
			merged = new Uint8Array(leftover.length + bytes.length)
			merged.set(leftover)
			merged.set(bytes, leftover.length)
		}
		this.cursor = new ByteCursor(merged, this.fetched - leftover.length)
		this.cursor.setLimit(this.limit)
		this.fetched += bytes.length
		return true
	}

	/** exactly n bytes, as an owned copy */
	async read(n: number, what = 'bytes'): Promise<Uint8Array> {
		this.ensureAvailable(n, what)

		const direct = this.cursor.request(n)
		if (direct !== NEED_MORE) return direct.slice()

		const out = new Uint8Array(n)
		let filled = 0
		while (filled < n) {
			const part = this.cursor.take(n - filled)
			out.set(part, filled)
			filled += part.length
			if (filled < n && !(await this.refill())) {
				throw new BundleDecodeError('UnexpectedEof', `data ended ${n - filled} bytes short reading ${what}`, this.offset)
			}
		}
		return out
	}

	async skip(n: number, what = 'bytes'): Promise<void> {
		this.ensureAvailable(n, what)
		let left = n
		while (left > 0) {
			left -= this.cursor.take(left).length
			if (left > 0 && !(await this.refill())) {
				throw new BundleDecodeError('UnexpectedEof', `data ended ${left} bytes short skipping ${what}`, this.offset)
			}
		}
	}

	/** run `fn` with reads clamped to the next `length` bytes */
	async within<T>(length: number, code: DecodeErrorCode, what: string, fn: () => Promise<T>): Promise<T> {
		this.ensureAvailable(length, what)
		this.spans.push({ end: this.offset + length, code, what })
		this.cursor.setLimit(this.limit)
		try {
			return await fn()
		} finally {
			this.spans.pop()
			this.cursor.setLimit(this.limit)
		}
	}

	private ensureAvailable(n: number, what: string) {
		if (n <= this.remaining) return
		const span = this.spans.length > 0 ? this.spans[this.spans.length - 1] : undefined
		throw new BundleDecodeError(
			span?.code ?? 'UnexpectedEof',
			`${what} needs ${n} bytes, ${this.remaining} left in ${span?.what ?? 'transaction'}`,
			this.offset,
		)
	}

	private async fetchWithRetry(offset: number): Promise<Uint8Array> {
		for (let attempt = 0; ; attempt++) {
			try {
				const chunk = await this.fetchChunk(offset, this.signal)
				if (chunk.length === 0) throw new TransportError(`empty chunk at offset ${offset}`)
				this.chunksFetched++
				console.info(this.label, `chunk ${this.chunksFetched} @${offset} ${Math.min(offset + chunk.length, this.totalSize)}/${this.totalSize} bytes ✅`)
				return chunk
			} catch (err: unknown) {
				if (this.signal.aborted) throw err
				if (attempt >= this.retries) {
					throw new TransportError(
						`chunk at offset ${offset} failed after ${attempt + 1} attempts`,
						err instanceof TransportError ? err.status : undefined,
						{ cause: err },
					)
				}
				const delay = this.retryDelayMs * 2 ** attempt
				console.warn(this.label, `chunk at offset ${offset} failed: ${String(err)}. retrying in ${delay}ms...`)
				await this.sleep(delay)
			}
		}
	}
}
