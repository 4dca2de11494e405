import { once } from 'node:events'
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import { OutputIoError } from '../errors'

/**
 * writes a JSON array to a sink one element at a time.
 * `[` on open, each element on its own line, `]` on close. the empty array is exactly `[]`.
 * an element is serialized in full before any of it reaches the sink.
 */
export class JsonArrayWriter<T> {
	private count = 0
	private state: 'new' | 'open' | 'closed' | 'aborted' = 'new'
	private failure: Error | null = null

	constructor(private readonly sink: Writable) {
		sink.on('error', (err: Error) => {
			this.failure ??= err
		})
	}

	get itemsWritten() {
		return this.count
	}

	async open(): Promise<void> {
		if (this.state !== 'new') throw new Error(`cannot open a ${this.state} writer`)
		this.state = 'open'
		await this.write('[')
	}

	async writeItem(item: T): Promise<void> {
		if (this.state !== 'open') throw new Error(`cannot write to a ${this.state} writer`)
		const text = JSON.stringify(item)
		await this.write((this.count === 0 ? '\n' : ',\n') + text)
		this.count++
	}

	async close(): Promise<void> {
		if (this.state !== 'open') throw new Error(`cannot close a ${this.state} writer`)
		await this.write(this.count === 0 ? ']' : '\n]')
		this.state = 'closed'
		await this.finish()
	}

	/**
	 * end the sink as-is, leaving the array unterminated.
	 * called while a run is already failing, so a sink error here is logged, not thrown over the first failure.
	 */
	async abort(): Promise<void> {
		if (this.state === 'closed' || this.state === 'aborted') return
		this.state = 'aborted'
		if (this.sink.destroyed || this.failure) return
		try {
			await this.finish()
		} catch (err: unknown) {
			console.error(JsonArrayWriter.name, 'error ending output after failure', err)
		}
	}

	private async write(text: string): Promise<void> {
		if (this.failure) throw new OutputIoError('output sink failed', { cause: this.failure })
		//a destroyed sink never emits 'drain'
		if (this.sink.destroyed || this.sink.errored) {
			throw new OutputIoError('output sink closed', { cause: this.sink.errored ?? undefined })
		}
		try {
			if (!this.sink.write(text)) await once(this.sink, 'drain')
		} catch (err: unknown) {
			throw new OutputIoError('write to output sink failed', { cause: err })
		}
	}

	private async finish(): Promise<void> {
		try {
			this.sink.end()
			await finished(this.sink)
		} catch (err: unknown) {
			throw new OutputIoError('finalizing output sink failed', { cause: err })
		}
		if (this.failure) throw new OutputIoError('output sink failed', { cause: this.failure })
	}
}
