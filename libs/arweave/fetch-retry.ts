import { z } from 'zod'
import { TransportError } from '../errors'

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export interface RetryOptions {
	/** extra attempts after the first */
	retries: number
	retryMs: number
	signal?: AbortSignal
	sleep?: (ms: number) => Promise<void>
	headers?: Record<string, string>
}

/** 202 is the node's "pending" answer */
const retryable = (status: number) => status === 202 || status === 429 || status >= 500

const attemptJson = async (url: string, signal?: AbortSignal, headers?: Record<string, string>) => {
	const res = await fetch(url, { signal, headers })
	if (res.status !== 200) {
		await res.body?.cancel() //close connection
		return { status: res.status, statusText: res.statusText, json: undefined }
	}
	return { status: res.status, statusText: res.statusText, json: await res.json() as unknown }
}

/**
 * GET json and validate it with `schema`.
 * resolves null on 404 (if the data isn't there it isn't there).
 * retries connection errors, 202, 429 and 5xx `retries` times; other statuses fail straight away.
 */
export const fetchJsonRetried = async <T>(
	url: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	options: RetryOptions,
): Promise<T | null> => {
	const { retries, retryMs, signal, headers } = options
	const sleep = options.sleep ?? defaultSleep

	for (let attempt = 0; ; attempt++) {
		let status: number | undefined
		let statusText = ''
		let json: unknown
		let cause: unknown
		try {
			({ status, statusText, json } = await attemptJson(url, signal, headers))
		} catch (err: unknown) {
			if (signal?.aborted) throw err
			cause = err
		}

		if (status === 200) {
			const parsed = schema.safeParse(json)
			if (!parsed.success) {
				throw new TransportError(`unexpected response from '${url}': ${parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`, status)
			}
			return parsed.data
		}
		if (status === 404) return null
		if (status !== undefined && !retryable(status)) {
			throw new TransportError(`'${url}' failed: ${status} ${statusText}`, status)
		}

		const reason = status !== undefined ? `${status} ${statusText}` : String(cause)
		if (attempt >= retries) {
			throw new TransportError(`'${url}' giving up after ${attempt + 1} attempts. ${reason}`, status, { cause })
		}
		console.warn(fetchJsonRetried.name, `'${url}' ${reason}. retrying in ${retryMs}ms...`)
		await sleep(retryMs)
	}
}
