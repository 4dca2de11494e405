/**
 * error taxonomy for a bundle dump run.
 * every one of these is fatal for the run; the cli prints the whole `cause` chain.
 */

export type DecodeErrorCode =
	| 'MalformedHeader'
	| 'ItemSizeMismatch'
	| 'ItemOverrun'
	| 'UnknownSignatureType'
	| 'InvalidPresenceFlag'
	| 'TagCountMismatch'
	| 'TagLengthMismatch'
	| 'TruncatedVarint'
	| 'MalformedVarint'
	| 'MalformedTags'
	| 'UnexpectedEof'

export class BundleDecodeError extends Error {
	override name = 'BundleDecodeError'
	readonly itemIndex?: number

	constructor(
		readonly code: DecodeErrorCode,
		message: string,
		/** absolute offset into the transaction data where the problem was detected */
		readonly offset: number,
		options?: { itemIndex?: number; cause?: unknown },
	) {
		super(`${code}: ${message} (offset ${offset})`, { cause: options?.cause })
		this.itemIndex = options?.itemIndex
	}
}

export class TransportError extends Error {
	override name = 'TransportError'
	constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
		super(message, options)
	}
}

export class NotABundleError extends Error {
	override name = 'NotABundleError'
	constructor(readonly txid: string) {
		super(`${txid} is not an ANS-104 bundle (requires Bundle-Format:binary and Bundle-Version:2.0.0)`)
	}
}

export class OutputIoError extends Error {
	override name = 'OutputIoError'
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
	}
}

/** flattens an error and its `cause` chain into printable lines */
export const errorChain = (err: unknown): string[] => {
	const lines: string[] = []
	let current: unknown = err
	while (current !== undefined && current !== null && lines.length < 16) {
		if (current instanceof Error) {
			lines.push(`${current.name}: ${current.message}`)
			current = current.cause
		} else {
			lines.push(String(current))
			break
		}
	}
	return lines
}
