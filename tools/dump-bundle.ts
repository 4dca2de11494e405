#!/usr/bin/env node
import 'dotenv/config'
import { cac } from 'cac'
import { createWriteStream } from 'node:fs'
import { z } from 'zod'
import { configFromEnv, trimSlash } from '../Config'
import { createArweaveNetwork } from '../libs/arweave/network'
import { dumpBundle } from '../libs/dump-bundle'
import { errorChain } from '../libs/errors'

const ArgsSchema = z.object({
	transactionId: z.string().regex(/^[a-zA-Z0-9_-]{43}$/, 'expected a 43 character base64url transaction id'),
	apiUrl: z.string().url().optional(),
	outputFile: z.string().min(1).optional(),
})

export type CliArgs = z.infer<typeof ArgsSchema>

/** last value given for any of `flags`, exactly as typed */
const rawOption = (argv: string[], flags: string[]) => {
	let value: string | undefined
	argv.forEach((arg, i) => {
		for (const flag of flags) {
			if (arg === flag && i + 1 < argv.length) value = argv[i + 1]
			else if (arg.startsWith(`${flag}=`)) value = arg.slice(flag.length + 1)
		}
	})
	return value
}

/** returns null when help or version was printed */
export const parseCliArgs = (argv: string[]): CliArgs | null => {
	const cli = cac('bundle-dumper')
	cli
		.option('-t, --transaction-id <id>', 'Transaction ID of the ANS-104 bundle to fetch')
		.option('-a, --api-url <url>', 'Arweave HTTP API. Default: $HOST_URL or https://arweave.net')
		.option('-o, --output-file <file>', 'JSON output file name. Default: <transaction-id>.json')
		.usage('--transaction-id <id> [--output-file <file>]')
		.help()

	const { options } = cli.parse(argv, { run: false })
	if (options.help) return null

	//mri turns all-digit values into numbers, losing digits past 2^53
	const text = (value: unknown, flags: string[]) => typeof value === 'number' ? rawOption(argv, flags) : value

	const parsed = ArgsSchema.safeParse({
		transactionId: text(options.transactionId, ['-t', '--transaction-id']),
		apiUrl: options.apiUrl,
		outputFile: text(options.outputFile, ['-o', '--output-file']),
	})
	if (!parsed.success) {
		throw new Error(`Invalid arguments: ${parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`)
	}
	return parsed.data
}

export const main = async (argv: string[] = process.argv): Promise<number> => {
	const args = parseCliArgs(argv)
	if (!args) return 0

	const config = configFromEnv()
	if (args.apiUrl) config.host_url = trimSlash(args.apiUrl)
	const outputFile = args.outputFile ?? `${args.transactionId}.json`

	const stats = await dumpBundle({
		txid: args.transactionId,
		network: createArweaveNetwork(config),
		openSink: () => createWriteStream(outputFile, 'utf-8'),
		chunkRetries: config.chunk_retries,
		chunkRetryMs: config.chunk_retry_ms,
		writeQueueSize: config.write_queue_size,
	})

	console.log(`Bundle data stored in: ${outputFile} (${stats.items} dataItems, ${stats.chunks} chunks)`)
	return 0
}

if (require.main === module) {
	main().then(
		(code) => { process.exitCode = code },
		(err: unknown) => {
			for (const line of errorChain(err)) console.error(line)
			process.exitCode = 1
		},
	)
}
