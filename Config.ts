import { z } from 'zod'

export type Config = {
	/** arweave http api for offsets, chunks and /tx lookups. defaults to https://arweave.net */
	host_url: string
	gql_url: string	//defaults to https://arweave.net/graphql
	gql_url_secondary: string	//defaults to https://arweave-search.goldsky.com/graphql

	/* extra nodes tried for chunks after host_url fails, e.g. `http://tip-2.arweave.xyz:1984` */
	http_api_nodes: Array<string>

	/** extra attempts per chunk, and the first backoff (doubles each attempt) */
	chunk_retries: number
	chunk_retry_ms: number

	/** decoded dataItems allowed to wait for the output writer */
	write_queue_size: number
}

const jsonStringArray = z.string().transform((s, ctx) => {
	try {
		return z.array(z.string().url()).parse(JSON.parse(s))
	} catch {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a JSON array of urls' })
		return z.NEVER
	}
})

const EnvSchema = z.object({
	HOST_URL: z.string().url().default('https://arweave.net'),
	GQL_URL: z.string().url().default('https://arweave.net/graphql'),
	GQL_URL_SECONDARY: z.string().url().default('https://arweave-search.goldsky.com/graphql'),
	HTTP_API_NODES: jsonStringArray.default('[]'),
	CHUNK_RETRIES: z.coerce.number().int().min(0).max(10).default(1),
	CHUNK_RETRY_MS: z.coerce.number().int().min(0).default(1_000),
	WRITE_QUEUE_SIZE: z.coerce.number().int().min(1).default(16),
})

/** read config from env vars (load dotenv before calling), with defaults for everything */
export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): Config => {
	const parsed = EnvSchema.safeParse(env)
	if (!parsed.success) {
		throw new Error(`Invalid env vars: ${parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')}`)
	}
	const e = parsed.data
	return {
		host_url: trimSlash(e.HOST_URL),
		gql_url: e.GQL_URL,
		gql_url_secondary: e.GQL_URL_SECONDARY,
		http_api_nodes: e.HTTP_API_NODES.map(trimSlash),
		chunk_retries: e.CHUNK_RETRIES,
		chunk_retry_ms: e.CHUNK_RETRY_MS,
		write_queue_size: e.WRITE_QUEUE_SIZE,
	}
}

export const trimSlash = (url: string) => url.replace(/\/+$/, '')
