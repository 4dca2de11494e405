import moize from 'moize'

export interface TxTag {
	name: string
	value: string
}

/** the slice of an ar-gql client used here */
export interface GqlTxLookup {
	endpointUrl: string
	tx(id: string): Promise<{ id: string; tags: TxTag[] } | null>
}

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

export const GQL_RETRY_MS = 10_000
const maxTries = 3

/** notes:
 * - connection retries are handled internally in ar-gql
 * - we retry rate-limits and server errors
 * - null means the endpoint has no record of the id
*/
export const gqlTx = moize(
	async (id: string, gql: GqlTxLookup, retryMs: number = GQL_RETRY_MS) => {
		let tries = 0
		while (true) {
			try {
				console.info(gqlTx.name, `unmemoized gql.tx('${id}') using ${gql.endpointUrl}`)
				return await gql.tx(id)
			} catch (err: unknown) {
				const e = err instanceof Error ? err : new Error(String(err))
				const status = !isNaN(Number(e.cause)) ? Number(e.cause) : null // ar-gql errors are a bit messy

				if (!status || status === 429 || status >= 500) {
					if (++tries >= maxTries) {
						throw new Error(
							`[gqlTx] "${e.message}" while fetching tx: "${id}" using gqlProvider: ${gql.endpointUrl}.`
							+ ` Tried ${tries} times.`,
							{ cause: e },
						)
					}
					console.warn(gqlTx.name, `warning: (${status}) '${e.message}', for '${id}'. retrying in ${retryMs}ms...`)
					await sleep(retryMs)
					continue
				}

				throw new Error(`UNEXPECTED gqlTx-error: (${status}) ${e.message} for id ${id} using ${gql.endpointUrl}`, { cause: e })
			}
		}
	},
	{
		isPromise: true,
		maxSize: 1_000,
		maxArgs: 2,
		// memoize by txid + endpoint; ar-gql objects themselves don't serialize
		transformArgs: ([id, gql]) => [id, gql.endpointUrl],
	}
)
