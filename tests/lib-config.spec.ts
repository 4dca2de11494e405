import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { configFromEnv, trimSlash } from '../Config'

describe('configFromEnv', () => {

	it('defaults everything', () => {
		assert.deepEqual(configFromEnv({}), {
			host_url: 'https://arweave.net',
			gql_url: 'https://arweave.net/graphql',
			gql_url_secondary: 'https://arweave-search.goldsky.com/graphql',
			http_api_nodes: [],
			chunk_retries: 1,
			chunk_retry_ms: 1_000,
			write_queue_size: 16,
		})
	})

	it('reads overrides', () => {
		const config = configFromEnv({
			HOST_URL: 'http://localhost:1984/',
			HTTP_API_NODES: '["http://tip-1.test:1984/", "http://tip-2.test:1984"]',
			CHUNK_RETRIES: '3',
			CHUNK_RETRY_MS: '250',
			WRITE_QUEUE_SIZE: '4',
		})
		assert.equal(config.host_url, 'http://localhost:1984')
		assert.deepEqual(config.http_api_nodes, ['http://tip-1.test:1984', 'http://tip-2.test:1984'])
		assert.equal(config.chunk_retries, 3)
		assert.equal(config.chunk_retry_ms, 250)
		assert.equal(config.write_queue_size, 4)
	})

	it('rejects invalid values', () => {
		assert.throws(() => configFromEnv({ WRITE_QUEUE_SIZE: '0' }), /^Error: Invalid env vars: WRITE_QUEUE_SIZE: /)
		assert.throws(() => configFromEnv({ HTTP_API_NODES: 'not json' }), { message: 'Invalid env vars: HTTP_API_NODES: expected a JSON array of urls' })
		assert.throws(() => configFromEnv({ HOST_URL: 'arweave.net' }), /HOST_URL/)
	})

	it('trims trailing slashes', () => {
		assert.equal(trimSlash('https://arweave.net//'), 'https://arweave.net')
	})
})
