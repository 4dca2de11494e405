import { NotABundleError } from '../errors'
import type { TxTag } from './gqlTx'

export const isAns104 = (tags: TxTag[]) =>
	tags.some(tag => tag.name === 'Bundle-Format' && tag.value === 'binary')
	&& tags.some(tag => tag.name === 'Bundle-Version' && tag.value === '2.0.0')

/** fail fast before any data is fetched */
export const verifyBundle = async (txid: string, txTags: (txid: string) => Promise<TxTag[]>) => {
	const tags = await txTags(txid)
	if (!isAns104(tags)) {
		console.error(verifyBundle.name, txid, `not ans104. tags: ${JSON.stringify(tags)}`)
		throw new NotABundleError(txid)
	}
	console.info(verifyBundle.name, txid, 'ans104 detected')
}
