import Arweave from 'arweave'
import type { DataItemRecord } from '../../types'
import type { DataItem } from './data-item'

const b64url = (bytes: Uint8Array) => Arweave.utils.bufferTob64Url(bytes)

export const toDataItemRecord = (item: DataItem): DataItemRecord => ({
	id: item.id,
	signature_type: item.signatureType,
	signature_name: item.signatureName,
	signature: b64url(item.signature),
	owner: b64url(item.owner),
	target: item.target ? b64url(item.target) : null,
	anchor: item.anchor ? b64url(item.anchor) : null,
	tags: item.tags.map(({ name, value }) => ({ name: b64url(name), value: b64url(value) })),
	data: b64url(item.data),
})
