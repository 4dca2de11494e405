/** one element of the dumped JSON array. byte strings are base64url */
export interface DataItemRecord {
	id: string
	signature_type: number
	signature_name: string
	signature: string
	owner: string
	target: string | null
	anchor: string | null
	tags: TagRecord[]
	data: string
}

export interface TagRecord {
	name: string
	value: string
}

export interface DumpStats {
	txid: string
	items: number
	bytes: number
	chunks: number
}
