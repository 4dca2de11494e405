/**
 * ANS-104 signature configuration
 */

export enum SignatureConfig {
	ARWEAVE = 1,
	ED25519 = 2,
	ETHEREUM = 3,
	SOLANA = 4,
	INJECTEDAPTOS = 5,
	MULTIAPTOS = 6,
	TYPEDETHEREUM = 7,
}

export const SIG_CONFIG: Record<number, { sigLength: number; pubLength: number; sigName: string }> = {
	[SignatureConfig.ARWEAVE]: { sigLength: 512, pubLength: 512, sigName: 'arweave' },
	[SignatureConfig.ED25519]: { sigLength: 64, pubLength: 32, sigName: 'ed25519' },
	[SignatureConfig.ETHEREUM]: { sigLength: 65, pubLength: 65, sigName: 'ethereum' },
	[SignatureConfig.SOLANA]: { sigLength: 64, pubLength: 32, sigName: 'solana' },
	[SignatureConfig.INJECTEDAPTOS]: { sigLength: 64, pubLength: 32, sigName: 'injectedAptos' },
	[SignatureConfig.MULTIAPTOS]: { sigLength: 64 * 32 + 4, pubLength: 32 * 32 + 1, sigName: 'multiAptos' },
	[SignatureConfig.TYPEDETHEREUM]: { sigLength: 65, pubLength: 42, sigName: 'typedEthereum' },
}

/** bundle header: 32 byte item count, then 32 byte size + 32 byte id per item */
export const HEADER_START = 32
export const ENTRY_SIZE_LENGTH = 32
export const ENTRY_ID_LENGTH = 32
export const ENTRY_LENGTH = ENTRY_SIZE_LENGTH + ENTRY_ID_LENGTH

/** only the low 8 bytes of a 32 byte size field may be set */
export const LONG_LENGTH = 8

export const TARGET_LENGTH = 32
export const ANCHOR_LENGTH = 32

/** zigzag varints in the avro tag encoding carry at most 64 bits */
export const MAX_VARINT_BYTES = 10
