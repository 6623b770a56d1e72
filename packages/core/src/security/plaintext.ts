import type { ByteChannel } from '@/channel/types.js'
import type { SecuredChannel, SecurityMode } from '@/security/types.js'

export const PLAINTEXT_PROTOCOL = '/plaintext/1.0.0'

/**
 * No encryption, no authentication: the channel passes through unchanged
 */
export class PlaintextMode implements SecurityMode {
	readonly id = PLAINTEXT_PROTOCOL
	readonly strength = 0

	secure(channel: ByteChannel): Promise<SecuredChannel> {
		return Promise.resolve({ channel })
	}
}
