import type { ByteChannel } from '@/channel/types.js'
import type { KeyPair } from '@/security/key-pair.js'
import { performHandshake } from '@/security/secure-channel/handshake.js'
import type { SecuredChannel, SecurityMode } from '@/security/types.js'
import type { UpgradeContext } from '@/upgrade/types.js'

export const SECURE_CHANNEL_PROTOCOL = '/secure-channel/1.0.0'

/**
 * Authenticated, encrypted mode keyed by a static Ed25519 identity
 */
export class SecureChannelMode implements SecurityMode {
	readonly id = SECURE_CHANNEL_PROTOCOL
	readonly strength = 100

	constructor(private readonly identity: KeyPair) {}

	get peerId(): string {
		return this.identity.peerId
	}

	secure(channel: ByteChannel, context: UpgradeContext): Promise<SecuredChannel> {
		return performHandshake(channel, this.identity, context.logger)
	}
}
