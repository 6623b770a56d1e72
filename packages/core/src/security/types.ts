/**
 * Security mode contract
 */

import type { ByteChannel } from '@/channel/types.js'
import type { Destroyable, UpgradeContext } from '@/upgrade/types.js'

export interface SecuredChannel {
	readonly channel: ByteChannel
	/** Hex SHA-256 of the remote identity key, when the mode authenticates peers */
	readonly remotePeer?: string
}

export interface SecurityMode {
	readonly id: string
	/** Higher wins when both peers support several modes */
	readonly strength: number
	secure(channel: ByteChannel, context: UpgradeContext): Promise<SecuredChannel>
}

/**
 * Output of the security stage
 */
export interface SecuredConnection extends SecuredChannel, Destroyable {
	readonly mode: string
}
