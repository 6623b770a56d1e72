/**
 * Upgrade stage contract
 *
 * A stage consumes the previous stage's output and produces a new
 * capability: raw channel → secured channel → muxed connection. Stages are
 * independent objects so each can be swapped or tested alone.
 */

import type { Multiaddr } from '@/address/multiaddr.js'
import type { Logger } from '@/logger.js'

/** Which side opened the underlying connection */
export type ConnectionRole = 'listener' | 'dialer'

export interface UpgradeContext {
	readonly role: ConnectionRole
	readonly remoteAddress: Multiaddr
	readonly logger: Logger
}

export interface UpgradeStage<TIn, TOut> {
	readonly name: string
	upgrade(input: TIn, context: UpgradeContext): Promise<TOut>
}

/**
 * Anything a failed stage can tear down
 */
export interface Destroyable {
	destroy(error?: Error): void
}
