/**
 * Protocol router: binds protocol ids to stream handlers
 */

import type { Multiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import type { Logger } from '@/logger.js'
import { handle } from '@/negotiation/multistream.js'

export interface StreamContext {
	readonly protocol: string
	readonly remoteAddress: Multiaddr
	readonly remotePeer?: string
	readonly logger: Logger
}

/**
 * Runs one application protocol on one negotiated substream. A rejection
 * concerns that substream only.
 */
export type StreamHandler = (stream: ByteChannel, context: StreamContext) => Promise<void>

export interface RouteContext {
	readonly remoteAddress: Multiaddr
	readonly remotePeer?: string
	readonly logger: Logger
}

export class ProtocolRouter {
	private readonly handlers = new Map<string, StreamHandler>()

	/**
	 * Register a handler; a later registration for the same id replaces it
	 */
	handle(protocol: string, handler: StreamHandler): this {
		this.handlers.set(protocol, handler)
		return this
	}

	get protocols(): string[] {
		return [...this.handlers.keys()]
	}

	/**
	 * Negotiate a protocol on an inbound substream and run its handler
	 *
	 * @throws NegotiationError when the remote proposes nothing we handle
	 */
	async route(stream: ByteChannel, context: RouteContext): Promise<void> {
		const negotiated = await handle(stream, this.protocols, { scope: 'stream', logger: context.logger })
		const handler = this.handlers.get(negotiated.protocol)
		if (!handler) {
			// handle() only accepts registered ids
			throw new RangeError(`No handler for ${negotiated.protocol}`)
		}

		const logger = context.logger.child({ protocol: negotiated.protocol })
		logger.info('protocol negotiated')
		await handler(negotiated.stream, {
			protocol: negotiated.protocol,
			remoteAddress: context.remoteAddress,
			remotePeer: context.remotePeer,
			logger,
		})
	}
}
