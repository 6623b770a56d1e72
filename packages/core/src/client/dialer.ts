import type { Multiaddr } from '@/address/multiaddr.js'
import { toError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'
import type { ReuseTransport } from '@/muxer/connection-reuse.js'
import { select, type NegotiatedStream } from '@/negotiation/multistream.js'
import { createStack, type StackOptions } from '@/stack.js'

/**
 * Opens negotiated substreams to remote peers, one connection per peer
 */
export class Dialer {
	private readonly logger: Logger

	constructor(
		readonly transport: ReuseTransport,
		logger: Logger = noopLogger
	) {
		this.logger = logger.child({ component: 'dialer' })
	}

	static create(options: StackOptions = {}): Dialer {
		return new Dialer(createStack(options).transport, options.logger)
	}

	/**
	 * Open a substream and select the first protocol the remote accepts
	 *
	 * @throws NegotiationError when the remote accepts none; the substream is
	 * reset, the connection stays up
	 */
	async dial(address: Multiaddr | string, protocols: readonly string[]): Promise<NegotiatedStream> {
		const stream = await this.transport.openStream(address)
		const logger = this.logger.child({ remoteAddress: address.toString(), streamId: stream.id })
		try {
			const negotiated = await select(stream, protocols, { scope: 'stream', logger })
			logger.debug('protocol negotiated', { protocol: negotiated.protocol })
			return negotiated
		} catch (error) {
			stream.destroy(toError(error))
			throw error
		}
	}

	close(): Promise<void> {
		return this.transport.close()
	}
}
