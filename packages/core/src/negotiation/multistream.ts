/**
 * multistream-select protocol negotiation
 *
 * Used twice per connection: once to agree on the stream muxer, then once
 * per substream to agree on the application protocol.
 *
 * ```
 * > /multistream/1.0.0    # dialer: i speak multistream
 * < /multistream/1.0.0    # listener: so do i
 * > /chat/2.0.0           # dialer: i want chat
 * < na                    # listener: not available
 * > /echo/1.0.0           # dialer: what about echo?
 * < /echo/1.0.0           # listener: ok, acts as the ack
 * > <echo frames>
 * ```
 *
 * Every message is a UVARINT-length-prefixed UTF-8 line ending in "\n".
 */

import type { ByteChannel } from '@/channel/types.js'
import { ChannelReader } from '@/channel/channel-reader.js'
import { encodeLengthPrefixed } from '@/codec/varint.js'
import { NegotiationError, toError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'

export const MULTISTREAM_PROTOCOL = '/multistream/1.0.0'
export const NOT_AVAILABLE = 'na'
export const LIST = 'ls'
export const MAX_MESSAGE_LENGTH = 1024

export interface NegotiationOptions {
	/** What a failure aborts: a whole connection (muxer) or one substream (protocol) */
	scope?: 'connection' | 'stream'
	logger?: Logger
}

export interface NegotiatedStream {
	readonly protocol: string
	/** The negotiated channel, including any bytes read past the negotiation */
	readonly stream: ByteChannel
}

/**
 * Encode one negotiation message
 */
export function encodeMessage(message: string): Buffer {
	return encodeLengthPrefixed(Buffer.from(`${message}\n`, 'utf8'))
}

/**
 * Listener side: wait for a proposal we support and acknowledge it
 */
export async function handle(
	channel: ByteChannel,
	protocols: readonly string[],
	options: NegotiationOptions = {}
): Promise<NegotiatedStream> {
	const session = new NegotiationSession(channel, protocols, options)
	return session.run(async () => {
		await session.write(encodeMessage(MULTISTREAM_PROTOCOL))
		await session.expectHeader()

		while (true) {
			const proposal = await session.readMessage()

			if (proposal === LIST) {
				await session.write(encodeList(protocols))
				continue
			}

			if (protocols.includes(proposal)) {
				await session.write(encodeMessage(proposal))
				session.logger.debug('protocol accepted', { protocol: proposal })
				return proposal
			}

			session.logger.debug('protocol not available', { protocol: proposal })
			await session.write(encodeMessage(NOT_AVAILABLE))
		}
	})
}

/**
 * Dialer side: propose protocols in order until one is accepted
 */
export async function select(
	channel: ByteChannel,
	protocols: readonly string[],
	options: NegotiationOptions = {}
): Promise<NegotiatedStream> {
	if (protocols.length === 0) {
		throw new NegotiationError('No protocols to propose', options.scope ?? 'stream')
	}

	const session = new NegotiationSession(channel, protocols, options)
	return session.run(async () => {
		const [first, ...rest] = protocols
		// Header and first proposal go out in one write
		await session.write(Buffer.concat([encodeMessage(MULTISTREAM_PROTOCOL), encodeMessage(first!)]))
		await session.expectHeader()

		for (const protocol of [first!, ...rest]) {
			if (protocol !== first) {
				await session.write(encodeMessage(protocol))
			}

			const response = await session.readMessage()
			if (response === protocol) {
				session.logger.debug('protocol selected', { protocol })
				return protocol
			}
			if (response !== NOT_AVAILABLE) {
				throw new NegotiationError(
					`Unexpected response "${response}" to proposal "${protocol}"`,
					session.scope,
					protocols
				)
			}
		}

		throw new NegotiationError(`Remote supports none of: ${protocols.join(', ')}`, session.scope, protocols)
	})
}

function encodeList(protocols: readonly string[]): Buffer {
	const body = Buffer.concat([...protocols.map(p => encodeMessage(p)), Buffer.from('\n')])
	return encodeLengthPrefixed(body)
}

class NegotiationSession {
	readonly scope: 'connection' | 'stream'
	readonly logger: Logger
	private readonly reader: ChannelReader

	constructor(
		private readonly channel: ByteChannel,
		private readonly protocols: readonly string[],
		options: NegotiationOptions
	) {
		this.scope = options.scope ?? 'stream'
		this.logger = options.logger ?? noopLogger
		this.reader = new ChannelReader(
			channel,
			message => new NegotiationError(`Malformed negotiation: ${message}`, this.scope, this.protocols)
		)
	}

	async run(negotiate: () => Promise<string>): Promise<NegotiatedStream> {
		try {
			const protocol = await negotiate()
			return { protocol, stream: this.reader.detach() }
		} catch (error) {
			if (error instanceof NegotiationError) {
				throw error
			}
			// I/O faults mid-negotiation are reported as negotiation failures of this scope
			const cause = toError(error)
			throw new NegotiationError(`Negotiation aborted: ${cause.message}`, this.scope, this.protocols, cause)
		}
	}

	write(data: Buffer): Promise<void> {
		return this.channel.write(data)
	}

	async expectHeader(): Promise<void> {
		const header = await this.readMessage()
		if (header !== MULTISTREAM_PROTOCOL) {
			throw new NegotiationError(`Unexpected negotiation header "${header}"`, this.scope, this.protocols)
		}
	}

	async readMessage(): Promise<string> {
		const message = await this.reader.readLengthPrefixed(MAX_MESSAGE_LENGTH)
		if (message === null) {
			throw new NegotiationError('Remote closed the stream during negotiation', this.scope, this.protocols)
		}
		if (message.length === 0 || message[message.length - 1] !== 0x0a) {
			throw new NegotiationError('Negotiation message is not newline-terminated', this.scope, this.protocols)
		}
		return message.subarray(0, message.length - 1).toString('utf8')
	}
}
