/**
 * mplex stream multiplexer over one secured channel
 *
 * A single read loop demultiplexes frames into per-stream queues; all
 * outgoing frames pass through one write chain so they never interleave.
 */

import type { Multiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import { ChannelReader } from '@/channel/channel-reader.js'
import { ConnectionIoError, toError } from '@/errors.js'
import { errorContext, noopLogger, type Logger } from '@/logger.js'
import { decodeHeader, encodeMplexFrame, isMessageType, MessageType } from '@/muxer/mplex/codec.js'
import { MplexStream, type StreamSink } from '@/muxer/mplex/stream.js'
import type { MuxedConnection, MuxedStream } from '@/muxer/types.js'
import type { ConnectionRole } from '@/upgrade/types.js'
import { AsyncQueue } from '@/utils/async-queue.js'

export const DEFAULT_MAX_MESSAGE_SIZE = 1024 * 1024
export const DEFAULT_MAX_STREAM_BUFFER_SIZE = 4 * 1024 * 1024
export const DEFAULT_MAX_INBOUND_STREAMS = 1024

export interface MplexOptions {
	role: ConnectionRole
	remoteAddress: Multiaddr
	remotePeer?: string
	securityMode?: string
	logger?: Logger
	/** Largest frame payload sent or accepted (default: 1 MiB) */
	maxMessageSize?: number
	/** Unread bytes per stream before it is reset (default: 4 MiB) */
	maxStreamBufferSize?: number
	/** Concurrent remote-initiated streams (default: 1024) */
	maxInboundStreams?: number
}

type MuxerState = 'open' | 'closing' | 'closed'

export class MplexMuxer implements MuxedConnection, StreamSink {
	readonly role: ConnectionRole
	readonly remoteAddress: Multiaddr
	readonly remotePeer?: string
	readonly securityMode?: string
	readonly maxMessageSize: number

	private readonly logger: Logger
	private readonly reader: ChannelReader
	private readonly maxStreamBufferSize: number
	private readonly maxInboundStreams: number
	private readonly outbound = new Map<number, MplexStream>()
	private readonly inbound = new Map<number, MplexStream>()
	private readonly accepted = new AsyncQueue<MplexStream>()
	private readonly closeListeners: ((error?: Error) => void)[] = []
	private readonly reading: Promise<void>
	private writeChain: Promise<void> = Promise.resolve()
	private nextStreamId = 0
	private state: MuxerState = 'open'
	private closeError: Error | undefined

	private constructor(
		private readonly channel: ByteChannel,
		options: MplexOptions
	) {
		this.role = options.role
		this.remoteAddress = options.remoteAddress
		this.remotePeer = options.remotePeer
		this.securityMode = options.securityMode
		this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE
		this.maxStreamBufferSize = options.maxStreamBufferSize ?? DEFAULT_MAX_STREAM_BUFFER_SIZE
		this.maxInboundStreams = options.maxInboundStreams ?? DEFAULT_MAX_INBOUND_STREAMS
		this.logger = (options.logger ?? noopLogger).child({ component: 'mplex' })
		this.reader = new ChannelReader(channel, message => new ConnectionIoError(`Malformed mplex frame: ${message}`))
		this.reading = this.readLoop()
	}

	/**
	 * Start multiplexing over a channel. The muxer owns the channel from here on.
	 */
	static create(channel: ByteChannel, options: MplexOptions): MplexMuxer {
		return new MplexMuxer(channel, options)
	}

	get closed(): boolean {
		return this.state !== 'open'
	}

	get streamCount(): number {
		return this.inbound.size + this.outbound.size
	}

	async openStream(): Promise<MuxedStream> {
		if (this.state !== 'open') {
			throw new ConnectionIoError('Cannot open a stream on a closed connection', this.closeError)
		}

		const id = this.nextStreamId++
		const stream = this.createStream(id, 'outbound')
		this.outbound.set(id, stream)
		await this.sendFrame(id, MessageType.NewStream, Buffer.from(String(id)))
		return stream
	}

	acceptedStreams(): AsyncIterable<MuxedStream> {
		return this.accepted
	}

	async close(): Promise<void> {
		if (this.state !== 'open') {
			return
		}
		this.state = 'closing'
		this.accepted.end()
		await this.writeChain
		this.shutdown(undefined)
		await this.reading
	}

	destroy(error?: Error): void {
		this.shutdown(error)
	}

	onClose(listener: (error?: Error) => void): void {
		if (this.state === 'closed') {
			listener(this.closeError)
			return
		}
		this.closeListeners.push(listener)
	}

	/** @internal */
	sendFrame(streamId: number, type: MessageType, data?: Buffer): Promise<void> {
		if (this.state === 'closed') {
			return Promise.reject(new ConnectionIoError('Connection is closed', this.closeError))
		}

		const frame = encodeMplexFrame(streamId, type, data)
		const write = this.writeChain.then(() => this.channel.write(frame))
		this.writeChain = write.catch((error: unknown) => {
			this.shutdown(new ConnectionIoError('Connection write failed', toError(error)))
		})
		return write
	}

	/** @internal */
	forget(stream: MplexStream): void {
		const streams = stream.direction === 'outbound' ? this.outbound : this.inbound
		if (streams.get(stream.id) === stream) {
			streams.delete(stream.id)
		}
	}

	private createStream(id: number, direction: 'inbound' | 'outbound'): MplexStream {
		return new MplexStream(id, direction, this, {
			maxBufferSize: this.maxStreamBufferSize,
			logger: this.logger,
		})
	}

	private async readLoop(): Promise<void> {
		try {
			while (this.state !== 'closed') {
				const header = await this.reader.readUVarInt()
				if (header === null) {
					// Clean close for the connection, but a fault for any stream still open
					this.shutdown(undefined, new ConnectionIoError('Connection closed by remote'))
					return
				}
				const data = await this.reader.readLengthPrefixed(this.maxMessageSize)
				if (data === null) {
					throw new ConnectionIoError('Connection ended inside an mplex frame')
				}
				this.handleFrame(header, data)
			}
		} catch (error) {
			if (this.state === 'closed') {
				return
			}
			this.shutdown(error instanceof ConnectionIoError ? error : new ConnectionIoError('Connection read failed', toError(error)))
		}
	}

	private handleFrame(header: number, data: Buffer): void {
		const { streamId, type } = decodeHeader(header)
		if (!isMessageType(type)) {
			throw new ConnectionIoError(`Unknown mplex message type ${type}`)
		}

		switch (type) {
			case MessageType.NewStream:
				this.handleNewStream(streamId)
				return
			case MessageType.MessageInitiator:
				this.inbound.get(streamId)?.receive(data)
				return
			case MessageType.MessageReceiver:
				this.outbound.get(streamId)?.receive(data)
				return
			case MessageType.CloseInitiator:
				this.inbound.get(streamId)?.remoteClose()
				return
			case MessageType.CloseReceiver:
				this.outbound.get(streamId)?.remoteClose()
				return
			case MessageType.ResetInitiator:
				this.inbound.get(streamId)?.remoteReset()
				return
			case MessageType.ResetReceiver:
				this.outbound.get(streamId)?.remoteReset()
				return
		}
	}

	private handleNewStream(streamId: number): void {
		if (this.inbound.has(streamId)) {
			throw new ConnectionIoError(`Remote reopened live stream ${streamId}`)
		}

		const stream = this.createStream(streamId, 'inbound')
		if (this.state !== 'open' || this.inbound.size >= this.maxInboundStreams) {
			this.logger.warn('rejecting inbound stream', { streamId, inboundStreams: this.inbound.size })
			stream.destroy()
			return
		}

		this.inbound.set(streamId, stream)
		if (!this.accepted.push(stream)) {
			stream.destroy()
		}
	}

	private shutdown(error: Error | undefined, streamError: Error = error ?? new ConnectionIoError('Connection closed')): void {
		if (this.state === 'closed') {
			return
		}
		this.state = 'closed'
		this.closeError = error

		if (error) {
			this.logger.debug('connection aborted', errorContext(error))
		}

		for (const stream of [...this.inbound.values(), ...this.outbound.values()]) {
			stream.abort(streamError)
		}
		this.inbound.clear()
		this.outbound.clear()
		this.accepted.end()
		this.channel.destroy(error)

		for (const listener of this.closeListeners.splice(0)) {
			listener(error)
		}
	}
}
