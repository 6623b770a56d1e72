import { StreamIoError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'
import { MessageType } from '@/muxer/mplex/codec.js'
import type { MuxedStream, StreamDirection } from '@/muxer/types.js'
import { AsyncQueue } from '@/utils/async-queue.js'

/**
 * What a stream needs from its connection
 */
export interface StreamSink {
	readonly maxMessageSize: number
	sendFrame(streamId: number, type: MessageType, data?: Buffer): Promise<void>
	forget(stream: MplexStream): void
}

export interface MplexStreamOptions {
	maxBufferSize: number
	logger?: Logger
}

export class MplexStream implements MuxedStream {
	private readonly queue = new AsyncQueue<Buffer>()
	private readonly logger: Logger
	private readonly maxBufferSize: number
	private bufferedBytes = 0
	private writeClosed = false
	private readClosed = false
	private destroyed = false

	constructor(
		readonly id: number,
		readonly direction: StreamDirection,
		private readonly sink: StreamSink,
		options: MplexStreamOptions
	) {
		this.maxBufferSize = options.maxBufferSize
		this.logger = (options.logger ?? noopLogger).child({ streamId: id, direction })
	}

	get closed(): boolean {
		return this.destroyed || (this.writeClosed && this.readClosed)
	}

	/** Unread bytes in the receive queue */
	get pendingBytes(): number {
		return this.bufferedBytes
	}

	async read(): Promise<Buffer | null> {
		const result = await this.queue.next()
		if (result.done) {
			return null
		}
		this.bufferedBytes -= result.value.length
		return result.value
	}

	async write(data: Buffer): Promise<void> {
		if (this.destroyed) {
			throw new StreamIoError(`Stream ${this.id} is closed`)
		}
		if (this.writeClosed) {
			throw new StreamIoError(`Stream ${this.id} is closed for writing`)
		}

		const type = this.direction === 'outbound' ? MessageType.MessageInitiator : MessageType.MessageReceiver
		const max = this.sink.maxMessageSize
		for (let offset = 0; offset < data.length; offset += max) {
			await this.sink.sendFrame(this.id, type, data.subarray(offset, offset + max))
		}
	}

	async closeWrite(): Promise<void> {
		if (this.writeClosed || this.destroyed) {
			return
		}
		this.writeClosed = true
		const type = this.direction === 'outbound' ? MessageType.CloseInitiator : MessageType.CloseReceiver
		await this.sink.sendFrame(this.id, type)
		this.settleIfDone()
	}

	reset(): void {
		this.destroy(new StreamIoError(`Stream ${this.id} was reset locally`))
	}

	destroy(error?: Error): void {
		if (this.destroyed) {
			return
		}
		const notifyRemote = !(this.writeClosed && this.readClosed)
		this.terminate(error ?? new StreamIoError(`Stream ${this.id} was destroyed`))

		if (notifyRemote) {
			const type = this.direction === 'outbound' ? MessageType.ResetInitiator : MessageType.ResetReceiver
			this.sink.sendFrame(this.id, type).catch((sendError: unknown) => {
				this.logger.debug('could not send reset', { error: String(sendError) })
			})
		}
	}

	/** @internal Data frame from the remote */
	receive(data: Buffer): void {
		if (this.destroyed || this.readClosed) {
			return
		}
		if (this.bufferedBytes + data.length > this.maxBufferSize) {
			this.logger.warn('receive buffer exceeded, resetting stream', {
				bufferedBytes: this.bufferedBytes,
				maxBufferSize: this.maxBufferSize,
			})
			this.destroy(new StreamIoError(`Stream ${this.id} receive buffer exceeded ${this.maxBufferSize} bytes`))
			return
		}
		if (data.length === 0) {
			return
		}
		this.bufferedBytes += data.length
		this.queue.push(data)
	}

	/** @internal Remote half-closed its side */
	remoteClose(): void {
		if (this.readClosed) {
			return
		}
		this.readClosed = true
		this.queue.end()
		this.settleIfDone()
	}

	/** @internal Remote reset the stream */
	remoteReset(): void {
		this.terminate(new StreamIoError(`Stream ${this.id} was reset by the remote`))
	}

	/** @internal Parent connection failed */
	abort(error: Error): void {
		this.terminate(error)
	}

	private terminate(error: Error): void {
		if (this.destroyed) {
			return
		}
		this.destroyed = true
		this.writeClosed = true
		this.readClosed = true
		this.queue.clear()
		this.bufferedBytes = 0
		this.queue.fail(error)
		this.sink.forget(this)
	}

	private settleIfDone(): void {
		if (this.writeClosed && this.readClosed) {
			this.sink.forget(this)
		}
	}
}
