/**
 * ByteChannel over a node:net socket
 */

import type * as net from 'node:net'
import type { ByteChannel } from '@/channel/types.js'
import { ConnectionIoError } from '@/errors.js'

export interface SocketChannelOptions {
	/** Pause the socket once this many unread bytes are queued (default: 1 MiB) */
	highWaterMark?: number
}

interface PendingRead {
	resolve: (chunk: Buffer | null) => void
	reject: (error: Error) => void
}

/**
 * Adapts socket events to pull-based reads
 *
 * Incoming data is queued; the socket is paused while the queue is above the
 * high-water mark, so a slow reader applies TCP backpressure to its peer
 * instead of growing memory.
 */
export class SocketChannel implements ByteChannel {
	private readonly queue: Buffer[] = []
	private queuedBytes = 0
	private pending: PendingRead | null = null
	private ended = false
	private error: Error | null = null
	private _closed = false
	private readonly highWaterMark: number

	constructor(
		private readonly socket: net.Socket,
		options: SocketChannelOptions = {}
	) {
		this.highWaterMark = options.highWaterMark ?? 1024 * 1024

		socket.on('data', this.handleData.bind(this))
		socket.on('end', this.handleEnd.bind(this))
		socket.on('error', this.handleError.bind(this))
		socket.on('close', this.handleClose.bind(this))
	}

	get closed(): boolean {
		return this._closed
	}

	read(): Promise<Buffer | null> {
		const chunk = this.queue.shift()
		if (chunk) {
			this.queuedBytes -= chunk.length
			if (this.socket.isPaused() && this.queuedBytes < this.highWaterMark) {
				this.socket.resume()
			}
			return Promise.resolve(chunk)
		}

		if (this.error) {
			return Promise.reject(this.error)
		}
		if (this.ended) {
			return Promise.resolve(null)
		}
		if (this._closed) {
			return Promise.reject(new ConnectionIoError('Connection closed'))
		}
		if (this.pending) {
			return Promise.reject(new ConnectionIoError('Concurrent reads on one connection are not allowed'))
		}

		return new Promise((resolve, reject) => {
			this.pending = { resolve, reject }
		})
	}

	write(data: Buffer): Promise<void> {
		if (this._closed || this.socket.writableEnded) {
			return Promise.reject(new ConnectionIoError('Cannot write to a closed connection'))
		}

		return new Promise((resolve, reject) => {
			this.socket.write(data, err => {
				if (err) {
					reject(new ConnectionIoError(`Write failed: ${err.message}`, err))
				} else {
					resolve()
				}
			})
		})
	}

	closeWrite(): Promise<void> {
		if (this._closed || this.socket.writableEnded) {
			return Promise.resolve()
		}

		return new Promise(resolve => {
			this.socket.end(() => resolve())
		})
	}

	destroy(error?: Error): void {
		if (this._closed) {
			return
		}

		this.error ??= error ?? new ConnectionIoError('Connection destroyed')
		this._closed = true
		this.socket.destroy()
		this.settlePending()
	}

	private handleData(chunk: Buffer): void {
		if (this.pending) {
			const { resolve } = this.pending
			this.pending = null
			resolve(chunk)
			return
		}

		this.queue.push(chunk)
		this.queuedBytes += chunk.length
		if (this.queuedBytes >= this.highWaterMark) {
			this.socket.pause()
		}
	}

	private handleEnd(): void {
		this.ended = true
		this.settlePending()
	}

	private handleError(error: Error): void {
		this.error ??= new ConnectionIoError(`Socket error: ${error.message}`, error)
		this.settlePending()
	}

	private handleClose(): void {
		this._closed = true
		this.settlePending()
	}

	private settlePending(): void {
		if (!this.pending) {
			return
		}

		const { resolve, reject } = this.pending
		this.pending = null
		if (this.error) {
			reject(this.error)
		} else if (this.ended) {
			resolve(null)
		} else if (this._closed) {
			reject(new ConnectionIoError('Connection closed'))
		}
	}
}
