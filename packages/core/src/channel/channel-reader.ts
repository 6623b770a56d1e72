/**
 * Buffered reader over a ByteChannel
 *
 * Negotiation and framing layers read exact byte counts and varints from a
 * channel that delivers arbitrary chunks. Bytes read past the end of a
 * negotiation are not lost: `detach()` hands them to the next layer.
 */

import type { ByteChannel } from '@/channel/types.js'
import { MAX_UVARINT_BYTES } from '@/codec/varint.js'
import { StreamIoError } from '@/errors.js'

export type EndOfStreamErrorFactory = (message: string) => Error

const defaultEndOfStreamError: EndOfStreamErrorFactory = message => new StreamIoError(message)

export class ChannelReader {
	private readonly chunks: Buffer[] = []
	private offset = 0 // Offset within chunks[0]
	private available = 0
	private eof = false

	constructor(
		private readonly channel: ByteChannel,
		private readonly endOfStreamError: EndOfStreamErrorFactory = defaultEndOfStreamError
	) {}

	get bufferedBytes(): number {
		return this.available
	}

	/**
	 * Read exactly `length` bytes
	 *
	 * @throws the end-of-stream error if the channel ends first
	 */
	async readExactly(length: number): Promise<Buffer> {
		while (this.available < length) {
			if (!(await this.fill())) {
				throw this.endOfStreamError(`stream ended after ${this.available} of ${length} bytes`)
			}
		}
		return this.consume(length)
	}

	/**
	 * Read exactly `length` bytes, or null if the channel ended cleanly before
	 * the first of them
	 */
	async readExactlyOrEnd(length: number): Promise<Buffer | null> {
		if (this.available === 0 && !(await this.fill())) {
			return null
		}
		return this.readExactly(length)
	}

	/**
	 * Read a UVARINT
	 *
	 * @returns null if the channel ended cleanly before the first byte
	 */
	async readUVarInt(): Promise<number | null> {
		let value = 0
		let multiplier = 1

		for (let i = 0; i < MAX_UVARINT_BYTES; i++) {
			if (this.available === 0 && !(await this.fill())) {
				if (i === 0) {
					return null
				}
				throw this.endOfStreamError('stream ended inside a varint')
			}

			const byte = this.consume(1)[0]!
			value += (byte & 0x7f) * multiplier
			if ((byte & 0x80) === 0) {
				return value
			}
			multiplier *= 0x80
		}

		throw this.endOfStreamError(`varint longer than ${MAX_UVARINT_BYTES} bytes`)
	}

	/**
	 * Read a UVARINT-length-prefixed message
	 *
	 * @returns null on a clean end-of-stream before the prefix
	 */
	async readLengthPrefixed(maxLength: number): Promise<Buffer | null> {
		const length = await this.readUVarInt()
		if (length === null) {
			return null
		}
		if (length > maxLength) {
			throw this.endOfStreamError(`message of ${length} bytes exceeds the maximum of ${maxLength}`)
		}
		return this.readExactly(length)
	}

	/**
	 * Hand the channel to the next layer, buffered bytes first
	 */
	detach(): ByteChannel {
		if (this.available === 0) {
			return this.channel
		}
		return new PrefixedChannel(this.consume(this.available), this.channel)
	}

	private async fill(): Promise<boolean> {
		if (this.eof) {
			return false
		}

		const chunk = await this.channel.read()
		if (chunk === null) {
			this.eof = true
			return false
		}
		if (chunk.length > 0) {
			this.chunks.push(chunk)
			this.available += chunk.length
		}
		return true
	}

	private consume(length: number): Buffer {
		if (length === 0) {
			return Buffer.alloc(0)
		}

		const first = this.chunks[0]!
		if (first.length - this.offset >= length) {
			const slice = first.subarray(this.offset, this.offset + length)
			this.offset += length
			this.available -= length
			if (this.offset === first.length) {
				this.chunks.shift()
				this.offset = 0
			}
			return slice
		}

		const out = Buffer.allocUnsafe(length)
		let copied = 0
		while (copied < length) {
			const buf = this.chunks[0]!
			const toCopy = Math.min(length - copied, buf.length - this.offset)
			buf.copy(out, copied, this.offset, this.offset + toCopy)
			copied += toCopy
			this.offset += toCopy
			this.available -= toCopy
			if (this.offset === buf.length) {
				this.chunks.shift()
				this.offset = 0
			}
		}
		return out
	}
}

/**
 * Channel that replays bytes already consumed by a negotiation before
 * delegating to the underlying channel
 */
export class PrefixedChannel implements ByteChannel {
	private prefix: Buffer | null

	constructor(
		prefix: Buffer,
		private readonly inner: ByteChannel
	) {
		this.prefix = prefix.length > 0 ? prefix : null
	}

	get closed(): boolean {
		return this.inner.closed
	}

	read(): Promise<Buffer | null> {
		if (this.prefix) {
			const prefix = this.prefix
			this.prefix = null
			return Promise.resolve(prefix)
		}
		return this.inner.read()
	}

	write(data: Buffer): Promise<void> {
		return this.inner.write(data)
	}

	closeWrite(): Promise<void> {
		return this.inner.closeWrite()
	}

	destroy(error?: Error): void {
		this.prefix = null
		this.inner.destroy(error)
	}
}
