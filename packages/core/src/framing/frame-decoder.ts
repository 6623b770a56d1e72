/**
 * Incremental decoder for length-delimited frames.
 *
 * Framing:
 * - 4-byte big-endian UINT32 length prefix (payload length, excludes the prefix)
 * - payload bytes; a zero-length payload is a valid frame
 *
 * Keeps a queue of received buffers and only copies when a frame spans
 * multiple chunks.
 */

import { FrameTooLargeError } from '@/errors.js'

export const FRAME_HEADER_SIZE = 4
export const DEFAULT_MAX_FRAME_LENGTH = 8 * 1024 * 1024

/**
 * Prefix a payload with its 4-byte length
 */
export function encodeFrame(payload: Buffer, maxFrameLength: number = DEFAULT_MAX_FRAME_LENGTH): Buffer {
	if (payload.length > maxFrameLength) {
		throw new FrameTooLargeError(payload.length, maxFrameLength)
	}
	const buf = Buffer.allocUnsafe(FRAME_HEADER_SIZE + payload.length)
	buf.writeUInt32BE(payload.length, 0)
	payload.copy(buf, FRAME_HEADER_SIZE)
	return buf
}

export class FrameDecoder {
	private readonly buffers: Buffer[] = []
	private bufferOffset = 0 // Offset within buffers[0]
	private availableBytes = 0 // Total bytes available across buffers (from bufferOffset)
	private expectedLength: number | null = null // null means "need length prefix"

	constructor(private readonly maxFrameLength: number = DEFAULT_MAX_FRAME_LENGTH) {}

	/**
	 * Bytes received but not yet returned as a frame, prefix included
	 */
	get pendingBytes(): number {
		return this.availableBytes + (this.expectedLength === null ? 0 : FRAME_HEADER_SIZE)
	}

	/**
	 * Push a new chunk and return any complete payloads extracted.
	 *
	 * @throws FrameTooLargeError as soon as a prefix announces more than the
	 * maximum, before the payload is buffered
	 */
	push(chunk: Buffer): Buffer[] {
		if (chunk.length > 0) {
			this.buffers.push(chunk)
			this.availableBytes += chunk.length
		}

		const frames: Buffer[] = []

		while (true) {
			if (this.expectedLength === null) {
				if (this.availableBytes < FRAME_HEADER_SIZE) {
					break
				}

				const length = this.peekUInt32BE()
				if (length > this.maxFrameLength) {
					throw new FrameTooLargeError(length, this.maxFrameLength)
				}
				this.consumeBytes(FRAME_HEADER_SIZE)
				this.expectedLength = length
			}

			if (this.availableBytes < this.expectedLength) {
				break
			}

			frames.push(this.consumeBytes(this.expectedLength))
			this.expectedLength = null
		}

		return frames
	}

	private peekUInt32BE(): number {
		const first = this.buffers[0]!
		const availableInFirst = first.length - this.bufferOffset
		if (availableInFirst >= FRAME_HEADER_SIZE) {
			return first.readUInt32BE(this.bufferOffset)
		}

		const tmp = Buffer.allocUnsafe(FRAME_HEADER_SIZE)
		let copied = 0

		for (let i = 0; copied < FRAME_HEADER_SIZE; i++) {
			const buf = this.buffers[i]!
			const start = i === 0 ? this.bufferOffset : 0
			const toCopy = Math.min(FRAME_HEADER_SIZE - copied, buf.length - start)
			buf.copy(tmp, copied, start, start + toCopy)
			copied += toCopy
		}

		return tmp.readUInt32BE(0)
	}

	private consumeBytes(length: number): Buffer {
		if (length === 0) {
			return Buffer.alloc(0)
		}

		const first = this.buffers[0]!
		const availableInFirst = first.length - this.bufferOffset

		if (length <= availableInFirst) {
			const start = this.bufferOffset
			const slice = first.subarray(start, start + length)

			this.bufferOffset += length
			this.availableBytes -= length

			if (this.bufferOffset === first.length) {
				this.buffers.shift()
				this.bufferOffset = 0
			}

			return slice
		}

		const out = Buffer.allocUnsafe(length)
		let copied = 0

		while (copied < length) {
			const buf = this.buffers[0]!
			const start = this.bufferOffset
			const toCopy = Math.min(length - copied, buf.length - start)
			buf.copy(out, copied, start, start + toCopy)
			copied += toCopy

			this.bufferOffset += toCopy
			this.availableBytes -= toCopy

			if (this.bufferOffset === buf.length) {
				this.buffers.shift()
				this.bufferOffset = 0
			}
		}

		return out
	}
}
