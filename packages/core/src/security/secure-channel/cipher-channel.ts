/**
 * AES-256-GCM framed channel
 *
 * Frame: 4-byte big-endian length | ciphertext | 16-byte auth tag.
 * The 96-bit GCM nonce is 4 zero bytes followed by a 64-bit big-endian
 * counter, one counter per direction.
 */

import * as crypto from 'node:crypto'
import type { ByteChannel } from '@/channel/types.js'
import { ChannelReader } from '@/channel/channel-reader.js'
import { StreamIoError, toError } from '@/errors.js'

export const MAX_PLAINTEXT_CHUNK = 64 * 1024
export const AUTH_TAG_LENGTH = 16
const LENGTH_PREFIX_SIZE = 4
const NONCE_SIZE = 12

export class CipherChannel implements ByteChannel {
	private readonly reader: ChannelReader
	private sendCounter = 0n
	private receiveCounter = 0n
	private failure: Error | null = null

	constructor(
		private readonly inner: ByteChannel,
		private readonly sendKey: Buffer,
		private readonly receiveKey: Buffer
	) {
		this.reader = new ChannelReader(inner, message => new StreamIoError(`Secure channel ${message}`))
	}

	get closed(): boolean {
		return this.inner.closed
	}

	/**
	 * Next decrypted frame, or null on a clean end-of-stream
	 *
	 * @throws StreamIoError when a frame fails authentication; the channel is
	 * destroyed first
	 */
	async read(): Promise<Buffer | null> {
		if (this.failure) {
			throw this.failure
		}

		const header = await this.reader.readExactlyOrEnd(LENGTH_PREFIX_SIZE)
		if (header === null) {
			return null
		}

		const length = header.readUInt32BE(0)
		if (length < AUTH_TAG_LENGTH || length > MAX_PLAINTEXT_CHUNK + AUTH_TAG_LENGTH) {
			throw this.fail(new StreamIoError(`Secure channel frame of ${length} bytes is out of range`))
		}

		const frame = await this.reader.readExactly(length)
		const ciphertext = frame.subarray(0, length - AUTH_TAG_LENGTH)
		const tag = frame.subarray(length - AUTH_TAG_LENGTH)

		try {
			const decipher = crypto.createDecipheriv('aes-256-gcm', this.receiveKey, nonceFor(this.receiveCounter++))
			decipher.setAuthTag(tag)
			return Buffer.concat([decipher.update(ciphertext), decipher.final()])
		} catch (error) {
			throw this.fail(new StreamIoError('Secure channel integrity check failed', toError(error)))
		}
	}

	write(data: Buffer): Promise<void> {
		if (this.failure) {
			return Promise.reject(this.failure)
		}
		if (data.length === 0) {
			return Promise.resolve()
		}

		const frames: Buffer[] = []
		for (let offset = 0; offset < data.length; offset += MAX_PLAINTEXT_CHUNK) {
			frames.push(this.seal(data.subarray(offset, offset + MAX_PLAINTEXT_CHUNK)))
		}
		return this.inner.write(frames.length === 1 ? frames[0]! : Buffer.concat(frames))
	}

	closeWrite(): Promise<void> {
		return this.inner.closeWrite()
	}

	destroy(error?: Error): void {
		this.inner.destroy(error)
	}

	private seal(chunk: Buffer): Buffer {
		const cipher = crypto.createCipheriv('aes-256-gcm', this.sendKey, nonceFor(this.sendCounter++))
		const ciphertext = Buffer.concat([cipher.update(chunk), cipher.final()])
		const tag = cipher.getAuthTag()

		const frame = Buffer.allocUnsafe(LENGTH_PREFIX_SIZE + ciphertext.length + AUTH_TAG_LENGTH)
		frame.writeUInt32BE(ciphertext.length + AUTH_TAG_LENGTH, 0)
		ciphertext.copy(frame, LENGTH_PREFIX_SIZE)
		tag.copy(frame, LENGTH_PREFIX_SIZE + ciphertext.length)
		return frame
	}

	private fail(error: StreamIoError): StreamIoError {
		this.failure = error
		this.inner.destroy(error)
		return error
	}
}

function nonceFor(counter: bigint): Buffer {
	const nonce = Buffer.alloc(NONCE_SIZE)
	nonce.writeBigUInt64BE(counter, NONCE_SIZE - 8)
	return nonce
}
