import type { ByteChannel } from '@/channel/types.js'
import { StreamIoError } from '@/errors.js'
import { DEFAULT_MAX_FRAME_LENGTH, FrameDecoder } from '@/framing/frame-decoder.js'

export type FrameEvent = { type: 'frame'; payload: Buffer } | { type: 'end' }

/**
 * Pulls length-delimited frames off a channel, one per call
 */
export class FramedReader {
	private readonly decoder: FrameDecoder
	private readonly pending: Buffer[] = []
	private ended = false

	constructor(
		private readonly channel: ByteChannel,
		maxFrameLength: number = DEFAULT_MAX_FRAME_LENGTH
	) {
		this.decoder = new FrameDecoder(maxFrameLength)
	}

	/**
	 * Next complete frame, or `end` once the remote finished at a frame boundary
	 *
	 * @throws StreamIoError when the stream ends inside a frame
	 * @throws FrameTooLargeError when a prefix exceeds the maximum length
	 */
	async next(): Promise<FrameEvent> {
		while (true) {
			const payload = this.pending.shift()
			if (payload) {
				return { type: 'frame', payload }
			}
			if (this.ended) {
				return { type: 'end' }
			}

			const chunk = await this.channel.read()
			if (chunk === null) {
				this.ended = true
				if (this.decoder.pendingBytes > 0) {
					throw new StreamIoError(`Stream ended with ${this.decoder.pendingBytes} bytes of an incomplete frame`)
				}
				continue
			}
			this.pending.push(...this.decoder.push(chunk))
		}
	}
}
