import type { Multiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import type { Dialer } from '@/client/dialer.js'
import { StreamIoError } from '@/errors.js'
import { DEFAULT_MAX_FRAME_LENGTH, encodeFrame } from '@/framing/frame-decoder.js'
import { ECHO_PROTOCOL } from '@/protocols/echo/echo-session.js'
import { FramedReader } from '@/protocols/echo/framed-reader.js'

export interface EchoClientOptions {
	maxFrameLength?: number
}

/**
 * One echo substream. Requests are answered in order; await each `echo()`
 * before sending the next.
 */
export class EchoClient {
	private readonly reader: FramedReader

	private constructor(
		private readonly stream: ByteChannel,
		private readonly maxFrameLength: number
	) {
		this.reader = new FramedReader(stream, maxFrameLength)
	}

	static async connect(dialer: Dialer, address: Multiaddr | string, options: EchoClientOptions = {}): Promise<EchoClient> {
		const { stream } = await dialer.dial(address, [ECHO_PROTOCOL])
		return new EchoClient(stream, options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH)
	}

	/**
	 * Send one frame and wait for its echo
	 */
	async echo(payload: Buffer): Promise<Buffer> {
		await this.stream.write(encodeFrame(payload, this.maxFrameLength))
		const event = await this.reader.next()
		if (event.type === 'end') {
			throw new StreamIoError('Server ended the stream before replying')
		}
		return event.payload
	}

	/**
	 * Half-close and wait for the server to end its side
	 */
	async close(): Promise<void> {
		await this.stream.closeWrite()
		const event = await this.reader.next()
		if (event.type !== 'end') {
			throw new StreamIoError('Server sent a frame after the stream was closed')
		}
	}

	destroy(error?: Error): void {
		this.stream.destroy(error)
	}
}
