/**
 * Echo session: returns every frame to the sender, unchanged, until the
 * remote ends its side
 *
 * ```
 * awaiting-frame ──frame──▶ echoing ──written──▶ awaiting-frame
 *       │                      │
 *      end                   fault
 *       ▼                      ▼
 *  closed-clean          closed-faulted
 * ```
 */

import type { ByteChannel } from '@/channel/types.js'
import { toError } from '@/errors.js'
import { DEFAULT_MAX_FRAME_LENGTH, encodeFrame } from '@/framing/frame-decoder.js'
import { errorContext, noopLogger, type Logger } from '@/logger.js'
import { FramedReader } from '@/protocols/echo/framed-reader.js'

export const ECHO_PROTOCOL = '/echo/1.0.0'

export type EchoSessionState = 'awaiting-frame' | 'echoing' | 'closed-clean' | 'closed-faulted'

export interface EchoSessionResult {
	state: 'closed-clean' | 'closed-faulted'
	messages: number
	bytes: number
	error?: Error
}

export interface EchoSessionOptions {
	maxFrameLength?: number
	logger?: Logger
}

export class EchoSession {
	private currentState: EchoSessionState = 'awaiting-frame'
	private messages = 0
	private bytes = 0
	private error: Error | undefined
	private readonly maxFrameLength: number
	private readonly logger: Logger

	constructor(
		private readonly stream: ByteChannel,
		options: EchoSessionOptions = {}
	) {
		this.maxFrameLength = options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH
		this.logger = options.logger ?? noopLogger
	}

	get state(): EchoSessionState {
		return this.currentState
	}

	/**
	 * Echo until end-of-stream or a fault. Never rejects: a fault destroys the
	 * stream and is reported in the result.
	 */
	async run(): Promise<EchoSessionResult> {
		const reader = new FramedReader(this.stream, this.maxFrameLength)

		try {
			while (true) {
				const event = await reader.next()

				if (event.type === 'end') {
					this.logger.debug('received end of stream', { messages: this.messages })
					await this.stream.closeWrite()
					this.currentState = 'closed-clean'
					return this.result('closed-clean')
				}

				this.currentState = 'echoing'
				this.logger.debug('echoing message', { bytes: event.payload.length })
				await this.stream.write(encodeFrame(event.payload, this.maxFrameLength))
				this.messages++
				this.bytes += event.payload.length
				this.currentState = 'awaiting-frame'
			}
		} catch (error) {
			const err = toError(error)
			this.error = err
			this.currentState = 'closed-faulted'
			this.logger.debug('echo session faulted', errorContext(err))
			this.stream.destroy(err)
			return this.result('closed-faulted')
		}
	}

	private result(state: EchoSessionResult['state']): EchoSessionResult {
		return { state, messages: this.messages, bytes: this.bytes, error: this.error }
	}
}
