import { errorContext } from '@/logger.js'
import type { StreamHandler } from '@/negotiation/router.js'
import { EchoSession } from '@/protocols/echo/echo-session.js'

export interface EchoHandlerOptions {
	maxFrameLength?: number
}

/**
 * Stream handler running one echo session per substream
 */
export function createEchoHandler(options: EchoHandlerOptions = {}): StreamHandler {
	return async (stream, context) => {
		const session = new EchoSession(stream, { maxFrameLength: options.maxFrameLength, logger: context.logger })
		const result = await session.run()

		if (result.state === 'closed-faulted') {
			context.logger.warn('echo session faulted', {
				messages: result.messages,
				...errorContext(result.error),
			})
			return
		}
		context.logger.debug('echo session finished', { messages: result.messages, bytes: result.bytes })
	}
}
