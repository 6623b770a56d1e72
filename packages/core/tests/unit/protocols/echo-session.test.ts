import { describe, expect, it, vi } from 'vitest'

import { Multiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import { FrameTooLargeError } from '@/errors.js'
import { encodeFrame, FrameDecoder } from '@/framing/frame-decoder.js'
import type { Logger } from '@/logger.js'
import { EchoSession } from '@/protocols/echo/echo-session.js'
import { FramedReader } from '@/protocols/echo/framed-reader.js'
import { createEchoHandler } from '@/protocols/echo/handler.js'
import { createChannelPair } from '@/testing.js'

async function readFrames(channel: ByteChannel): Promise<Buffer[]> {
	const decoder = new FrameDecoder()
	const frames: Buffer[] = []
	for (let chunk = await channel.read(); chunk !== null; chunk = await channel.read()) {
		frames.push(...decoder.push(chunk))
	}
	return frames
}

function createMockLogger(): Logger {
	const logger: Logger = {
		error: vi.fn(),
		warn: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		child: () => logger,
	}
	return logger
}

describe('EchoSession', () => {
	it('echoes every frame in order and ends cleanly', async () => {
		const [client, server] = createChannelPair()
		const session = new EchoSession(server)
		expect(session.state).toBe('awaiting-frame')

		const running = session.run()
		await client.write(Buffer.concat([encodeFrame(Buffer.from('hello')), encodeFrame(Buffer.from('world'))]))
		await client.write(encodeFrame(Buffer.from('!')))
		await client.closeWrite()

		expect(await running).toEqual({ state: 'closed-clean', messages: 3, bytes: 11, error: undefined })
		expect(session.state).toBe('closed-clean')
		expect((await readFrames(client)).map(frame => frame.toString())).toEqual(['hello', 'world', '!'])
	})

	it('echoes zero-length frames', async () => {
		const [client, server] = createChannelPair()
		const running = new EchoSession(server).run()

		await client.write(encodeFrame(Buffer.alloc(0)))
		await client.closeWrite()

		expect((await running).messages).toBe(1)
		expect(Buffer.concat(server.written)).toEqual(Buffer.from([0, 0, 0, 0]))
	})

	it('reassembles frames delivered one byte at a time', async () => {
		const [client, server] = createChannelPair()
		const running = new EchoSession(server).run()

		for (const byte of encodeFrame(Buffer.from('drip'))) {
			await client.write(Buffer.from([byte]))
		}
		await client.closeWrite()

		expect((await running).state).toBe('closed-clean')
		expect((await readFrames(client)).map(frame => frame.toString())).toEqual(['drip'])
	})

	it('ends without writing when the peer sends nothing', async () => {
		const [client, server] = createChannelPair()
		const running = new EchoSession(server).run()

		await client.closeWrite()

		expect(await running).toEqual({ state: 'closed-clean', messages: 0, bytes: 0, error: undefined })
		expect(await client.read()).toBeNull()
	})

	it('faults on a frame above the maximum without echoing it', async () => {
		const [client, server] = createChannelPair()
		const session = new EchoSession(server, { maxFrameLength: 10 })
		const running = session.run()

		await client.write(encodeFrame(Buffer.from('ok')))
		await client.write(encodeFrame(Buffer.alloc(11)))

		const result = await running
		expect(result.state).toBe('closed-faulted')
		expect(result.messages).toBe(1)
		expect(result.error).toBeInstanceOf(FrameTooLargeError)
		expect(result.error?.message).toBe('Frame of 11 bytes exceeds the maximum of 10 bytes')
		expect(session.state).toBe('closed-faulted')
		expect(server.closed).toBe(true)
		expect((await readFrames(client)).map(frame => frame.toString())).toEqual(['ok'])
	})

	it('faults when the stream ends inside a frame', async () => {
		const [client, server] = createChannelPair()
		const running = new EchoSession(server).run()

		await client.write(encodeFrame(Buffer.from('0123456789')).subarray(0, 6))
		await client.closeWrite()

		const result = await running
		expect(result.state).toBe('closed-faulted')
		expect(result.error?.message).toBe('Stream ended with 6 bytes of an incomplete frame')
	})

	it('faults when the stream breaks', async () => {
		const [, server] = createChannelPair()
		const running = new EchoSession(server).run()

		server.destroy(new Error('connection reset'))

		expect(await running).toMatchObject({ state: 'closed-faulted', error: { message: 'connection reset' } })
	})
})

describe('FramedReader', () => {
	it('yields frames then end', async () => {
		const [client, server] = createChannelPair()
		const reader = new FramedReader(server)

		await client.write(Buffer.concat([encodeFrame(Buffer.from('a')), encodeFrame(Buffer.from('b'))]))
		await client.closeWrite()

		const first = await reader.next()
		const second = await reader.next()
		expect(first.type === 'frame' && first.payload.toString()).toBe('a')
		expect(second.type === 'frame' && second.payload.toString()).toBe('b')
		expect(await reader.next()).toEqual({ type: 'end' })
		expect(await reader.next()).toEqual({ type: 'end' })
	})
})

describe('createEchoHandler', () => {
	const context = (logger: Logger) => ({
		protocol: '/echo/1.0.0',
		remoteAddress: Multiaddr.parse('/ip4/127.0.0.1/tcp/50000'),
		logger,
	})

	it('logs finished sessions at debug level', async () => {
		const [client, server] = createChannelPair()
		const logger = createMockLogger()
		const handled = createEchoHandler()(server, context(logger))

		await client.write(encodeFrame(Buffer.from('hi')))
		await client.closeWrite()
		await handled

		expect(logger.debug).toHaveBeenCalledWith('echo session finished', { messages: 1, bytes: 2 })
		expect(logger.warn).not.toHaveBeenCalled()
	})

	it('logs faulted sessions as warnings without rejecting', async () => {
		const [client, server] = createChannelPair()
		const logger = createMockLogger()
		const handled = createEchoHandler({ maxFrameLength: 4 })(server, context(logger))

		await client.write(encodeFrame(Buffer.alloc(5)))
		await handled

		expect(logger.warn).toHaveBeenCalledWith('echo session faulted', {
			messages: 0,
			error: 'Frame of 5 bytes exceeds the maximum of 4 bytes',
			errorName: 'FrameTooLargeError',
		})
	})
})
