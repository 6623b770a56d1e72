import { describe, expect, it } from 'vitest'

import { ChannelReader } from '@/channel/channel-reader.js'
import { encodeLengthPrefixed, encodeUVarInt } from '@/codec/varint.js'
import { NegotiationError, StreamIoError } from '@/errors.js'
import { createChannelPair } from '@/testing.js'

describe('ChannelReader', () => {
	it('reads exact byte counts across chunks', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.write(Buffer.from('ab'))
		await writer.write(Buffer.from('cde'))

		expect((await reader.readExactly(4)).toString()).toBe('abcd')
		expect(reader.bufferedBytes).toBe(1)
		expect((await reader.readExactly(1)).toString()).toBe('e')
	})

	it('reads a varint split across chunks', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.write(Buffer.from([0xac]))
		await writer.write(Buffer.from([0x02]))

		expect(await reader.readUVarInt()).toBe(300)
	})

	it('returns null on a clean end of stream', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.closeWrite()

		expect(await reader.readUVarInt()).toBeNull()
		expect(await reader.readLengthPrefixed(10)).toBeNull()
		expect(await reader.readExactlyOrEnd(4)).toBeNull()
	})

	it('fails when the stream ends inside a read', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.write(Buffer.from('ab'))
		await writer.closeWrite()

		await expect(reader.readExactly(3)).rejects.toThrow(StreamIoError)
		await expect(new ChannelReader(channel).readExactly(1)).rejects.toThrow('stream ended after 0 of 1 bytes')
	})

	it('fails inside a varint with the configured error', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel, message => new NegotiationError(message, 'stream'))

		await writer.write(Buffer.from([0x80]))
		await writer.closeWrite()

		await expect(reader.readUVarInt()).rejects.toThrow(NegotiationError)
	})

	it('enforces the maximum message length', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.write(encodeUVarInt(11))

		await expect(reader.readLengthPrefixed(10)).rejects.toThrow('message of 11 bytes exceeds the maximum of 10')
	})

	it('hands buffered bytes to the next layer on detach', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.write(Buffer.concat([encodeLengthPrefixed(Buffer.from('x')), Buffer.from('rest')]))
		await writer.write(Buffer.from('more'))

		expect((await reader.readLengthPrefixed(10))?.toString()).toBe('x')

		const detached = reader.detach()
		expect((await detached.read())?.toString()).toBe('rest')
		expect((await detached.read())?.toString()).toBe('more')
	})

	it('returns the channel itself when nothing is buffered', async () => {
		const [writer, channel] = createChannelPair()
		const reader = new ChannelReader(channel)

		await writer.write(Buffer.from('ab'))
		await reader.readExactly(2)

		expect(reader.detach()).toBe(channel)
	})
})
