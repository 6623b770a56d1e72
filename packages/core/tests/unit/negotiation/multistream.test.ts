import { describe, expect, it } from 'vitest'

import { ChannelReader } from '@/channel/channel-reader.js'
import { encodeLengthPrefixed, encodeUVarInt } from '@/codec/varint.js'
import { NegotiationError } from '@/errors.js'
import { encodeMessage, handle, MULTISTREAM_PROTOCOL, select } from '@/negotiation/multistream.js'
import { createChannelPair } from '@/testing.js'

const ECHO = '/echo/1.0.0'
const CHAT = '/chat/2.0.0'

describe('multistream negotiation', () => {
	it('agrees on the first protocol both sides support', async () => {
		const [dialer, listener] = createChannelPair()

		const [selected, handled] = await Promise.all([select(dialer, [CHAT, ECHO]), handle(listener, [ECHO])])

		expect(selected.protocol).toBe(ECHO)
		expect(handled.protocol).toBe(ECHO)
	})

	it('sends the header and first proposal in one write', async () => {
		const [dialer, listener] = createChannelPair()

		await Promise.all([select(dialer, [ECHO]), handle(listener, [ECHO])])

		expect(dialer.written[0]).toEqual(Buffer.concat([encodeMessage(MULTISTREAM_PROTOCOL), encodeMessage(ECHO)]))
		expect(dialer.written).toHaveLength(1)
	})

	it('encodes messages as length-prefixed lines', () => {
		expect(encodeMessage('na')).toEqual(Buffer.from([0x03, 0x6e, 0x61, 0x0a]))
	})

	it('fails the dialer when nothing is supported', async () => {
		const [dialer, listener] = createChannelPair()
		const handled = handle(listener, [ECHO])

		const selected = select(dialer, [CHAT])
		await expect(selected).rejects.toBeInstanceOf(NegotiationError)
		await expect(selected).rejects.toMatchObject({
			message: `Remote supports none of: ${CHAT}`,
			scope: 'stream',
			offered: [CHAT],
		})

		await dialer.closeWrite()
		await expect(handled).rejects.toThrow('Remote closed the stream during negotiation')
	})

	it('reports failures with the requested scope', async () => {
		const [dialer, listener] = createChannelPair()
		void handle(listener, [ECHO]).catch(() => {})

		await expect(select(dialer, [CHAT], { scope: 'connection' })).rejects.toMatchObject({ scope: 'connection' })
		await dialer.closeWrite()
	})

	it('refuses to propose an empty list', async () => {
		const [dialer] = createChannelPair()
		await expect(select(dialer, [])).rejects.toThrow('No protocols to propose')
	})

	it('keeps bytes that arrive with the proposal', async () => {
		const [dialer, listener] = createChannelPair()

		await dialer.write(
			Buffer.concat([encodeMessage(MULTISTREAM_PROTOCOL), encodeMessage(ECHO), Buffer.from('payload')])
		)
		const negotiated = await handle(listener, [ECHO])

		expect((await negotiated.stream.read())?.toString()).toBe('payload')
	})

	it('lists supported protocols on request', async () => {
		const [dialer, listener] = createChannelPair()
		void handle(listener, [ECHO]).catch(() => {})

		await dialer.write(Buffer.concat([encodeMessage(MULTISTREAM_PROTOCOL), encodeMessage('ls')]))
		const reader = new ChannelReader(dialer)

		expect((await reader.readLengthPrefixed(1024))?.toString()).toBe(`${MULTISTREAM_PROTOCOL}\n`)
		expect(await reader.readLengthPrefixed(1024)).toEqual(Buffer.concat([encodeMessage(ECHO), Buffer.from('\n')]))
		await dialer.closeWrite()
	})

	it('rejects a wrong header', async () => {
		const [dialer, listener] = createChannelPair()

		await dialer.write(encodeMessage('/multistream/2.0.0'))

		await expect(handle(listener, [ECHO])).rejects.toThrow('Unexpected negotiation header "/multistream/2.0.0"')
	})

	it('rejects an unexpected response', async () => {
		const [dialer, listener] = createChannelPair()

		await listener.write(Buffer.concat([encodeMessage(MULTISTREAM_PROTOCOL), encodeMessage(CHAT)]))

		await expect(select(dialer, [ECHO])).rejects.toThrow(`Unexpected response "${CHAT}" to proposal "${ECHO}"`)
	})

	it('rejects a message without a trailing newline', async () => {
		const [dialer, listener] = createChannelPair()

		await dialer.write(encodeLengthPrefixed(Buffer.from(MULTISTREAM_PROTOCOL)))

		await expect(handle(listener, [ECHO])).rejects.toThrow('Negotiation message is not newline-terminated')
	})

	it('rejects oversized messages', async () => {
		const [dialer, listener] = createChannelPair()

		await dialer.write(encodeUVarInt(2000))

		await expect(handle(listener, [ECHO])).rejects.toThrow(
			'Malformed negotiation: message of 2000 bytes exceeds the maximum of 1024'
		)
	})

	it('wraps channel faults as negotiation failures', async () => {
		const [, listener] = createChannelPair()
		const handled = handle(listener, [ECHO])

		listener.destroy(new Error('socket reset'))

		await expect(handled).rejects.toThrow('Negotiation aborted: socket reset')
	})
})
