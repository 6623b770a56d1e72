import { describe, expect, it } from 'vitest'

import { decodeUVarInt, encodeLengthPrefixed, encodeUVarInt } from '@/codec/varint.js'

describe('UVARINT', () => {
	it.each([
		[0, [0x00]],
		[1, [0x01]],
		[127, [0x7f]],
		[128, [0x80, 0x01]],
		[300, [0xac, 0x02]],
		[16384, [0x80, 0x80, 0x01]],
	])('encodes %d', (value, bytes) => {
		expect([...encodeUVarInt(value)]).toEqual(bytes)
		expect(decodeUVarInt(Buffer.from(bytes))).toEqual({ value, bytesRead: bytes.length })
	})

	it('decodes at an offset', () => {
		expect(decodeUVarInt(Buffer.from([0xff, 0xac, 0x02, 0x00]), 1)).toEqual({ value: 300, bytesRead: 2 })
	})

	it('returns null for an incomplete varint', () => {
		expect(decodeUVarInt(Buffer.from([0x80]))).toBeNull()
		expect(decodeUVarInt(Buffer.alloc(0))).toBeNull()
	})

	it('rejects values it cannot encode', () => {
		expect(() => encodeUVarInt(-1)).toThrow('UVARINT cannot encode -1')
		expect(() => encodeUVarInt(1.5)).toThrow(RangeError)
	})

	it('rejects encodings longer than 8 bytes', () => {
		expect(() => decodeUVarInt(Buffer.alloc(9, 0x80))).toThrow('UVARINT is longer than 8 bytes')
	})

	it('round-trips the largest safe integer', () => {
		const encoded = encodeUVarInt(Number.MAX_SAFE_INTEGER)
		expect(encoded.length).toBe(8)
		expect(decodeUVarInt(encoded)).toEqual({ value: Number.MAX_SAFE_INTEGER, bytesRead: 8 })
	})

	it('prefixes payloads with their length', () => {
		expect([...encodeLengthPrefixed(Buffer.from('hi'))]).toEqual([0x02, 0x68, 0x69])
	})
})
