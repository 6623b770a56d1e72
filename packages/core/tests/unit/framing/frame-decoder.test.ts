import { describe, expect, it } from 'vitest'

import { FrameTooLargeError } from '@/errors.js'
import { encodeFrame, FrameDecoder } from '@/framing/frame-decoder.js'

describe('FrameDecoder', () => {
	it('decodes a frame when length prefix spans chunks', () => {
		const decoder = new FrameDecoder()
		const buf = encodeFrame(Buffer.from('hello'))

		expect(decoder.push(buf.subarray(0, 2))).toEqual([])
		const out = decoder.push(buf.subarray(2))

		expect(out).toHaveLength(1)
		expect(out[0]!.toString('utf8')).toBe('hello')
	})

	it('decodes multiple frames in a single chunk', () => {
		const decoder = new FrameDecoder()
		const chunk = Buffer.concat([encodeFrame(Buffer.from('a')), encodeFrame(Buffer.from('bb'))])

		const out = decoder.push(chunk)
		expect(out.map(frame => frame.toString('utf8'))).toEqual(['a', 'bb'])
	})

	it('decodes zero-length frames', () => {
		const decoder = new FrameDecoder()
		const chunk = Buffer.concat([encodeFrame(Buffer.alloc(0)), encodeFrame(Buffer.from('x')), encodeFrame(Buffer.alloc(0))])

		const out = decoder.push(chunk)
		expect(out.map(frame => frame.length)).toEqual([0, 1, 0])
	})

	it('decodes a frame spanning multiple chunks and tracks pending bytes', () => {
		const decoder = new FrameDecoder()
		const buf = encodeFrame(Buffer.from('0123456789'))

		expect(decoder.push(buf.subarray(0, 3))).toEqual([])
		expect(decoder.pendingBytes).toBe(3)
		expect(decoder.push(buf.subarray(3, 9))).toEqual([])
		expect(decoder.pendingBytes).toBe(9)

		const out = decoder.push(buf.subarray(9))
		expect(out).toHaveLength(1)
		expect(out[0]!.toString('utf8')).toBe('0123456789')
		expect(decoder.pendingBytes).toBe(0)
	})

	it('keeps leftover bytes for the next frame', () => {
		const decoder = new FrameDecoder()
		const first = encodeFrame(Buffer.from('first'))
		const combined = Buffer.concat([first, encodeFrame(Buffer.from('second'))])

		const cut = first.length + 2
		expect(decoder.push(combined.subarray(0, cut)).map(f => f.toString())).toEqual(['first'])
		expect(decoder.push(combined.subarray(cut)).map(f => f.toString())).toEqual(['second'])
	})

	it('rejects a prefix above the maximum before buffering the payload', () => {
		const decoder = new FrameDecoder(10)
		const header = Buffer.alloc(4)
		header.writeUInt32BE(11, 0)

		expect(() => decoder.push(header)).toThrow(FrameTooLargeError)
		expect(() => new FrameDecoder(10).push(header)).toThrow('Frame of 11 bytes exceeds the maximum of 10 bytes')
	})

	it('accepts a frame of exactly the maximum length', () => {
		const decoder = new FrameDecoder(4)
		expect(decoder.push(encodeFrame(Buffer.from('abcd'), 4))).toHaveLength(1)
	})
})

describe('encodeFrame', () => {
	it('writes a big-endian length prefix', () => {
		expect([...encodeFrame(Buffer.from('hi'))]).toEqual([0, 0, 0, 2, 0x68, 0x69])
		expect([...encodeFrame(Buffer.alloc(0))]).toEqual([0, 0, 0, 0])
	})

	it('refuses payloads above the maximum', () => {
		expect(() => encodeFrame(Buffer.alloc(5), 4)).toThrow(FrameTooLargeError)
	})
})
