import { describe, expect, it } from 'vitest'

import { parseArgs } from '../../src/args.js'

describe('parseArgs', () => {
	it('splits positionals from flags', () => {
		expect(parseArgs(['send', '/ip4/127.0.0.1/tcp/1', 'hi', '--log-level', 'debug'])).toEqual({
			positionals: ['send', '/ip4/127.0.0.1/tcp/1', 'hi'],
			flags: { 'log-level': 'debug' },
		})
	})

	it('accepts inline values', () => {
		expect(parseArgs(['--security=/plaintext/1.0.0']).flags).toEqual({ security: '/plaintext/1.0.0' })
	})

	it('treats a flag followed by another flag as boolean', () => {
		expect(parseArgs(['--help', '--log-level', 'info']).flags).toEqual({ help: true, 'log-level': 'info' })
		expect(parseArgs(['--help']).flags).toEqual({ help: true })
	})

	it('stops option parsing at --', () => {
		expect(parseArgs(['send', 'addr', '--', '--not-a-flag'])).toEqual({
			positionals: ['send', 'addr', '--not-a-flag'],
			flags: {},
		})
	})
})
