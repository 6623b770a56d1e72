import * as crypto from 'node:crypto'
import { describe, expect, it } from 'vitest'

import { KeyMaterialError } from '@/errors.js'
import { generateKeyPair, loadKeyPair, peerIdFromPublicKey } from '@/security/key-pair.js'

describe('key pairs', () => {
	it('derives the peer id from the public key', () => {
		const keyPair = generateKeyPair()
		const expected = crypto.createHash('sha256').update(keyPair.publicKeyDer).digest('hex')

		expect(keyPair.peerId).toBe(expected)
		expect(keyPair.peerId).toMatch(/^[0-9a-f]{64}$/)
		expect(peerIdFromPublicKey(keyPair.publicKeyDer)).toBe(expected)
	})

	it('signs with the private key', () => {
		const keyPair = generateKeyPair()
		const data = Buffer.from('payload')

		expect(crypto.verify(null, data, keyPair.publicKey, keyPair.sign(data))).toBe(true)
	})

	it('loads PEM key material', () => {
		const generated = generateKeyPair()
		const loaded = loadKeyPair({
			privateKey: generated.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
			publicKey: generated.publicKey.export({ type: 'spki', format: 'pem' }).toString(),
		})

		expect(loaded.peerId).toBe(generated.peerId)
	})

	it('loads DER key material', () => {
		const generated = generateKeyPair()
		const loaded = loadKeyPair({
			privateKey: generated.privateKey.export({ type: 'pkcs8', format: 'der' }),
			publicKey: generated.publicKeyDer,
		})

		expect(loaded.peerId).toBe(generated.peerId)
	})

	it('rejects keys that do not belong together', () => {
		const a = generateKeyPair()
		const b = generateKeyPair()

		expect(() =>
			loadKeyPair({
				privateKey: a.privateKey.export({ type: 'pkcs8', format: 'der' }),
				publicKey: b.publicKeyDer,
			})
		).toThrow('Public key does not match private key')
	})

	it('rejects undecodable keys', () => {
		const valid = generateKeyPair()

		expect(() => loadKeyPair({ privateKey: Buffer.from('not a key'), publicKey: valid.publicKeyDer })).toThrow(
			KeyMaterialError
		)
		expect(() => loadKeyPair({ privateKey: Buffer.from('not a key'), publicKey: valid.publicKeyDer })).toThrow(
			'Private key could not be decoded'
		)
		expect(() =>
			loadKeyPair({
				privateKey: valid.privateKey.export({ type: 'pkcs8', format: 'der' }),
				publicKey: Buffer.from('not a key'),
			})
		).toThrow('Public key could not be decoded')
	})

	it('rejects keys of another algorithm', () => {
		const { privateKey, publicKey } = crypto.generateKeyPairSync('x25519')

		expect(() =>
			loadKeyPair({
				privateKey: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
				publicKey: publicKey.export({ type: 'spki', format: 'pem' }).toString(),
			})
		).toThrow('Private key must be ed25519, got x25519')
	})
})
