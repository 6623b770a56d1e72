/**
 * Ed25519 identity keys for the secure channel
 */

import * as crypto from 'node:crypto'
import { KeyMaterialError, toError } from '@/errors.js'

export interface KeyMaterial {
	/** PKCS#8 private key, PEM text or DER bytes */
	privateKey: string | Buffer
	/** SPKI public key, PEM text or DER bytes */
	publicKey: string | Buffer
}

export class KeyPair {
	readonly publicKeyDer: Buffer

	constructor(
		readonly privateKey: crypto.KeyObject,
		readonly publicKey: crypto.KeyObject
	) {
		this.publicKeyDer = publicKey.export({ type: 'spki', format: 'der' })
	}

	get peerId(): string {
		return peerIdFromPublicKey(this.publicKeyDer)
	}

	sign(data: Buffer): Buffer {
		return crypto.sign(null, data, this.privateKey)
	}
}

/**
 * Peer id of an identity key: hex SHA-256 of its SPKI DER encoding
 */
export function peerIdFromPublicKey(spkiDer: Buffer): string {
	return crypto.createHash('sha256').update(spkiDer).digest('hex')
}

/**
 * Make a fresh, unpersisted key pair
 */
export function generateKeyPair(): KeyPair {
	const { privateKey, publicKey } = crypto.generateKeyPairSync('ed25519')
	return new KeyPair(privateKey, publicKey)
}

/**
 * Load and cross-check a static key pair
 *
 * @throws KeyMaterialError when either key cannot be decoded, is not Ed25519,
 * or the two keys do not belong together
 */
export function loadKeyPair(material: KeyMaterial): KeyPair {
	let privateKey: crypto.KeyObject
	let publicKey: crypto.KeyObject

	try {
		privateKey = isPem(material.privateKey)
			? crypto.createPrivateKey({ key: material.privateKey, format: 'pem' })
			: crypto.createPrivateKey({ key: toBuffer(material.privateKey), format: 'der', type: 'pkcs8' })
	} catch (error) {
		throw new KeyMaterialError('Private key could not be decoded', toError(error))
	}

	try {
		publicKey = isPem(material.publicKey)
			? crypto.createPublicKey({ key: material.publicKey, format: 'pem' })
			: crypto.createPublicKey({ key: toBuffer(material.publicKey), format: 'der', type: 'spki' })
	} catch (error) {
		throw new KeyMaterialError('Public key could not be decoded', toError(error))
	}

	if (privateKey.asymmetricKeyType !== 'ed25519') {
		throw new KeyMaterialError(`Private key must be ed25519, got ${privateKey.asymmetricKeyType ?? 'unknown'}`)
	}
	if (publicKey.asymmetricKeyType !== 'ed25519') {
		throw new KeyMaterialError(`Public key must be ed25519, got ${publicKey.asymmetricKeyType ?? 'unknown'}`)
	}

	const derived = crypto.createPublicKey(privateKey).export({ type: 'spki', format: 'der' })
	const given = publicKey.export({ type: 'spki', format: 'der' })
	if (!derived.equals(given)) {
		throw new KeyMaterialError('Public key does not match private key')
	}

	return new KeyPair(privateKey, publicKey)
}

function isPem(key: string | Buffer): boolean {
	const text = typeof key === 'string' ? key : key.subarray(0, 64).toString('latin1')
	return text.includes('-----BEGIN')
}

function toBuffer(key: string | Buffer): Buffer {
	return typeof key === 'string' ? Buffer.from(key, 'base64') : key
}
