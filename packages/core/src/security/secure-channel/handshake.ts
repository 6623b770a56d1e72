/**
 * Secure channel handshake
 *
 * Symmetric: both sides run the same three rounds, so neither waits on the
 * other before writing.
 *
 * 1. propose   nonce (16 bytes) | Ed25519 identity key | X25519 ephemeral key
 * 2. exchange  signature over (own ephemeral key ‖ remote nonce)
 * 3. finish    remote nonce, encrypted under the derived keys
 *
 * Every message is UVARINT-length-prefixed; the propose message holds three
 * length-prefixed fields.
 */

import * as crypto from 'node:crypto'
import type { ByteChannel } from '@/channel/types.js'
import { ChannelReader } from '@/channel/channel-reader.js'
import { decodeUVarInt, encodeLengthPrefixed } from '@/codec/varint.js'
import { SecurityHandshakeError, toError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'
import { peerIdFromPublicKey, type KeyPair } from '@/security/key-pair.js'
import { CipherChannel } from '@/security/secure-channel/cipher-channel.js'
import type { SecuredChannel } from '@/security/types.js'

export const NONCE_LENGTH = 16
export const MAX_HANDSHAKE_MESSAGE = 4096
export const KEY_DERIVATION_INFO = 'switchyard/secure-channel/1'
const KEY_LENGTH = 32

export interface Proposal {
	nonce: Buffer
	identityKey: Buffer
	ephemeralKey: Buffer
}

export function encodeProposal(proposal: Proposal): Buffer {
	return encodeLengthPrefixed(
		Buffer.concat([
			encodeLengthPrefixed(proposal.nonce),
			encodeLengthPrefixed(proposal.identityKey),
			encodeLengthPrefixed(proposal.ephemeralKey),
		])
	)
}

/**
 * Decode the body of a propose message (without its outer length prefix)
 */
export function decodeProposal(body: Buffer): Proposal {
	const fields: Buffer[] = []
	let offset = 0
	while (fields.length < 3) {
		const length = decodeUVarInt(body, offset)
		if (length === null || offset + length.bytesRead + length.value > body.length) {
			throw new SecurityHandshakeError('truncated propose message')
		}
		offset += length.bytesRead
		fields.push(body.subarray(offset, offset + length.value))
		offset += length.value
	}
	if (offset !== body.length) {
		throw new SecurityHandshakeError('trailing bytes in propose message')
	}

	const [nonce, identityKey, ephemeralKey] = fields
	if (!nonce || !identityKey || !ephemeralKey || nonce.length !== NONCE_LENGTH) {
		throw new SecurityHandshakeError('malformed propose message')
	}
	return { nonce, identityKey, ephemeralKey }
}

/**
 * Derive the (send, receive) key pair from the DH secret and both nonces
 */
export function deriveKeys(sharedSecret: Buffer, localNonce: Buffer, remoteNonce: Buffer): { sendKey: Buffer; receiveKey: Buffer } {
	const localFirst = Buffer.compare(localNonce, remoteNonce) < 0
	const salt = localFirst ? Buffer.concat([localNonce, remoteNonce]) : Buffer.concat([remoteNonce, localNonce])
	const okm = Buffer.from(crypto.hkdfSync('sha256', sharedSecret, salt, KEY_DERIVATION_INFO, KEY_LENGTH * 2))
	const first = okm.subarray(0, KEY_LENGTH)
	const second = okm.subarray(KEY_LENGTH)
	return localFirst ? { sendKey: first, receiveKey: second } : { sendKey: second, receiveKey: first }
}

/**
 * Run the handshake over a raw channel
 *
 * @throws SecurityHandshakeError on any authentication or integrity failure,
 * or when the remote closes mid-handshake
 */
export async function performHandshake(
	channel: ByteChannel,
	identity: KeyPair,
	logger: Logger = noopLogger
): Promise<SecuredChannel> {
	try {
		return await runHandshake(channel, identity, logger)
	} catch (error) {
		if (error instanceof SecurityHandshakeError) {
			throw error
		}
		const cause = toError(error)
		throw new SecurityHandshakeError(cause.message, cause)
	}
}

async function runHandshake(channel: ByteChannel, identity: KeyPair, logger: Logger): Promise<SecuredChannel> {
	const reader = new ChannelReader(channel, message => new SecurityHandshakeError(message))
	const readMessage = async (): Promise<Buffer> => {
		const message = await reader.readLengthPrefixed(MAX_HANDSHAKE_MESSAGE)
		if (message === null) {
			throw new SecurityHandshakeError('remote closed the connection')
		}
		return message
	}

	const ephemeral = crypto.generateKeyPairSync('x25519')
	const local: Proposal = {
		nonce: crypto.randomBytes(NONCE_LENGTH),
		identityKey: identity.publicKeyDer,
		ephemeralKey: ephemeral.publicKey.export({ type: 'spki', format: 'der' }),
	}

	// 1. propose
	await channel.write(encodeProposal(local))
	const remote = decodeProposal(await readMessage())

	if (remote.nonce.equals(local.nonce)) {
		throw new SecurityHandshakeError('remote echoed our nonce')
	}

	const remoteIdentity = importKey(remote.identityKey, 'ed25519', 'identity')
	const remoteEphemeral = importKey(remote.ephemeralKey, 'x25519', 'ephemeral')

	// 2. exchange
	await channel.write(encodeLengthPrefixed(identity.sign(Buffer.concat([local.ephemeralKey, remote.nonce]))))
	const signature = await readMessage()
	const signed = Buffer.concat([remote.ephemeralKey, local.nonce])
	if (!crypto.verify(null, signed, remoteIdentity, signature)) {
		throw new SecurityHandshakeError('invalid signature')
	}

	// 3. finish
	const sharedSecret = crypto.diffieHellman({ privateKey: ephemeral.privateKey, publicKey: remoteEphemeral })
	const { sendKey, receiveKey } = deriveKeys(sharedSecret, local.nonce, remote.nonce)
	const secured = new CipherChannel(reader.detach(), sendKey, receiveKey)

	await secured.write(remote.nonce)
	const echoed = await secured.read()
	if (echoed === null) {
		throw new SecurityHandshakeError('remote closed the connection')
	}
	if (!echoed.equals(local.nonce)) {
		throw new SecurityHandshakeError('key confirmation mismatch')
	}

	const remotePeer = peerIdFromPublicKey(remote.identityKey)
	logger.debug('secure channel established', { remotePeer })
	return { channel: secured, remotePeer }
}

function importKey(der: Buffer, type: 'ed25519' | 'x25519', label: string): crypto.KeyObject {
	let key: crypto.KeyObject
	try {
		key = crypto.createPublicKey({ key: der, format: 'der', type: 'spki' })
	} catch (error) {
		throw new SecurityHandshakeError(`undecodable ${label} key`, toError(error))
	}
	if (key.asymmetricKeyType !== type) {
		throw new SecurityHandshakeError(`${label} key must be ${type}`)
	}
	return key
}

