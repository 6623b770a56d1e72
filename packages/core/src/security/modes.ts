import { SwitchyardError } from '@/errors.js'
import type { KeyPair } from '@/security/key-pair.js'
import { PLAINTEXT_PROTOCOL, PlaintextMode } from '@/security/plaintext.js'
import { SECURE_CHANNEL_PROTOCOL, SecureChannelMode } from '@/security/secure-channel/mode.js'
import type { SecurityMode } from '@/security/types.js'

export const SECURITY_PROTOCOLS = [SECURE_CHANNEL_PROTOCOL, PLAINTEXT_PROTOCOL] as const

/**
 * Build security modes from their ids
 *
 * @throws SwitchyardError (startup) for an unknown id, or a secure mode
 * without an identity
 */
export function createSecurityModes(ids: readonly string[], identity?: KeyPair): SecurityMode[] {
	return ids.map(id => {
		switch (id) {
			case PLAINTEXT_PROTOCOL:
				return new PlaintextMode()
			case SECURE_CHANNEL_PROTOCOL:
				if (!identity) {
					throw new SwitchyardError(`${id} requires an identity key pair`, 'startup')
				}
				return new SecureChannelMode(identity)
			default:
				throw new SwitchyardError(`Unknown security mode "${id}"`, 'startup')
		}
	})
}
