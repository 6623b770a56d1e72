/**
 * The fixed upgrade pipeline shared by the echo server and client:
 * TCP → security negotiation → mplex → connection reuse
 */

import { noopLogger, type Logger } from '@/logger.js'
import { ReuseTransport } from '@/muxer/connection-reuse.js'
import { MuxerStage, type MuxerLimits } from '@/muxer/stage.js'
import { generateKeyPair, type KeyPair } from '@/security/key-pair.js'
import { createSecurityModes, SECURITY_PROTOCOLS } from '@/security/modes.js'
import { SecurityNegotiator } from '@/security/negotiator.js'
import { TcpTransport } from '@/transport/tcp-transport.js'
import type { TcpTransportOptions } from '@/transport/types.js'
import type { ByteChannel } from '@/channel/types.js'
import type { ComposableTransport } from '@/upgrade/upgraded-transport.js'

export interface StackOptions {
	logger?: Logger
	/** Static identity; an ephemeral one is generated when absent */
	keyPair?: KeyPair
	/** Security mode ids to offer (default: secure channel and plaintext) */
	security?: readonly string[]
	tcp?: Omit<TcpTransportOptions, 'logger'>
	/** Raw transport to upgrade (default: TCP with the `tcp` options) */
	base?: ComposableTransport<ByteChannel>
	muxer?: MuxerLimits
}

export interface Stack {
	readonly transport: ReuseTransport
	readonly keyPair: KeyPair
	readonly securityModes: string[]
}

export function createStack(options: StackOptions = {}): Stack {
	const logger = options.logger ?? noopLogger
	const keyPair = options.keyPair ?? generateKeyPair()
	const security = new SecurityNegotiator(createSecurityModes(options.security ?? SECURITY_PROTOCOLS, keyPair))

	const base = options.base ?? new TcpTransport({ ...options.tcp, logger })
	const upgraded = base
		.withUpgrade(security, logger)
		.withUpgrade(new MuxerStage(options.muxer), logger)

	logger.debug('stack created', { transport: upgraded.name, security: security.modeIds, peerId: keyPair.peerId })
	return {
		transport: new ReuseTransport(upgraded, { logger }),
		keyPair,
		securityModes: security.modeIds,
	}
}
