import type { Multiaddr } from '@/address/multiaddr.js'
import { noopLogger, type Logger } from '@/logger.js'
import { ProtocolRouter } from '@/negotiation/router.js'
import { ECHO_PROTOCOL } from '@/protocols/echo/echo-session.js'
import { createEchoHandler } from '@/protocols/echo/handler.js'
import { ConnectionSupervisor, type SupervisorStats } from '@/server/supervisor.js'
import { createStack, type StackOptions } from '@/stack.js'

export interface EchoServerOptions extends StackOptions {
	/** Largest echo frame accepted (default: 8 MiB) */
	maxFrameLength?: number
}

export interface EchoServer {
	/** Hex SHA-256 of the server's identity key */
	readonly peerId: string
	readonly securityModes: readonly string[]
	readonly stats: SupervisorStats
	readonly address: Multiaddr | null
	start(address: Multiaddr | string): Promise<Multiaddr>
	close(): Promise<void>
}

/**
 * Echo endpoint over the default pipeline
 *
 * @example
 * ```typescript
 * const server = createEchoServer({ logger: createLogger('info') })
 * const address = await server.start('/ip4/127.0.0.1/tcp/0')
 * ```
 */
export function createEchoServer(options: EchoServerOptions = {}): EchoServer {
	const logger: Logger = options.logger ?? noopLogger
	const stack = createStack(options)
	const router = new ProtocolRouter().handle(
		ECHO_PROTOCOL,
		createEchoHandler({ maxFrameLength: options.maxFrameLength })
	)
	const supervisor = new ConnectionSupervisor({ transport: stack.transport, router, logger })

	return {
		peerId: stack.keyPair.peerId,
		securityModes: stack.securityModes,
		get stats() {
			return supervisor.stats
		},
		get address() {
			return supervisor.address
		},
		start: address => supervisor.start(address),
		close: async () => {
			await supervisor.close()
			await stack.transport.close()
		},
	}
}
