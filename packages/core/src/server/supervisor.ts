/**
 * Connection supervisor
 *
 * Accepts upgraded connections and runs every connection, and every
 * substream within it, as an independent task. Each task catches its own
 * faults, so one peer can only ever tear down its own connection and one
 * substream only itself.
 */

import type { Multiaddr } from '@/address/multiaddr.js'
import { SwitchyardError, toError } from '@/errors.js'
import { errorContext, noopLogger, type Logger } from '@/logger.js'
import type { MuxedConnection, MuxedStream } from '@/muxer/types.js'
import type { ProtocolRouter } from '@/negotiation/router.js'
import type { IncomingConnection, Listener, Transport } from '@/transport/types.js'

export interface SupervisorOptions {
	transport: Transport<MuxedConnection>
	router: ProtocolRouter
	logger?: Logger
}

/**
 * Supervisor statistics
 */
export interface SupervisorStats {
	/** Upgraded connections currently open */
	activeConnections: number
	/** Connections the listener handed over, upgraded or not */
	acceptedConnections: number
	/** Connections that failed to upgrade or closed with a fault */
	failedConnections: number
	/** Substreams currently being served */
	activeStreams: number
}

type SupervisorState = 'idle' | 'running' | 'closing' | 'closed'

export class ConnectionSupervisor {
	private readonly transport: Transport<MuxedConnection>
	private readonly router: ProtocolRouter
	private readonly logger: Logger
	private readonly connections = new Set<MuxedConnection>()
	private readonly tasks = new Set<Promise<void>>()
	private listener: Listener<MuxedConnection> | null = null
	private acceptLoop: Promise<void> | null = null
	private state: SupervisorState = 'idle'
	private acceptedConnections = 0
	private failedConnections = 0
	private activeStreams = 0

	constructor(options: SupervisorOptions) {
		this.transport = options.transport
		this.router = options.router
		this.logger = (options.logger ?? noopLogger).child({ component: 'supervisor' })
	}

	get stats(): SupervisorStats {
		return {
			activeConnections: this.connections.size,
			acceptedConnections: this.acceptedConnections,
			failedConnections: this.failedConnections,
			activeStreams: this.activeStreams,
		}
	}

	get address(): Multiaddr | null {
		return this.listener?.address ?? null
	}

	/**
	 * Bind the listener and start accepting
	 *
	 * @returns the bound address, with the real port when port 0 was requested
	 * @throws UnsupportedAddressError, AddressParseError or the bind error;
	 * nothing is left running
	 */
	async start(address: Multiaddr | string): Promise<Multiaddr> {
		if (this.state !== 'idle') {
			throw new SwitchyardError(`Supervisor cannot start while ${this.state}`, 'startup')
		}

		const listener = await this.transport.listen(address)
		this.listener = listener
		this.state = 'running'
		this.logger.info('listening', { address: listener.address.toString() })
		this.acceptLoop = this.accept(listener)
		return listener.address
	}

	/**
	 * Stop accepting, destroy live connections and wait for every task
	 */
	async close(): Promise<void> {
		if (this.state !== 'running') {
			this.state = 'closed'
			return
		}
		this.state = 'closing'

		// Closing the listener also aborts upgrades still in flight
		await this.listener?.close()
		for (const connection of this.connections) {
			connection.destroy()
		}
		await this.acceptLoop
		await Promise.all([...this.tasks])

		this.state = 'closed'
		this.logger.info('server closed', { acceptedConnections: this.acceptedConnections })
	}

	private async accept(listener: Listener<MuxedConnection>): Promise<void> {
		try {
			for await (const incoming of listener) {
				this.spawn(this.handleConnection(incoming))
			}
		} catch (error) {
			this.logger.error('accept loop failed', errorContext(error))
		}
	}

	private spawn(task: Promise<void>): void {
		this.tasks.add(task)
		void task.then(() => this.tasks.delete(task))
	}

	private async handleConnection(incoming: IncomingConnection<MuxedConnection>): Promise<void> {
		const logger = this.logger.child({ remoteAddress: incoming.remoteAddress.toString() })
		this.acceptedConnections++
		logger.info('incoming connection')

		let connection: MuxedConnection
		try {
			connection = await incoming.connection
		} catch (error) {
			if (this.state !== 'running') {
				logger.debug('upgrade abandoned', errorContext(error))
				return
			}
			this.failedConnections++
			logger.warn('connection failed', { stage: 'upgrade', ...errorContext(error) })
			return
		}

		if (this.state !== 'running') {
			connection.destroy()
			return
		}

		this.connections.add(connection)
		connection.onClose(error => {
			this.connections.delete(connection)
			if (error && this.state === 'running') {
				this.failedConnections++
				logger.warn('connection failed', errorContext(error))
			} else {
				logger.debug('connection closed')
			}
		})
		logger.info('connection upgraded', {
			securityMode: connection.securityMode,
			remotePeer: connection.remotePeer,
		})

		try {
			for await (const stream of connection.acceptedStreams()) {
				this.spawn(this.handleStream(stream, connection, logger))
			}
		} catch (error) {
			connection.destroy(toError(error))
		}
	}

	private async handleStream(stream: MuxedStream, connection: MuxedConnection, connectionLogger: Logger): Promise<void> {
		const logger = connectionLogger.child({ streamId: stream.id })
		this.activeStreams++
		try {
			await this.router.route(stream, {
				remoteAddress: connection.remoteAddress,
				remotePeer: connection.remotePeer,
				logger,
			})
		} catch (error) {
			logger.warn('stream failed', errorContext(error))
			stream.destroy(toError(error))
		} finally {
			this.activeStreams--
		}
	}
}
