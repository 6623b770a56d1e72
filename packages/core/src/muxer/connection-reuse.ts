/**
 * Connection reuse for multiplexed connections
 *
 * Outbound substreams to one peer share one upgraded connection. The table
 * maps a peer key (the canonical address) to a pending or live connection;
 * lookup and insert happen in one synchronous step, so concurrent requests
 * share a single establishment.
 */

import { toMultiaddr, type Multiaddr } from '@/address/multiaddr.js'
import { errorContext, noopLogger, type Logger } from '@/logger.js'
import type { MuxedConnection, MuxedStream } from '@/muxer/types.js'
import type { IncomingConnection, Listener, Transport } from '@/transport/types.js'

export interface ConnectionReuseOptions {
	logger?: Logger
}

/**
 * Connection reuse statistics
 */
export interface ConnectionReuseStats {
	/** Peers with a pending or live connection */
	peers: number
	/** Outbound establishments started */
	dials: number
	/** Inbound connections registered */
	registered: number
}

export class ConnectionReuse {
	private readonly entries = new Map<string, Promise<MuxedConnection>>()
	private readonly logger: Logger
	private dials = 0
	private registered = 0

	constructor(
		private readonly transport: Transport<MuxedConnection>,
		options: ConnectionReuseOptions = {}
	) {
		this.logger = (options.logger ?? noopLogger).child({ component: 'connection-reuse' })
	}

	get stats(): ConnectionReuseStats {
		return { peers: this.entries.size, dials: this.dials, registered: this.registered }
	}

	/**
	 * Existing connection to the peer, or a new one shared by every caller
	 * that asks before it settles
	 */
	getConnection(address: Multiaddr | string): Promise<MuxedConnection> {
		const target = toMultiaddr(address)
		const key = peerKey(target)

		const existing = this.entries.get(key)
		if (existing) {
			return existing
		}

		this.dials++
		const established: Promise<MuxedConnection> = this.transport.dial(target).then(
			connection => {
				this.track(key, established, connection)
				return connection
			},
			(error: unknown) => {
				this.logger.debug('connection establishment failed', { peer: key, ...errorContext(error) })
				this.drop(key, established)
				throw error
			}
		)
		this.entries.set(key, established)
		return established
	}

	/**
	 * Open a substream to the peer, reusing its connection
	 */
	async openStream(address: Multiaddr | string): Promise<MuxedStream> {
		const connection = await this.getConnection(address)
		return connection.openStream()
	}

	/**
	 * Record an inbound connection so outbound requests to its address reuse it
	 */
	register(address: Multiaddr | string, connection: MuxedConnection): void {
		if (connection.closed) {
			return
		}
		const key = peerKey(toMultiaddr(address))
		const entry = Promise.resolve(connection)
		this.entries.set(key, entry)
		this.registered++
		this.track(key, entry, connection)
	}

	/**
	 * Close every live connection and forget all entries
	 */
	async close(): Promise<void> {
		const pending = [...this.entries.values()]
		this.entries.clear()

		const results = await Promise.allSettled(pending)
		await Promise.all(
			results.map(result => (result.status === 'fulfilled' ? result.value.close() : Promise.resolve()))
		)
	}

	private track(key: string, entry: Promise<MuxedConnection>, connection: MuxedConnection): void {
		if (connection.closed) {
			this.drop(key, entry)
			return
		}
		connection.onClose(() => this.drop(key, entry))
	}

	private drop(key: string, entry: Promise<MuxedConnection>): void {
		if (this.entries.get(key) === entry) {
			this.entries.delete(key)
		}
	}
}

function peerKey(address: Multiaddr): string {
	return address.toString()
}

/**
 * Transport over multiplexed connections that dials through a reuse table and
 * registers every inbound connection in it
 */
export class ReuseTransport implements Transport<MuxedConnection> {
	readonly name: string
	readonly reuse: ConnectionReuse

	constructor(
		private readonly inner: Transport<MuxedConnection>,
		options: ConnectionReuseOptions = {}
	) {
		this.name = `${inner.name}+reuse`
		this.reuse = new ConnectionReuse(inner, options)
	}

	async listen(address: Multiaddr | string): Promise<Listener<MuxedConnection>> {
		const listener = await this.inner.listen(address)
		return new RegisteringListener(listener, this.reuse)
	}

	dial(address: Multiaddr | string): Promise<MuxedConnection> {
		return this.reuse.getConnection(address)
	}

	openStream(address: Multiaddr | string): Promise<MuxedStream> {
		return this.reuse.openStream(address)
	}

	close(): Promise<void> {
		return this.reuse.close()
	}
}

class RegisteringListener implements Listener<MuxedConnection> {
	constructor(
		private readonly inner: Listener<MuxedConnection>,
		private readonly reuse: ConnectionReuse
	) {}

	get address(): Multiaddr {
		return this.inner.address
	}

	close(): Promise<void> {
		return this.inner.close()
	}

	async *[Symbol.asyncIterator](): AsyncIterator<IncomingConnection<MuxedConnection>> {
		for await (const incoming of this.inner) {
			yield {
				remoteAddress: incoming.remoteAddress,
				localAddress: incoming.localAddress,
				connection: incoming.connection.then(connection => {
					this.reuse.register(incoming.remoteAddress, connection)
					return connection
				}),
			}
		}
	}
}
