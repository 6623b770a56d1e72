/**
 * Shared types for transports and listeners
 */

import type { Multiaddr } from '@/address/multiaddr.js'
import type { Logger } from '@/logger.js'

/**
 * An inbound connection as it leaves a listener
 *
 * `connection` settles once every upgrade stage layered on the listener has
 * run for this connection. A rejected promise concerns this connection only.
 */
export interface IncomingConnection<T> {
	readonly remoteAddress: Multiaddr
	readonly localAddress: Multiaddr
	readonly connection: Promise<T>
}

/**
 * Lazy, unbounded, non-restartable sequence of inbound connections.
 * Iteration ends only after `close()`.
 */
export interface Listener<T> extends AsyncIterable<IncomingConnection<T>> {
	/** The bound address, with the real port when port 0 was requested */
	readonly address: Multiaddr
	close(): Promise<void>
}

/**
 * Capability contract: listen for and dial connections of type T
 */
export interface Transport<T> {
	readonly name: string
	listen(address: Multiaddr | string): Promise<Listener<T>>
	dial(address: Multiaddr | string): Promise<T>
}

/**
 * Socket configuration options
 */
export interface SocketConfig {
	/** Connection timeout in milliseconds (default: 10000) */
	connectionTimeoutMs?: number
	/** Enable TCP keep-alive (default: true) */
	keepAlive?: boolean
	/** Keep-alive initial delay in milliseconds (default: 60000) */
	keepAliveInitialDelayMs?: number
	/** Enable TCP_NODELAY (default: true) */
	noDelay?: boolean
	/** Unread bytes per connection before the socket is paused (default: 1 MiB) */
	highWaterMark?: number
}

export interface TcpTransportOptions extends SocketConfig {
	/** Pending connection backlog passed to listen() */
	backlog?: number
	logger?: Logger
}
