/**
 * TCP transport: binds listeners and dials peers for `/ip4|ip6/…/tcp/…`
 */

import * as net from 'node:net'
import type { AddressInfo } from 'node:net'
import { Multiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import { SocketChannel } from '@/transport/socket-channel.js'
import type { IncomingConnection, Listener, TcpTransportOptions } from '@/transport/types.js'
import { ComposableTransport } from '@/upgrade/upgraded-transport.js'
import { AsyncQueue } from '@/utils/async-queue.js'
import {
	AddressParseError,
	ConnectionError,
	ConnectionTimeoutError,
	UnsupportedAddressError,
} from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'

/**
 * Resolved socket configuration with defaults applied
 */
interface ResolvedSocketConfig {
	connectionTimeoutMs: number
	keepAlive: boolean
	keepAliveInitialDelayMs: number
	noDelay: boolean
	highWaterMark: number
	backlog?: number
}

export class TcpTransport extends ComposableTransport<ByteChannel> {
	readonly name = 'tcp'

	private readonly config: ResolvedSocketConfig
	private readonly logger: Logger
	private readonly listeners = new Set<TcpListener>()

	constructor(options: TcpTransportOptions = {}) {
		super()
		this.config = {
			connectionTimeoutMs: options.connectionTimeoutMs ?? 10000,
			keepAlive: options.keepAlive ?? true,
			keepAliveInitialDelayMs: options.keepAliveInitialDelayMs ?? 60000,
			noDelay: options.noDelay ?? true,
			highWaterMark: options.highWaterMark ?? 1024 * 1024,
			backlog: options.backlog,
		}
		this.logger = options.logger?.child({ component: 'tcp' }) ?? noopLogger
	}

	/**
	 * Number of listeners currently bound by this transport
	 */
	get activeListeners(): number {
		return this.listeners.size
	}

	/**
	 * Bind a listening socket
	 *
	 * @throws UnsupportedAddressError before any socket is created when the
	 * address is not `/ip4|ip6/<host>/tcp/<port>`
	 * @throws the node:net error unchanged when binding fails
	 */
	async listen(address: Multiaddr | string): Promise<Listener<ByteChannel>> {
		const requested = this.resolve(address, true)
		const socketAddress = requested.toSocketAddress()
		if (!socketAddress) {
			throw new UnsupportedAddressError(requested, this.name)
		}

		const server = net.createServer({ allowHalfOpen: true })

		await new Promise<void>((resolve, reject) => {
			const onError = (error: Error): void => {
				reject(error)
			}
			server.once('error', onError)
			server.listen({ host: socketAddress.host, port: socketAddress.port, backlog: this.config.backlog }, () => {
				server.removeListener('error', onError)
				resolve()
			})
		})

		const info = server.address()
		if (info === null || typeof info === 'string') {
			server.close()
			throw new UnsupportedAddressError(requested, this.name)
		}

		const listener = new TcpListener(server, boundAddress(info), this, this.logger)
		this.listeners.add(listener)
		this.logger.debug('listening', { address: listener.address.toString() })
		return listener
	}

	/**
	 * Open an outbound connection
	 */
	async dial(address: Multiaddr | string): Promise<ByteChannel> {
		const target = this.resolve(address, false)
		const socketAddress = target.toSocketAddress()
		if (!socketAddress) {
			throw new UnsupportedAddressError(target, this.name)
		}

		const { host, port } = socketAddress
		const socket = await new Promise<net.Socket>((resolve, reject) => {
			let settled = false
			const socket = net.connect({ host, port, allowHalfOpen: true })

			const timeoutHandle = setTimeout(() => {
				if (settled) return
				settled = true
				socket.destroy()
				reject(new ConnectionTimeoutError(host, port, this.config.connectionTimeoutMs))
			}, this.config.connectionTimeoutMs)

			const onError = (error: Error): void => {
				if (settled) return
				settled = true
				clearTimeout(timeoutHandle)
				socket.destroy()
				reject(new ConnectionError(host, port, error.message, error))
			}

			socket.once('connect', () => {
				if (settled) return
				settled = true
				clearTimeout(timeoutHandle)
				socket.removeListener('error', onError)
				resolve(socket)
			})
			socket.once('error', onError)
		})

		this.configureSocket(socket)
		this.logger.debug('dialed', { address: target.toString() })
		return this.createChannel(socket)
	}

	/** @internal */
	configureSocket(socket: net.Socket): void {
		if (this.config.keepAlive) {
			socket.setKeepAlive(true, this.config.keepAliveInitialDelayMs)
		}
		if (this.config.noDelay) {
			socket.setNoDelay(true)
		}
	}

	/** @internal */
	createChannel(socket: net.Socket): SocketChannel {
		return new SocketChannel(socket, { highWaterMark: this.config.highWaterMark })
	}

	/** @internal */
	forget(listener: TcpListener): void {
		this.listeners.delete(listener)
	}

	private resolve(address: Multiaddr | string, listening: boolean): Multiaddr {
		let parsed: Multiaddr
		try {
			parsed = typeof address === 'string' ? Multiaddr.parse(address) : address
		} catch (error) {
			if (error instanceof AddressParseError) {
				throw new UnsupportedAddressError(address, this.name, error)
			}
			throw error
		}

		const protocols = parsed.protocols()
		const network = protocols[0]
		const allowed = listening ? network === 'ip4' || network === 'ip6' : network !== undefined
		if (!allowed || protocols.length !== 2 || protocols[1] !== 'tcp') {
			throw new UnsupportedAddressError(parsed, this.name)
		}
		return parsed
	}
}

function boundAddress(info: AddressInfo): Multiaddr {
	return Multiaddr.fromSocket(info.address, info.port, info.family)
}

class TcpListener implements Listener<ByteChannel> {
	private readonly incoming = new AsyncQueue<IncomingConnection<ByteChannel>>()
	private closed = false

	constructor(
		private readonly server: net.Server,
		readonly address: Multiaddr,
		private readonly transport: TcpTransport,
		private readonly logger: Logger
	) {
		server.on('connection', this.handleConnection.bind(this))
		server.on('error', error => {
			this.logger.error('listener error', { address: this.address.toString(), error: error.message })
		})
	}

	[Symbol.asyncIterator](): AsyncIterator<IncomingConnection<ByteChannel>> {
		return this.incoming
	}

	close(): Promise<void> {
		if (this.closed) {
			return Promise.resolve()
		}
		this.closed = true
		this.transport.forget(this)
		this.incoming.end()

		// Stop accepting now; live connections belong to their pipelines
		this.server.close(() => {
			this.logger.debug('listener closed', { address: this.address.toString() })
		})
		return Promise.resolve()
	}

	private handleConnection(socket: net.Socket): void {
		const { remoteAddress, remotePort, remoteFamily } = socket
		if (this.closed || remoteAddress === undefined || remotePort === undefined) {
			socket.destroy()
			return
		}

		this.transport.configureSocket(socket)
		const channel = this.transport.createChannel(socket)
		const accepted = this.incoming.push({
			remoteAddress: Multiaddr.fromSocket(remoteAddress, remotePort, remoteFamily),
			localAddress: this.address,
			connection: Promise.resolve(channel),
		})
		if (!accepted) {
			channel.destroy()
		}
	}
}
