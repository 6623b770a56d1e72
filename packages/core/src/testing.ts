/**
 * In-process stand-ins for sockets, for tests
 *
 * `createChannelPair()` returns two connected ByteChannels; `MemoryTransport`
 * listens and dials over such pairs, so whole pipelines run without a socket.
 */

import { Multiaddr, toMultiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import { ConnectionError, ConnectionIoError, StreamIoError, UnsupportedAddressError } from '@/errors.js'
import type { IncomingConnection, Listener } from '@/transport/types.js'
import { ComposableTransport } from '@/upgrade/upgraded-transport.js'
import { AsyncQueue } from '@/utils/async-queue.js'

export class MemoryChannel implements ByteChannel {
	private readonly incoming = new AsyncQueue<Buffer>()
	private peer: MemoryChannel | null = null
	private writeClosed = false
	private destroyed = false
	/** Every chunk written, in order */
	readonly written: Buffer[] = []

	get closed(): boolean {
		return this.destroyed || (this.writeClosed && this.incoming.isEnded)
	}

	connect(peer: MemoryChannel): void {
		this.peer = peer
	}

	async read(): Promise<Buffer | null> {
		const result = await this.incoming.next()
		return result.done ? null : result.value
	}

	write(data: Buffer): Promise<void> {
		if (this.destroyed) {
			return Promise.reject(new StreamIoError('Channel is destroyed'))
		}
		if (this.writeClosed) {
			return Promise.reject(new StreamIoError('Channel is closed for writing'))
		}
		const copy = Buffer.from(data)
		this.written.push(copy)
		this.peer?.incoming.push(copy)
		return Promise.resolve()
	}

	closeWrite(): Promise<void> {
		if (!this.writeClosed) {
			this.writeClosed = true
			this.peer?.incoming.end()
		}
		return Promise.resolve()
	}

	destroy(error?: Error): void {
		if (this.destroyed) {
			return
		}
		this.destroyed = true
		this.writeClosed = true
		this.incoming.clear()
		this.incoming.fail(error ?? new ConnectionIoError('Channel destroyed'))
		this.peer?.incoming.end()
	}
}

/**
 * Two connected channels: bytes written to one are read from the other
 */
export function createChannelPair(): [MemoryChannel, MemoryChannel] {
	const a = new MemoryChannel()
	const b = new MemoryChannel()
	a.connect(b)
	b.connect(a)
	return [a, b]
}

/**
 * Listeners registered by address, shared by the transports that dial them
 */
export class MemoryNetwork {
	private readonly listeners = new Map<string, MemoryListener>()
	private nextPort = 40000
	private nextClientPort = 50000
	/** Connections dialed so far, per canonical address */
	readonly dials = new Map<string, number>()

	/** @internal */
	bind(address: Multiaddr): MemoryListener {
		const socket = address.toSocketAddress()
		if (!socket) {
			throw new UnsupportedAddressError(address, 'memory')
		}
		const bound = socket.port === 0 ? address.withPort(this.nextPort++) : address
		const key = bound.toString()
		if (this.listeners.has(key)) {
			throw new ConnectionIoError(`Address ${key} is already in use`)
		}
		const listener = new MemoryListener(bound, () => this.listeners.delete(key))
		this.listeners.set(key, listener)
		return listener
	}

	/** @internal */
	connect(address: Multiaddr): MemoryChannel {
		const key = address.toString()
		const listener = this.listeners.get(key)
		const socket = address.toSocketAddress()
		if (!listener || !socket) {
			throw new ConnectionError(socket?.host ?? key, socket?.port ?? 0, 'connection refused')
		}

		this.dials.set(key, (this.dials.get(key) ?? 0) + 1)
		const [local, remote] = createChannelPair()
		listener.accept(remote, Multiaddr.fromSocket('127.0.0.1', this.nextClientPort++))
		return local
	}
}

class MemoryListener implements Listener<ByteChannel> {
	private readonly incoming = new AsyncQueue<IncomingConnection<ByteChannel>>()

	constructor(
		readonly address: Multiaddr,
		private readonly onClose: () => void
	) {}

	[Symbol.asyncIterator](): AsyncIterator<IncomingConnection<ByteChannel>> {
		return this.incoming
	}

	accept(channel: MemoryChannel, remoteAddress: Multiaddr): void {
		const accepted = this.incoming.push({
			remoteAddress,
			localAddress: this.address,
			connection: Promise.resolve(channel),
		})
		if (!accepted) {
			channel.destroy()
		}
	}

	close(): Promise<void> {
		this.incoming.end()
		this.onClose()
		return Promise.resolve()
	}
}

/**
 * Transport over a MemoryNetwork, accepting `/ip4|ip6/<host>/tcp/<port>`
 */
export class MemoryTransport extends ComposableTransport<ByteChannel> {
	readonly name = 'memory'

	constructor(readonly network: MemoryNetwork = new MemoryNetwork()) {
		super()
	}

	async listen(address: Multiaddr | string): Promise<Listener<ByteChannel>> {
		return this.network.bind(toMultiaddr(address))
	}

	async dial(address: Multiaddr | string): Promise<ByteChannel> {
		return this.network.connect(toMultiaddr(address))
	}
}
