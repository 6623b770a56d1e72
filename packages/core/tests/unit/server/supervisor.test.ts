import { afterEach, describe, expect, it, vi } from 'vitest'

import type { Multiaddr } from '@/address/multiaddr.js'
import { Dialer } from '@/client/dialer.js'
import { EchoClient } from '@/client/echo-client.js'
import { encodeUVarInt } from '@/codec/varint.js'
import type { Logger } from '@/logger.js'
import type { MuxedConnection } from '@/muxer/types.js'
import { ProtocolRouter } from '@/negotiation/router.js'
import { ECHO_PROTOCOL } from '@/protocols/echo/echo-session.js'
import { createEchoHandler } from '@/protocols/echo/handler.js'
import { PLAINTEXT_PROTOCOL } from '@/security/plaintext.js'
import { ConnectionSupervisor } from '@/server/supervisor.js'
import { createStack } from '@/stack.js'
import { MemoryNetwork, MemoryTransport } from '@/testing.js'
import type { IncomingConnection, Listener, Transport } from '@/transport/types.js'

const BOOM_PROTOCOL = '/boom/1.0.0'

function createMockLogger(): Logger {
	const logger: Logger = {
		error: vi.fn(),
		warn: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		child: () => logger,
	}
	return logger
}

const cleanups: (() => Promise<void>)[] = []

afterEach(async () => {
	for (const cleanup of cleanups.splice(0)) {
		await cleanup()
	}
})

async function setup(logger: Logger = createMockLogger()) {
	const network = new MemoryNetwork()
	const server = createStack({ base: new MemoryTransport(network), security: [PLAINTEXT_PROTOCOL] })
	const router = new ProtocolRouter().handle(ECHO_PROTOCOL, createEchoHandler()).handle(BOOM_PROTOCOL, async () => {
		throw new Error('handler exploded')
	})
	const supervisor = new ConnectionSupervisor({ transport: server.transport, router, logger })
	const address = await supervisor.start('/ip4/127.0.0.1/tcp/0')
	const dialer = Dialer.create({ base: new MemoryTransport(network), security: [PLAINTEXT_PROTOCOL] })

	cleanups.push(async () => {
		await dialer.close()
		await supervisor.close()
	})
	return { network, supervisor, address, dialer, logger }
}

/**
 * Records a weak reference to every connection the inner listener upgrades
 */
class TrackingTransport implements Transport<MuxedConnection> {
	readonly name = 'tracking'
	readonly upgraded: WeakRef<MuxedConnection>[] = []

	constructor(private readonly inner: Transport<MuxedConnection>) {}

	async listen(address: Multiaddr | string): Promise<Listener<MuxedConnection>> {
		const listener = await this.inner.listen(address)
		const upgraded = this.upgraded
		return {
			get address() {
				return listener.address
			},
			close: () => listener.close(),
			async *[Symbol.asyncIterator](): AsyncIterator<IncomingConnection<MuxedConnection>> {
				for await (const incoming of listener) {
					yield {
						remoteAddress: incoming.remoteAddress,
						localAddress: incoming.localAddress,
						connection: incoming.connection.then(connection => {
							upgraded.push(new WeakRef(connection))
							return connection
						}),
					}
				}
			},
		}
	}

	dial(address: Multiaddr | string): Promise<MuxedConnection> {
		return this.inner.dial(address)
	}
}

describe('ConnectionSupervisor', () => {
	it('binds and reports the real address', async () => {
		const { supervisor, address, logger } = await setup()

		expect(address.toString()).toBe('/ip4/127.0.0.1/tcp/40000')
		expect(supervisor.address).toBe(address)
		expect(logger.info).toHaveBeenCalledWith('listening', { address: '/ip4/127.0.0.1/tcp/40000' })
	})

	it('serves echo streams and counts them', async () => {
		const { supervisor, address, dialer } = await setup()

		const client = await EchoClient.connect(dialer, address)
		expect((await client.echo(Buffer.from('ping'))).toString()).toBe('ping')
		expect(supervisor.stats).toEqual({
			activeConnections: 1,
			acceptedConnections: 1,
			failedConnections: 0,
			activeStreams: 1,
		})

		await client.close()
		await vi.waitFor(() => expect(supervisor.stats.activeStreams).toBe(0))
	})

	it('isolates a failing stream handler from sibling streams', async () => {
		const { supervisor, address, dialer, logger } = await setup()

		const healthy = await EchoClient.connect(dialer, address)
		const { stream: doomed } = await dialer.dial(address, [BOOM_PROTOCOL])

		await expect(doomed.read()).rejects.toThrow('Stream 1 was reset by the remote')
		expect(logger.warn).toHaveBeenCalledWith('stream failed', { error: 'handler exploded', errorName: 'Error' })

		expect((await healthy.echo(Buffer.from('still alive'))).toString()).toBe('still alive')
		expect(supervisor.stats.activeConnections).toBe(1)
		expect(supervisor.stats.failedConnections).toBe(0)
	})

	it('keeps echoing for other connections when one sends an oversized frame', async () => {
		const { network, supervisor, address, dialer, logger } = await setup()
		const faultyDialer = Dialer.create({ base: new MemoryTransport(network), security: [PLAINTEXT_PROTOCOL] })
		cleanups.unshift(() => faultyDialer.close())

		const healthy = await EchoClient.connect(dialer, address)
		expect((await healthy.echo(Buffer.from('before'))).toString()).toBe('before')

		const { stream: faulty } = await faultyDialer.dial(address, [ECHO_PROTOCOL])
		await faulty.write(Buffer.from([0x01, 0x00, 0x00, 0x00]))

		await expect(faulty.read()).rejects.toThrow('was reset by the remote')
		await vi.waitFor(() =>
			expect(logger.warn).toHaveBeenCalledWith('echo session faulted', {
				messages: 0,
				error: 'Frame of 16777216 bytes exceeds the maximum of 8388608 bytes',
				errorName: 'FrameTooLargeError',
			})
		)

		expect((await healthy.echo(Buffer.from('after'))).toString()).toBe('after')
		expect(supervisor.stats.activeConnections).toBe(2)
		expect(supervisor.stats.failedConnections).toBe(0)
	})

	it('isolates a connection that fails to upgrade', async () => {
		const { network, supervisor, address, dialer, logger } = await setup()
		const raw = await new MemoryTransport(network).dial(address)

		await raw.write(encodeUVarInt(5000))

		await vi.waitFor(() => expect(supervisor.stats.failedConnections).toBe(1))
		expect(logger.warn).toHaveBeenCalledWith('connection failed', {
			stage: 'upgrade',
			error: 'Malformed security announcement: message of 5000 bytes exceeds the maximum of 4096',
			errorName: 'NegotiationError',
		})

		const client = await EchoClient.connect(dialer, address)
		expect((await client.echo(Buffer.from('unaffected'))).toString()).toBe('unaffected')
		expect(supervisor.stats.acceptedConnections).toBe(2)
	})

	it('keeps the connection when a protocol is refused', async () => {
		const { supervisor, address, dialer } = await setup()

		await expect(dialer.dial(address, ['/chat/2.0.0'])).rejects.toThrow('Remote supports none of: /chat/2.0.0')

		const client = await EchoClient.connect(dialer, address)
		expect((await client.echo(Buffer.from('after refusal'))).toString()).toBe('after refusal')
		expect(supervisor.stats.acceptedConnections).toBe(1)
	})

	it('forgets connections the remote closes', async () => {
		const { supervisor, address, dialer } = await setup()

		const connection = await dialer.transport.dial(address)
		await vi.waitFor(() => expect(supervisor.stats.activeConnections).toBe(1))
		await connection.close()

		await vi.waitFor(() => expect(supervisor.stats.activeConnections).toBe(0))
		expect(supervisor.stats.failedConnections).toBe(0)
	})

	it('closes live connections and tears down pending upgrades', async () => {
		const { network, supervisor, address, dialer, logger } = await setup()
		const connection = await dialer.transport.dial(address)
		const silent = await new MemoryTransport(network).dial(address)
		await vi.waitFor(() => expect(supervisor.stats.acceptedConnections).toBe(2))

		await supervisor.close()

		expect(supervisor.stats.activeConnections).toBe(0)
		expect(supervisor.stats.failedConnections).toBe(0)
		await vi.waitFor(() => expect(connection.closed).toBe(true))
		// The pending upgrade was torn down without the silent peer doing anything
		let chunk = await silent.read()
		while (chunk !== null) {
			chunk = await silent.read()
		}
		await expect(silent.read()).resolves.toBeNull()
		expect(logger.info).toHaveBeenCalledWith('server closed', { acceptedConnections: 2 })
		await expect(supervisor.start('/ip4/127.0.0.1/tcp/0')).rejects.toThrow('Supervisor cannot start while closed')
	})

	it.skipIf(typeof globalThis.gc !== 'function')('releases connections once they close', async () => {
		const network = new MemoryNetwork()
		const server = createStack({ base: new MemoryTransport(network), security: [PLAINTEXT_PROTOCOL] })
		const transport = new TrackingTransport(server.transport)
		const router = new ProtocolRouter().handle(ECHO_PROTOCOL, createEchoHandler())
		const supervisor = new ConnectionSupervisor({ transport, router })
		const address = await supervisor.start('/ip4/127.0.0.1/tcp/0')
		const dialer = Dialer.create({ base: new MemoryTransport(network), security: [PLAINTEXT_PROTOCOL] })
		cleanups.push(async () => {
			await dialer.close()
			await supervisor.close()
		})

		for (let i = 0; i < 20; i++) {
			const connection = await dialer.transport.dial(address)
			await vi.waitFor(() => expect(supervisor.stats.activeConnections).toBe(1))
			await connection.close()
			await vi.waitFor(() => expect(supervisor.stats.activeConnections).toBe(0))
		}
		expect(transport.upgraded).toHaveLength(20)

		await new Promise(resolve => setTimeout(resolve, 10))
		globalThis.gc?.()

		const reachable = transport.upgraded.filter(ref => ref.deref() !== undefined)
		expect(reachable.length).toBeLessThan(5)
	})
})
