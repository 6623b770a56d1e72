/**
 * Transport composition: layer upgrade stages on top of a base transport
 */

import { toMultiaddr, type Multiaddr } from '@/address/multiaddr.js'
import type { IncomingConnection, Listener, Transport } from '@/transport/types.js'
import type { ConnectionRole, Destroyable, UpgradeContext, UpgradeStage } from '@/upgrade/types.js'
import { noopLogger, type Logger } from '@/logger.js'
import { ConnectionIoError, toError } from '@/errors.js'

/**
 * Base class for transports that can be extended with upgrade stages
 *
 * @example
 * ```typescript
 * const transport = new TcpTransport()
 *   .withUpgrade(securityStage)
 *   .withUpgrade(muxerStage)
 * ```
 */
export abstract class ComposableTransport<T extends Destroyable> implements Transport<T> {
	abstract readonly name: string

	abstract listen(address: Multiaddr | string): Promise<Listener<T>>

	abstract dial(address: Multiaddr | string): Promise<T>

	withUpgrade<U extends Destroyable>(stage: UpgradeStage<T, U>, logger?: Logger): UpgradedTransport<T, U> {
		return new UpgradedTransport(this, stage, logger)
	}
}

/**
 * Applies one stage to every connection of the inner transport, inbound or
 * outbound. A failed stage destroys its input and rejects only that
 * connection.
 */
export class UpgradedTransport<TIn extends Destroyable, TOut extends Destroyable> extends ComposableTransport<TOut> {
	readonly name: string
	private readonly logger: Logger

	constructor(
		private readonly inner: Transport<TIn>,
		private readonly stage: UpgradeStage<TIn, TOut>,
		logger: Logger = noopLogger
	) {
		super()
		this.name = `${inner.name}+${stage.name}`
		this.logger = logger.child({ component: 'upgrade', stage: stage.name })
	}

	async listen(address: Multiaddr | string): Promise<Listener<TOut>> {
		const listener = await this.inner.listen(address)
		return new UpgradedListener(listener, (incoming, signal) =>
			this.apply(incoming.connection, 'listener', incoming.remoteAddress, signal)
		)
	}

	async dial(address: Multiaddr | string): Promise<TOut> {
		const remoteAddress = toMultiaddr(address)
		return this.apply(this.inner.dial(remoteAddress), 'dialer', remoteAddress)
	}

	private async apply(
		input: Promise<TIn>,
		role: ConnectionRole,
		remoteAddress: Multiaddr,
		signal?: AbortSignal
	): Promise<TOut> {
		const connection = await input
		const context: UpgradeContext = {
			role,
			remoteAddress,
			logger: this.logger.child({ remoteAddress: remoteAddress.toString(), role }),
		}

		// A closed listener tears down upgrades still in flight
		const onAbort = (): void => connection.destroy(new ConnectionIoError('Listener closed'))
		if (signal?.aborted) {
			onAbort()
			throw new ConnectionIoError('Listener closed')
		}
		signal?.addEventListener('abort', onAbort, { once: true })

		try {
			const upgraded = await this.stage.upgrade(connection, context)
			if (signal?.aborted) {
				upgraded.destroy()
				throw new ConnectionIoError('Listener closed')
			}
			return upgraded
		} catch (error) {
			const err = toError(error)
			context.logger.debug('upgrade failed', { error: err.message })
			connection.destroy(err)
			throw err
		} finally {
			signal?.removeEventListener('abort', onAbort)
		}
	}
}

class UpgradedListener<TIn, TOut> implements Listener<TOut> {
	private readonly abortController = new AbortController()

	constructor(
		private readonly inner: Listener<TIn>,
		private readonly upgrade: (incoming: IncomingConnection<TIn>, signal: AbortSignal) => Promise<TOut>
	) {}

	get address(): Multiaddr {
		return this.inner.address
	}

	close(): Promise<void> {
		this.abortController.abort()
		return this.inner.close()
	}

	async *[Symbol.asyncIterator](): AsyncIterator<IncomingConnection<TOut>> {
		const signal = this.abortController.signal
		for await (const incoming of this.inner) {
			yield {
				remoteAddress: incoming.remoteAddress,
				localAddress: incoming.localAddress,
				connection: this.upgrade(incoming, signal),
			}
		}
	}
}
