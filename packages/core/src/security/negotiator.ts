/**
 * Security upgrade negotiation
 *
 * Both peers write one announcement (the newline-joined ids of the modes they
 * support, UVARINT-length-prefixed) and read the other's. Each then applies
 * the same rule to the intersection, highest strength first and ties by id
 * ascending, so both pick the same mode without another round trip.
 */

import type { ByteChannel } from '@/channel/types.js'
import { ChannelReader } from '@/channel/channel-reader.js'
import { encodeLengthPrefixed } from '@/codec/varint.js'
import { NegotiationError } from '@/errors.js'
import type { SecuredConnection, SecurityMode } from '@/security/types.js'
import type { UpgradeContext, UpgradeStage } from '@/upgrade/types.js'

export const MAX_ANNOUNCEMENT_LENGTH = 4096

/**
 * Order modes by preference: strength descending, then id ascending
 */
export function rankModes(modes: readonly SecurityMode[]): SecurityMode[] {
	return [...modes].sort((a, b) => b.strength - a.strength || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
}

/**
 * Preferred local mode the remote also announced, or null
 */
export function selectMode(local: readonly SecurityMode[], remoteIds: readonly string[]): SecurityMode | null {
	return rankModes(local).find(mode => remoteIds.includes(mode.id)) ?? null
}

export function encodeAnnouncement(ids: readonly string[]): Buffer {
	return encodeLengthPrefixed(Buffer.from(ids.join('\n'), 'utf8'))
}

export class SecurityNegotiator implements UpgradeStage<ByteChannel, SecuredConnection> {
	readonly name = 'security'
	private readonly modes: SecurityMode[]

	constructor(modes: readonly SecurityMode[]) {
		const byId = new Map<string, SecurityMode>()
		for (const mode of modes) {
			byId.set(mode.id, mode)
		}
		if (byId.size === 0) {
			throw new RangeError('SecurityNegotiator needs at least one mode')
		}
		this.modes = rankModes([...byId.values()])
	}

	get modeIds(): string[] {
		return this.modes.map(mode => mode.id)
	}

	upgrade(channel: ByteChannel, context: UpgradeContext): Promise<SecuredConnection> {
		return this.negotiate(channel, context)
	}

	/**
	 * Agree on a mode and run its handshake
	 *
	 * @throws NegotiationError when the announcements share no mode, or the
	 * remote's announcement is empty, oversized or missing
	 */
	async negotiate(channel: ByteChannel, context: UpgradeContext): Promise<SecuredConnection> {
		const offered = this.modeIds
		const reader = new ChannelReader(
			channel,
			message => new NegotiationError(`Malformed security announcement: ${message}`, 'connection', offered)
		)

		await channel.write(encodeAnnouncement(offered))

		const announcement = await reader.readLengthPrefixed(MAX_ANNOUNCEMENT_LENGTH)
		if (announcement === null) {
			throw new NegotiationError('Remote closed the connection before announcing security modes', 'connection', offered)
		}

		const remoteIds = announcement
			.toString('utf8')
			.split('\n')
			.filter(id => id.length > 0)
		if (remoteIds.length === 0) {
			throw new NegotiationError('Remote announced no security modes', 'connection', offered)
		}

		const mode = selectMode(this.modes, remoteIds)
		if (!mode) {
			throw new NegotiationError(
				`No common security mode (local: ${offered.join(', ')}; remote: ${remoteIds.join(', ')})`,
				'connection',
				offered
			)
		}

		context.logger.debug('security mode selected', { mode: mode.id })
		const secured = await mode.secure(reader.detach(), context)
		return {
			mode: mode.id,
			channel: secured.channel,
			remotePeer: secured.remotePeer,
			destroy: error => secured.channel.destroy(error),
		}
	}
}
