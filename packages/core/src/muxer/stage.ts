import { handle, select } from '@/negotiation/multistream.js'
import { MPLEX_PROTOCOL } from '@/muxer/mplex/codec.js'
import { MplexMuxer, type MplexOptions } from '@/muxer/mplex/muxer.js'
import type { MuxedConnection } from '@/muxer/types.js'
import type { SecuredConnection } from '@/security/types.js'
import type { UpgradeContext, UpgradeStage } from '@/upgrade/types.js'

export type MuxerLimits = Pick<MplexOptions, 'maxMessageSize' | 'maxStreamBufferSize' | 'maxInboundStreams'>

/**
 * Negotiates mplex over a secured channel and starts multiplexing
 */
export class MuxerStage implements UpgradeStage<SecuredConnection, MuxedConnection> {
	readonly name = 'mplex'

	constructor(private readonly limits: MuxerLimits = {}) {}

	async upgrade(input: SecuredConnection, context: UpgradeContext): Promise<MuxedConnection> {
		const negotiate = context.role === 'listener' ? handle : select
		const { stream } = await negotiate(input.channel, [MPLEX_PROTOCOL], {
			scope: 'connection',
			logger: context.logger,
		})

		return MplexMuxer.create(stream, {
			...this.limits,
			role: context.role,
			remoteAddress: context.remoteAddress,
			remotePeer: input.remotePeer,
			securityMode: input.mode,
			logger: context.logger,
		})
	}
}
