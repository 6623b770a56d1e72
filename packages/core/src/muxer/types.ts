/**
 * Multiplexed connection and substream contracts
 */

import type { Multiaddr } from '@/address/multiaddr.js'
import type { ByteChannel } from '@/channel/types.js'
import type { Destroyable } from '@/upgrade/types.js'

export type StreamDirection = 'inbound' | 'outbound'

/**
 * One logical byte stream inside a multiplexed connection. Has its own
 * receive queue, so a slow reader never blocks its siblings.
 */
export interface MuxedStream extends ByteChannel {
	/** Unique per direction within the parent connection */
	readonly id: number
	readonly direction: StreamDirection
	/** Abort both directions and tell the remote */
	reset(): void
}

export interface MuxedConnection extends Destroyable {
	readonly remoteAddress: Multiaddr
	readonly remotePeer?: string
	readonly securityMode?: string
	readonly closed: boolean
	/** Live substreams in both directions */
	readonly streamCount: number

	openStream(): Promise<MuxedStream>

	/**
	 * Remote-initiated substreams, lazily and in arrival order. Ends when the
	 * connection closes. Single consumer.
	 */
	acceptedStreams(): AsyncIterable<MuxedStream>

	/** Flush queued frames, then tear down */
	close(): Promise<void>

	/** Called once, with the fault if the connection did not close cleanly */
	onClose(listener: (error?: Error) => void): void
}
