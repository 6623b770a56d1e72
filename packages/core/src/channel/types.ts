/**
 * Byte channel contract shared by every layer of the upgrade chain
 *
 * A raw TCP connection, a secured channel and a multiplexed substream all
 * expose the same surface, so each upgrade stage consumes one ByteChannel and
 * produces another.
 */

export interface ByteChannel {
	/**
	 * Next chunk of bytes, or null once the remote has ended its side.
	 * Rejects once the channel is destroyed or faulted.
	 */
	read(): Promise<Buffer | null>

	/**
	 * Write bytes. Resolves once the bytes were handed to the layer below.
	 */
	write(data: Buffer): Promise<void>

	/**
	 * Signal end-of-stream to the remote; reading may continue.
	 */
	closeWrite(): Promise<void>

	/**
	 * Release the channel immediately. Pending reads settle without any
	 * cooperation from the remote.
	 */
	destroy(error?: Error): void

	readonly closed: boolean
}
