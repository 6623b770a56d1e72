/**
 * Error taxonomy for the upgrade pipeline
 *
 * Every error carries the scope it may affect. Startup errors stop the
 * process, connection errors drop one connection, stream errors drop one
 * substream.
 */

import type { Multiaddr } from '@/address/multiaddr.js'

export type ErrorScope = 'startup' | 'connection' | 'stream'

/**
 * Base class for all switchyard errors
 */
export class SwitchyardError extends Error {
	override readonly cause?: Error

	constructor(
		message: string,
		readonly scope: ErrorScope,
		cause?: Error
	) {
		super(message)
		this.name = 'SwitchyardError'
		this.cause = cause
		// Maintains proper stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Thrown when an address string is not a well-formed multiaddr
 */
export class AddressParseError extends SwitchyardError {
	constructor(
		readonly input: string,
		reason: string
	) {
		super(`Invalid address "${input}": ${reason}`, 'startup')
		this.name = 'AddressParseError'
	}
}

/**
 * Thrown when a transport cannot listen on or dial an address.
 * The caller may retry with another address.
 */
export class UnsupportedAddressError extends SwitchyardError {
	constructor(
		readonly address: Multiaddr | string,
		readonly transport: string,
		cause?: Error
	) {
		super(`Address ${String(address)} is not supported by the ${transport} transport`, 'startup', cause)
		this.name = 'UnsupportedAddressError'
	}
}

/**
 * Thrown when static key material cannot be loaded
 */
export class KeyMaterialError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, 'startup', cause)
		this.name = 'KeyMaterialError'
	}
}

/**
 * Thrown when an outbound connection cannot be established
 */
export class ConnectionError extends SwitchyardError {
	constructor(
		readonly host: string,
		readonly port: number,
		message: string,
		cause?: Error
	) {
		super(`Connection to ${host}:${port} failed: ${message}`, 'connection', cause)
		this.name = 'ConnectionError'
	}
}

/**
 * Thrown when connection establishment times out
 */
export class ConnectionTimeoutError extends ConnectionError {
	constructor(
		host: string,
		port: number,
		readonly timeoutMs: number
	) {
		super(host, port, `timed out after ${timeoutMs}ms`)
		this.name = 'ConnectionTimeoutError'
	}
}

/**
 * Thrown when two peers cannot agree on a security mode, muxer or protocol
 */
export class NegotiationError extends SwitchyardError {
	constructor(
		message: string,
		scope: 'connection' | 'stream',
		readonly offered: readonly string[] = [],
		cause?: Error
	) {
		super(message, scope, cause)
		this.name = 'NegotiationError'
	}
}

/**
 * Thrown when the secure channel handshake fails authentication or integrity checks
 */
export class SecurityHandshakeError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(`Secure channel handshake failed: ${message}`, 'connection', cause)
		this.name = 'SecurityHandshakeError'
	}
}

/**
 * Fault on the underlying multiplexed connection; aborts all its substreams
 */
export class ConnectionIoError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, 'connection', cause)
		this.name = 'ConnectionIoError'
	}
}

/**
 * Read or write fault on a single substream
 */
export class StreamIoError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, 'stream', cause)
		this.name = 'StreamIoError'
	}
}

/**
 * A length-prefixed frame announced more bytes than allowed
 */
export class FrameTooLargeError extends StreamIoError {
	constructor(
		readonly length: number,
		readonly maxLength: number
	) {
		super(`Frame of ${length} bytes exceeds the maximum of ${maxLength} bytes`)
		this.name = 'FrameTooLargeError'
	}
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}
