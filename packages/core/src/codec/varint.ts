/**
 * Unsigned variable-length integers (LEB128)
 *
 * Each byte has 7 data bits + 1 continuation bit (MSB).
 * MSB = 1 means more bytes follow; MSB = 0 means final byte.
 *
 * Values are plain numbers, so anything up to Number.MAX_SAFE_INTEGER
 * round-trips; longer encodings are rejected.
 */

/** Longest encoding that still fits a safe integer (7 * 8 = 56 bits) */
export const MAX_UVARINT_BYTES = 8

/**
 * Encode an unsigned integer as UVARINT
 */
export function encodeUVarInt(value: number): Buffer {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new RangeError(`UVARINT cannot encode ${value}`)
	}

	const bytes: number[] = []

	while (value > 0x7f) {
		bytes.push((value % 0x80) | 0x80) // Set continuation bit
		value = Math.floor(value / 0x80)
	}
	bytes.push(value)

	return Buffer.from(bytes)
}

/**
 * Decode a UVARINT from a buffer at the given offset
 *
 * Returns null when the buffer ends before the final byte.
 */
export function decodeUVarInt(buffer: Buffer, offset: number = 0): { value: number; bytesRead: number } | null {
	let value = 0
	let multiplier = 1
	let bytesRead = 0

	while (true) {
		if (offset + bytesRead >= buffer.length) {
			return null
		}

		const byte = buffer[offset + bytesRead]!
		bytesRead++

		value += (byte & 0x7f) * multiplier

		if ((byte & 0x80) === 0) {
			return { value, bytesRead }
		}

		if (bytesRead >= MAX_UVARINT_BYTES) {
			throw new RangeError(`UVARINT is longer than ${MAX_UVARINT_BYTES} bytes`)
		}
		multiplier *= 0x80
	}
}

/**
 * Prefix a payload with its UVARINT length
 */
export function encodeLengthPrefixed(payload: Buffer): Buffer {
	return Buffer.concat([encodeUVarInt(payload.length), payload])
}
