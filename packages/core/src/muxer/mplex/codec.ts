/**
 * mplex frame layout
 *
 * ```
 * uvarint(streamId << 3 | type)  uvarint(length)  data
 * ```
 */

import { encodeUVarInt } from '@/codec/varint.js'

export const MPLEX_PROTOCOL = '/mplex/6.7.0'

export const MessageType = {
	NewStream: 0,
	MessageReceiver: 1,
	MessageInitiator: 2,
	CloseReceiver: 3,
	CloseInitiator: 4,
	ResetReceiver: 5,
	ResetInitiator: 6,
} as const

export type MessageType = (typeof MessageType)[keyof typeof MessageType]

const MESSAGE_TYPES: readonly MessageType[] = Object.values(MessageType)

export function isMessageType(value: number): value is MessageType {
	return MESSAGE_TYPES.some(type => type === value)
}

export function encodeMplexFrame(streamId: number, type: MessageType, data: Buffer = Buffer.alloc(0)): Buffer {
	return Buffer.concat([encodeUVarInt(streamId * 8 + type), encodeUVarInt(data.length), data])
}

/**
 * Split a frame header into stream id and type. The type is validated by the
 * caller.
 */
export function decodeHeader(header: number): { streamId: number; type: number } {
	return { streamId: Math.floor(header / 8), type: header % 8 }
}
