/**
 * Protocol table for multiaddr components
 */

import { isIPv6 } from 'node:net'

export type ProtocolName = 'ip4' | 'ip6' | 'dns' | 'dns4' | 'dns6' | 'tcp' | 'udp' | 'ws'

export interface ProtocolDefinition {
	readonly name: ProtocolName
	/** Whether the component is followed by a value segment */
	readonly hasValue: boolean
	/** Returns the canonical value, or a rejection reason */
	parseValue(value: string): { ok: true; value: string } | { ok: false; reason: string }
}

const DNS_LABEL = /^(?!-)[A-Za-z0-9-]{1,63}(?<!-)$/

function parseIp4(value: string): { ok: true; value: string } | { ok: false; reason: string } {
	const octets = value.split('.')
	if (octets.length !== 4) {
		return { ok: false, reason: `"${value}" is not a dotted-quad IPv4 address` }
	}

	const canonical: number[] = []
	for (const octet of octets) {
		if (!/^\d{1,3}$/.test(octet)) {
			return { ok: false, reason: `"${value}" is not a dotted-quad IPv4 address` }
		}
		const n = Number(octet)
		if (n > 255) {
			return { ok: false, reason: `IPv4 octet ${octet} is out of range` }
		}
		canonical.push(n)
	}

	return { ok: true, value: canonical.join('.') }
}

function parseIp6(value: string): { ok: true; value: string } | { ok: false; reason: string } {
	if (!isIPv6(value)) {
		return { ok: false, reason: `"${value}" is not an IPv6 address` }
	}
	return { ok: true, value: value.toLowerCase() }
}

function parseDnsName(value: string): { ok: true; value: string } | { ok: false; reason: string } {
	const name = value.endsWith('.') ? value.slice(0, -1) : value
	if (name.length === 0 || name.length > 253 || !name.split('.').every(label => DNS_LABEL.test(label))) {
		return { ok: false, reason: `"${value}" is not a valid DNS name` }
	}
	return { ok: true, value: name.toLowerCase() }
}

function parsePort(value: string): { ok: true; value: string } | { ok: false; reason: string } {
	if (!/^\d{1,5}$/.test(value)) {
		return { ok: false, reason: `port "${value}" is not numeric` }
	}
	const port = Number(value)
	if (port > 65535) {
		return { ok: false, reason: `port ${port} is out of range` }
	}
	return { ok: true, value: String(port) }
}

const noValue = (): { ok: true; value: string } => ({ ok: true, value: '' })

export const PROTOCOLS: ReadonlyMap<string, ProtocolDefinition> = new Map<string, ProtocolDefinition>([
	['ip4', { name: 'ip4', hasValue: true, parseValue: parseIp4 }],
	['ip6', { name: 'ip6', hasValue: true, parseValue: parseIp6 }],
	['dns', { name: 'dns', hasValue: true, parseValue: parseDnsName }],
	['dns4', { name: 'dns4', hasValue: true, parseValue: parseDnsName }],
	['dns6', { name: 'dns6', hasValue: true, parseValue: parseDnsName }],
	['tcp', { name: 'tcp', hasValue: true, parseValue: parsePort }],
	['udp', { name: 'udp', hasValue: true, parseValue: parsePort }],
	['ws', { name: 'ws', hasValue: false, parseValue: noValue }],
])

export function isNetworkProtocol(name: ProtocolName): boolean {
	return name === 'ip4' || name === 'ip6' || name === 'dns' || name === 'dns4' || name === 'dns6'
}

export function isTransportProtocol(name: ProtocolName): name is 'tcp' | 'udp' {
	return name === 'tcp' || name === 'udp'
}
