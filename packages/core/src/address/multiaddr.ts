/**
 * Protocol-tagged network addresses, e.g. `/ip4/127.0.0.1/tcp/10333`
 */

import { AddressParseError } from '@/errors.js'
import {
	PROTOCOLS,
	isNetworkProtocol,
	isTransportProtocol,
	type ProtocolName,
} from '@/address/protocols.js'

export interface AddressComponent {
	readonly protocol: ProtocolName
	readonly value: string
}

export interface SocketAddress {
	family: 4 | 6
	host: string
	port: number
	transport: 'tcp' | 'udp'
}

/**
 * Immutable, validated address descriptor
 */
export class Multiaddr {
	readonly components: readonly AddressComponent[]

	private constructor(components: readonly AddressComponent[]) {
		this.components = Object.freeze(components.map(c => Object.freeze({ ...c })))
	}

	/**
	 * Parse a textual multiaddr
	 *
	 * @throws AddressParseError when any component is malformed or the
	 * sequence does not describe a supported shape
	 */
	static parse(text: string): Multiaddr {
		if (text.length === 0) {
			throw new AddressParseError(text, 'address is empty')
		}
		if (!text.startsWith('/')) {
			throw new AddressParseError(text, 'address must start with "/"')
		}

		const segments = text.slice(1).split('/')
		if (segments[segments.length - 1] === '') {
			segments.pop()
		}
		if (segments.length === 0) {
			throw new AddressParseError(text, 'address has no components')
		}

		const components: AddressComponent[] = []
		for (let i = 0; i < segments.length; i++) {
			const tag = segments[i]!
			const definition = PROTOCOLS.get(tag)
			if (!definition) {
				throw new AddressParseError(text, `unknown protocol "${tag}"`)
			}

			if (!definition.hasValue) {
				components.push({ protocol: definition.name, value: '' })
				continue
			}

			const raw = segments[++i]
			if (raw === undefined || raw === '') {
				throw new AddressParseError(text, `protocol "${tag}" requires a value`)
			}

			const parsed = definition.parseValue(raw)
			if (!parsed.ok) {
				throw new AddressParseError(text, parsed.reason)
			}
			components.push({ protocol: definition.name, value: parsed.value })
		}

		validateShape(text, components)
		return new Multiaddr(components)
	}

	/**
	 * Build the descriptor for a socket endpoint as reported by node:net
	 */
	static fromSocket(address: string, port: number, family: string | number = 4, transport: 'tcp' | 'udp' = 'tcp'): Multiaddr {
		const isV6 = family === 6 || family === 'IPv6'
		// IPv4-mapped IPv6 peers on dual-stack sockets
		const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(address)
		if (isV6 && mapped) {
			return Multiaddr.parse(`/ip4/${mapped[1]}/${transport}/${port}`)
		}
		return Multiaddr.parse(`/${isV6 ? 'ip6' : 'ip4'}/${address}/${transport}/${port}`)
	}

	/**
	 * Socket coordinates for `/ip4|ip6|dns*\/host/tcp|udp/port` shapes
	 */
	toSocketAddress(): SocketAddress | null {
		const [network, transport] = this.components
		if (!network || !transport || !isTransportProtocol(transport.protocol)) {
			return null
		}

		return {
			family: network.protocol === 'ip6' || network.protocol === 'dns6' ? 6 : 4,
			host: network.value,
			port: Number(transport.value),
			transport: transport.protocol,
		}
	}

	/**
	 * Return a copy with the port of the transport component replaced
	 */
	withPort(port: number): Multiaddr {
		const components = this.components.map(c => (isTransportProtocol(c.protocol) ? { ...c, value: String(port) } : c))
		return new Multiaddr(components)
	}

	protocols(): ProtocolName[] {
		return this.components.map(c => c.protocol)
	}

	equals(other: Multiaddr): boolean {
		if (this.components.length !== other.components.length) {
			return false
		}
		return this.components.every((c, i) => {
			const o = other.components[i]!
			return c.protocol === o.protocol && c.value === o.value
		})
	}

	toString(): string {
		return this.components.map(c => (c.value === '' ? `/${c.protocol}` : `/${c.protocol}/${c.value}`)).join('')
	}
}

/**
 * Parse a textual multiaddr
 */
export function parseMultiaddr(text: string): Multiaddr {
	return Multiaddr.parse(text)
}

/**
 * Accept either form wherever an address is taken
 */
export function toMultiaddr(address: Multiaddr | string): Multiaddr {
	return typeof address === 'string' ? Multiaddr.parse(address) : address
}

function validateShape(text: string, components: AddressComponent[]): void {
	const [network, transport, ...rest] = components

	if (!network || !isNetworkProtocol(network.protocol)) {
		throw new AddressParseError(text, 'address must start with ip4, ip6, dns, dns4 or dns6')
	}
	if (!transport) {
		return
	}
	if (!isTransportProtocol(transport.protocol)) {
		throw new AddressParseError(text, `"${transport.protocol}" cannot follow "${network.protocol}"`)
	}

	const [next, ...trailing] = rest
	if (!next) {
		return
	}
	if (next.protocol !== 'ws' || transport.protocol !== 'tcp') {
		throw new AddressParseError(text, `"${next.protocol}" cannot follow "${transport.protocol}"`)
	}
	if (trailing.length > 0) {
		throw new AddressParseError(text, `unexpected component "${trailing[0]!.protocol}"`)
	}
}
