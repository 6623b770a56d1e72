/**
 * Process bootstrap for the echo command line
 */

import { once } from 'node:events'
import {
	createEchoServer,
	createLogger,
	Dialer,
	EchoClient,
	errorContext,
	generateKeyPair,
	parseMultiaddr,
	toError,
	type KeyPair,
	type Logger,
} from '@switchyard/core'
import { ConfigError, resolveConfig, USAGE, type EchoConfig, type Environment } from './config.js'
import { loadKeyFiles } from './keys.js'

export interface MainOptions {
	argv?: readonly string[]
	env?: Environment
	/** Receives each echoed reply of `send` */
	output?: (line: string) => void
	/** Resolves when a listening server should shut down */
	shutdownSignal?: () => Promise<unknown>
}

/**
 * Run the command line and resolve with the process exit code
 */
export async function main(options: MainOptions = {}): Promise<number> {
	const output = options.output ?? ((line: string) => process.stdout.write(`${line}\n`))

	let config: EchoConfig
	try {
		config = resolveConfig(options.argv ?? process.argv.slice(2), options.env ?? process.env)
	} catch (error) {
		if (error instanceof ConfigError) {
			process.stderr.write(`${error.message}\n\n${USAGE}\n`)
			return 1
		}
		throw error
	}

	if (config.command === 'help') {
		output(USAGE)
		return 0
	}

	const logger = createLogger(config.logLevel, { service: 'switchyard-echo' })

	try {
		const keyPair = await resolveKeyPair(config, logger)
		if (config.command === 'send') {
			await runSend(config, keyPair, logger, output)
			return 0
		}
		await runListen(config, keyPair, logger, options.shutdownSignal ?? waitForTermination)
		return 0
	} catch (error) {
		const err = toError(error)
		logger.error('fatal error', errorContext(err))
		// Reported even when logging is silenced
		process.stderr.write(`${err.name}: ${err.message}\n`)
		return 1
	}
}

async function resolveKeyPair(config: EchoConfig, logger: Logger): Promise<KeyPair> {
	if (config.privateKeyPath !== undefined && config.publicKeyPath !== undefined) {
		return loadKeyFiles(config.privateKeyPath, config.publicKeyPath)
	}
	const keyPair = generateKeyPair()
	logger.warn('no identity keys configured, using an ephemeral key pair', { peerId: keyPair.peerId })
	return keyPair
}

async function runListen(
	config: EchoConfig,
	keyPair: KeyPair,
	logger: Logger,
	shutdownSignal: () => Promise<unknown>
): Promise<void> {
	const address = parseMultiaddr(config.address)
	const server = createEchoServer({ logger, keyPair, security: config.security })
	const bound = await server.start(address)
	logger.info('echo server ready', {
		address: bound.toString(),
		peerId: server.peerId,
		security: server.securityModes,
	})

	await shutdownSignal()
	logger.info('shutting down')
	await server.close()
}

async function runSend(config: EchoConfig, keyPair: KeyPair, logger: Logger, output: (line: string) => void): Promise<void> {
	const address = parseMultiaddr(config.address)
	const dialer = Dialer.create({ logger, keyPair, security: config.security })
	try {
		const client = await EchoClient.connect(dialer, address)
		for (const message of config.messages) {
			const reply = await client.echo(Buffer.from(message, 'utf8'))
			output(reply.toString('utf8'))
		}
		await client.close()
	} finally {
		await dialer.close()
	}
}

function waitForTermination(): Promise<unknown> {
	return Promise.race([once(process, 'SIGINT'), once(process, 'SIGTERM')])
}
