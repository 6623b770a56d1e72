/**
 * Command line and environment configuration
 *
 * Flags win over environment variables; both are validated by one zod schema.
 */

import { z } from 'zod'
import { LOG_LEVELS, SECURITY_PROTOCOLS, SwitchyardError } from '@switchyard/core'
import { parseArgs } from './args.js'

export const DEFAULT_LISTEN_ADDRESS = '/ip4/0.0.0.0/tcp/10333'

export const USAGE = `Usage:
  switchyard-echo [listen] [address] [options]
  switchyard-echo send <address> <message...> [options]

Options:
  --log-level <level>     ${LOG_LEVELS.join(' | ')} (env SWITCHYARD_LOG_LEVEL)
  --security <ids>        comma-separated security mode ids (env SWITCHYARD_SECURITY)
  --private-key <path>    PKCS#8 Ed25519 private key, PEM or DER (env SWITCHYARD_PRIVATE_KEY)
  --public-key <path>     SPKI Ed25519 public key, PEM or DER (env SWITCHYARD_PUBLIC_KEY)
  --help                  print this message`

const KNOWN_FLAGS = new Set(['log-level', 'security', 'private-key', 'public-key', 'help'])

/**
 * Invalid command line or environment
 */
export class ConfigError extends SwitchyardError {
	constructor(
		message: string,
		readonly issues: readonly string[] = []
	) {
		super(message, 'startup')
		this.name = 'ConfigError'
	}
}

const securityListSchema = z
	.string()
	.transform(value =>
		value
			.split(',')
			.map(id => id.trim())
			.filter(id => id.length > 0)
	)
	.pipe(z.array(z.enum(SECURITY_PROTOCOLS)).min(1, 'at least one security mode is required'))

export const configSchema = z
	.object({
		command: z.enum(['listen', 'send', 'help']),
		address: z.string().min(1, 'address is required'),
		messages: z.array(z.string()),
		logLevel: z.enum(LOG_LEVELS),
		security: securityListSchema,
		privateKeyPath: z.string().min(1).optional(),
		publicKeyPath: z.string().min(1).optional(),
	})
	.superRefine((config, ctx) => {
		if ((config.privateKeyPath === undefined) !== (config.publicKeyPath === undefined)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: [config.privateKeyPath === undefined ? 'privateKeyPath' : 'publicKeyPath'],
				message: '--private-key and --public-key must be given together',
			})
		}
		if (config.command === 'send' && config.messages.length === 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['messages'],
				message: 'send needs at least one message',
			})
		}
	})

export type EchoConfig = z.infer<typeof configSchema>

export type Environment = Readonly<Record<string, string | undefined>>

/**
 * Build the validated configuration from argv (without node and script) and
 * the environment
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(argv: readonly string[], env: Environment = {}): EchoConfig {
	const { positionals, flags } = parseArgs(argv)

	for (const key of Object.keys(flags)) {
		if (!KNOWN_FLAGS.has(key)) {
			throw new ConfigError(`Unknown option --${key}`)
		}
	}

	const [first, ...rest] = positionals
	let command: string = 'listen'
	let operands = positionals
	if (flags['help'] === true) {
		command = 'help'
	} else if (first === 'send' || first === 'listen') {
		command = first
		operands = rest
	}

	const [address, ...messages] = operands
	if (command === 'listen' && messages.length > 0) {
		throw new ConfigError(`Unexpected argument "${messages[0]}"`)
	}

	const result = configSchema.safeParse({
		command,
		address: address ?? (command === 'send' ? '' : DEFAULT_LISTEN_ADDRESS),
		messages,
		logLevel: stringFlag(flags, 'log-level') ?? env['SWITCHYARD_LOG_LEVEL'] ?? 'info',
		security: stringFlag(flags, 'security') ?? env['SWITCHYARD_SECURITY'] ?? SECURITY_PROTOCOLS.join(','),
		privateKeyPath: stringFlag(flags, 'private-key') ?? env['SWITCHYARD_PRIVATE_KEY'],
		publicKeyPath: stringFlag(flags, 'public-key') ?? env['SWITCHYARD_PUBLIC_KEY'],
	})

	if (!result.success) {
		const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
		throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues)
	}
	return result.data
}

function stringFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
	const value = flags[key]
	if (value === true) {
		throw new ConfigError(`Option --${key} requires a value`)
	}
	return value === false ? undefined : value
}
