/**
 * Structured JSON logging for switchyard
 *
 * Every component takes an optional logger and derives a child with its own
 * context, so a single line carries the connection and stream it belongs to.
 */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = (typeof LOG_LEVELS)[number]

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: Record<string, unknown>): void
	warn(message: string, context?: Record<string, unknown>): void
	info(message: string, context?: Record<string, unknown>): void
	debug(message: string, context?: Record<string, unknown>): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

class JsonLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: Record<string, unknown>
	) {}

	private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (LOG_LEVEL_VALUES[level] > LOG_LEVEL_VALUES[this.level]) {
			return
		}

		const output = JSON.stringify({
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		})

		if (level === 'error') {
			console.error(output)
		} else {
			console.log(output)
		}
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug')
 * logger.info('listening', { address: '/ip4/127.0.0.1/tcp/10333' })
 * // Output: {"level":"info","message":"listening","timestamp":"...","address":"/ip4/127.0.0.1/tcp/10333"}
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: Record<string, unknown> = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()

/**
 * Reduce an unknown thrown value to loggable fields
 */
export function errorContext(error: unknown): Record<string, unknown> {
	if (error instanceof Error) {
		return { error: error.message, errorName: error.name }
	}
	return { error: String(error) }
}
