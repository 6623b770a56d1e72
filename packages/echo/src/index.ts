export { main, type MainOptions } from './main.js'
export { resolveConfig, configSchema, ConfigError, DEFAULT_LISTEN_ADDRESS, USAGE } from './config.js'
export type { EchoConfig, Environment } from './config.js'
export { parseArgs, type ParsedArgs } from './args.js'
export { loadKeyFiles } from './keys.js'
