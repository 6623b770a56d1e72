export interface ParsedArgs {
	positionals: string[]
	flags: Record<string, string | boolean>
}

/**
 * Split argv into positionals and `--key value` / `--key=value` / `--flag` options
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const positionals: string[] = []
	const flags: Record<string, string | boolean> = {}

	for (let i = 0; i < argv.length; i++) {
		const raw = argv[i]
		if (raw === undefined) continue
		if (raw === '--') {
			positionals.push(...argv.slice(i + 1))
			break
		}
		if (!raw.startsWith('--')) {
			positionals.push(raw)
			continue
		}

		const [key, inlineValue] = raw.slice(2).split('=', 2)
		if (!key) continue
		if (inlineValue !== undefined) {
			flags[key] = inlineValue
			continue
		}

		const next = argv[i + 1]
		if (next && !next.startsWith('--')) {
			flags[key] = next
			i++
			continue
		}

		flags[key] = true
	}

	return { positionals, flags }
}
