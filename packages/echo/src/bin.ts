#!/usr/bin/env -S node --import tsx
import { main } from './main.js'

void main().then(
	code => process.exit(code),
	(error: unknown) => {
		console.error(error)
		process.exit(1)
	}
)
