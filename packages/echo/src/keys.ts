import { readFile } from 'node:fs/promises'
import { KeyMaterialError, loadKeyPair, toError, type KeyPair } from '@switchyard/core'

/**
 * Read a static identity from disk
 *
 * @throws KeyMaterialError when a file cannot be read or the keys are invalid
 */
export async function loadKeyFiles(privateKeyPath: string, publicKeyPath: string): Promise<KeyPair> {
	const [privateKey, publicKey] = await Promise.all([readKeyFile(privateKeyPath), readKeyFile(publicKeyPath)])
	return loadKeyPair({ privateKey, publicKey })
}

async function readKeyFile(path: string): Promise<Buffer> {
	try {
		return await readFile(path)
	} catch (error) {
		throw new KeyMaterialError(`Cannot read key file ${path}`, toError(error))
	}
}
