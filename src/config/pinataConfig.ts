/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                            Pinata Configuration                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Endpoints, timeouts and credential resolution for the Pinata pinning
 * service backing the result cache.
 *
 * @packageDocumentation
 */

import { getEnvConfig } from '../utils/env.js'

/** JSON pinning endpoint */
export const PINATA_PIN_JSON_URL =
	'https://api.pinata.cloud/pinning/pinJSONToIPFS'

/** Unpin endpoint; the CID is appended */
export const PINATA_UNPIN_URL = 'https://api.pinata.cloud/pinning/unpin'

/**
 * Gateways tried in order when retrieving a pinned payload.
 */
export const IPFS_GATEWAYS: ReadonlyArray<(cid: string) => string> = [
	(cid) => `https://gateway.pinata.cloud/ipfs/${cid}`,
	(cid) => `https://ipfs.io/ipfs/${cid}`,
]

/** Timeout for pin uploads */
export const PIN_UPLOAD_TIMEOUT_MS = 30_000

/** Timeout per gateway when retrieving */
export const PIN_RETRIEVE_TIMEOUT_MS = 10_000

/** Timeout for unpin requests */
export const PIN_UNPIN_TIMEOUT_MS = 10_000

/** Metadata tag identifying cache pins */
export const PIN_CACHE_TAG = 'pokemon_cache'

/**
 * Credentials accepted by Pinata: a JWT, or an API key/secret pair.
 */
export type PinataCredentials =
	| { kind: 'jwt'; jwt: string }
	| { kind: 'keyPair'; apiKey: string; secretApiKey: string }

/**
 * Resolve Pinata credentials from the environment.
 * The JWT wins when both forms are present.
 * Returns null when neither form is complete, which disables the cache.
 */
export function getPinataCredentials(): PinataCredentials | null {
	const env = getEnvConfig()

	if (env.PINATA_JWT_TOKEN) {
		return { kind: 'jwt', jwt: env.PINATA_JWT_TOKEN }
	}

	if (env.PINATA_API_KEY && env.PINATA_SECRET_API_KEY) {
		return {
			kind: 'keyPair',
			apiKey: env.PINATA_API_KEY,
			secretApiKey: env.PINATA_SECRET_API_KEY,
		}
	}

	return null
}

/**
 * Build the authentication headers for a set of credentials.
 */
export function pinataAuthHeaders(
	credentials: PinataCredentials
): Record<string, string> {
	if (credentials.kind === 'jwt') {
		return { Authorization: `Bearer ${credentials.jwt}` }
	}

	return {
		pinata_api_key: credentials.apiKey,
		pinata_secret_api_key: credentials.secretApiKey,
	}
}
