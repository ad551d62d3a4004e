/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Pinata Pinning Service                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Pins JSON payloads through the Pinata API and reads them back through
 * public IPFS gateways. Every call is a single attempt bounded by its own
 * timeout; failures are logged and reported as null / false.
 *
 * @packageDocumentation
 */

import { createLogger, diagnostic } from './logger.js'
import { isRecord } from './validator.js'
import {
	IPFS_GATEWAYS,
	PINATA_PIN_JSON_URL,
	PINATA_UNPIN_URL,
	PIN_RETRIEVE_TIMEOUT_MS,
	PIN_UNPIN_TIMEOUT_MS,
	PIN_UPLOAD_TIMEOUT_MS,
	pinataAuthHeaders,
	type PinataCredentials,
} from '../config/pinataConfig.js'
import type { PinMetadata, PinningService } from '../types/cache.js'

const logger = createLogger('Pinata')

export interface PinataServiceOptions {
	/** fetch implementation, replaceable in tests */
	fetchFn?: typeof fetch
	/** Retrieval URL builders, tried in order */
	gateways?: ReadonlyArray<(cid: string) => string>
}

type GatewayRead = { found: false } | { found: true; body: unknown }

/**
 * Run a fetch and read its response under one abort timeout.
 * The timer stays armed until `read` settles, so a stalled body aborts too.
 */
async function fetchWithTimeout<T>(
	fetchFn: typeof fetch,
	url: string,
	init: RequestInit,
	timeoutMs: number,
	read: (res: Response) => Promise<T>
): Promise<T> {
	const controller = new AbortController()
	const timeout = setTimeout(() => controller.abort(), timeoutMs)

	try {
		const res = await fetchFn(url, { ...init, signal: controller.signal })
		return await read(res)
	} finally {
		clearTimeout(timeout)
	}
}

/**
 * Read the CID out of a pin response, or null when the upload was refused.
 */
async function readPinnedCid(res: Response): Promise<string | null> {
	if (!res.ok) {
		const text = (await res.text()).slice(0, 512)
		logger.warn(`Failed to upload to Pinata: ${res.status} - ${text}`)
		return null
	}

	const body: unknown = await res.json()
	const cid = isRecord(body) ? body.IpfsHash : undefined

	if (typeof cid !== 'string' || cid === '') {
		logger.warn('Pinata response did not include an IpfsHash')
		return null
	}

	return cid
}

function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.name === 'AbortError' ? 'timed out' : error.message
	}
	return String(error)
}

/**
 * {@link PinningService} backed by Pinata.
 * Without credentials the service is unavailable and every call declines.
 */
export class PinataPinningService implements PinningService {
	private readonly fetchFn: typeof fetch
	private readonly gateways: ReadonlyArray<(cid: string) => string>

	constructor(
		private readonly credentials: PinataCredentials | null,
		options: PinataServiceOptions = {}
	) {
		this.fetchFn = options.fetchFn ?? fetch
		this.gateways = options.gateways ?? IPFS_GATEWAYS
	}

	get available(): boolean {
		return this.credentials !== null
	}

	async pin(content: unknown, metadata: PinMetadata): Promise<string | null> {
		if (!this.credentials) {
			return null
		}

		const started = Date.now()

		try {
			const cid = await fetchWithTimeout(
				this.fetchFn,
				PINATA_PIN_JSON_URL,
				{
					method: 'POST',
					headers: {
						'Content-Type': 'application/json',
						...pinataAuthHeaders(this.credentials),
					},
					body: JSON.stringify({
						pinataContent: content,
						pinataMetadata: metadata,
					}),
				},
				PIN_UPLOAD_TIMEOUT_MS,
				readPinnedCid
			)

			if (cid === null) {
				return null
			}

			diagnostic.debug('Pinned payload', {
				cid,
				name: metadata.name,
				took: Date.now() - started,
			})

			return cid
		} catch (error) {
			logger.warn(`Error uploading to Pinata: ${describeError(error)}`)
			return null
		}
	}

	async retrieve(cid: string): Promise<unknown | null> {
		for (const gateway of this.gateways) {
			const url = gateway(cid)

			try {
				const outcome = await fetchWithTimeout(
					this.fetchFn,
					url,
					{ method: 'GET', headers: { Accept: 'application/json' } },
					PIN_RETRIEVE_TIMEOUT_MS,
					async (res): Promise<GatewayRead> => {
						if (!res.ok) {
							logger.debug(`Gateway ${url} answered ${res.status}`)
							return { found: false }
						}
						return { found: true, body: await res.json() }
					}
				)

				if (!outcome.found) {
					continue
				}

				logger.debug(`Retrieved cached data from IPFS: ${cid}`)
				return outcome.body
			} catch (error) {
				logger.debug(`Failed to fetch from ${url}: ${describeError(error)}`)
			}
		}

		logger.warn(`Could not fetch data from IPFS CID: ${cid}`)
		return null
	}

	async unpin(cid: string): Promise<boolean> {
		if (!this.credentials) {
			return false
		}

		try {
			const status = await fetchWithTimeout(
				this.fetchFn,
				`${PINATA_UNPIN_URL}/${cid}`,
				{
					method: 'DELETE',
					headers: pinataAuthHeaders(this.credentials),
				},
				PIN_UNPIN_TIMEOUT_MS,
				async (res) => res.status
			)

			if (status < 200 || status >= 300) {
				logger.warn(`Failed to unpin ${cid}: ${status}`)
				return false
			}

			return true
		} catch (error) {
			logger.warn(`Error unpinning ${cid}: ${describeError(error)}`)
			return false
		}
	}
}
