/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                               PokéAPI Client                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Read-only client for the PokéAPI REST endpoints.
 *
 * Features:
 * - Bounded response memo (size + TTL) so one run never reads a URL twice
 * - Per-request timeout via AbortController
 * - Fixed politeness delay after every network read
 * - Never throws: transport errors, timeouts and non-2xx answers yield null
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'timers/promises'
import { Cache } from './cache.js'
import { createLogger, diagnostic } from './logger.js'
import {
	RESPONSE_MEMO_MAX_ENTRIES,
	RESPONSE_MEMO_TTL,
} from '../config/cacheSettings.js'
import {
	DEFAULT_POKEAPI_BASE_URL,
	POKEAPI_REQUEST_DELAY_MS,
	POKEAPI_TIMEOUT_MS,
} from '../config/pokeApiConfig.js'
import type { CacheStats } from '../types/cache.js'

const logger = createLogger('PokeAPI')

/**
 * Keyed read access to PokéAPI, as consumed by the normalizers.
 */
export interface PokeApiSource {
	/**
	 * Read a resource by its path relative to the API root.
	 * @param path - e.g. 'pokemon/25' or 'type/fire'
	 * @returns Parsed JSON body, or null when it could not be read
	 */
	fetch(path: string): Promise<unknown | null>
}

export interface PokeApiClientOptions {
	/** API root without trailing slash */
	baseUrl?: string
	/** Timeout per read in milliseconds */
	timeoutMs?: number
	/** Pause after each network read in milliseconds */
	delayMs?: number
	/** fetch implementation, replaceable in tests */
	fetchFn?: typeof fetch
	/** Response memo; defaults to a bounded 1 hour cache */
	memo?: Cache<unknown>
}

/**
 * PokéAPI client with a bounded response memo.
 */
export class PokeApiClient implements PokeApiSource {
	private readonly baseUrl: string
	private readonly timeoutMs: number
	private readonly delayMs: number
	private readonly fetchFn: typeof fetch
	private readonly memo: Cache<unknown>

	constructor(options: PokeApiClientOptions = {}) {
		this.baseUrl = (options.baseUrl ?? DEFAULT_POKEAPI_BASE_URL).replace(
			/\/+$/,
			''
		)
		this.timeoutMs = options.timeoutMs ?? POKEAPI_TIMEOUT_MS
		this.delayMs = options.delayMs ?? POKEAPI_REQUEST_DELAY_MS
		this.fetchFn = options.fetchFn ?? fetch
		this.memo =
			options.memo ??
			new Cache<unknown>(RESPONSE_MEMO_TTL, {
				maxEntries: RESPONSE_MEMO_MAX_ENTRIES,
			})
	}

	/**
	 * Build the full URL for a relative resource path.
	 */
	urlFor(path: string): string {
		return `${this.baseUrl}/${path.replace(/^\/+/, '')}`
	}

	async fetch(path: string): Promise<unknown | null> {
		const url = this.urlFor(path)

		const memoized = this.memo.get(url)
		if (memoized !== undefined) {
			diagnostic.trace('PokéAPI memo hit', { url })
			return memoized
		}

		const started = Date.now()
		const controller = new AbortController()
		const timeout = setTimeout(() => controller.abort(), this.timeoutMs)
		let body: unknown

		try {
			const res = await this.fetchFn(url, {
				signal: controller.signal,
				headers: { Accept: 'application/json' },
			})

			if (!res.ok) {
				logger.warn(`Failed to fetch ${url}: HTTP ${res.status}`)
				return null
			}

			body = await res.json()
			this.memo.set(url, body)

			diagnostic.debug('PokéAPI read', {
				url,
				status: res.status,
				took: Date.now() - started,
			})
		} catch (error) {
			if (error instanceof Error && error.name === 'AbortError') {
				logger.warn(`Failed to fetch ${url}: timed out after ${this.timeoutMs}ms`)
			} else {
				logger.warn(
					`Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`
				)
			}
			return null
		} finally {
			clearTimeout(timeout)
		}

		if (this.delayMs > 0) {
			await delay(this.delayMs)
		}

		return body
	}

	/** Memo statistics */
	memoStats(): CacheStats {
		return this.memo.getStats()
	}

	/**
	 * Drop every memoized response.
	 * @returns Number of responses dropped
	 */
	clearMemo(): number {
		return this.memo.clear()
	}
}
