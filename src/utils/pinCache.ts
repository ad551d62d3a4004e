/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                            Pinned Result Cache                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Caches generated results on IPFS through a {@link PinningService}.
 * A local directory maps request fingerprints to content identifiers; the
 * directory lives in memory only and expires lazily after a fixed TTL.
 *
 * @packageDocumentation
 */

import { Cache } from './cache.js'
import { fingerprintRequest } from './fingerprint.js'
import { createLogger, diagnostic } from './logger.js'
import { isRecord } from './validator.js'
import { DEFAULT_PIN_CACHE_TTL_MINUTES } from '../config/cacheSettings.js'
import { PIN_CACHE_TAG } from '../config/pinataConfig.js'
import type {
	PinCacheStats,
	PinnedPayload,
	PinningService,
} from '../types/cache.js'
import type { DataRequest } from '../types/request.js'

const logger = createLogger('PinCache')

export interface PinCacheOptions {
	/** Directory TTL in minutes */
	ttlMinutes?: number
	/** Clock in milliseconds, replaceable in tests */
	now?: () => number
	/** Also unpin identifiers removed by {@link PinCache.sweepExpired} */
	unpinExpired?: boolean
}

export class PinCache {
	private readonly directory: Cache<string>
	private readonly now: () => number
	private readonly unpinExpired: boolean

	constructor(
		private readonly service: PinningService,
		options: PinCacheOptions = {}
	) {
		const ttlMinutes = options.ttlMinutes ?? DEFAULT_PIN_CACHE_TTL_MINUTES
		this.now = options.now ?? Date.now
		this.unpinExpired = options.unpinExpired ?? false
		this.directory = new Cache<string>(ttlMinutes * 60_000, { now: this.now })

		if (!service.available) {
			logger.info('Pinning credentials not configured; result cache disabled')
		}
	}

	get available(): boolean {
		return this.service.available
	}

	/**
	 * Look up a cached result for a request.
	 * @returns The `data` field of the pinned payload, or null on any miss
	 */
	async lookup(request: Partial<DataRequest>): Promise<unknown | null> {
		if (!this.service.available) {
			return null
		}

		const key = fingerprintRequest(request)
		const cid = this.directory.get(key)

		if (cid === undefined) {
			diagnostic.debug('Pin cache miss', { key })
			return null
		}

		const payload = await this.service.retrieve(cid)

		if (payload === null) {
			this.directory.delete(key)
			return null
		}

		if (!isRecord(payload) || !('data' in payload)) {
			logger.warn(`Pinned payload for ${key} has no data; evicting ${cid}`)
			this.directory.delete(key)
			return null
		}

		logger.info(`Cache HIT for RFD fingerprint: ${key}`)
		return payload.data
	}

	/**
	 * Forget the entry for a request, e.g. when its data proved unusable.
	 * @returns True when an entry was removed
	 */
	evict(request: Partial<DataRequest>): boolean {
		return this.directory.delete(fingerprintRequest(request))
	}

	/**
	 * Pin a result under the fingerprint of its request.
	 * @returns True when the upload succeeded and the directory was updated
	 */
	async store(request: Partial<DataRequest>, result: unknown): Promise<boolean> {
		if (!this.service.available) {
			return false
		}

		const key = fingerprintRequest(request)
		const payload: PinnedPayload = {
			timestamp: Math.floor(this.now() / 1000),
			cache_key: key,
			data: result,
		}

		const cid = await this.service.pin(payload, {
			name: `${PIN_CACHE_TAG}_${key}`,
			keyvalues: { type: PIN_CACHE_TAG, cache_key: key },
		})

		if (cid === null) {
			return false
		}

		this.directory.set(key, cid)
		logger.info(`Cache STORE for RFD fingerprint: ${key} -> ${cid}`)
		return true
	}

	stats(): PinCacheStats {
		const { total, valid, expired, ttlMs } = this.directory.getStats()

		return {
			total,
			valid,
			expired,
			ttlSeconds: Math.round(ttlMs / 1000),
			available: this.service.available,
		}
	}

	/**
	 * Drop directory entries past the TTL, unpinning them when configured.
	 * @returns Number of entries removed
	 */
	async sweepExpired(): Promise<number> {
		const evicted: string[] = []
		const removed = this.directory.prune((_key, cid) => {
			evicted.push(cid)
		})

		if (this.unpinExpired && this.service.available) {
			for (const cid of evicted) {
				await this.service.unpin(cid)
			}
		}

		if (removed > 0) {
			logger.info(`Cleared ${removed} expired cache entries`)
		}

		return removed
	}
}
