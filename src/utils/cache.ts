/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Generic Cache Utility                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Generic in-memory cache with TTL (time-to-live) support and an optional
 * size bound. Expiry is evaluated lazily on read, on stats and on prune;
 * nothing runs in the background.
 *
 * Backs both the PokéAPI response memo and the pinned result cache directory.
 *
 * @packageDocumentation
 */

import type { CacheEntry, CacheOptions, CacheStats } from '../types/cache.js'

/**
 * Generic in-memory cache with TTL support.
 * Type parameter T: The type of values stored in the cache
 */
export class Cache<T> {
	private cache: Map<string, CacheEntry<T>>
	private readonly ttl: number
	private readonly maxEntries: number
	private readonly now: () => number

	/**
	 * Creates a new cache instance.
	 * @param ttl - Time-to-live in milliseconds
	 * @param options - Size bound and clock
	 */
	constructor(ttl: number, options: CacheOptions = {}) {
		this.cache = new Map()
		this.ttl = ttl
		this.maxEntries = options.maxEntries ?? Infinity
		this.now = options.now ?? Date.now
	}

	/** TTL in milliseconds, fixed at construction */
	get ttlMs(): number {
		return this.ttl
	}

	/** Number of entries held, expired ones included */
	get size(): number {
		return this.cache.size
	}

	/**
	 * An entry is expired once its age exceeds the TTL.
	 */
	private isExpired(entry: CacheEntry<T>, now: number): boolean {
		return now - entry.timestamp > this.ttl
	}

	/**
	 * Get a value from the cache.
	 * Expired entries are deleted and reported as missing.
	 * @param key - Cache key
	 * @returns Cached value or undefined if not found/expired
	 */
	get(key: string): T | undefined {
		const entry = this.cache.get(key)

		if (!entry) {
			return undefined
		}

		if (this.isExpired(entry, this.now())) {
			this.cache.delete(key)
			return undefined
		}

		return entry.value
	}

	/**
	 * Store a value in the cache, replacing any entry under the same key.
	 * When the size bound is reached the oldest insertion is evicted.
	 * @param key - Cache key
	 * @param value - Value to cache (cannot be undefined; use null instead)
	 * @throws Error if attempting to cache undefined
	 */
	set(key: string, value: T): void {
		if (value === undefined) {
			throw new Error(
				'Cannot cache undefined values. Use null to represent missing data.'
			)
		}

		// Re-inserting moves the key to the end of the insertion order
		this.cache.delete(key)

		while (this.cache.size >= this.maxEntries) {
			const oldest = this.cache.keys().next()
			if (oldest.done) break
			this.cache.delete(oldest.value)
		}

		this.cache.set(key, {
			value,
			timestamp: this.now(),
		})
	}

	/**
	 * Check if a key exists and is not expired.
	 * @param key - Cache key
	 * @returns True if key exists and is valid
	 */
	has(key: string): boolean {
		return this.get(key) !== undefined
	}

	/**
	 * Remove a single entry.
	 * @param key - Cache key
	 * @returns True if an entry was removed
	 */
	delete(key: string): boolean {
		return this.cache.delete(key)
	}

	/**
	 * Clear all entries from the cache.
	 * @returns Number of entries cleared
	 */
	clear(): number {
		const size = this.cache.size
		this.cache.clear()
		return size
	}

	/**
	 * Get cache statistics.
	 * @returns Cache statistics including valid/expired counts
	 */
	getStats(): CacheStats {
		const now = this.now()
		let valid = 0
		let expired = 0

		for (const entry of this.cache.values()) {
			if (this.isExpired(entry, now)) {
				expired++
			} else {
				valid++
			}
		}

		return {
			total: this.cache.size,
			valid,
			expired,
			ttlMs: this.ttl,
		}
	}

	/**
	 * Remove expired entries from the cache.
	 * @param onEvict - Called with each removed key and value
	 * @returns Number of entries removed
	 */
	prune(onEvict?: (key: string, value: T) => void): number {
		const now = this.now()
		let removed = 0

		for (const [key, entry] of this.cache.entries()) {
			if (this.isExpired(entry, now)) {
				this.cache.delete(key)
				onEvict?.(key, entry.value)
				removed++
			}
		}

		return removed
	}
}
