/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Cache Type Definitions                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Type definitions for the in-memory TTL cache, the PokéAPI response memo
 * and the pinned result cache.
 *
 * @packageDocumentation
 */

/**
 * Represents a cached entry with a timestamp for TTL management.
 */
export interface CacheEntry<T> {
	/** The cached value */
	value: T
	/** Unix timestamp (ms) when this entry was cached */
	timestamp: number
}

/**
 * Statistics about cache state.
 */
export interface CacheStats {
	/** Total number of entries in the cache */
	total: number
	/** Number of valid (non-expired) entries */
	valid: number
	/** Number of expired entries still in cache */
	expired: number
	/** Cache TTL in milliseconds */
	ttlMs: number
}

/**
 * Construction options for {@link Cache}.
 */
export interface CacheOptions {
	/** Maximum number of entries; the oldest insertion is evicted first */
	maxEntries?: number
	/** Clock used for timestamps, in milliseconds. Defaults to Date.now */
	now?: () => number
}

/**
 * Statistics reported by the pinned result cache.
 */
export interface PinCacheStats {
	/** Number of fingerprints tracked in the local directory */
	total: number
	/** Entries still within the TTL */
	valid: number
	/** Entries past the TTL that have not been evicted yet */
	expired: number
	/** Configured TTL in seconds */
	ttlSeconds: number
	/** Whether pinning credentials are configured */
	available: boolean
}

/**
 * Payload uploaded to the pinning service for each stored result.
 */
export interface PinnedPayload<T = unknown> {
	/** Unix timestamp (seconds) of the upload */
	timestamp: number
	/** Request fingerprint the payload was stored under */
	cache_key: string
	/** The cached result */
	data: T
}

/**
 * Metadata attached to a pinned payload.
 */
export interface PinMetadata {
	/** Display name of the pin */
	name: string
	/** Searchable key/value tags */
	keyvalues: Record<string, string>
}

/**
 * Pin / unpin / retrieve capability behind the pinned result cache.
 * The node ships a Pinata implementation; tests use an in-memory one.
 */
export interface PinningService {
	/** Whether the service has the credentials it needs */
	readonly available: boolean
	/**
	 * Upload a JSON payload.
	 * @returns Content identifier, or null when the upload failed
	 */
	pin(content: unknown, metadata: PinMetadata): Promise<string | null>
	/**
	 * Fetch a previously pinned payload.
	 * @returns Parsed JSON, or null when no gateway could serve it
	 */
	retrieve(cid: string): Promise<unknown | null>
	/**
	 * Remove a pin.
	 * @returns True when the service acknowledged the removal
	 */
	unpin(cid: string): Promise<boolean>
}
