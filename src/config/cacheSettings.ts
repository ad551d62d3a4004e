/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                            Cache Configuration                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Centralized cache configuration settings for the application.
 *
 * @packageDocumentation
 */

/**
 * Default time-to-live for pinned result cache entries.
 * Overridden by PIN_CACHE_TTL_MINUTES.
 */
export const DEFAULT_PIN_CACHE_TTL_MINUTES = 30

/**
 * Time-to-live for memoized PokéAPI responses.
 * PokéAPI data is effectively static, so 1 hour is a safe default.
 * Value: 3,600,000 milliseconds (1 hour)
 */
export const RESPONSE_MEMO_TTL = 60 * 60 * 1000 // 1 hour in milliseconds

/**
 * Upper bound on memoized PokéAPI responses held in memory.
 */
export const RESPONSE_MEMO_MAX_ENTRIES = 1000

/** Length of the hex fingerprint used as cache key */
export const FINGERPRINT_LENGTH = 16
