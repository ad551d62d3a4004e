/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                        Node Setup Type Definitions                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for node setup and configuration.
 * Includes environment validation and configuration schemas.
 *
 * @packageDocumentation
 */

/**
 * Defines the schema for an environment variable.
 * Used to validate and transform environment configuration at startup.
 */
export interface EnvVariable {
	/** The environment variable name (e.g., 'PINATA_API_KEY') */
	name: keyof EnvironmentConfig
	/** Whether this variable is required for the node to function */
	required: boolean
	/** The expected data type of the variable */
	type: 'string' | 'number' | 'boolean' | 'url' | 'path'
	/** Human-readable description of what this variable configures */
	description: string
	/** Optional validation function that returns true or an error message */
	validator?: (value: string) => boolean | string
	/** Optional transformer to convert the string value to the appropriate type */
	transformer?: (value: string) => string | number | boolean
	/** Default value if the environment variable is not set (only for optional vars) */
	defaultValue?: string | number | boolean
	/** Whether this value should be masked in logs (e.g., API keys, tokens) */
	sensitive?: boolean
}

/**
 * Result of environment validation process.
 * Contains validation status, errors, and the processed configuration.
 */
export interface EnvValidationResult {
	/** Whether all required environment variables passed validation */
	valid: boolean
	/** List of validation errors that must be fixed before startup */
	errors: Array<{
		/** The environment variable that failed validation */
		variable: string
		/** The specific error that occurred */
		error: string
		/** Description of what this variable is used for */
		description: string
	}>
	/** The validated and transformed configuration object */
	config: Partial<EnvironmentConfig>
}

/**
 * Strongly-typed environment configuration after validation.
 * Optional entries have no default and stay undefined when unset.
 */
export interface EnvironmentConfig {
	/** Port number for the Express server (default: 3000) */
	PORT: number
	/** Logging verbosity level 0-6 (default: 3/info) */
	LOG_LEVEL: number
	/** Whether to enable detailed diagnostic logging (default: false) */
	DIAGNOSTIC_LOGGER: boolean
	/** Bearer token for POST endpoints; POST routes are open when unset */
	API_BEARER_TOKEN?: string
	/** PokéAPI base URL */
	POKEAPI_BASE_URL: string
	/** Pinata API key (used with the secret when no JWT is set) */
	PINATA_API_KEY?: string
	/** Pinata API secret */
	PINATA_SECRET_API_KEY?: string
	/** Pinata JWT, preferred over the key pair */
	PINATA_JWT_TOKEN?: string
	/** Pinned result cache TTL in minutes (default: 30) */
	PIN_CACHE_TTL_MINUTES: number
	/** Unpin swept cache entries remotely (default: false) */
	PIN_CACHE_UNPIN_EXPIRED: boolean
	/** Directory generated datasets are written to */
	DATASET_OUTPUT_DIR?: string
	/** Enable rate limiting middleware (default: true) */
	RATE_LIMIT_ENABLED: boolean
	/** Rate limit window in milliseconds (default: 60000) */
	RATE_LIMIT_WINDOW_MS: number
	/** Max requests per window (default: 100) */
	RATE_LIMIT_MAX: number
}
