/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                        Environment Variable Schema                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Defines the schema for all environment variables read by the node.
 * This schema is used to validate configuration at startup.
 *
 * @packageDocumentation
 */

import type { EnvVariable } from '../types/setup.js'
import { DEFAULT_PIN_CACHE_TTL_MINUTES } from './cacheSettings.js'
import { DEFAULT_POKEAPI_BASE_URL } from './pokeApiConfig.js'

const validateUrl = (value: string): boolean | string => {
	try {
		new URL(value)
		return true
	} catch {
		return 'Must be a valid URL'
	}
}

const validateNonEmpty = (value: string): boolean | string =>
	value.trim() !== '' || 'Must be a non-empty string'

/**
 * Environment variable schema defining all configuration requirements.
 * Each entry describes a variable's validation rules, transformations, and metadata.
 */
export const envSchema: EnvVariable[] = [
	{
		name: 'PORT',
		required: false,
		type: 'number',
		description: 'Server port',
		defaultValue: 3000,
		validator: (value) => {
			const port = parseInt(value)
			if (isNaN(port) || port < 1 || port > 65535) {
				return 'Port must be between 1 and 65535'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'LOG_LEVEL',
		required: false,
		type: 'number',
		description:
			'Logging level (0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal)',
		defaultValue: 3,
		validator: (value) => {
			const level = parseInt(value)
			if (isNaN(level) || level < 0 || level > 6) {
				return 'Log level must be between 0 and 6'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'DIAGNOSTIC_LOGGER',
		required: false,
		type: 'boolean',
		description: 'Enable diagnostic logging',
		defaultValue: false,
		transformer: (value) => value === 'true',
	},
	{
		name: 'API_BEARER_TOKEN',
		required: false,
		type: 'string',
		description:
			'Bearer token for POST endpoint authentication (POST routes are open when unset)',
		sensitive: true,
		validator: (value) =>
			value.length >= 32 ||
			'Token should be at least 32 characters for security',
	},
	{
		name: 'POKEAPI_BASE_URL',
		required: false,
		type: 'url',
		description: 'Base URL of the PokéAPI REST endpoints',
		defaultValue: DEFAULT_POKEAPI_BASE_URL,
		validator: validateUrl,
		transformer: (value) => value.replace(/\/+$/, ''),
	},
	{
		name: 'PINATA_API_KEY',
		required: false,
		type: 'string',
		description: 'Pinata API key (used with PINATA_SECRET_API_KEY)',
		sensitive: true,
		validator: validateNonEmpty,
	},
	{
		name: 'PINATA_SECRET_API_KEY',
		required: false,
		type: 'string',
		description: 'Pinata API secret (used with PINATA_API_KEY)',
		sensitive: true,
		validator: validateNonEmpty,
	},
	{
		name: 'PINATA_JWT_TOKEN',
		required: false,
		type: 'string',
		description: 'Pinata JWT, preferred over the API key pair when set',
		sensitive: true,
		validator: validateNonEmpty,
	},
	{
		name: 'PIN_CACHE_TTL_MINUTES',
		required: false,
		type: 'number',
		description: 'Time-to-live of pinned result cache entries in minutes',
		defaultValue: DEFAULT_PIN_CACHE_TTL_MINUTES,
		validator: (value) => {
			const minutes = parseInt(value)
			if (isNaN(minutes) || minutes < 1) {
				return 'TTL must be at least 1 minute'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'PIN_CACHE_UNPIN_EXPIRED',
		required: false,
		type: 'boolean',
		description: 'Unpin expired cache entries from Pinata when they are swept',
		defaultValue: false,
		transformer: (value) => value === 'true',
	},
	{
		name: 'DATASET_OUTPUT_DIR',
		required: false,
		type: 'path',
		description: 'Directory that generated datasets are written to',
		validator: validateNonEmpty,
	},
	{
		name: 'RATE_LIMIT_ENABLED',
		required: false,
		type: 'boolean',
		description: 'Enable rate limiting middleware',
		defaultValue: true,
		transformer: (value: string) => value.toLowerCase() !== 'false',
	},
	{
		name: 'RATE_LIMIT_WINDOW_MS',
		required: false,
		type: 'number',
		description: 'Rate limit window duration in milliseconds',
		defaultValue: 60000,
		validator: (value) => {
			const ms = parseInt(value)
			if (isNaN(ms) || ms < 1000) {
				return 'Window must be at least 1000ms (1 second)'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
	{
		name: 'RATE_LIMIT_MAX',
		required: false,
		type: 'number',
		description: 'Max requests per window',
		defaultValue: 100,
		validator: (value) => {
			const max = parseInt(value)
			if (isNaN(max) || max < 1) {
				return 'Max must be at least 1'
			}
			return true
		},
		transformer: (value) => parseInt(value),
	},
]
