/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                             Validation Utility                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Lightweight input validation for request-for-data descriptors.
 * Turns the loosely-typed wire descriptor into a {@link DataRequest} with
 * defaults applied, with detailed error reporting.
 *
 * @packageDocumentation
 */

import { createLogger, diagnostic } from './logger.js'
import {
	DEFAULT_RECORD_COUNT,
	MAX_RECORDS,
} from '../config/pokeApiConfig.js'
import {
	DATA_CATEGORIES,
	type DataCategory,
	type DataRequest,
	type RawDataRequest,
} from '../types/request.js'

/** Logger instance for validation module */
const logger = createLogger('Validator')

/**
 * Validation error with detailed context
 */
export class ValidationError extends Error {
	constructor(
		message: string,
		public field: string,
		public value: unknown,
		public context?: Record<string, unknown>
	) {
		super(message)
		this.name = 'ValidationError'
	}
}

/**
 * Narrow an unknown value to a plain JSON object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Type guard for the supported data categories.
 */
export function isDataCategory(value: unknown): value is DataCategory {
	return DATA_CATEGORIES.some((category) => category === value)
}

/**
 * Resolve the category a request asks for.
 *
 * Reads data_type, then its aliases type and pokemon_data_type. Without any
 * of them, a request whose name or description mentions Pokémon is taken to
 * want 'pokemon'.
 *
 * @returns The requested category (possibly unsupported), or null
 */
export function resolveCategory(request: RawDataRequest): string | null {
	const explicit =
		request.data_type || request.type || request.pokemon_data_type

	if (explicit) {
		return typeof explicit === 'string' ? explicit : String(explicit)
	}

	const text = [request.description, request.name]
		.filter((part): part is string => typeof part === 'string')
		.join(' ')
		.toLowerCase()

	return text.includes('pokemon') ? 'pokemon' : null
}

/**
 * Validates the requested record count
 */
export function validateRecordCount(
	value: unknown,
	fieldName: string = 'num_records'
): number {
	if (value === undefined || value === null) {
		return DEFAULT_RECORD_COUNT
	}

	if (typeof value !== 'number' || !Number.isInteger(value)) {
		throw new ValidationError(
			'Record count must be an integer',
			fieldName,
			value,
			{ receivedType: typeof value }
		)
	}

	if (value < 1) {
		throw new ValidationError(
			'Record count must be at least 1',
			fieldName,
			value
		)
	}

	if (value > MAX_RECORDS) {
		throw new ValidationError(
			`Requested ${value} records exceeds maximum ${MAX_RECORDS}`,
			fieldName,
			value,
			{ maxRecords: MAX_RECORDS }
		)
	}

	return value
}

/**
 * Validates an optional list of Pokémon names
 */
export function validateNameList(
	value: unknown,
	fieldName: string = 'pokemon_names'
): string[] {
	if (value === undefined || value === null) {
		return []
	}

	if (!Array.isArray(value)) {
		throw new ValidationError('Names must be an array', fieldName, value)
	}

	return value.map((name, index) => {
		if (typeof name !== 'string' || name.trim() === '') {
			throw new ValidationError(
				'Names must be non-empty strings',
				`${fieldName}[${index}]`,
				name
			)
		}
		return name.trim()
	})
}

/**
 * Validates an optional list of Pokémon ids
 */
export function validateIdList(
	value: unknown,
	fieldName: string = 'pokemon_ids'
): number[] {
	if (value === undefined || value === null) {
		return []
	}

	if (!Array.isArray(value)) {
		throw new ValidationError('IDs must be an array', fieldName, value)
	}

	return value.map((id, index) => {
		if (typeof id !== 'number' || !Number.isInteger(id) || id < 1) {
			throw new ValidationError(
				'IDs must be positive integers',
				`${fieldName}[${index}]`,
				id
			)
		}
		return id
	})
}

/**
 * Validates an optional generation number.
 * Generations without a known id range are accepted and fall back later;
 * 0 is kept but selects no generation.
 */
export function validateGeneration(
	value: unknown,
	fieldName: string = 'generation'
): number | undefined {
	if (value === undefined || value === null) {
		return undefined
	}

	if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
		throw new ValidationError(
			'Generation must be a non-negative integer',
			fieldName,
			value
		)
	}

	return value
}

/**
 * Validates an optional type filter. An empty string means no filter.
 */
export function validateTypeFilter(
	value: unknown,
	fieldName: string = 'type_filter'
): string | undefined {
	if (value === undefined || value === null || value === '') {
		return undefined
	}

	if (typeof value !== 'string') {
		throw new ValidationError('Type filter must be a string', fieldName, value)
	}

	return value
}

/**
 * Validates an optional boolean inclusion flag
 */
export function validateFlag(
	value: unknown,
	fieldName: string,
	defaultValue: boolean
): boolean {
	if (value === undefined || value === null) {
		return defaultValue
	}

	if (typeof value !== 'boolean') {
		throw new ValidationError(`${fieldName} must be a boolean`, fieldName, value)
	}

	return value
}

/**
 * Parse a wire descriptor into a validated request.
 * @throws ValidationError describing the first offending field
 */
export function parseDataRequest(input: unknown): DataRequest {
	if (!isRecord(input)) {
		throw new ValidationError('Request must be a JSON object', 'request', input)
	}

	const request: RawDataRequest = input
	const category = resolveCategory(request)

	if (category === null) {
		throw new ValidationError(
			'Request does not describe Pokémon data',
			'data_type',
			undefined
		)
	}

	if (!isDataCategory(category)) {
		throw new ValidationError(
			`Unsupported data type: ${category}`,
			'data_type',
			category,
			{ supported: [...DATA_CATEGORIES] }
		)
	}

	const rfdId = request.rfd_id
	const parsed: DataRequest = {
		category,
		count: validateRecordCount(request.num_records),
		names: validateNameList(request.pokemon_names),
		ids: validateIdList(request.pokemon_ids),
		generation: validateGeneration(request.generation),
		typeFilter: validateTypeFilter(request.type_filter),
		includeStats: validateFlag(request.include_stats, 'include_stats', true),
		includeAbilities: validateFlag(
			request.include_abilities,
			'include_abilities',
			true
		),
		includeMoves: validateFlag(request.include_moves, 'include_moves', false),
		rfdId:
			typeof rfdId === 'string' || typeof rfdId === 'number'
				? String(rfdId)
				: undefined,
	}

	diagnostic.debug('Parsed data request', { ...parsed })

	return parsed
}

/**
 * Check whether a request can be served, without raising.
 * @returns True when the request parses into a supported category
 */
export function validateRequest(input: unknown): boolean {
	try {
		parseDataRequest(input)
		return true
	} catch (error) {
		if (error instanceof ValidationError) {
			logger.warn(`Request rejected: ${error.message}`)
			return false
		}
		logger.error('Error validating request:', error)
		return false
	}
}

/**
 * Map an error to an HTTP-friendly response body
 */
export function handleValidationError(error: unknown): {
	status: number
	error: string
	details?: unknown
} {
	if (error instanceof ValidationError) {
		logger.debug('Validation error:', {
			field: error.field,
			value: error.value,
			context: error.context,
		})
		return {
			status: 400,
			error: error.message,
			details: {
				field: error.field,
				context: error.context,
			},
		}
	}

	return {
		status: 500,
		error: error instanceof Error ? error.message : 'Unknown validation error',
	}
}
