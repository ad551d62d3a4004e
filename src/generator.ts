/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Pokémon Data Generator                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * The `pokemon` data tool. Parses request descriptors, serves a request
 * from the pinned result cache when possible, and otherwise dispatches to
 * the category's normalizer and writes the fresh envelope back to the cache.
 *
 * @packageDocumentation
 */

import { z } from 'zod'
import { createLogger, diagnostic } from './utils/logger.js'
import { normalizers } from './utils/normalizers/index.js'
import { parseDataRequest, validateRequest } from './utils/validator.js'
import {
	MAX_RECORDS,
	PIN_CACHE_SOURCE,
	POKEAPI_SOURCE,
} from './config/pokeApiConfig.js'
import type { PinCacheStats } from './types/cache.js'
import type { DataRecord, DatasetResult } from './types/records.js'
import { DATA_CATEGORIES, type DataRequest } from './types/request.js'
import type {
	DataTool,
	GeneratedDataset,
	ToolCapabilities,
} from './types/tool.js'
import type { PinCache } from './utils/pinCache.js'
import type { PokeApiSource } from './utils/pokeApi.js'

const logger = createLogger('Generator')

/**
 * Raised when a request cannot be turned into a dataset.
 * The underlying failure, if any, is kept as the cause.
 */
export class GenerationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'GenerationError'
	}
}

/** Shape a cached payload must have to be served as an envelope */
const CachedEnvelopeSchema = z.object({
	data: z.array(z.record(z.unknown())),
	count: z.number().optional(),
})

export interface DataGeneratorDependencies {
	source: PokeApiSource
	cache: PinCache
}

export class DataGenerator implements DataTool {
	readonly name = 'pokemon'
	readonly description =
		'Pokémon data tool that generates datasets of Pokémon, moves, abilities, type relations and evolution chains from PokéAPI'

	readonly capabilities: ToolCapabilities = {
		data_types: [...DATA_CATEGORIES],
		parameters: {
			data_type: {
				type: 'string',
				required: true,
				description: 'Type of Pokémon data to generate',
			},
			num_records: {
				type: 'integer',
				required: false,
				default: 10,
				description: `Number of records to generate (max ${MAX_RECORDS})`,
			},
			pokemon_names: {
				type: 'array',
				required: false,
				description: 'Specific Pokémon names to include',
			},
			pokemon_ids: {
				type: 'array',
				required: false,
				description: 'Specific Pokémon IDs to include',
			},
			generation: {
				type: 'integer',
				required: false,
				description: 'Pokémon generation to draw ids from (1-9)',
			},
			type_filter: {
				type: 'string',
				required: false,
				description: "Keep only Pokémon of this type (e.g. 'fire')",
			},
			include_stats: {
				type: 'boolean',
				required: false,
				default: true,
				description: 'Include base stats',
			},
			include_abilities: {
				type: 'boolean',
				required: false,
				default: true,
				description: 'Include abilities',
			},
			include_moves: {
				type: 'boolean',
				required: false,
				default: false,
				description: 'Include the first ten moves',
			},
		},
		output_format: 'json',
		max_records: MAX_RECORDS,
	}

	private readonly source: PokeApiSource
	private readonly cache: PinCache

	constructor(deps: DataGeneratorDependencies) {
		this.source = deps.source
		this.cache = deps.cache
	}

	parse(input: unknown): DataRequest {
		return parseDataRequest(input)
	}

	validate(input: unknown): boolean {
		return validateRequest(input)
	}

	/**
	 * Produce the dataset for a parsed request.
	 * @throws GenerationError when the request yields no records or dispatch fails
	 */
	async generate(request: DataRequest): Promise<GeneratedDataset> {
		try {
			const cached = await this.fromCache(request)
			if (cached) {
				return cached
			}

			logger.info(
				`Generating fresh ${request.category} dataset with ${request.count} records`
			)

			const result = await this.produce(request)
			if (await this.cache.store(request, result)) {
				result.cache_stored = true
			}

			return result
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			logger.error(`Error generating Pokémon data: ${message}`)
			throw new GenerationError(`Failed to generate Pokémon data: ${message}`, {
				cause: error,
			})
		}
	}

	getCacheStats(): PinCacheStats {
		return this.cache.stats()
	}

	clearExpiredCache(): Promise<number> {
		return this.cache.sweepExpired()
	}

	private async fromCache(
		request: DataRequest
	): Promise<GeneratedDataset | null> {
		const payload = await this.cache.lookup(request)
		if (payload === null) {
			return null
		}

		const parsed = CachedEnvelopeSchema.safeParse(payload)
		if (!parsed.success) {
			logger.warn('Cached result has unexpected structure, treating as fresh')
			this.cache.evict(request)
			return null
		}

		logger.info('Returning cached result from IPFS')
		const { data, count } = parsed.data
		return {
			data,
			count: count ?? data.length,
			data_type: request.category,
			source: PIN_CACHE_SOURCE,
			cached: true,
		}
	}

	private async produce(request: DataRequest): Promise<DatasetResult> {
		const normalize = normalizers[request.category]
		const started = Date.now()
		const records: DataRecord[] = await normalize(request, this.source)

		diagnostic.info('Normalized records', {
			category: request.category,
			requested: request.count,
			produced: records.length,
			took: Date.now() - started,
		})

		if (records.length === 0) {
			throw new GenerationError(
				`No ${request.category} records could be produced`
			)
		}

		return {
			data: records,
			count: records.length,
			data_type: request.category,
			source: POKEAPI_SOURCE,
			cached: false,
		}
	}
}
