/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                               Node Assembly                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Wires the node's collaborators from the validated environment: the
 * PokéAPI client, the Pinata pinning service and result cache, the
 * `pokemon` tool and the registry that serves it.
 *
 * @packageDocumentation
 */

import { DataGenerator } from './generator.js'
import { getPinataCredentials } from './config/pinataConfig.js'
import { DatasetWriter } from './utils/datasetWriter.js'
import { PinCache } from './utils/pinCache.js'
import { PinataPinningService } from './utils/pinata.js'
import { PokeApiClient } from './utils/pokeApi.js'
import { ToolRegistry } from './utils/registry.js'
import type { EnvironmentConfig } from './types/setup.js'

export interface PokedexNode {
	registry: ToolRegistry
	generator: DataGenerator
}

export function createNode(config: EnvironmentConfig): PokedexNode {
	const source = new PokeApiClient({ baseUrl: config.POKEAPI_BASE_URL })

	const cache = new PinCache(new PinataPinningService(getPinataCredentials()), {
		ttlMinutes: config.PIN_CACHE_TTL_MINUTES,
		unpinExpired: config.PIN_CACHE_UNPIN_EXPIRED,
	})

	const generator = new DataGenerator({ source, cache })

	const writer = config.DATASET_OUTPUT_DIR
		? new DatasetWriter(config.DATASET_OUTPUT_DIR)
		: undefined

	const registry = new ToolRegistry(writer).register(generator)

	return { registry, generator }
}
