/**
 * Evolution chain normalizer
 *
 * Reads chains sequentially from id 1, at most the first 50, and flattens
 * each chain link into `{ species, evolves_to }` where every child also
 * carries the level and trigger of its first evolution detail.
 *
 * Parsing stops at MAX_EVOLUTION_DEPTH; deeper children are dropped.
 */

import { createLogger } from '../logger.js'
import {
	MAX_EVOLUTION_CHAINS,
	MAX_EVOLUTION_DEPTH,
} from '../../config/pokeApiConfig.js'
import { EvolutionChainSchema, type ChainLink } from '../../types/pokeApi.js'
import type {
	EvolutionNode,
	EvolutionRecord,
	EvolutionStep,
} from '../../types/records.js'
import type { DataRequest } from '../../types/request.js'
import type { PokeApiSource } from '../pokeApi.js'

const logger = createLogger('Normalizer:Evolution')

/**
 * Parse the children of a chain link. `depth` is the depth of the link
 * itself, the root being 0.
 */
function parseChildren(link: ChainLink, depth: number): EvolutionStep[] {
	if (link.evolves_to.length === 0) {
		return []
	}

	if (depth + 1 > MAX_EVOLUTION_DEPTH) {
		logger.warn(
			`Evolution chain deeper than ${MAX_EVOLUTION_DEPTH} levels below ${link.species.name}; dropping ${link.evolves_to.length} branch(es)`
		)
		return []
	}

	return link.evolves_to.map((child) => {
		const detail = child.evolution_details[0]
		return {
			species: child.species.name,
			min_level: detail?.min_level ?? null,
			trigger: detail?.trigger?.name ?? null,
			evolves_to: parseChildren(child, depth + 1),
		}
	})
}

/**
 * Parse a chain link into a tree of species.
 */
export function parseEvolutionChain(link: ChainLink): EvolutionNode {
	return {
		species: link.species.name,
		evolves_to: parseChildren(link, 0),
	}
}

export async function normalizeEvolution(
	request: Pick<DataRequest, 'count'>,
	source: PokeApiSource
): Promise<EvolutionRecord[]> {
	const records: EvolutionRecord[] = []
	const last = Math.min(request.count, MAX_EVOLUTION_CHAINS)

	for (let id = 1; id <= last; id++) {
		const raw = await source.fetch(`evolution-chain/${id}`)
		if (raw === null) {
			continue
		}

		const parsed = EvolutionChainSchema.safeParse(raw)
		if (!parsed.success) {
			logger.warn(
				`Failed to parse evolution chain ${id}: ${parsed.error.message}`
			)
			continue
		}

		const chain = parsed.data
		records.push({
			id: chain.id,
			baby_trigger_item: chain.baby_trigger_item?.name ?? null,
			chain: parseEvolutionChain(chain.chain),
		})
	}

	return records
}
