/**
 * Ability normalizer
 *
 * Reads abilities sequentially from id 1, at most the first 100. The effect
 * is the first short effect the API lists, whatever its language.
 */

import { createLogger } from '../logger.js'
import { MAX_SEQUENTIAL_RECORDS } from '../../config/pokeApiConfig.js'
import { AbilitySchema } from '../../types/pokeApi.js'
import type { AbilityRecord } from '../../types/records.js'
import type { DataRequest } from '../../types/request.js'
import type { PokeApiSource } from '../pokeApi.js'

const logger = createLogger('Normalizer:Abilities')

export async function normalizeAbilities(
	request: Pick<DataRequest, 'count'>,
	source: PokeApiSource
): Promise<AbilityRecord[]> {
	const records: AbilityRecord[] = []
	const last = Math.min(request.count, MAX_SEQUENTIAL_RECORDS)

	for (let id = 1; id <= last; id++) {
		const raw = await source.fetch(`ability/${id}`)
		if (raw === null) {
			continue
		}

		const parsed = AbilitySchema.safeParse(raw)
		if (!parsed.success) {
			logger.warn(`Failed to parse ability ${id}: ${parsed.error.message}`)
			continue
		}

		const ability = parsed.data
		records.push({
			id: ability.id,
			name: ability.name,
			is_main_series: ability.is_main_series ?? null,
			generation: ability.generation?.name ?? null,
			effect: ability.effect_entries?.[0]?.short_effect ?? null,
		})
	}

	return records
}
