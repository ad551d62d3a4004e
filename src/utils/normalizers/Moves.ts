/**
 * Move normalizer
 *
 * Reads moves sequentially from id 1, at most the first 100.
 */

import { createLogger } from '../logger.js'
import { MAX_SEQUENTIAL_RECORDS } from '../../config/pokeApiConfig.js'
import { MoveSchema } from '../../types/pokeApi.js'
import type { MoveRecord } from '../../types/records.js'
import type { DataRequest } from '../../types/request.js'
import type { PokeApiSource } from '../pokeApi.js'

const logger = createLogger('Normalizer:Moves')

export async function normalizeMoves(
	request: Pick<DataRequest, 'count'>,
	source: PokeApiSource
): Promise<MoveRecord[]> {
	const records: MoveRecord[] = []
	const last = Math.min(request.count, MAX_SEQUENTIAL_RECORDS)

	for (let id = 1; id <= last; id++) {
		const raw = await source.fetch(`move/${id}`)
		if (raw === null) {
			continue
		}

		const parsed = MoveSchema.safeParse(raw)
		if (!parsed.success) {
			logger.warn(`Failed to parse move ${id}: ${parsed.error.message}`)
			continue
		}

		const move = parsed.data
		records.push({
			id: move.id,
			name: move.name,
			power: move.power ?? null,
			pp: move.pp ?? null,
			accuracy: move.accuracy ?? null,
			priority: move.priority ?? null,
			type: move.type?.name ?? null,
			damage_class: move.damage_class?.name ?? null,
			effect_chance: move.effect_chance ?? null,
		})
	}

	return records
}
