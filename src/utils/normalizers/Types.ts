/**
 * Type normalizer
 *
 * Emits the 18 main types in a fixed order with their damage relations.
 * The request's count does not apply here.
 */

import { createLogger } from '../logger.js'
import { TYPE_NAMES } from '../../config/pokeApiConfig.js'
import { TypeSchema, type NamedResource } from '../../types/pokeApi.js'
import type { TypeRecord } from '../../types/records.js'
import type { PokeApiSource } from '../pokeApi.js'

const logger = createLogger('Normalizer:Types')

const names = (list: NamedResource[]): string[] => list.map((t) => t.name)

export async function normalizeTypes(
	source: PokeApiSource
): Promise<TypeRecord[]> {
	const records: TypeRecord[] = []

	for (const typeName of TYPE_NAMES) {
		const raw = await source.fetch(`type/${typeName}`)
		if (raw === null) {
			continue
		}

		const parsed = TypeSchema.safeParse(raw)
		if (!parsed.success) {
			logger.warn(`Failed to parse type ${typeName}: ${parsed.error.message}`)
			continue
		}

		const { id, name, damage_relations: relations } = parsed.data
		records.push({
			id,
			name,
			damage_relations: {
				double_damage_to: names(relations.double_damage_to),
				half_damage_to: names(relations.half_damage_to),
				no_damage_to: names(relations.no_damage_to),
				double_damage_from: names(relations.double_damage_from),
				half_damage_from: names(relations.half_damage_from),
				no_damage_from: names(relations.no_damage_from),
			},
		})
	}

	return records
}
