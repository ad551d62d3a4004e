/**
 * Pokémon normalizer
 *
 * Produces one record per Pokémon target. Targets come from the request's
 * names, else its ids, else an id window: the generation's national dex
 * range, or the first 151 when no generation is given. Each list is cut to
 * the requested count.
 *
 * Stats, abilities and moves are attached according to the include flags;
 * moves are limited to the first ten listed by the API.
 */

import { createLogger } from '../logger.js'
import {
	DEFAULT_POKEMON_RANGE_END,
	GENERATION_RANGES,
	MAX_MOVES_PER_POKEMON,
} from '../../config/pokeApiConfig.js'
import { PokemonSchema, type PokemonResource } from '../../types/pokeApi.js'
import type { PokemonRecord } from '../../types/records.js'
import type { DataRequest } from '../../types/request.js'
import type { PokeApiSource } from '../pokeApi.js'

const logger = createLogger('Normalizer:Pokemon')

type PokemonTarget = string | number

/**
 * Inclusive range of ids, empty when end < start.
 */
function idRange(start: number, end: number): number[] {
	const ids: number[] = []
	for (let id = start; id <= end; id++) {
		ids.push(id)
	}
	return ids
}

/**
 * Decide which Pokémon a request targets.
 */
export function resolvePokemonTargets(
	request: Pick<DataRequest, 'count' | 'names' | 'ids' | 'generation'>
): PokemonTarget[] {
	const { count, names, ids, generation } = request

	if (names.length > 0) {
		return names.slice(0, count)
	}

	if (ids.length > 0) {
		return ids.slice(0, count)
	}

	if (generation) {
		const [start, end] = GENERATION_RANGES[generation] ?? GENERATION_RANGES[1]
		return idRange(start, Math.min(start + count - 1, end))
	}

	return idRange(1, Math.min(count, DEFAULT_POKEMON_RANGE_END))
}

/**
 * Shape a PokéAPI Pokémon resource into a record.
 */
export function toPokemonRecord(
	pokemon: PokemonResource,
	options: Pick<DataRequest, 'includeStats' | 'includeAbilities' | 'includeMoves'>
): PokemonRecord {
	const record: PokemonRecord = {
		id: pokemon.id,
		name: pokemon.name,
		height: pokemon.height,
		weight: pokemon.weight,
		types: pokemon.types.map((t) => t.type.name),
		base_experience: pokemon.base_experience ?? null,
	}

	if (options.includeStats) {
		record.stats = Object.fromEntries(
			pokemon.stats.map((s) => [s.stat.name, s.base_stat])
		)
	}

	if (options.includeAbilities) {
		record.abilities = pokemon.abilities.map((a) => ({
			name: a.ability.name,
			is_hidden: a.is_hidden,
			slot: a.slot,
		}))
	}

	if (options.includeMoves) {
		record.moves = pokemon.moves.slice(0, MAX_MOVES_PER_POKEMON).map((m) => ({
			name: m.move.name,
			learn_method: m.version_group_details[0]?.move_learn_method.name ?? 'unknown',
		}))
	}

	return record
}

export async function normalizePokemon(
	request: DataRequest,
	source: PokeApiSource
): Promise<PokemonRecord[]> {
	const records: PokemonRecord[] = []
	const typeFilter = request.typeFilter?.toLowerCase()

	for (const target of resolvePokemonTargets(request)) {
		const path =
			typeof target === 'string'
				? `pokemon/${target.toLowerCase()}`
				: `pokemon/${target}`

		const raw = await source.fetch(path)
		if (raw === null) {
			continue
		}

		const parsed = PokemonSchema.safeParse(raw)
		if (!parsed.success) {
			logger.warn(`Failed to parse Pokémon ${target}: ${parsed.error.message}`)
			continue
		}

		const pokemon = parsed.data
		if (
			typeFilter !== undefined &&
			!pokemon.types.some((t) => t.type.name === typeFilter)
		) {
			continue
		}

		records.push(toPokemonRecord(pokemon, request))
	}

	return records
}
