/**
 * Record normalizers, one per data category.
 */

import { normalizeAbilities } from './Abilities.js'
import { normalizeEvolution } from './Evolution.js'
import { normalizeMoves } from './Moves.js'
import { normalizePokemon } from './Pokemon.js'
import { normalizeTypes } from './Types.js'
import type { DataRecord } from '../../types/records.js'
import type { DataCategory, DataRequest } from '../../types/request.js'
import type { PokeApiSource } from '../pokeApi.js'

export type Normalizer = (
	request: DataRequest,
	source: PokeApiSource
) => Promise<DataRecord[]>

export const normalizers: Record<DataCategory, Normalizer> = {
	pokemon: normalizePokemon,
	moves: normalizeMoves,
	abilities: normalizeAbilities,
	types: (_request, source) => normalizeTypes(source),
	evolution: normalizeEvolution,
}

export { resolvePokemonTargets, toPokemonRecord } from './Pokemon.js'
export { parseEvolutionChain } from './Evolution.js'
export {
	normalizePokemon,
	normalizeMoves,
	normalizeAbilities,
	normalizeTypes,
	normalizeEvolution,
}
