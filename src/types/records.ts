/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                          Record Type Definitions                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Normalized record shapes emitted by the normalizers, and the result
 * envelope returned by the generator. Field names follow the JSON wire
 * format consumers already read.
 *
 * @packageDocumentation
 */

import type { DataCategory } from './request.js'

export interface PokemonAbilityRecord {
	name: string
	is_hidden: boolean
	slot: number
}

export interface PokemonMoveRecord {
	name: string
	/** First listed learn method, or 'unknown' */
	learn_method: string
}

export interface PokemonRecord {
	id: number
	name: string
	height: number
	weight: number
	types: string[]
	base_experience: number | null
	/** Stat name to base value, present when stats are requested */
	stats?: Record<string, number>
	abilities?: PokemonAbilityRecord[]
	/** At most the first 10 moves */
	moves?: PokemonMoveRecord[]
}

export interface MoveRecord {
	id: number
	name: string
	power: number | null
	pp: number | null
	accuracy: number | null
	priority: number | null
	type: string | null
	damage_class: string | null
	effect_chance: number | null
}

export interface AbilityRecord {
	id: number
	name: string
	is_main_series: boolean | null
	generation: string | null
	effect: string | null
}

export interface DamageRelations {
	double_damage_to: string[]
	half_damage_to: string[]
	no_damage_to: string[]
	double_damage_from: string[]
	half_damage_from: string[]
	no_damage_from: string[]
}

export interface TypeRecord {
	id: number
	name: string
	damage_relations: DamageRelations
}

/** A species that a chain node evolves into */
export interface EvolutionStep {
	species: string
	min_level: number | null
	trigger: string | null
	evolves_to: EvolutionStep[]
}

/** Root of a parsed evolution chain */
export interface EvolutionNode {
	species: string
	evolves_to: EvolutionStep[]
}

export interface EvolutionRecord {
	id: number
	baby_trigger_item: string | null
	chain: EvolutionNode
}

/** Any normalized record */
export type DataRecord =
	| PokemonRecord
	| MoveRecord
	| AbilityRecord
	| TypeRecord
	| EvolutionRecord

/** A record read back from the pinned cache, not re-validated */
export type CachedRecord = Record<string, unknown>

/**
 * Result envelope returned by generate().
 * Fresh results carry normalized records; cached ones carry whatever was
 * pinned under the request's fingerprint.
 */
export interface DatasetResult<T = DataRecord> {
	data: T[]
	count: number
	data_type: DataCategory
	/** Where the records came from */
	source: string
	/** True when served from the pinned result cache */
	cached: boolean
	/** Present and true when the result was stored in the pinned cache */
	cache_stored?: boolean
}
