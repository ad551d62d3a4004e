/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                          Request Type Definitions                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Request-for-data (RFD) descriptors as they arrive on the wire, and the
 * validated struct the generator works with.
 *
 * @packageDocumentation
 */

/** Data categories the generator can produce */
export const DATA_CATEGORIES = [
	'pokemon',
	'moves',
	'abilities',
	'types',
	'evolution',
] as const

export type DataCategory = (typeof DATA_CATEGORIES)[number]

/**
 * Request descriptor as received from callers.
 * Every field is optional; unrecognized keys are ignored.
 */
export interface RawDataRequest {
	/** Identifier used when writing the dataset to disk */
	rfd_id?: unknown
	/** Free-text request name */
	name?: unknown
	/** Free-text request description */
	description?: unknown
	/** Category to generate */
	data_type?: unknown
	/** Alias of data_type */
	type?: unknown
	/** Alias of data_type */
	pokemon_data_type?: unknown
	/** Tool that should serve the request */
	mcp_tool?: unknown
	num_records?: unknown
	pokemon_names?: unknown
	pokemon_ids?: unknown
	generation?: unknown
	type_filter?: unknown
	include_stats?: unknown
	include_abilities?: unknown
	include_moves?: unknown
	[key: string]: unknown
}

/**
 * Validated request with defaults applied.
 */
export interface DataRequest {
	category: DataCategory
	/** Desired number of records (default 10) */
	count: number
	/** Explicit Pokémon names, highest priority target list */
	names: string[]
	/** Explicit Pokémon ids, used when no names are given */
	ids: number[]
	/** Generation whose id range is used when no names or ids are given */
	generation?: number
	/** Keep only Pokémon having this type (case-insensitive) */
	typeFilter?: string
	/** Attach base stats (default true) */
	includeStats: boolean
	/** Attach abilities (default true) */
	includeAbilities: boolean
	/** Attach the first moves (default false) */
	includeMoves: boolean
	/** Identifier used for dataset output */
	rfdId?: string
}
