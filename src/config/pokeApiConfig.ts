/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           PokéAPI Configuration                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Endpoints, timeouts and static lookup tables used when reading PokéAPI.
 *
 * @packageDocumentation
 */

/** Public PokéAPI v2 endpoint */
export const DEFAULT_POKEAPI_BASE_URL = 'https://pokeapi.co/api/v2'

/** Timeout for a single PokéAPI read */
export const POKEAPI_TIMEOUT_MS = 10_000

/** Pause after every network read to stay polite to the public API */
export const POKEAPI_REQUEST_DELAY_MS = 100

/** Largest num_records a request may ask for */
export const MAX_RECORDS = 1000

/** Records produced when a request does not say */
export const DEFAULT_RECORD_COUNT = 10

/** Moves and abilities are read from ids 1..100 at most */
export const MAX_SEQUENTIAL_RECORDS = 100

/** Evolution chains are read from ids 1..50 at most */
export const MAX_EVOLUTION_CHAINS = 50

/** Recursion limit when parsing an evolution chain tree */
export const MAX_EVOLUTION_DEPTH = 8

/** Moves kept per Pokémon record */
export const MAX_MOVES_PER_POKEMON = 10

/** Highest id of the default (no generation) window */
export const DEFAULT_POKEMON_RANGE_END = 151

/**
 * National dex id range per generation, inclusive on both ends.
 * Unknown generations fall back to generation 1.
 */
export const GENERATION_RANGES: Readonly<
	Record<number, readonly [start: number, end: number]>
> = {
	1: [1, 151],
	2: [152, 251],
	3: [252, 386],
	4: [387, 493],
	5: [494, 649],
	6: [650, 721],
	7: [722, 809],
	8: [810, 905],
	9: [906, 1010],
}

/** The 18 main types, in the order type records are emitted */
export const TYPE_NAMES = [
	'normal',
	'fire',
	'water',
	'electric',
	'grass',
	'ice',
	'fighting',
	'poison',
	'ground',
	'flying',
	'psychic',
	'bug',
	'rock',
	'ghost',
	'dragon',
	'dark',
	'steel',
	'fairy',
] as const

/** Source label on freshly generated results */
export const POKEAPI_SOURCE = 'PokéAPI via direct requests'

/** Source label on results served from the pinned cache */
export const PIN_CACHE_SOURCE = 'IPFS Cache via Pinata'
