/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                         Test Fixtures & Constants                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Builders for PokéAPI-shaped resources used across test suites.
 * Values are made up; only the shapes follow the API.
 */

import { TYPE_NAMES } from '../../src/config/pokeApiConfig.js'

export const TEST_BEARER_TOKEN = 'test-secret-token-for-integration-tests'

const ref = (name: string) => ({ name, url: `http://pokeapi.test/${name}/` })

export interface PokemonFixtureOptions {
	types?: string[]
	baseExperience?: number | null
	moveCount?: number
}

export function pokemonResource(
	id: number,
	name: string,
	options: PokemonFixtureOptions = {}
) {
	const types = options.types ?? ['normal']
	const moveCount = options.moveCount ?? 2

	return {
		id,
		name,
		height: id * 2,
		weight: id * 10,
		base_experience:
			options.baseExperience === undefined ? 50 + id : options.baseExperience,
		types: types.map((type, index) => ({ slot: index + 1, type: ref(type) })),
		stats: [
			{ base_stat: 40 + id, stat: ref('hp') },
			{ base_stat: 50 + id, stat: ref('attack') },
			{ base_stat: 30 + id, stat: ref('defense') },
		],
		abilities: [
			{ ability: ref(`${name}-ability`), is_hidden: false, slot: 1 },
			{ ability: ref(`${name}-hidden`), is_hidden: true, slot: 3 },
		],
		moves: Array.from({ length: moveCount }, (_, index) => ({
			move: ref(`${name}-move-${index + 1}`),
			version_group_details:
				index === 0 ? [] : [{ move_learn_method: ref('level-up') }],
		})),
		// Fields the normalizer ignores
		order: id,
		is_default: true,
	}
}

export function moveResource(id: number) {
	return {
		id,
		name: `move-${id}`,
		power: id % 2 === 0 ? 40 + id : null,
		pp: 20,
		accuracy: 100,
		priority: 0,
		type: ref('normal'),
		damage_class: ref(id % 2 === 0 ? 'physical' : 'status'),
		effect_chance: null,
	}
}

export function abilityResource(id: number) {
	return {
		id,
		name: `ability-${id}`,
		is_main_series: true,
		generation: ref('generation-iii'),
		effect_entries: [
			{ short_effect: `Effect of ability ${id}.`, language: ref('en') },
			{ short_effect: `Wirkung ${id}.`, language: ref('de') },
		],
	}
}

export function typeResource(index: number) {
	const name = TYPE_NAMES[index]
	const next = TYPE_NAMES[(index + 1) % TYPE_NAMES.length]

	return {
		id: index + 1,
		name,
		damage_relations: {
			double_damage_to: [ref(next)],
			half_damage_to: [],
			no_damage_to: [],
			double_damage_from: [],
			half_damage_from: [ref(name)],
			no_damage_from: [],
		},
	}
}

interface ChainLinkFixture {
	species: { name: string; url: string }
	evolution_details: Array<{
		min_level: number | null
		trigger: { name: string; url: string }
	}>
	evolves_to: ChainLinkFixture[]
}

/**
 * A linear chain of species, each evolving into the next at
 * level 10 * depth.
 */
export function linearChain(species: string[]): ChainLinkFixture {
	const build = (depth: number): ChainLinkFixture => ({
		species: ref(species[depth]),
		evolution_details:
			depth === 0
				? []
				: [{ min_level: depth * 10, trigger: ref('level-up') }],
		evolves_to: depth + 1 < species.length ? [build(depth + 1)] : [],
	})

	return build(0)
}

export function evolutionChainResource(id: number, species: string[]) {
	return {
		id,
		baby_trigger_item: null,
		chain: linearChain(species),
	}
}
