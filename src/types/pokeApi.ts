/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                          PokéAPI Response Schemas                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * zod schemas for the subset of PokéAPI resources the normalizers read.
 * Optional fields are nullish because the API omits or nulls them freely.
 *
 * @packageDocumentation
 */

import { z } from 'zod'

/** `{ name, url }` reference used throughout PokéAPI */
export const NamedResourceSchema = z.object({
	name: z.string(),
	url: z.string().optional(),
})

export type NamedResource = z.infer<typeof NamedResourceSchema>

// Pokémon resource (/pokemon/{id or name})
export const PokemonSchema = z.object({
	id: z.number(),
	name: z.string(),
	height: z.number(),
	weight: z.number(),
	base_experience: z.number().nullish(),
	types: z.array(
		z.object({
			slot: z.number().optional(),
			type: NamedResourceSchema,
		})
	),
	stats: z.array(
		z.object({
			base_stat: z.number(),
			stat: NamedResourceSchema,
		})
	),
	abilities: z.array(
		z.object({
			ability: NamedResourceSchema,
			is_hidden: z.boolean(),
			slot: z.number(),
		})
	),
	moves: z.array(
		z.object({
			move: NamedResourceSchema,
			version_group_details: z.array(
				z.object({
					move_learn_method: NamedResourceSchema,
				})
			),
		})
	),
})

export type PokemonResource = z.infer<typeof PokemonSchema>

// Move resource (/move/{id})
export const MoveSchema = z.object({
	id: z.number(),
	name: z.string(),
	power: z.number().nullish(),
	pp: z.number().nullish(),
	accuracy: z.number().nullish(),
	priority: z.number().nullish(),
	type: NamedResourceSchema.nullish(),
	damage_class: NamedResourceSchema.nullish(),
	effect_chance: z.number().nullish(),
})

export type MoveResource = z.infer<typeof MoveSchema>

// Ability resource (/ability/{id})
export const AbilitySchema = z.object({
	id: z.number(),
	name: z.string(),
	is_main_series: z.boolean().nullish(),
	generation: NamedResourceSchema.nullish(),
	effect_entries: z
		.array(
			z.object({
				short_effect: z.string(),
				language: NamedResourceSchema.optional(),
			})
		)
		.nullish(),
})

export type AbilityResource = z.infer<typeof AbilitySchema>

// Type resource (/type/{name})
export const TypeSchema = z.object({
	id: z.number(),
	name: z.string(),
	damage_relations: z.object({
		double_damage_to: z.array(NamedResourceSchema),
		half_damage_to: z.array(NamedResourceSchema),
		no_damage_to: z.array(NamedResourceSchema),
		double_damage_from: z.array(NamedResourceSchema),
		half_damage_from: z.array(NamedResourceSchema),
		no_damage_from: z.array(NamedResourceSchema),
	}),
})

export type TypeResource = z.infer<typeof TypeSchema>

/** One link of an evolution chain; children nest recursively */
export interface ChainLink {
	species: NamedResource
	evolution_details: Array<{
		min_level?: number | null
		trigger?: NamedResource | null
	}>
	evolves_to: ChainLink[]
}

export const ChainLinkSchema: z.ZodType<ChainLink> = z.lazy(() =>
	z.object({
		species: NamedResourceSchema,
		evolution_details: z.array(
			z.object({
				min_level: z.number().nullish(),
				trigger: NamedResourceSchema.nullish(),
			})
		),
		evolves_to: z.array(ChainLinkSchema),
	})
)

// Evolution chain resource (/evolution-chain/{id})
export const EvolutionChainSchema = z.object({
	id: z.number(),
	baby_trigger_item: NamedResourceSchema.nullish(),
	chain: ChainLinkSchema,
})

export type EvolutionChainResource = z.infer<typeof EvolutionChainSchema>
