/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Request Fingerprinting                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Deterministic short identifiers for requests, used as pinned cache keys.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto'
import { FINGERPRINT_LENGTH } from '../config/cacheSettings.js'
import { DEFAULT_RECORD_COUNT } from '../config/pokeApiConfig.js'
import type { DataRequest } from '../types/request.js'

/**
 * Serialize a value as JSON with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
	return JSON.stringify(value, (_key, val: unknown) => {
		if (val === null || typeof val !== 'object' || Array.isArray(val)) {
			return val
		}
		const sorted: Record<string, unknown> = {}
		for (const key of Object.keys(val).sort()) {
			sorted[key] = Reflect.get(val, key)
		}
		return sorted
	})
}

/**
 * Derive the cache fingerprint of a request.
 *
 * Only nine fields take part, each defaulted when absent; names and ids are
 * sorted so their order does not matter, and an absent generation or type
 * filter is dropped rather than encoded. Free-text fields never contribute.
 *
 * @example
 * ```ts
 * fingerprintRequest({ category: 'types' })
 * // 16 hex chars, identical for every request differing only in free text
 * ```
 */
export function fingerprintRequest(request: Partial<DataRequest>): string {
	const relevant: Record<string, unknown> = {
		data_type: request.category ?? 'pokemon',
		num_records: request.count ?? DEFAULT_RECORD_COUNT,
		pokemon_names: [...(request.names ?? [])].sort(),
		pokemon_ids: [...(request.ids ?? [])].sort((a, b) => a - b),
		include_stats: request.includeStats ?? true,
		include_abilities: request.includeAbilities ?? true,
		include_moves: request.includeMoves ?? false,
	}

	if (request.generation !== undefined) {
		relevant.generation = request.generation
	}
	if (request.typeFilter !== undefined) {
		relevant.type_filter = request.typeFilter
	}

	return createHash('sha256')
		.update(canonicalJson(relevant))
		.digest('hex')
		.slice(0, FINGERPRINT_LENGTH)
}
