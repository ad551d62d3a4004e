/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                         Pinned Result Cache Tests                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { describe, test, expect, beforeEach } from 'vitest'
import { PinCache } from '../src/utils/pinCache.js'
import { fingerprintRequest } from '../src/utils/fingerprint.js'
import { InMemoryPinningService } from './helpers/fakes.js'

const request = { category: 'pokemon' as const, count: 3, generation: 1 }
const result = { data: [{ id: 1, name: 'bulbasaur' }], count: 1 }

describe('PinCache', () => {
	let now: number
	let pinning: InMemoryPinningService
	let cache: PinCache

	beforeEach(() => {
		now = 1_700_000_000_000
		pinning = new InMemoryPinningService()
		cache = new PinCache(pinning, { ttlMinutes: 30, now: () => now })
	})

	test('should miss when nothing has been stored', async () => {
		await expect(cache.lookup(request)).resolves.toBeNull()
		expect(pinning.retrieveCount).toBe(0)
	})

	test('should return the stored result for the same request', async () => {
		await expect(cache.store(request, result)).resolves.toBe(true)

		await expect(cache.lookup(request)).resolves.toEqual(result)
	})

	test('should pin a timestamped payload tagged with the fingerprint', async () => {
		await cache.store(request, result)

		expect(pinning.pins.get('cid-1')).toEqual({
			content: {
				timestamp: 1_700_000_000,
				cache_key: 'b7d1deecb638b095',
				data: result,
			},
			metadata: {
				name: 'pokemon_cache_b7d1deecb638b095',
				keyvalues: { type: 'pokemon_cache', cache_key: 'b7d1deecb638b095' },
			},
		})
	})

	test('should hit for a request differing only in list order', async () => {
		await cache.store({ names: ['pikachu', 'eevee'] }, result)

		await expect(cache.lookup({ names: ['eevee', 'pikachu'] })).resolves.toEqual(
			result
		)
	})

	test('should still hit exactly at the TTL', async () => {
		await cache.store(request, result)
		now += 30 * 60_000

		await expect(cache.lookup(request)).resolves.toEqual(result)
	})

	test('should evict and miss one second past the TTL', async () => {
		await cache.store(request, result)
		now += 30 * 60_000 + 1000

		await expect(cache.lookup(request)).resolves.toBeNull()
		expect(pinning.retrieveCount).toBe(0)
		expect(cache.stats().total).toBe(0)
	})

	test('should evict an entry whose content cannot be retrieved', async () => {
		await cache.store(request, result)
		pinning.failRetrievals = true

		await expect(cache.lookup(request)).resolves.toBeNull()
		expect(cache.stats().total).toBe(0)

		pinning.failRetrievals = false
		await expect(cache.lookup(request)).resolves.toBeNull()
		expect(pinning.retrieveCount).toBe(1)
	})

	test('should evict an entry whose payload carries no data', async () => {
		await cache.store(request, result)
		pinning.pins.set('cid-1', {
			content: 'not a payload',
			metadata: { name: 'pokemon_cache_b7d1deecb638b095', keyvalues: {} },
		})

		await expect(cache.lookup(request)).resolves.toBeNull()
		await expect(cache.lookup(request)).resolves.toBeNull()
		expect(pinning.retrieveCount).toBe(1)
		expect(cache.stats().total).toBe(0)
	})

	test('should forget an entry on evict', async () => {
		await cache.store(request, result)

		expect(cache.evict(request)).toBe(true)
		expect(cache.evict(request)).toBe(false)
		await expect(cache.lookup(request)).resolves.toBeNull()
		expect(pinning.retrieveCount).toBe(0)
	})

	test('should report a failed upload and keep no entry', async () => {
		pinning.failPins = true

		await expect(cache.store(request, result)).resolves.toBe(false)
		expect(cache.stats().total).toBe(0)
	})

	test('should overwrite the entry on a second store', async () => {
		await cache.store(request, { data: [], count: 0 })
		await cache.store(request, result)

		await expect(cache.lookup(request)).resolves.toEqual(result)
		expect(cache.stats().total).toBe(1)
	})

	describe('without credentials', () => {
		test('should decline to store and always miss', async () => {
			const disabled = new PinCache(new InMemoryPinningService(false))

			await expect(disabled.store(request, result)).resolves.toBe(false)
			await expect(disabled.lookup(request)).resolves.toBeNull()
			expect(disabled.stats()).toEqual({
				total: 0,
				valid: 0,
				expired: 0,
				ttlSeconds: 1800,
				available: false,
			})
		})
	})

	describe('stats and sweep', () => {
		test('should count valid and expired entries', async () => {
			await cache.store(request, result)
			now += 20 * 60_000
			await cache.store({ category: 'types' }, result)
			now += 15 * 60_000

			expect(cache.stats()).toEqual({
				total: 2,
				valid: 1,
				expired: 1,
				ttlSeconds: 1800,
				available: true,
			})
		})

		test('should sweep expired entries and keep pins by default', async () => {
			await cache.store(request, result)
			now += 31 * 60_000

			await expect(cache.sweepExpired()).resolves.toBe(1)
			expect(cache.stats().total).toBe(0)
			expect(pinning.unpinned).toEqual([])
		})

		test('should unpin swept entries when configured', async () => {
			const unpinning = new PinCache(pinning, {
				ttlMinutes: 1,
				now: () => now,
				unpinExpired: true,
			})
			await unpinning.store(request, result)
			await unpinning.store({ category: 'moves' }, result)
			now += 61_000

			await expect(unpinning.sweepExpired()).resolves.toBe(2)
			expect(pinning.unpinned).toEqual(['cid-1', 'cid-2'])
			expect(pinning.pins.size).toBe(0)
		})

		test('should return 0 when nothing has expired', async () => {
			await cache.store(request, result)

			await expect(cache.sweepExpired()).resolves.toBe(0)
		})
	})

	test('should key entries by request fingerprint', async () => {
		await cache.store(request, result)

		const payload = await pinning.retrieve('cid-1')
		expect(payload).toMatchObject({ cache_key: fingerprintRequest(request) })
	})
})
