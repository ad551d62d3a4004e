/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                            Cache Utility Tests                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Unit tests for the generic cache utility: TTL expiry on a controlled
 * clock, the size bound, statistics and pruning.
 */

import { describe, test, expect, beforeEach } from 'vitest'
import { Cache } from '../src/utils/cache.js'

describe('Cache Utility', () => {
	let now: number
	const clock = () => now

	beforeEach(() => {
		now = 1_000_000
	})

	describe('Basic Operations', () => {
		test('should store and retrieve values', () => {
			const cache = new Cache<string>(1000, { now: clock })

			cache.set('key1', 'value1')
			cache.set('key2', 'value2')

			expect(cache.get('key1')).toBe('value1')
			expect(cache.get('key2')).toBe('value2')
			expect(cache.size).toBe(2)
		})

		test('should return undefined for non-existent keys', () => {
			const cache = new Cache<string>(1000)

			expect(cache.get('nonexistent')).toBeUndefined()
		})

		test('should overwrite existing keys', () => {
			const cache = new Cache<string>(1000)

			cache.set('key', 'value1')
			cache.set('key', 'value2')

			expect(cache.get('key')).toBe('value2')
			expect(cache.size).toBe(1)
		})

		test('should refuse undefined values', () => {
			const cache = new Cache<string | undefined>(1000)

			expect(() => cache.set('key', undefined)).toThrow(
				'Cannot cache undefined values'
			)
		})

		test('should keep null as a cacheable value', () => {
			const cache = new Cache<string | null>(1000)

			cache.set('null', null)

			expect(cache.get('null')).toBeNull()
			expect(cache.has('null')).toBe(true)
		})

		test('should delete single entries', () => {
			const cache = new Cache<string>(1000)

			cache.set('key', 'value')

			expect(cache.delete('key')).toBe(true)
			expect(cache.delete('key')).toBe(false)
			expect(cache.get('key')).toBeUndefined()
		})
	})

	describe('TTL (Time-To-Live)', () => {
		test('should keep an entry whose age equals the TTL', () => {
			const cache = new Cache<string>(1000, { now: clock })

			cache.set('key', 'value')
			now += 1000

			expect(cache.get('key')).toBe('value')
		})

		test('should expire an entry once its age exceeds the TTL', () => {
			const cache = new Cache<string>(1000, { now: clock })

			cache.set('key', 'value')
			now += 1001

			expect(cache.get('key')).toBeUndefined()
			expect(cache.size).toBe(0)
		})

		test('should restart the TTL when a key is overwritten', () => {
			const cache = new Cache<string>(1000, { now: clock })

			cache.set('key', 'old')
			now += 800
			cache.set('key', 'new')
			now += 800

			expect(cache.get('key')).toBe('new')
		})

		test('has() should report expired entries as missing', () => {
			const cache = new Cache<string>(50, { now: clock })

			cache.set('key', 'value')
			expect(cache.has('key')).toBe(true)

			now += 51
			expect(cache.has('key')).toBe(false)
		})
	})

	describe('Size bound', () => {
		test('should evict the oldest insertion when full', () => {
			const cache = new Cache<number>(10_000, { maxEntries: 3, now: clock })

			cache.set('a', 1)
			cache.set('b', 2)
			cache.set('c', 3)
			cache.set('d', 4)

			expect(cache.size).toBe(3)
			expect(cache.get('a')).toBeUndefined()
			expect(cache.get('d')).toBe(4)
		})

		test('should treat an overwritten key as the newest insertion', () => {
			const cache = new Cache<number>(10_000, { maxEntries: 2 })

			cache.set('a', 1)
			cache.set('b', 2)
			cache.set('a', 10)
			cache.set('c', 3)

			expect(cache.get('b')).toBeUndefined()
			expect(cache.get('a')).toBe(10)
			expect(cache.get('c')).toBe(3)
		})
	})

	describe('clear() method', () => {
		test('should clear valid and expired entries alike', () => {
			const cache = new Cache<string>(50, { now: clock })

			cache.set('key1', 'value1')
			now += 60
			cache.set('key2', 'value2')

			expect(cache.clear()).toBe(2)
			expect(cache.size).toBe(0)
		})

		test('should return 0 when clearing empty cache', () => {
			expect(new Cache<string>(1000).clear()).toBe(0)
		})
	})

	describe('getStats() method', () => {
		test('should return correct statistics for empty cache', () => {
			const cache = new Cache<string>(1000)

			expect(cache.getStats()).toEqual({
				total: 0,
				valid: 0,
				expired: 0,
				ttlMs: 1000,
			})
		})

		test('should split valid and expired entries without evicting', () => {
			const cache = new Cache<string>(50, { now: clock })

			cache.set('key1', 'value1')
			cache.set('key2', 'value2')
			now += 60
			cache.set('key3', 'value3')

			expect(cache.getStats()).toEqual({
				total: 3,
				valid: 1,
				expired: 2,
				ttlMs: 50,
			})
			expect(cache.size).toBe(3)
		})
	})

	describe('prune() method', () => {
		test('should remove only expired entries', () => {
			const cache = new Cache<string>(50, { now: clock })

			cache.set('expired1', 'value1')
			cache.set('expired2', 'value2')
			now += 60
			cache.set('fresh', 'value3')

			expect(cache.prune()).toBe(2)
			expect(cache.get('expired1')).toBeUndefined()
			expect(cache.get('fresh')).toBe('value3')
		})

		test('should report each evicted entry', () => {
			const cache = new Cache<string>(50, { now: clock })
			const evicted: Array<[string, string]> = []

			cache.set('a', 'cid-a')
			cache.set('b', 'cid-b')
			now += 60

			cache.prune((key, value) => evicted.push([key, value]))

			expect(evicted).toEqual([
				['a', 'cid-a'],
				['b', 'cid-b'],
			])
		})

		test('should return 0 when nothing has expired', () => {
			const cache = new Cache<string>(1000)

			cache.set('key1', 'value1')

			expect(cache.prune()).toBe(0)
		})
	})
})
