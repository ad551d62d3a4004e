/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                         Environment Utility Tests                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Tests for environment configuration utilities: sensitive value
 * obfuscation by log level and schema validation.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest'
import { obfuscateSensitiveValue, validateEnv } from '../src/utils/env.js'
import { envSchema } from '../src/config/envSchema.js'

describe('Environment Utilities', () => {
	// Store original LOG_LEVEL to restore after tests
	let originalLogLevel: string | undefined

	beforeEach(() => {
		originalLogLevel = process.env.LOG_LEVEL
	})

	afterEach(() => {
		if (originalLogLevel === undefined) {
			delete process.env.LOG_LEVEL
		} else {
			process.env.LOG_LEVEL = originalLogLevel
		}
	})

	describe('obfuscateSensitiveValue', () => {
		const testValue = 'my-secret-api-key-1234'

		test('should return non-sensitive values unchanged at every level', () => {
			for (const level of ['0', '1', '2', '3', '4', '5', '6']) {
				process.env.LOG_LEVEL = level
				expect(obfuscateSensitiveValue(testValue, false)).toBe(testValue)
			}
		})

		test('should show full value at SILLY level', () => {
			process.env.LOG_LEVEL = '0'

			expect(obfuscateSensitiveValue(testValue, true)).toBe(testValue)
		})

		test('should keep the last 4 characters at TRACE and DEBUG', () => {
			for (const level of ['1', '2']) {
				process.env.LOG_LEVEL = level
				expect(obfuscateSensitiveValue(testValue, true)).toBe('***1234')
			}
			expect(obfuscateSensitiveValue('abc', true)).toBe('***abc')
		})

		test('should fully obfuscate at INFO and above', () => {
			for (const level of ['3', '4', '5', '6']) {
				process.env.LOG_LEVEL = level
				expect(obfuscateSensitiveValue(testValue, true)).toBe('********')
			}
		})

		test('should default to INFO level when LOG_LEVEL is unset', () => {
			delete process.env.LOG_LEVEL

			expect(obfuscateSensitiveValue(testValue, true)).toBe('********')
		})

		test('should fully obfuscate when LOG_LEVEL is not a number', () => {
			process.env.LOG_LEVEL = 'invalid'

			expect(obfuscateSensitiveValue(testValue, true)).toBe('********')
		})
	})

	describe('validateEnv', () => {
		test('should accept an empty environment and apply defaults', () => {
			const result = validateEnv(envSchema, {})

			expect(result.valid).toBe(true)
			expect(result.config).toEqual({
				PORT: 3000,
				LOG_LEVEL: 3,
				DIAGNOSTIC_LOGGER: false,
				POKEAPI_BASE_URL: 'https://pokeapi.co/api/v2',
				PIN_CACHE_TTL_MINUTES: 30,
				PIN_CACHE_UNPIN_EXPIRED: false,
				RATE_LIMIT_ENABLED: true,
				RATE_LIMIT_WINDOW_MS: 60000,
				RATE_LIMIT_MAX: 100,
			})
		})

		test('should transform values', () => {
			const result = validateEnv(envSchema, {
				PIN_CACHE_TTL_MINUTES: '5',
				PIN_CACHE_UNPIN_EXPIRED: 'true',
				POKEAPI_BASE_URL: 'http://localhost:8080/api/v2/',
				RATE_LIMIT_ENABLED: 'false',
			})

			expect(result.valid).toBe(true)
			expect(result.config.PIN_CACHE_TTL_MINUTES).toBe(5)
			expect(result.config.PIN_CACHE_UNPIN_EXPIRED).toBe(true)
			expect(result.config.POKEAPI_BASE_URL).toBe('http://localhost:8080/api/v2')
			expect(result.config.RATE_LIMIT_ENABLED).toBe(false)
		})

		test('should collect an error per invalid variable', () => {
			const result = validateEnv(envSchema, {
				PIN_CACHE_TTL_MINUTES: '0',
				API_BEARER_TOKEN: 'short',
				POKEAPI_BASE_URL: 'not a url',
			})

			expect(result.valid).toBe(false)
			expect(result.errors.map((e) => e.variable)).toEqual([
				'API_BEARER_TOKEN',
				'POKEAPI_BASE_URL',
				'PIN_CACHE_TTL_MINUTES',
			])
		})
	})
})
