/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                     Service Endpoint Integration Tests                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Health, metadata and cache statistics endpoints.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import type { Server } from 'http'
import {
	createTestNode,
	startTestServer,
	stopTestServer,
	get,
} from '../helpers/testServer.js'

describe('Service Endpoints', () => {
	let server: Server
	let baseURL: string

	beforeAll(async () => {
		const testServer = await startTestServer(createTestNode())
		server = testServer.server
		baseURL = testServer.baseURL
	})

	afterAll(async () => {
		await stopTestServer(server)
	})

	it('GET /health should report a healthy node', async () => {
		const response = await get(baseURL, '/health')

		expect(response.status).toBe(200)
		expect(await response.json()).toMatchObject({ status: 'healthy' })
	})

	it('GET /info should describe the pokemon tool', async () => {
		const response = await get(baseURL, '/info')

		expect(response.status).toBe(200)
		expect(await response.json()).toMatchObject({
			tools: ['pokemon'],
			name: 'pokemon',
			capabilities: {
				data_types: ['pokemon', 'moves', 'abilities', 'types', 'evolution'],
				output_format: 'json',
				max_records: 1000,
			},
			cacheAvailable: true,
		})
	})

	it('GET /cache/stats should report an empty cache', async () => {
		const response = await get(baseURL, '/cache/stats')

		expect(response.status).toBe(200)
		expect(await response.json()).toEqual({
			total: 0,
			valid: 0,
			expired: 0,
			ttlSeconds: 1800,
			available: true,
		})
	})

	it('should answer 404 for unknown routes', async () => {
		const response = await get(baseURL, '/bundle')

		expect(response.status).toBe(404)
	})
})
