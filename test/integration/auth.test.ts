/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                      Authentication Integration Tests                     ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bearer token protection of POST endpoints, with and without a
 * configured token.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest'
import type { Server } from 'http'
import {
	createTestNode,
	startTestServer,
	stopTestServer,
	post,
	get,
} from '../helpers/testServer.js'
import { getEnvConfig, setEnvConfigCache } from '../../src/utils/env.js'

const POST_ENDPOINTS = ['/generate', '/validate', '/cache/clear']
const GET_ENDPOINTS = ['/health', '/info', '/cache/stats']

describe('Authentication Middleware', () => {
	let server: Server
	let baseURL: string
	const config = getEnvConfig()

	beforeAll(async () => {
		const testServer = await startTestServer(createTestNode())
		server = testServer.server
		baseURL = testServer.baseURL
	})

	afterAll(async () => {
		await stopTestServer(server)
	})

	afterEach(() => {
		setEnvConfigCache(config)
	})

	it('should allow POST requests with the configured token', async () => {
		const response = await post(baseURL, '/validate', { data_type: 'types' })

		expect(response.status).toBe(200)
	})

	it('should reject POST requests without an Authorization header', async () => {
		for (const path of POST_ENDPOINTS) {
			const response = await fetch(`${baseURL}${path}`, { method: 'POST' })

			expect(response.status).toBe(401)
			expect(await response.json()).toEqual({
				error: 'Missing Authorization header',
			})
		}
	})

	it('should reject POST requests with a wrong token', async () => {
		const response = await post(
			baseURL,
			'/validate',
			{ data_type: 'types' },
			{ Authorization: 'Bearer wrong-token' }
		)

		expect(response.status).toBe(403)
		expect(await response.json()).toEqual({ error: 'Invalid or missing token' })
	})

	it('should reject a non-Bearer scheme', async () => {
		const response = await post(
			baseURL,
			'/validate',
			{ data_type: 'types' },
			{ Authorization: `Basic ${config.API_BEARER_TOKEN}` }
		)

		expect(response.status).toBe(403)
	})

	it('should leave GET endpoints public', async () => {
		for (const path of GET_ENDPOINTS) {
			const response = await get(baseURL, path)

			expect(response.status).toBe(200)
		}
	})

	it('should leave POST endpoints open when no token is configured', async () => {
		setEnvConfigCache({ ...config, API_BEARER_TOKEN: undefined })

		const response = await fetch(`${baseURL}/validate`, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ data_type: 'types' }),
		})

		expect(response.status).toBe(200)
		expect(await response.json()).toEqual({ valid: true })
	})
})
