/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                               Route Handlers                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Route table for the node's HTTP surface.
 *
 * Route groups:
 * - /health - Liveness probe
 * - /info - Tool metadata and capabilities
 * - /generate - Dataset generation
 * - /validate - Descriptor validation
 * - /cache - Pinned result cache statistics and sweep
 *
 * Note: POST routes are protected by bearer auth middleware applied globally.
 *
 * @packageDocumentation
 */

import { Router } from 'express'
import type { Controllers } from './controllers.js'
import type { RouteMount } from './types/routes.js'

/**
 * Route mount configuration
 *
 * Single source of truth for all route mounts. Used by:
 * - app.ts to mount routes on the Express app
 * - logger.ts to display available endpoints
 *
 * @public
 */
export function createRouteMounts(controllers: Controllers): RouteMount[] {
	const {
		healthCheck,
		getInfo,
		generateDataset,
		validateDataset,
		getCacheStats,
		clearExpiredCache,
	} = controllers

	return [
		{
			basePath: '/health',
			router: Router().get('/', healthCheck),
		},
		{
			basePath: '/info',
			router: Router().get('/', getInfo),
		},
		{
			basePath: '/generate',
			router: Router().post('/', generateDataset),
		},
		{
			basePath: '/validate',
			router: Router().post('/', validateDataset),
		},
		{
			basePath: '/cache',
			router: Router()
				.get('/stats', getCacheStats)
				.post('/clear', clearExpiredCache),
		},
	]
}
