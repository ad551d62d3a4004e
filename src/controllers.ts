/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                             Route Controllers                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Express handlers for dataset generation, request validation, cache
 * maintenance and service metadata. Handlers are built around the node's
 * tool registry and generator so the app can be assembled with fakes.
 *
 * @packageDocumentation
 */

import type { Request, Response } from 'express'
import { GenerationError, type DataGenerator } from './generator.js'
import { createLogger, diagnostic } from './utils/logger.js'
import { handleValidationError, ValidationError } from './utils/validator.js'
import type { ToolRegistry } from './utils/registry.js'

/** Logger instance for controllers module */
const logger = createLogger('Controller')

/** Service version reported by /info */
const NODE_VERSION = '0.1.0'

export interface ControllerDependencies {
	registry: ToolRegistry
	generator: DataGenerator
}

export type Handler = (req: Request, res: Response) => Promise<void>

export interface Controllers {
	healthCheck: Handler
	getInfo: Handler
	generateDataset: Handler
	validateDataset: Handler
	getCacheStats: Handler
	clearExpiredCache: Handler
}

export function createControllers({
	registry,
	generator,
}: ControllerDependencies): Controllers {
	/**
	 * GET /health
	 * Liveness probe.
	 */
	const healthCheck: Handler = async (_req, res) => {
		res.status(200).json({
			status: 'healthy',
			uptime: Math.floor(process.uptime()),
		})
	}

	/**
	 * GET /info
	 * Tool metadata and capabilities.
	 */
	const getInfo: Handler = async (_req, res) => {
		const uptime = process.uptime()

		res.status(200).json({
			version: NODE_VERSION,
			uptime: Math.floor(uptime),
			nodeStarted: new Date(Date.now() - uptime * 1000).toISOString(),
			tools: registry.list(),
			name: generator.name,
			description: generator.description,
			capabilities: generator.capabilities,
			cacheAvailable: generator.getCacheStats().available,
		})
	}

	/**
	 * POST /generate
	 * Produces the dataset described by the request body.
	 * 400 on an invalid descriptor, 500 when generation fails.
	 */
	const generateDataset: Handler = async (req, res) => {
		const startTime = Date.now()

		try {
			const { result, outputPath } = await registry.solve(req.body)

			diagnostic.info('Dataset generated', {
				dataType: result.data_type,
				count: result.count,
				cached: result.cached,
				processingTime: Date.now() - startTime,
			})

			res
				.status(200)
				.json(outputPath ? { ...result, output_path: outputPath } : result)
		} catch (error) {
			if (
				error instanceof GenerationError &&
				error.cause instanceof ValidationError
			) {
				const errorResponse = handleValidationError(error.cause)
				diagnostic.debug('Request validation failed', errorResponse)
				res.status(errorResponse.status).json(errorResponse)
				return
			}

			if (error instanceof GenerationError) {
				logger.error(error.message)
				res.status(500).json({ error: error.message })
				return
			}

			logger.error('Unexpected error generating dataset:', error)
			res.status(500).json({ error: 'Internal Server Error' })
		}
	}

	/**
	 * POST /validate
	 * Reports whether a descriptor would be accepted.
	 */
	const validateDataset: Handler = async (req, res) => {
		res.status(200).json({ valid: registry.validate(req.body) })
	}

	/**
	 * GET /cache/stats
	 */
	const getCacheStats: Handler = async (_req, res) => {
		res.status(200).json(generator.getCacheStats())
	}

	/**
	 * POST /cache/clear
	 * Sweeps expired entries from the pinned result cache.
	 */
	const clearExpiredCache: Handler = async (_req, res) => {
		try {
			const cleared = await generator.clearExpiredCache()
			res.status(200).json({ cleared })
		} catch (error) {
			logger.error('Error clearing expired cache entries:', error)
			res.status(500).json({ error: 'Internal Server Error' })
		}
	}

	return {
		healthCheck,
		getInfo,
		generateDataset,
		validateDataset,
		getCacheStats,
		clearExpiredCache,
	}
}
