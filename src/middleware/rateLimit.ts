/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                          Rate Limiting Middleware                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Express middleware for rate limiting API requests. Counters live in
 * express-rate-limit's in-memory store, matching the node's process-local
 * state; they reset on restart.
 *
 * Requests presenting a Bearer token are counted per token, all others per
 * client IP.
 *
 * @packageDocumentation
 */

import rateLimit, { ipKeyGenerator } from 'express-rate-limit'
import type { Request, RequestHandler } from 'express'
import { getEnvConfig } from '../utils/env.js'
import { logger } from '../utils/logger.js'

/**
 * Explicit limits, overriding the environment
 * @public
 */
export interface RateLimitConfig {
	max: number
	windowMs: number
}

/**
 * Rate limit key: the token prefix when a Bearer token is present,
 * otherwise the IPv6-safe client address.
 * @internal
 */
export function generateRateLimitKey(req: Request): string {
	const authHeader = req.headers.authorization

	if (authHeader && typeof authHeader === 'string') {
		const [scheme, token] = authHeader.split(' ')
		if (scheme === 'Bearer' && token) {
			return `token:${token.substring(0, 16)}`
		}
	}

	const ip = req.ip || req.socket.remoteAddress || 'unknown'
	return `ip:${ipKeyGenerator(String(ip))}`
}

/**
 * Creates the rate limiter middleware.
 *
 * @param override - Limits to use instead of RATE_LIMIT_MAX / RATE_LIMIT_WINDOW_MS
 * @returns Rate limit middleware, or a pass-through when RATE_LIMIT_ENABLED is false
 *
 * @example
 * ```typescript
 * app.use(createRateLimiter())
 * app.use(createRateLimiter({ max: 5, windowMs: 1000 }))
 * ```
 *
 * @public
 */
export function createRateLimiter(override?: RateLimitConfig): RequestHandler {
	const config = getEnvConfig()

	if (!config.RATE_LIMIT_ENABLED) {
		logger.info('⚠️  Rate limiting is disabled (RATE_LIMIT_ENABLED=false)')
		return (_req, _res, next) => next()
	}

	const max = override?.max ?? config.RATE_LIMIT_MAX
	const windowMs = override?.windowMs ?? config.RATE_LIMIT_WINDOW_MS

	logger.debug(`Rate limiter created: ${max} requests per ${windowMs}ms`)

	return rateLimit({
		windowMs,
		limit: max,
		standardHeaders: true,
		legacyHeaders: false,
		keyGenerator: generateRateLimitKey,
		handler: (req, res) => {
			logger.warn('Rate limit exceeded', {
				key: generateRateLimitKey(req),
				path: req.path,
				method: req.method,
			})
			res.status(429).json({
				error: 'Too many requests',
				message: 'Rate limit exceeded. Please try again later.',
				retryAfter: Math.ceil(windowMs / 1000),
			})
		},
	})
}
