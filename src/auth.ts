/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Authentication Module                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bearer token authentication middleware for protecting POST endpoints.
 * When API_BEARER_TOKEN is unset the node runs open and every request passes.
 *
 * @packageDocumentation
 */

import type { Request, Response, NextFunction } from 'express'
import { diagnostic } from './utils/logger.js'
import { getEnvConfig } from './utils/env.js'

/**
 * Middleware to protect endpoints with Bearer token authorization.
 * Expects Authorization: Bearer <token> header matching API_BEARER_TOKEN.
 */
export function bearerAuth(req: Request, res: Response, next: NextFunction) {
	const { API_BEARER_TOKEN } = getEnvConfig()

	if (!API_BEARER_TOKEN) {
		next()
		return
	}

	const startTime = Date.now()
	const authHeader = req.headers['authorization']

	if (!authHeader || typeof authHeader !== 'string') {
		diagnostic.debug('Auth failed - missing header', {
			path: req.path,
			method: req.method,
			hasAuthHeader: !!authHeader,
		})
		res.status(401).json({ error: 'Missing Authorization header' })
		return
	}

	const [scheme, token] = authHeader.split(' ')
	const tokenValid = scheme === 'Bearer' && token === API_BEARER_TOKEN

	diagnostic.trace('Bearer auth check', {
		path: req.path,
		method: req.method,
		scheme,
		authTime: Date.now() - startTime,
		authenticated: tokenValid,
	})

	if (!tokenValid) {
		diagnostic.info('Auth failed - invalid token', {
			path: req.path,
			method: req.method,
			scheme,
			tokenLength: token?.length || 0,
		})
		res.status(403).json({ error: 'Invalid or missing token' })
		return
	}

	next()
}
