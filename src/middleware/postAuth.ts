/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                        POST Method Auth Middleware                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Applies bearer authentication to POST routes. Reads stay public so that
 * health probes and capability discovery need no token.
 *
 * @packageDocumentation
 */

import type { Request, Response, NextFunction } from 'express'
import { bearerAuth } from '../auth.js'

export function protectPostEndpoints(
	req: Request,
	res: Response,
	next: NextFunction
): void {
	if (req.method !== 'POST') {
		next()
		return
	}

	bearerAuth(req, res, next)
}
