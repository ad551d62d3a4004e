/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                       Diagnostic Logging Middleware                       ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Traces every HTTP exchange through the diagnostic logger: the request on
 * receipt (with the RFD fields that select a dataset) and the status and
 * timing once the response has been sent.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto'
import type { Request, Response, NextFunction } from 'express'
import { diagnostic } from '../utils/logger.js'
import { isRecord } from '../utils/validator.js'

/**
 * Pick the dataset-selecting fields out of a request body.
 */
function describeBody(body: unknown): Record<string, unknown> | undefined {
	if (!isRecord(body)) {
		return undefined
	}

	return {
		rfdId: body.rfd_id,
		dataType: body.data_type ?? body.type ?? body.pokemon_data_type,
		numRecords: body.num_records,
		tool: body.mcp_tool,
	}
}

export function diagnosticLogger(
	req: Request,
	res: Response,
	next: NextFunction
): void {
	const startTime = Date.now()
	const requestId = randomUUID().slice(0, 8)

	diagnostic.trace('HTTP request received', {
		requestId,
		method: req.method,
		path: req.path,
		query: req.query,
		rfd: describeBody(req.body),
	})

	res.on('finish', () => {
		diagnostic.debug('HTTP response sent', {
			requestId,
			method: req.method,
			path: req.path,
			statusCode: res.statusCode,
			responseTime: Date.now() - startTime,
		})
	})

	next()
}
