/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                         Graceful Shutdown Utility                         ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Closes the HTTP server and runs cleanup handlers before the process
 * exits on SIGTERM or SIGINT.
 *
 * @packageDocumentation
 */

import { logger } from './logger.js'
import type { ShutdownConfig } from '../types/shutdown.js'

/**
 * Performs graceful shutdown of all application resources.
 * Stops accepting new connections, runs cleanup handlers, then exits.
 *
 * @param signal - The signal that triggered the shutdown
 * @param config - Configuration containing resources to clean up
 * @param exit - Process exit, replaceable in tests
 */
export async function gracefulShutdown(
	signal: string,
	config: ShutdownConfig,
	exit: (code: number) => void = process.exit
): Promise<void> {
	logger.info(`Received ${signal} signal, starting graceful shutdown...`)

	// Stop accepting new connections
	await new Promise<void>((resolve) => {
		config.server.close(() => {
			logger.info('HTTP server closed')
			resolve()
		})
	})

	for (const handler of config.cleanupHandlers ?? []) {
		try {
			await handler()
		} catch (error) {
			logger.error('Error in cleanup handler:', error)
		}
	}

	logger.info('Graceful shutdown completed')
	exit(0)
}

/**
 * Registers process signal handlers for graceful shutdown.
 *
 * @param config - Configuration containing resources to clean up
 */
export function registerShutdownHandlers(config: ShutdownConfig): void {
	const onSignal = (signal: string) => {
		gracefulShutdown(signal, config).catch((error: unknown) => {
			logger.fatal('Graceful shutdown failed:', error)
			process.exit(1)
		})
	}

	process.once('SIGTERM', () => onSignal('SIGTERM'))
	process.once('SIGINT', () => onSignal('SIGINT'))
	logger.debug('Shutdown handlers registered')
}
