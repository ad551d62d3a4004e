/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                             Server Entry Point                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Main entry point for the Pokédex data node.
 * Validates the environment, assembles the node and starts the Express server.
 *
 * @packageDocumentation
 */

import { displayBanner } from './utils/banner.js'
import { logger } from './utils/logger.js'
import { setupEnvironment } from './utils/env.js'
import { registerShutdownHandlers } from './utils/gracefulShutdown.js'
import { createNode } from './node.js'
import { createApp } from './app.js'

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          ENVIRONMENT SETUP                                ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

// Display banner
displayBanner()

// Initialize and validate environment
const envConfig = setupEnvironment()
const { PORT } = envConfig

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                           APPLICATION SETUP                               ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const node = createNode(envConfig)

/** Express application instance for the Pokédex node server */
const app = createApp(node)

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                           SERVER STARTUP                                  ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

/**
 * Start the Express server on the configured port
 */
const server = app.listen(PORT, () => {
	logger.info(`Server running on port ${PORT}`)
})

// Register graceful shutdown handlers
registerShutdownHandlers({
	server,
	cleanupHandlers: [
		async () => {
			const cleared = await node.generator.clearExpiredCache()
			logger.info(`Swept ${cleared} expired cache entries`)
		},
	],
})
