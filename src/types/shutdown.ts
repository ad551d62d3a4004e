/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                       Node Shutdown Type Definitions                      ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * @packageDocumentation
 */

import type { Server } from 'http'

/**
 * Configuration for graceful shutdown process.
 * Contains all resources that need to be cleaned up on shutdown.
 */
export interface ShutdownConfig {
	/** Express HTTP server instance */
	server: Server
	/** Additional cleanup functions to run during shutdown */
	cleanupHandlers?: Array<() => Promise<void> | void>
}
