/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                            Dataset File Output                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Writes generated datasets as pretty-printed JSON files.
 *
 * @packageDocumentation
 */

import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from './logger.js'
import type { GeneratedDataset } from '../types/tool.js'

const logger = createLogger('DatasetWriter')

/**
 * File name for a request's dataset. Ids that are not a string or number
 * are written as 'unknown'.
 */
export function datasetFileName(rfdId: unknown): string {
	const id =
		typeof rfdId === 'string' || typeof rfdId === 'number'
			? String(rfdId).replace(/[^\w.-]/g, '_')
			: 'unknown'
	return `pokemon_rfd_${id}_solution.json`
}

export class DatasetWriter {
	constructor(private readonly outputDir: string) {}

	/**
	 * Write a dataset to the output directory, creating it if needed.
	 * @returns Path of the written file
	 */
	async write(result: GeneratedDataset, rfdId: unknown): Promise<string> {
		await mkdir(this.outputDir, { recursive: true })

		const filePath = path.join(this.outputDir, datasetFileName(rfdId))
		await writeFile(filePath, JSON.stringify(result, null, 2), 'utf8')

		logger.info(`Pokémon dataset generated successfully at: ${filePath}`)
		return filePath
	}
}
