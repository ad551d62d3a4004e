/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                             Data Tool Registry                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Routes request descriptors to a registered data tool. A request may name
 * its tool through `mcp_tool`; otherwise the first registered tool serves it.
 * Generated datasets are optionally written to disk.
 *
 * @packageDocumentation
 */

import { GenerationError } from '../generator.js'
import { createLogger } from './logger.js'
import { isRecord, ValidationError } from './validator.js'
import type { DataRequest } from '../types/request.js'
import type { DataTool, GeneratedDataset } from '../types/tool.js'
import type { DatasetWriter } from './datasetWriter.js'

const logger = createLogger('Registry')

export interface SolvedDataset {
	result: GeneratedDataset
	/** Where the dataset was written, when output is configured */
	outputPath?: string
}

export class ToolRegistry {
	private readonly tools = new Map<string, DataTool>()

	constructor(private readonly writer?: DatasetWriter) {}

	register(tool: DataTool): this {
		this.tools.set(tool.name, tool)
		logger.info(`Registered data tool: ${tool.name}`)
		return this
	}

	get(name: string): DataTool | undefined {
		return this.tools.get(name)
	}

	list(): string[] {
		return [...this.tools.keys()]
	}

	/**
	 * Pick the tool for a request.
	 * @throws GenerationError when no tool is registered or the named one is unknown
	 */
	resolve(request: unknown): DataTool {
		const named = isRecord(request) ? request.mcp_tool : undefined

		if (typeof named === 'string' && named !== '') {
			const tool = this.tools.get(named)
			if (!tool) {
				throw new GenerationError(`Data tool not found: ${named}`)
			}
			return tool
		}

		const first = this.tools.values().next()
		if (first.done) {
			throw new GenerationError('No data tools available')
		}
		return first.value
	}

	/**
	 * Validate a request against its tool without generating anything.
	 */
	validate(request: unknown): boolean {
		try {
			return this.resolve(request).validate(request)
		} catch (error) {
			if (error instanceof GenerationError) {
				logger.warn(error.message)
				return false
			}
			throw error
		}
	}

	/**
	 * Generate the dataset for a request and write it out when configured.
	 * A failed write is logged and the dataset returned without a path.
	 * @throws GenerationError when the tool rejects the request or fails;
	 * a rejected descriptor keeps its ValidationError as the cause
	 */
	async solve(request: unknown): Promise<SolvedDataset> {
		const tool = this.resolve(request)

		let parsed: DataRequest
		try {
			parsed = tool.parse(request)
		} catch (error) {
			if (error instanceof ValidationError) {
				logger.warn(`Request rejected: ${error.message}`)
				throw new GenerationError(
					`Data tool ${tool.name} cannot handle this request`,
					{ cause: error }
				)
			}
			throw error
		}

		const result = await tool.generate(parsed)

		if (!this.writer) {
			return { result }
		}

		try {
			const outputPath = await this.writer.write(result, parsed.rfdId)
			return { result, outputPath }
		} catch (error) {
			logger.warn(
				`Failed to write dataset output: ${error instanceof Error ? error.message : String(error)}`
			)
			return { result }
		}
	}
}
