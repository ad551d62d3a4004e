/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                           Tool Type Definitions                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Contract between the tool registry and the data tools it dispatches to.
 *
 * @packageDocumentation
 */

import type { CachedRecord, DataRecord, DatasetResult } from './records.js'
import type { DataCategory, DataRequest } from './request.js'

/** Description of one accepted request parameter */
export interface ToolParameter {
	type: 'string' | 'integer' | 'array' | 'boolean'
	required: boolean
	default?: boolean | number
	description: string
}

/**
 * What a tool can produce and which parameters it reads.
 */
export interface ToolCapabilities {
	data_types: DataCategory[]
	parameters: Record<string, ToolParameter>
	output_format: 'json'
	max_records: number
}

/** Result of a generate() call, fresh or served from cache */
export type GeneratedDataset = DatasetResult<DataRecord | CachedRecord>

/**
 * A data tool served through the registry.
 */
export interface DataTool {
	readonly name: string
	readonly description: string
	readonly capabilities: ToolCapabilities
	/**
	 * Turn a wire descriptor into the tool's request.
	 * @throws ValidationError naming the offending field
	 */
	parse(input: unknown): DataRequest
	/** Whether the tool can serve a request; never throws */
	validate(input: unknown): boolean
	generate(request: DataRequest): Promise<GeneratedDataset>
}
