/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                         🎮  POKÉDEX DATA NODE  🎮                         ║
 * ║                            Tool Registry Tests                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { DataGenerator, GenerationError } from '../src/generator.js'
import { PinCache } from '../src/utils/pinCache.js'
import { ToolRegistry } from '../src/utils/registry.js'
import { ValidationError } from '../src/utils/validator.js'
import { DatasetWriter, datasetFileName } from '../src/utils/datasetWriter.js'
import { FakePokeApiSource, InMemoryPinningService } from './helpers/fakes.js'
import { pokemonResource } from './helpers/fixtures.js'

function pokemonTool(): DataGenerator {
	const source = new FakePokeApiSource({
		'pokemon/25': pokemonResource(25, 'pikachu', { types: ['electric'] }),
	})
	return new DataGenerator({
		source,
		cache: new PinCache(new InMemoryPinningService()),
	})
}

const pikachuRequest = { data_type: 'pokemon', pokemon_ids: [25], rfd_id: 'rfd-7' }

describe('ToolRegistry', () => {
	test('should use the first registered tool by default', async () => {
		const registry = new ToolRegistry().register(pokemonTool())

		const { result, outputPath } = await registry.solve(pikachuRequest)

		expect(result.count).toBe(1)
		expect(outputPath).toBeUndefined()
	})

	test('should route by mcp_tool', () => {
		const tool = pokemonTool()
		const registry = new ToolRegistry().register(tool)

		expect(registry.resolve({ mcp_tool: 'pokemon' })).toBe(tool)
		expect(registry.list()).toEqual(['pokemon'])
	})

	test('should reject an unknown tool', async () => {
		const registry = new ToolRegistry().register(pokemonTool())

		await expect(
			registry.solve({ ...pikachuRequest, mcp_tool: 'weather' })
		).rejects.toThrow(new GenerationError('Data tool not found: weather'))
		expect(registry.validate({ ...pikachuRequest, mcp_tool: 'weather' })).toBe(false)
	})

	test('should reject a request its tool does not validate', async () => {
		const registry = new ToolRegistry().register(pokemonTool())

		const error = await registry
			.solve({ data_type: 'items' })
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(GenerationError)
		if (error instanceof GenerationError) {
			expect(error.message).toBe('Data tool pokemon cannot handle this request')
			expect(error.cause).toBeInstanceOf(ValidationError)
		}
	})

	test('should parse the descriptor once per solve', async () => {
		const tool = pokemonTool()
		const parse = vi.spyOn(tool, 'parse')
		const validate = vi.spyOn(tool, 'validate')
		const registry = new ToolRegistry().register(tool)

		await registry.solve(pikachuRequest)

		expect(parse).toHaveBeenCalledTimes(1)
		expect(validate).not.toHaveBeenCalled()
	})

	test('should fail when no tool is registered', () => {
		expect(() => new ToolRegistry().resolve({})).toThrow('No data tools available')
	})
})

describe('DatasetWriter', () => {
	let outputDir: string

	beforeEach(async () => {
		outputDir = await mkdtemp(path.join(tmpdir(), 'pokedex-datasets-'))
	})

	afterEach(async () => {
		await rm(outputDir, { recursive: true, force: true })
	})

	test('should name files after the rfd id', () => {
		expect(datasetFileName('rfd-7')).toBe('pokemon_rfd_rfd-7_solution.json')
		expect(datasetFileName(12)).toBe('pokemon_rfd_12_solution.json')
		expect(datasetFileName(undefined)).toBe('pokemon_rfd_unknown_solution.json')
		expect(datasetFileName('../etc')).toBe('pokemon_rfd_.._etc_solution.json')
	})

	test('should write the solved dataset as pretty JSON', async () => {
		const registry = new ToolRegistry(
			new DatasetWriter(path.join(outputDir, 'data'))
		).register(pokemonTool())

		const { result, outputPath } = await registry.solve(pikachuRequest)

		expect(outputPath).toBe(
			path.join(outputDir, 'data', 'pokemon_rfd_rfd-7_solution.json')
		)
		const written = await readFile(path.join(outputDir, 'data', 'pokemon_rfd_rfd-7_solution.json'), 'utf8')
		expect(written).toBe(JSON.stringify(result, null, 2))
	})

	test('should still return the dataset when the write fails', async () => {
		const blocker = path.join(outputDir, 'not-a-dir')
		await writeFile(blocker, 'occupied', 'utf8')
		const registry = new ToolRegistry(
			new DatasetWriter(path.join(blocker, 'data'))
		).register(pokemonTool())

		const solved = await registry.solve(pikachuRequest)

		expect(solved.outputPath).toBeUndefined()
		expect(solved.result.count).toBe(1)
		expect(solved.result.data_type).toBe('pokemon')
	})
})
