import { randomUUID } from 'crypto'
import path from 'path'
import { writeFile } from 'fs/promises'
import { AIMessage, HumanMessage, ToolMessage } from '@langchain/core/messages'
import { Annotation, END, START, StateGraph } from '@langchain/langgraph'
import {
	createPipelineState,
	PipelineState,
	STAGE_NAMES,
	StageName
} from '../state.js'
import {
	ExternalServiceError,
	FileSystemError,
	InvalidInputError,
	PipelineStageError
} from '../lib/errors.js'
import { ensureOutputDir, removeFiles } from '../exporters/outputPath.js'
import { DocumentExporter } from '../exporters/index.js'
import { SearchTool } from '../tools/search.js'
import { PaperWriter } from '../writers/paperWriter.js'

export interface PipelineDependencies {
	searchTool: SearchTool
	writer: PaperWriter
	exporters: DocumentExporter[]
	log?: (message: string) => void
}

export type Stage = (state: PipelineState) => Promise<void>

const plan =
	({ log = console.log }: PipelineDependencies, topic: string): Stage =>
	async state => {
		const trimmed = topic.trim()
		if (!trimmed) throw new InvalidInputError('Research topic must not be empty')

		log(`🚀 Starting research paper creation for: ${trimmed}`)
		state.topic = trimmed
		state.conversation.push(new HumanMessage({ content: trimmed }))
	}

const research =
	({ searchTool, log = console.log }: PipelineDependencies): Stage =>
	async state => {
		log(`🔍 Researching: ${state.topic}`)

		const toolCall = {
			id: `call_${randomUUID()}`,
			name: searchTool.name,
			args: { query: state.topic }
		}
		state.conversation.push(new AIMessage({ content: '', tool_calls: [toolCall] }))

		const result = await searchTool.invoke(toolCall.args)
		if (typeof result !== 'string') {
			throw new Error('Search tool returned a non-string result')
		}

		state.researchResults = result
		state.conversation.push(
			new ToolMessage({
				content: result,
				tool_call_id: toolCall.id,
				name: toolCall.name
			})
		)
	}

const write =
	({ writer, log = console.log }: PipelineDependencies): Stage =>
	async state => {
		log(`✍️ Writing paper for: ${state.topic}`)

		state.paperContent = await writer.generate(state.topic, state.researchResults)
		state.conversation.push(new AIMessage({ content: state.paperContent }))
	}

const exportDocuments =
	({ exporters, log = console.log }: PipelineDependencies): Stage =>
	async state => {
		log(`📄 Creating documents for: ${state.topic}`)

		for (const exporter of exporters) {
			try {
				const filePath = await exporter.export(state.paperContent, state.topic)
				state.exports.push({ format: exporter.format, path: filePath, success: true })
				state.outputPaths.add(filePath)
			} catch (error) {
				state.exports.push({
					format: exporter.format,
					path: error instanceof FileSystemError ? error.path : '',
					success: false
				})
				await removeFiles(state.outputPaths)
				state.outputPaths.clear()
				throw error
			}
		}
	}

export const createStages = (
	dependencies: PipelineDependencies,
	topic: string
): Record<StageName, Stage> => ({
	plan: plan(dependencies, topic),
	research: research(dependencies),
	write: write(dependencies),
	export: exportDocuments(dependencies)
})

const StageGraphAnnotation = Annotation.Root({
	completedStages: Annotation<StageName[]>({
		reducer: (current, update) => [...current, ...update],
		default: () => []
	})
})

/** Linear graph START → plan → research → write → export → END. */
export const buildStageGraph = (
	runStage: (name: StageName) => Promise<void>
) => {
	const node = (name: StageName) => async () => {
		await runStage(name)
		return { completedStages: [name] }
	}

	return new StateGraph(StageGraphAnnotation)
		.addNode('plan', node('plan'))
		.addNode('research', node('research'))
		.addNode('write', node('write'))
		.addNode('export', node('export'))
		.addEdge(START, 'plan')
		.addEdge('plan', 'research')
		.addEdge('research', 'write')
		.addEdge('write', 'export')
		.addEdge('export', END)
		.compile()
}

/**
 * Runs the stages in order over `state`. On failure the error is a
 * PipelineStageError and `state` keeps whatever the earlier stages wrote.
 */
export const runPipeline = async (
	topic: string,
	dependencies: PipelineDependencies,
	state: PipelineState = createPipelineState()
) => {
	const stages = createStages(dependencies, topic)

	const graph = buildStageGraph(async name => {
		try {
			await stages[name](state)
		} catch (error) {
			throw new PipelineStageError(name, error)
		}
	})

	try {
		const { completedStages } = await graph.invoke({})
		state.completedStages = completedStages
	} catch (error) {
		// The graph is linear: every stage before the failed one completed
		if (error instanceof PipelineStageError) {
			state.completedStages = STAGE_NAMES.slice(0, STAGE_NAMES.indexOf(error.stage))
		}
		throw error
	}

	return state
}

const drawableStageGraph = () => buildStageGraph(async () => {}).getGraphAsync()

export const stageGraphMermaid = async () => (await drawableStageGraph()).drawMermaid()

/** Renders the stage graph to `pipeline_graph.png` in `outputDir`. */
export const exportStageGraph = async (outputDir: string) => {
	let image: Blob

	try {
		image = await (await drawableStageGraph()).drawMermaidPng()
	} catch (error) {
		throw ExternalServiceError.fromError('mermaid.ink', error)
	}

	const filePath = path.join(outputDir, 'pipeline_graph.png')
	await ensureOutputDir(outputDir)

	try {
		await writeFile(filePath, Buffer.from(await image.arrayBuffer()))
	} catch (error) {
		throw FileSystemError.fromError(filePath, error)
	}

	return filePath
}
