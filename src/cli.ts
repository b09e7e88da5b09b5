import { PaperOptions, optionsFromEnv } from './lib/options.js'
import { ConfigurationError, describeError, PipelineStageError } from './lib/errors.js'
import joinMessages from './lib/joinMessages.js'
import { createPipelineState, PipelineState } from './state.js'
import {
	exportStageGraph,
	PipelineDependencies,
	runPipeline
} from './graphs/researchPaper.js'
import createDependencies from './dependencies.js'
import { removeFiles } from './exporters/outputPath.js'

export interface CliIo {
	ask(question: string): Promise<string>
	log(message: string): void
	error(message: string): void
}

export interface CliOptions {
	env: NodeJS.ProcessEnv
	io: CliIo
	buildDependencies?: (
		options: PaperOptions,
		log: (message: string) => void
	) => PipelineDependencies
	exportGraph?: (outputDir: string) => Promise<string>
}

const EXPORT_LABELS = { docx: '📄 Word Document', pdf: '📑 PDF Document' }

const askYesNo = async (io: CliIo, question: string) => {
	for (;;) {
		const answer = (await io.ask(question)).trim().toLowerCase()

		if (answer === 'y' || answer === 'yes') return true
		if (answer === 'n' || answer === 'no') return false

		io.error("❌ Please enter 'y' for yes or 'n' for no.")
	}
}

const reportFailure = (io: CliIo, error: PipelineStageError, state: PipelineState) => {
	io.error(`❌ ${error.message}`)

	if (state.conversation.length > 0) {
		io.error(`Conversation before the failure:\n${joinMessages(state.conversation)}`)
	}
}

const reviseUntilDone = async (
	io: CliIo,
	{ writer, exporters }: PipelineDependencies,
	state: PipelineState
) => {
	let content = state.paperContent

	while (await askYesNo(io, '\nWould you like to make any changes to the paper? (y/n): ')) {
		const changeRequest = (await io.ask('\nDescribe the changes you want to make: ')).trim()

		if (!changeRequest) {
			io.error('❌ Please provide a valid change request.')
			continue
		}

		io.log(`\n🔄 Applying changes: ${changeRequest}`)

		const written: string[] = []

		try {
			const revised = await writer.revise(content, changeRequest, state.topic)

			for (const exporter of exporters) {
				written.push(await exporter.export(revised, state.topic))
			}

			exporters.forEach((exporter, index) =>
				io.log(`${EXPORT_LABELS[exporter.format]} (updated): ${written[index]}`)
			)
			content = revised
			io.log('✅ Changes applied successfully!')
		} catch (error) {
			// A revision is exported as a whole or not at all
			await removeFiles(written)
			io.error(`❌ Edit failed: ${describeError(error)}`)
		}
	}

	io.log('\n✅ Research paper creation completed successfully!')
}

/** Interactive flow; resolves to the process exit code. */
const runCli = async ({
	env,
	io,
	buildDependencies = createDependencies,
	exportGraph = exportStageGraph
}: CliOptions) => {
	io.log('🎓 AI Research Paper Creator')
	io.log('='.repeat(40))

	let options: PaperOptions
	let dependencies: PipelineDependencies

	try {
		options = optionsFromEnv(env)
		dependencies = buildDependencies(options, io.log)
	} catch (error) {
		if (!(error instanceof ConfigurationError)) throw error

		io.error(`❌ Configuration error: ${error.message}`)
		return 1
	}

	const topic = await io.ask('\nEnter your research topic: ')
	const renderGraph = await askYesNo(io, 'Render the workflow graph as an image? (y/n): ')

	const state = createPipelineState()

	try {
		await runPipeline(topic, dependencies, state)
	} catch (error) {
		if (!(error instanceof PipelineStageError)) throw error

		reportFailure(io, error, state)
		return 1
	}

	io.log('\n' + '='.repeat(50))
	io.log('📊 RESEARCH PAPER COMPLETED')
	io.log('='.repeat(50))
	io.log(`✅ Topic: ${state.topic}`)
	for (const result of state.exports) {
		io.log(`${EXPORT_LABELS[result.format]}: ${result.path}`)
	}
	io.log(`\n📁 Documents saved in: ${options.outputDir}`)

	if (renderGraph) {
		try {
			io.log(`🗺️ Workflow graph: ${await exportGraph(options.outputDir)}`)
		} catch (error) {
			io.error(`⚠️ Could not render the workflow graph: ${describeError(error)}`)
		}
	}

	await reviseUntilDone(io, dependencies, state)

	return 0
}

export default runCli
