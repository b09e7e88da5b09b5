import { PaperOptions } from './lib/options.js'
import { getChatModel } from './lib/model.js'
import { createResearcher, createSearchTool } from './tools/search.js'
import { createPaperWriter } from './writers/paperWriter.js'
import { createExporters } from './exporters/index.js'
import { PipelineDependencies } from './graphs/researchPaper.js'

/** Wires the real providers from validated options. */
const createDependencies = (
	options: PaperOptions,
	log: (message: string) => void = console.log
): PipelineDependencies => ({
	searchTool: createSearchTool(
		createResearcher({
			apiKey: options.searchApiKey,
			searchDepth: options.searchDepth,
			maxResults: options.maxSearchResults,
			maxSnippetChars: options.maxSnippetChars
		})
	),
	writer: createPaperWriter({
		model: getChatModel(options.writerModel),
		provider: options.writerModel.provider
	}),
	exporters: createExporters({ outputDir: options.outputDir }),
	log
})

export default createDependencies
