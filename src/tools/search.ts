import { DynamicStructuredTool } from '@langchain/core/tools'
import { tavily } from '@tavily/core'
import z from 'zod'
import {
	ConfigurationError,
	ExternalServiceError,
	InvalidInputError
} from '../lib/errors.js'

export interface SearchResult {
	title: string
	url: string
	content: string
}

/** The slice of the Tavily client the researcher relies on. */
export interface SearchClient {
	search(
		query: string,
		options: { searchDepth: 'basic' | 'advanced'; maxResults: number }
	): Promise<{ results: SearchResult[] }>
}

export interface ResearcherOptions {
	apiKey: string
	searchDepth: 'basic' | 'advanced'
	maxResults: number
	maxSnippetChars: number
	client?: SearchClient
}

export interface Researcher {
	search(query: string): Promise<string>
}

export const researchQuery = (topic: string) =>
	`academic research ${topic} recent studies findings`

export const formatSearchResults = (
	topic: string,
	results: SearchResult[],
	maxSnippetChars: number
) => {
	let formattedOutput = `Research Results for '${topic}':\n\n`

	if (results.length === 0) {
		return `${formattedOutput}No search results found.\n`
	}

	results.forEach((result, index) => {
		formattedOutput += `${index + 1}. **${result.title}**\n`
		formattedOutput += `   Content: ${result.content.slice(0, maxSnippetChars)}...\n`
		formattedOutput += `   Source: ${result.url}\n\n`
	})

	return formattedOutput
}

export const createResearcher = ({
	apiKey,
	searchDepth,
	maxResults,
	maxSnippetChars,
	client
}: ResearcherOptions): Researcher => {
	if (!client && !apiKey) {
		throw new ConfigurationError('No Tavily API key configured', ['TAVILY_API_KEY'])
	}

	const searchClient: SearchClient = client ?? tavily({ apiKey })

	return {
		search: async query => {
			const topic = query.trim()
			if (!topic) throw new InvalidInputError('Search query must not be empty')

			try {
				const { results } = await searchClient.search(researchQuery(topic), {
					searchDepth,
					maxResults
				})

				return formatSearchResults(topic, results, maxSnippetChars)
			} catch (error) {
				throw ExternalServiceError.fromError('tavily', error)
			}
		}
	}
}

export const SearchSchema = z.strictObject({
	query: z
		.string()
		.trim()
		.min(1)
		.describe('The research topic to look up, in plain words.')
})

export const createSearchTool = (researcher: Researcher) =>
	new DynamicStructuredTool({
		name: 'search',
		description:
			'Searches the web for academic sources on a topic and returns the snippets with their source URLs.',
		schema: SearchSchema,
		func: async ({ query }) => researcher.search(query)
	})

export type SearchTool = ReturnType<typeof createSearchTool>
