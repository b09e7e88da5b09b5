import { z } from 'zod'
import { API_KEY_VARIABLES, ModelProviderSchema, ModelSchema } from './model.js'
import { ConfigurationError } from './errors.js'

export const SearchDepthSchema = z.enum(['basic', 'advanced'])

export const PaperOptionsSchema = z.strictObject({
	searchApiKey: z.string().min(1),
	searchDepth: SearchDepthSchema.default('advanced'),
	maxSearchResults: z.number().int().positive().default(6),
	maxSnippetChars: z.number().int().positive().default(600),
	writerModel: ModelSchema,
	outputDir: z.string().min(1).default('doc')
})

export type PaperOptions = z.infer<typeof PaperOptionsSchema>

export type PaperOptionsInput = z.input<typeof PaperOptionsSchema>

export const DEFAULT_WRITER_MODEL = 'gemini:gemini-2.0-flash'

export const parsePaperOptions = (input: PaperOptionsInput): PaperOptions => {
	const result = PaperOptionsSchema.safeParse(input)

	if (!result.success) {
		const details = result.error.issues
			.map(issue => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ')

		throw new ConfigurationError(`Invalid configuration: ${details}`)
	}

	return result.data
}

/** Splits `provider:model` into its parts. */
export const splitModel = (value: string) => {
	const separator = value.indexOf(':')
	const provider = ModelProviderSchema.safeParse(value.slice(0, separator))

	if (separator <= 0 || !provider.success || separator === value.length - 1) {
		throw new ConfigurationError(
			`WRITER_MODEL must look like "<${ModelProviderSchema.options.join('|')}>:<model name>", got "${value}"`
		)
	}

	return { provider: provider.data, name: value.slice(separator + 1) }
}

const numberFromEnv = (value: string | undefined) =>
	value === undefined || value.trim() === '' ? undefined : Number(value)

/**
 * Builds the options from environment variables. Fails with a
 * ConfigurationError listing every missing key before anything is contacted.
 */
export const optionsFromEnv = (env: NodeJS.ProcessEnv): PaperOptions => {
	const { provider, name } = splitModel(env.WRITER_MODEL || DEFAULT_WRITER_MODEL)
	const writerKeyVariable = API_KEY_VARIABLES[provider]

	const missing = ['TAVILY_API_KEY', writerKeyVariable].filter(
		variable => !env[variable]?.trim()
	)

	if (missing.length > 0) {
		throw new ConfigurationError(
			`Missing required environment variable${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
			missing
		)
	}

	const searchDepth = SearchDepthSchema.optional().safeParse(
		env.SEARCH_DEPTH?.trim() || undefined
	)

	if (!searchDepth.success) {
		throw new ConfigurationError(
			`SEARCH_DEPTH must be one of ${SearchDepthSchema.options.join(', ')}`
		)
	}

	return parsePaperOptions({
		searchApiKey: env.TAVILY_API_KEY ?? '',
		searchDepth: searchDepth.data,
		maxSearchResults: numberFromEnv(env.SEARCH_MAX_RESULTS),
		writerModel: {
			provider,
			name,
			apiKey: env[writerKeyVariable] ?? '',
			temperature: numberFromEnv(env.WRITER_TEMPERATURE),
			maxTokens: numberFromEnv(env.WRITER_MODEL_MAX_TOKENS)
		},
		outputDir: env.OUTPUT_DIR?.trim() || undefined
	})
}
