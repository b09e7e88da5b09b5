import { describe, it, expect } from 'vitest'
import { optionsFromEnv, splitModel } from '../../src/lib/options.js'
import { ConfigurationError } from '../../src/lib/errors.js'

const captureError = (fn: () => unknown) => {
	try {
		fn()
	} catch (error) {
		return error
	}
	throw new Error('Expected the call to throw')
}

describe('optionsFromEnv', () => {
	it('fills in defaults for the gemini writer', () => {
		const options = optionsFromEnv({
			TAVILY_API_KEY: 'test-search-key',
			GOOGLE_API_KEY: 'test-model-key'
		})

		expect(options).toEqual({
			searchApiKey: 'test-search-key',
			searchDepth: 'advanced',
			maxSearchResults: 6,
			maxSnippetChars: 600,
			writerModel: {
				provider: 'gemini',
				name: 'gemini-2.0-flash',
				apiKey: 'test-model-key',
				temperature: 0.7
			},
			outputDir: 'doc'
		})
	})

	it('lists every missing key', () => {
		const error = captureError(() => optionsFromEnv({}))

		expect(error).toBeInstanceOf(ConfigurationError)
		if (!(error instanceof ConfigurationError)) return
		expect(error.missing).toEqual(['TAVILY_API_KEY', 'GOOGLE_API_KEY'])
		expect(error.message).toBe(
			'Missing required environment variables: TAVILY_API_KEY, GOOGLE_API_KEY'
		)
	})

	it('treats a blank key as missing', () => {
		expect(() =>
			optionsFromEnv({ TAVILY_API_KEY: '   ', GOOGLE_API_KEY: 'test-model-key' })
		).toThrow('Missing required environment variable: TAVILY_API_KEY')
	})

	it('asks for the key of the configured provider', () => {
		expect(() =>
			optionsFromEnv({
				WRITER_MODEL: 'openai:gpt-4.1-mini',
				TAVILY_API_KEY: 'test-search-key',
				GOOGLE_API_KEY: 'test-model-key'
			})
		).toThrow('Missing required environment variable: OPENAI_API_KEY')

		const options = optionsFromEnv({
			WRITER_MODEL: 'openai:gpt-4.1-mini',
			TAVILY_API_KEY: 'test-search-key',
			OPENAI_API_KEY: 'test-openai-key'
		})

		expect(options.writerModel.provider).toBe('openai')
		expect(options.writerModel.name).toBe('gpt-4.1-mini')
		expect(options.writerModel.apiKey).toBe('test-openai-key')
	})

	it('reads the optional settings', () => {
		const options = optionsFromEnv({
			TAVILY_API_KEY: 'test-search-key',
			GOOGLE_API_KEY: 'test-model-key',
			SEARCH_DEPTH: 'basic',
			SEARCH_MAX_RESULTS: '3',
			WRITER_TEMPERATURE: '0.2',
			WRITER_MODEL_MAX_TOKENS: '4096',
			OUTPUT_DIR: 'papers'
		})

		expect(options.searchDepth).toBe('basic')
		expect(options.maxSearchResults).toBe(3)
		expect(options.writerModel.temperature).toBe(0.2)
		expect(options.writerModel.maxTokens).toBe(4096)
		expect(options.outputDir).toBe('papers')
	})

	it('rejects malformed values', () => {
		const env = { TAVILY_API_KEY: 'test-search-key', GOOGLE_API_KEY: 'test-model-key' }

		expect(() => optionsFromEnv({ ...env, WRITER_MODEL_MAX_TOKENS: 'lots' })).toThrow(
			/^Invalid configuration: writerModel\.maxTokens/
		)
		expect(() => optionsFromEnv({ ...env, SEARCH_DEPTH: 'deep' })).toThrow(
			'SEARCH_DEPTH must be one of basic, advanced'
		)
		expect(() => optionsFromEnv({ ...env, WRITER_MODEL: 'mistral:large' })).toThrow(
			ConfigurationError
		)
	})
})

describe('splitModel', () => {
	it('splits provider and model name', () => {
		expect(splitModel('anthropic:claude-sonnet-4')).toEqual({
			provider: 'anthropic',
			name: 'claude-sonnet-4'
		})
	})

	it('rejects values without both parts', () => {
		expect(() => splitModel('gpt-4.1')).toThrow(ConfigurationError)
		expect(() => splitModel('openai:')).toThrow(ConfigurationError)
	})
})
