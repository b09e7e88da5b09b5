declare global {
	namespace NodeJS {
		interface ProcessEnv {
			// API Keys
			TAVILY_API_KEY?: string
			GOOGLE_API_KEY?: string
			OPENAI_API_KEY?: string
			ANTHROPIC_API_KEY?: string

			// Writer model, e.g. gemini:gemini-2.0-flash
			WRITER_MODEL?: string
			WRITER_MODEL_MAX_TOKENS?: string
			WRITER_TEMPERATURE?: string

			SEARCH_DEPTH?: string
			SEARCH_MAX_RESULTS?: string
			OUTPUT_DIR?: string
		}
	}
}

export {}
