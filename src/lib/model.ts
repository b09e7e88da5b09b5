import z from 'zod'
import { ChatOpenAI } from '@langchain/openai'
import { ChatAnthropic } from '@langchain/anthropic'
import { ChatGoogleGenerativeAI } from '@langchain/google-genai'
import { ConfigurationError } from './errors.js'

export const ModelProviderSchema = z.enum(['openai', 'anthropic', 'gemini'])

export type ModelProvider = z.infer<typeof ModelProviderSchema>

export const ModelSchema = z.strictObject({
	provider: ModelProviderSchema,
	name: z.string().min(1),
	apiKey: z.string(),
	temperature: z.number().min(0).max(2).default(0.7),
	maxTokens: z.number().int().positive().optional()
})

export type Model = z.infer<typeof ModelSchema>

/** Environment variable holding the API key of each provider. */
export const API_KEY_VARIABLES: Record<ModelProvider, string> = {
	openai: 'OPENAI_API_KEY',
	anthropic: 'ANTHROPIC_API_KEY',
	gemini: 'GOOGLE_API_KEY'
}

export type ChatModel = ChatOpenAI | ChatAnthropic | ChatGoogleGenerativeAI

export const getChatModel = (model: Model): ChatModel => {
	if (!model.apiKey) {
		throw new ConfigurationError(
			`No API key configured for the ${model.provider} model`,
			[API_KEY_VARIABLES[model.provider]]
		)
	}

	const { name, apiKey, temperature, maxTokens } = model

	switch (model.provider) {
		case 'openai':
			return new ChatOpenAI({ model: name, apiKey, temperature, maxTokens })
		case 'anthropic':
			return new ChatAnthropic({ model: name, apiKey, temperature, maxTokens })
		case 'gemini':
			return new ChatGoogleGenerativeAI({
				model: name,
				apiKey,
				temperature,
				maxOutputTokens: maxTokens
			})
	}
}
