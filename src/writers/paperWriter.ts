import { HumanMessage } from '@langchain/core/messages'
import { BaseChatModel } from '@langchain/core/language_models/chat_models'
import { ExternalServiceError } from '../lib/errors.js'
import messageContentToString from '../lib/messageContentToString.js'
import { revisePaperPrompt, writePaperPrompt } from '../lib/prompts.js'

export interface PaperWriter {
	generate(topic: string, research: string): Promise<string>
	revise(content: string, changeRequest: string, topic: string): Promise<string>
}

/**
 * Wraps a chat model. Each call is a single model invocation and the reply
 * text is returned as-is, whatever its structure.
 */
export const createPaperWriter = ({
	model,
	provider
}: {
	model: BaseChatModel
	provider: string
}): PaperWriter => {
	const complete = async (prompt: string) => {
		try {
			const response = await model.invoke([new HumanMessage({ content: prompt })])
			return messageContentToString(response.content)
		} catch (error) {
			throw ExternalServiceError.fromError(provider, error)
		}
	}

	return {
		generate: (topic, research) => complete(writePaperPrompt({ topic, research })),
		revise: (content, changeRequest, topic) =>
			complete(revisePaperPrompt({ topic, content, changeRequest }))
	}
}
