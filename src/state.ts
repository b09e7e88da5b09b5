import { BaseMessage } from '@langchain/core/messages'

export const STAGE_NAMES = ['plan', 'research', 'write', 'export'] as const

export type StageName = (typeof STAGE_NAMES)[number]

export type MessageRole = 'user' | 'assistant' | 'tool'

export type ExportFormat = 'docx' | 'pdf'

export interface ExportResult {
	format: ExportFormat
	path: string
	success: boolean
}

export interface PipelineState {
	topic: string
	conversation: BaseMessage[]
	researchResults: string
	paperContent: string
	outputPaths: Set<string>
	exports: ExportResult[]
	completedStages: StageName[]
}

export const createPipelineState = (): PipelineState => ({
	topic: '',
	conversation: [],
	researchResults: '',
	paperContent: '',
	outputPaths: new Set(),
	exports: [],
	completedStages: []
})

export const messageRole = (message: BaseMessage): MessageRole => {
	const type = message.getType()

	switch (type) {
		case 'human':
			return 'user'
		case 'ai':
			return 'assistant'
		case 'tool':
			return 'tool'
		default:
			throw new Error(`Unsupported message type in conversation: ${type}`)
	}
}
