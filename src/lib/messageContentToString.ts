import { MessageContent } from '@langchain/core/messages'

const messageContentToString = (content: MessageContent) => {
	if (typeof content === 'string') {
		return content
	}

	// Multi-part replies: keep the text parts, drop images and tool blocks
	return content
		.map<string>(part => {
			if (typeof part === 'string') {
				return part
			}

			return 'text' in part && typeof part.text === 'string'
				? part.text
				: ''
		})
		.join('')
}

export default messageContentToString
