import { BaseMessage, isAIMessage } from '@langchain/core/messages'
import { messageRole } from '../state.js'
import messageContentToString from './messageContentToString.js'

/** Renders a conversation as `role: content` lines, tool calls included. */
const joinMessages = (messages: BaseMessage[]) =>
	messages
		.map(message => {
			const line = `${messageRole(message)}: ${messageContentToString(message.content)}`

			if (!isAIMessage(message) || !message.tool_calls?.length) return line

			const calls = message.tool_calls
				.map(call => `${call.name}(${JSON.stringify(call.args)})`)
				.join(', ')

			return `${line}[${calls}]`
		})
		.join('\n')

export default joinMessages
