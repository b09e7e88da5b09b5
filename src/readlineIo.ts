import { createInterface } from 'readline/promises'
import { CliIo } from './cli.js'

/**
 * Console prompts for the CLI. Once the input ends, pending and later
 * questions reject instead of waiting forever.
 */
const createReadlineIo = ({
	input,
	output
}: {
	input: NodeJS.ReadableStream
	output: NodeJS.WritableStream
}): CliIo & { close(): void } => {
	const readline = createInterface({ input, output })
	const closed = new AbortController()

	readline.on('close', () => closed.abort(new Error('Input closed before an answer was given')))

	return {
		ask: async question => readline.question(question, { signal: closed.signal }),
		log: message => console.log(message),
		error: message => console.error(message),
		close: () => readline.close()
	}
}

export default createReadlineIo
