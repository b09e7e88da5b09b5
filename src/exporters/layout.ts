export type HeadingLevel = 1 | 2 | 3 | 4

export type PaperBlock =
	| { type: 'heading'; level: HeadingLevel; text: string }
	| { type: 'paragraph'; text: string }
	| { type: 'bullet'; text: string }

const MARKDOWN_HEADING = /^(#{1,4})\s+(.+)$/
const NUMBERED_HEADING = /^(\d+(?:\.\d+)*)\.?\s+(\p{Lu}[^.!?:;]*)$/u
const BULLET = /^[-*]\s+(.+)$/
const MAX_NUMBERED_HEADING_WORDS = 8

const toLevel = (value: number): HeadingLevel =>
	value <= 1 ? 1 : value === 2 ? 2 : value === 3 ? 3 : 4

const stripEmphasis = (text: string) =>
	text.replace(/\*\*(.+?)\*\*/g, '$1').replace(/__(.+?)__/g, '$1').trim()

const parseLine = (line: string): PaperBlock | undefined => {
	const heading = MARKDOWN_HEADING.exec(line)
	if (heading) {
		return {
			type: 'heading',
			level: toLevel(heading[1].length),
			text: stripEmphasis(heading[2])
		}
	}

	// Deeper or malformed markdown headings carry no usable structure
	if (line.startsWith('#')) return undefined

	const bullet = BULLET.exec(line)
	if (bullet) return { type: 'bullet', text: stripEmphasis(bullet[1]) }

	const text = stripEmphasis(line)
	const numbered = NUMBERED_HEADING.exec(text)
	if (
		numbered &&
		numbered[2].trim().split(/\s+/).length <= MAX_NUMBERED_HEADING_WORDS
	) {
		return {
			type: 'heading',
			level: toLevel(numbered[1].split('.').length + 1),
			text
		}
	}

	return { type: 'paragraph', text }
}

/**
 * Best-effort reading of generated text into headings and paragraphs. The
 * topic becomes the title whenever the text does not open with one.
 */
export const layoutPaper = (content: string, topic: string): PaperBlock[] => {
	const blocks = content
		.split(/\r?\n/)
		.map(line => line.trim())
		.filter(line => line.length > 0)
		.map(parseLine)
		.filter((block): block is PaperBlock => block !== undefined)

	const [first] = blocks
	if (!first || first.type !== 'heading' || first.level !== 1) {
		blocks.unshift({ type: 'heading', level: 1, text: topic.trim() })
	}

	return blocks
}
