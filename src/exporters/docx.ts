import {
	AlignmentType,
	Document,
	HeadingLevel as DocxHeadingLevel,
	Packer,
	Paragraph,
	TextRun
} from 'docx'
import { HeadingLevel, PaperBlock } from './layout.js'

const HEADINGS = {
	1: DocxHeadingLevel.HEADING_1,
	2: DocxHeadingLevel.HEADING_2,
	3: DocxHeadingLevel.HEADING_3,
	4: DocxHeadingLevel.HEADING_4
} satisfies Record<HeadingLevel, unknown>

const toParagraph = (block: PaperBlock) => {
	switch (block.type) {
		case 'heading':
			return new Paragraph({
				heading: HEADINGS[block.level],
				alignment: block.level === 1 ? AlignmentType.CENTER : undefined,
				children: [new TextRun(block.text)]
			})
		case 'bullet':
			return new Paragraph({
				bullet: { level: 0 },
				children: [new TextRun(block.text)]
			})
		case 'paragraph':
			return new Paragraph({
				spacing: { after: 120 },
				children: [new TextRun(block.text)]
			})
	}
}

const renderDocx = (blocks: PaperBlock[], topic: string) =>
	Packer.toBuffer(
		new Document({
			title: topic,
			sections: [{ children: blocks.map(toParagraph) }]
		})
	)

export default renderDocx
