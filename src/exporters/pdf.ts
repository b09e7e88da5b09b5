import PDFDocument from 'pdfkit'
import { HeadingLevel, PaperBlock } from './layout.js'

const HEADING_SIZES: Record<HeadingLevel, number> = { 1: 16, 2: 14, 3: 12, 4: 11 }
const BODY_SIZE = 11

const renderPdf = (blocks: PaperBlock[], topic: string) =>
	new Promise<Buffer>((resolve, reject) => {
		const document = new PDFDocument({ size: 'LETTER', info: { Title: topic } })
		const chunks: Buffer[] = []

		document.on('data', (chunk: Buffer) => chunks.push(chunk))
		document.on('end', () => resolve(Buffer.concat(chunks)))
		document.on('error', reject)

		for (const block of blocks) {
			switch (block.type) {
				case 'heading':
					document
						.font('Helvetica-Bold')
						.fontSize(HEADING_SIZES[block.level])
						.text(block.text, { align: block.level === 1 ? 'center' : 'left' })
						.moveDown(block.level === 1 ? 1.5 : 0.5)
					break
				case 'bullet':
					document
						.font('Helvetica')
						.fontSize(BODY_SIZE)
						.text(`• ${block.text}`, { indent: 12 })
						.moveDown(0.25)
					break
				case 'paragraph':
					document
						.font('Helvetica')
						.fontSize(BODY_SIZE)
						.text(block.text, { align: 'justify' })
						.moveDown(0.5)
					break
			}
		}

		document.end()
	})

export default renderPdf
