import { writeFile } from 'fs/promises'
import { ExportFormat } from '../state.js'
import { FileSystemError } from '../lib/errors.js'
import { ensureOutputDir, outputPathFor } from './outputPath.js'
import { layoutPaper, PaperBlock } from './layout.js'
import renderDocx from './docx.js'
import renderPdf from './pdf.js'

export interface DocumentExporter {
	format: ExportFormat
	/** Writes the paper and resolves to the path of the written file. */
	export(content: string, topic: string): Promise<string>
}

export interface ExporterOptions {
	outputDir: string
	now?: () => Date
}

type Renderer = (blocks: PaperBlock[], topic: string) => Promise<Buffer>

const createExporter = (
	format: ExportFormat,
	render: Renderer,
	{ outputDir, now = () => new Date() }: ExporterOptions
): DocumentExporter => ({
	format,
	export: async (content, topic) => {
		const filePath = outputPathFor({
			outputDir,
			topic,
			extension: format,
			date: now()
		})
		const data = await render(layoutPaper(content, topic), topic.trim())

		await ensureOutputDir(outputDir)

		try {
			await writeFile(filePath, data)
		} catch (error) {
			throw FileSystemError.fromError(filePath, error)
		}

		return filePath
	}
})

export const createDocxExporter = (options: ExporterOptions) =>
	createExporter('docx', renderDocx, options)

export const createPdfExporter = (options: ExporterOptions) =>
	createExporter('pdf', renderPdf, options)

/** Word first, then PDF. */
export const createExporters = (options: ExporterOptions): DocumentExporter[] => [
	createDocxExporter(options),
	createPdfExporter(options)
]
