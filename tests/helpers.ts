import { readFile } from 'fs/promises'
import JSZip from 'jszip'

/** Fixed clock so exported file names are predictable. */
export const fixedNow = () => new Date(2026, 2, 14, 9, 15, 2)

export const TIMESTAMP = '20260314_091502'

export const readDocxXml = async (filePath: string) => {
	const zip = await JSZip.loadAsync(await readFile(filePath))
	const entry = zip.file('word/document.xml')
	if (!entry) throw new Error(`${filePath} has no word/document.xml`)

	return entry.async('string')
}

export const readPdfText = async (filePath: string) =>
	(await readFile(filePath)).toString('latin1')
