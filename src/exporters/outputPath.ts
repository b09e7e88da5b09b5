import path from 'path'
import { mkdir, rm } from 'fs/promises'
import { DateTime } from 'luxon'
import { FileSystemError } from '../lib/errors.js'

const MAX_TOPIC_LENGTH = 30

/** Letters, digits, spaces, `-` and `_` survive; spaces become underscores. */
export const safeTopic = (topic: string) => {
	const kept = Array.from(topic.trim())
		.filter(char => /[\p{L}\p{N} _-]/u.test(char))
		.join('')
		.replace(/ /g, '_')
		.slice(0, MAX_TOPIC_LENGTH)

	return kept || 'paper'
}

export const formatTimestamp = (date: Date) =>
	DateTime.fromJSDate(date).toFormat('yyyyMMdd_HHmmss')

// Same topic within the same second yields the same name; the later file wins.
export const outputPathFor = ({
	outputDir,
	topic,
	extension,
	date
}: {
	outputDir: string
	topic: string
	extension: string
	date: Date
}) =>
	path.join(outputDir, `${safeTopic(topic)}_${formatTimestamp(date)}.${extension}`)

export const ensureOutputDir = async (outputDir: string) => {
	try {
		await mkdir(outputDir, { recursive: true })
	} catch (error) {
		throw FileSystemError.fromError(outputDir, error)
	}
}

/** Deletes files written by an export that did not complete. */
export const removeFiles = async (filePaths: Iterable<string>) => {
	for (const filePath of filePaths) {
		try {
			await rm(filePath, { force: true })
		} catch (error) {
			throw FileSystemError.fromError(filePath, error)
		}
	}
}
