import type { StageName } from '../state.js'

export const describeError = (error: unknown) =>
	error instanceof Error ? error.message : String(error)

const statusOf = (error: unknown): number | undefined => {
	if (typeof error !== 'object' || error === null) return undefined

	if ('status' in error && typeof error.status === 'number') return error.status

	// axios-style clients keep the status on the response
	if (
		'response' in error &&
		typeof error.response === 'object' &&
		error.response !== null &&
		'status' in error.response &&
		typeof error.response.status === 'number'
	) {
		return error.response.status
	}

	// @tavily/core only keeps the status in the message: "429 Error: ..."
	const match =
		error instanceof Error ? /^(\d{3}) Error:/.exec(error.message) : null

	return match ? Number(match[1]) : undefined
}

const codeOf = (error: unknown): string | undefined =>
	typeof error === 'object' &&
	error !== null &&
	'code' in error &&
	typeof error.code === 'string'
		? error.code
		: undefined

export class ConfigurationError extends Error {
	constructor(message: string, readonly missing: string[] = []) {
		super(message)
		this.name = 'ConfigurationError'
	}
}

export class InvalidInputError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InvalidInputError'
	}
}

export class ExternalServiceError extends Error {
	constructor(
		readonly provider: string,
		message: string,
		readonly status?: number,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'ExternalServiceError'
	}

	static fromError(provider: string, error: unknown) {
		const status = statusOf(error)
		const prefix =
			status === undefined
				? `${provider} request failed`
				: `${provider} request failed with status ${status}`

		return new ExternalServiceError(
			provider,
			`${prefix}: ${describeError(error)}`,
			status,
			{ cause: error }
		)
	}
}

export class FileSystemError extends Error {
	constructor(
		readonly path: string,
		message: string,
		readonly code?: string,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'FileSystemError'
	}

	static fromError(path: string, error: unknown) {
		return new FileSystemError(
			path,
			`Could not write ${path}: ${describeError(error)}`,
			codeOf(error),
			{ cause: error }
		)
	}
}

/** Raised by the pipeline when one of its stages fails; `cause` holds the original error. */
export class PipelineStageError extends Error {
	constructor(readonly stage: StageName, cause: unknown) {
		super(`Stage "${stage}" failed: ${describeError(cause)}`, { cause })
		this.name = 'PipelineStageError'
	}
}
