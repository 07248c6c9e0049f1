/**
 * Errors raised by graph construction, parameter validation and id lookup.
 *
 * Unreachable goals and negative cycles are not errors; they are reported on
 * the search result.
 *
 * @module
 */

import type { ZodIssue } from "zod"

export type RouterErrorCode = "INVALID_PARAMETER" | "NOT_FOUND" | "DATA_INTEGRITY"

/** Base class for routing errors. */
export abstract class RouterError extends Error {
	abstract readonly code: RouterErrorCode
}

/** Unrecognized metric or algorithm, or an out-of-range option. */
export class InvalidParameterError extends RouterError {
	override readonly code = "INVALID_PARAMETER"

	constructor(
		message: string,
		readonly parameter: string,
	) {
		super(message)
		this.name = "InvalidParameterError"
	}
}

/** A city name or id that does not resolve to a node. */
export class NotFoundError extends RouterError {
	override readonly code = "NOT_FOUND"

	constructor(
		message: string,
		readonly identifier: unknown,
	) {
		super(message)
		this.name = "NotFoundError"
	}
}

/** Malformed or incomplete graph input. */
export class DataIntegrityError extends RouterError {
	override readonly code = "DATA_INTEGRITY"

	constructor(
		message: string,
		readonly issues: readonly ZodIssue[] = [],
	) {
		super(message)
		this.name = "DataIntegrityError"
	}
}
