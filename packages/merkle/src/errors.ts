/**
 * Thrown by write operations when a key, value or vector clock is malformed.
 * Always thrown before the tree is modified.
 */
export class ValidationError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "ValidationError"
		Error.captureStackTrace(this, this.constructor)
	}
}
