/**
 * Error base class shared by Quorum packages.
 */

/**
 * Base class for every error Quorum throws or reports.
 * `code` is stable and safe to switch on; `message` is for humans.
 */
export class QuorumError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * Thrown when an interval violates `start < end` or carries an invalid Date.
 * This is a contract violation upstream, so it is never caught internally.
 */
export class InvalidIntervalError extends QuorumError {
	readonly start: Date;
	readonly end: Date;

	constructor(start: Date, end: Date) {
		super(
			'invalid_interval',
			`Invalid interval: start (${describeDate(start)}) must be before end (${describeDate(end)})`,
		);
		this.start = start;
		this.end = end;
	}
}

function describeDate(date: Date): string {
	return Number.isNaN(date.getTime()) ? 'Invalid Date' : date.toISOString();
}
