/**
 * Quorum Core
 *
 * Shared time primitives for Quorum packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 *
 * @example
 * const interval: Interval = {
 *   start: new Date('2025-01-06T09:00:00Z'),
 *   end: new Date('2025-01-06T10:00:00Z')
 * };
 */
export interface Interval {
	/** The start of the interval (inclusive) */
	readonly start: Date;
	/** The end of the interval (exclusive) */
	readonly end: Date;
}

/**
 * A date range for querying time-bounded data.
 * Semantically identical to Interval.
 */
export interface DateRange {
	readonly start: Date;
	readonly end: Date;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;
