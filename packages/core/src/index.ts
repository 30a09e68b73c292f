/**
 * Quorum Core
 *
 * Shared time primitives for Quorum packages.
 * All intervals are half-open: [start, end)
 *
 * @packageDocumentation
 */

export type { DateRange, DurationMs, Interval } from './types.js';

export { InvalidIntervalError, QuorumError } from './errors.js';

export {
	assertValidInterval,
	createInterval,
	intervalContains,
	intervalDuration,
	intervalsOverlap,
	isValidInterval,
	mergeIntervals,
	overlapsAny,
	subtractIntervals,
} from './intervals.js';
