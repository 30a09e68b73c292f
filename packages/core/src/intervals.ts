/**
 * Interval arithmetic functions for working with time intervals.
 * All intervals are half-open [start, end), meaning start is inclusive and end is exclusive.
 */

import { InvalidIntervalError } from './errors.js';
import type { Interval } from './types.js';

/**
 * Returns true when both bounds are valid Dates and start < end.
 */
export function isValidInterval(interval: Interval): boolean {
	const start = interval.start.getTime();
	const end = interval.end.getTime();
	return !Number.isNaN(start) && !Number.isNaN(end) && start < end;
}

/**
 * Throws InvalidIntervalError unless the interval satisfies start < end.
 */
export function assertValidInterval(interval: Interval): void {
	if (!isValidInterval(interval)) {
		throw new InvalidIntervalError(interval.start, interval.end);
	}
}

/**
 * Creates a frozen interval, copying the Date bounds so later mutation of the
 * arguments cannot reach it.
 *
 * @throws InvalidIntervalError when start >= end
 *
 * @example
 * ```typescript
 * const lunch = createInterval(
 *   new Date('2025-01-06T12:00:00Z'),
 *   new Date('2025-01-06T13:00:00Z'),
 * );
 * ```
 */
export function createInterval(start: Date, end: Date): Interval {
	const interval = { start: new Date(start.getTime()), end: new Date(end.getTime()) };
	assertValidInterval(interval);
	return Object.freeze(interval);
}

/**
 * Checks if two intervals strictly overlap (share some time, not just an endpoint).
 * For half-open intervals [start, end), sharing only an endpoint means no overlap.
 */
export function intervalsOverlap(a: Interval, b: Interval): boolean {
	return a.start < b.end && b.start < a.end;
}

/**
 * Check if an interval contains a point in time.
 */
export function intervalContains(interval: Interval, time: Date): boolean {
	return time >= interval.start && time < interval.end;
}

/**
 * Get the duration of an interval in milliseconds.
 */
export function intervalDuration(interval: Interval): number {
	return interval.end.getTime() - interval.start.getTime();
}

/**
 * Merges overlapping or adjacent intervals into a sorted list of non-overlapping intervals.
 * Intervals that share only an endpoint (e.g., [a, b) and [b, c)) are merged.
 *
 * @param intervals - Intervals to merge (can be unsorted); the input is not mutated
 * @returns A sorted array of frozen, non-overlapping, non-adjacent intervals
 * @throws InvalidIntervalError when any interval has start >= end
 *
 * @example
 * ```typescript
 * const intervals = [
 *   { start: new Date('2025-01-06T10:00:00Z'), end: new Date('2025-01-06T12:00:00Z') },
 *   { start: new Date('2025-01-06T11:00:00Z'), end: new Date('2025-01-06T13:00:00Z') },
 * ];
 * const merged = mergeIntervals(intervals);
 * // Result: [{ start: 2025-01-06T10:00:00Z, end: 2025-01-06T13:00:00Z }]
 * ```
 */
export function mergeIntervals(intervals: readonly Interval[]): Interval[] {
	if (intervals.length === 0) {
		return [];
	}

	for (const interval of intervals) {
		assertValidInterval(interval);
	}

	// Sort by start time, then by end time for consistent results
	const sorted = [...intervals].sort((a, b) => {
		const startDiff = a.start.getTime() - b.start.getTime();
		if (startDiff !== 0) return startDiff;
		return a.end.getTime() - b.end.getTime();
	});

	const merged: Interval[] = [];
	let currentStart = sorted[0].start.getTime();
	let currentEnd = sorted[0].end.getTime();

	for (let i = 1; i < sorted.length; i++) {
		const next = sorted[i];

		// [a, b) and [b, c) are adjacent and merge
		if (next.start.getTime() <= currentEnd) {
			currentEnd = Math.max(currentEnd, next.end.getTime());
		} else {
			merged.push(Object.freeze({ start: new Date(currentStart), end: new Date(currentEnd) }));
			currentStart = next.start.getTime();
			currentEnd = next.end.getTime();
		}
	}

	merged.push(Object.freeze({ start: new Date(currentStart), end: new Date(currentEnd) }));

	return merged;
}

/**
 * Subtracts a set of intervals from another set of intervals.
 * Removes all time covered by 'subtract' from 'from' intervals.
 * May split intervals if subtraction punches holes in the middle.
 *
 * @param from - The intervals to subtract from
 * @param subtract - The intervals to subtract
 * @returns The remaining intervals after subtraction, sorted by start
 *
 * @example
 * ```typescript
 * const from = [
 *   { start: new Date('2025-01-06T08:00:00Z'), end: new Date('2025-01-06T17:00:00Z') },
 * ];
 * const subtract = [
 *   { start: new Date('2025-01-06T12:00:00Z'), end: new Date('2025-01-06T13:00:00Z') },
 * ];
 * const result = subtractIntervals(from, subtract);
 * // Result: [
 * //   { start: 2025-01-06T08:00:00Z, end: 2025-01-06T12:00:00Z },
 * //   { start: 2025-01-06T13:00:00Z, end: 2025-01-06T17:00:00Z }
 * // ]
 * ```
 */
export function subtractIntervals(
	from: readonly Interval[],
	subtract: readonly Interval[],
): Interval[] {
	const mergedFrom = mergeIntervals(from);
	if (mergedFrom.length === 0 || subtract.length === 0) {
		return mergedFrom;
	}

	const mergedSubtract = mergeIntervals(subtract);
	const result: Interval[] = [];

	// Both lists are sorted and disjoint, so a single forward pass over
	// `mergedSubtract` is enough.
	let j = 0;
	for (const interval of mergedFrom) {
		let cursor = interval.start.getTime();
		const end = interval.end.getTime();

		while (j < mergedSubtract.length && mergedSubtract[j].end.getTime() <= cursor) {
			j++;
		}

		let k = j;
		while (k < mergedSubtract.length && mergedSubtract[k].start.getTime() < end) {
			const sub = mergedSubtract[k];
			if (sub.start.getTime() > cursor) {
				result.push(Object.freeze({ start: new Date(cursor), end: new Date(sub.start.getTime()) }));
			}
			cursor = Math.max(cursor, sub.end.getTime());
			k++;
		}

		if (cursor < end) {
			result.push(Object.freeze({ start: new Date(cursor), end: new Date(end) }));
		}
	}

	return result;
}

/**
 * Checks whether an interval overlaps any member of a merged interval list.
 *
 * `merged` must be sorted and disjoint (the output of mergeIntervals). Because
 * both starts and ends are then ascending, the first interval ending after
 * `interval.start` is the only candidate worth testing, and it is found by
 * binary search.
 */
export function overlapsAny(merged: readonly Interval[], interval: Interval): boolean {
	const start = interval.start.getTime();
	let low = 0;
	let high = merged.length;

	while (low < high) {
		const mid = (low + high) >>> 1;
		if (merged[mid].end.getTime() > start) {
			high = mid;
		} else {
			low = mid + 1;
		}
	}

	return low < merged.length && merged[low].start < interval.end;
}
