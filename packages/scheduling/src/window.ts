/**
 * Working window generation.
 * Proposes every aligned start/end pair inside working hours; availability is
 * decided later by the resolver.
 */

import { addMinutes, max, min } from 'date-fns';
import type { CandidateWindow, DayKey, ResolvedSchedulingRequest } from './types.js';
import { dayOfWeekOf, iterateDays, localDateTimeToUtc, toDayKey } from './zoned.js';

/**
 * The request fields the window generator reads.
 */
export type WindowRequest = Pick<
	ResolvedSchedulingRequest,
	| 'durationMinutes'
	| 'windowStart'
	| 'windowEnd'
	| 'workingDays'
	| 'workingHoursStart'
	| 'workingHoursEnd'
	| 'timezone'
	| 'alignmentMinutes'
>;

/**
 * Generates candidate meeting windows for a request.
 *
 * Walks local calendar days in `request.timezone` from the day of
 * `windowStart` to the day of `windowEnd`, converts each working day's hours
 * to UTC, clips them to the request window, and emits windows whose starts
 * fall on `alignmentMinutes` boundaries of the local clock.
 *
 * The result is lazy and restartable: each iteration runs the generator again
 * from the first day. A duration that fits no working day yields nothing.
 *
 * @example
 * ```typescript
 * const windows = generateCandidateWindows({
 *   durationMinutes: 60,
 *   windowStart: new Date('2025-01-06T00:00:00Z'),
 *   windowEnd: new Date('2025-01-07T00:00:00Z'),
 *   workingDays: ['monday'],
 *   workingHoursStart: '09:00',
 *   workingHoursEnd: '17:00',
 *   timezone: 'UTC',
 *   alignmentMinutes: 15,
 * });
 * // 09:00-10:00, 09:15-10:15, ..., 16:00-17:00 (29 windows)
 * ```
 */
export function generateCandidateWindows(request: WindowRequest): Iterable<CandidateWindow> {
	return {
		[Symbol.iterator]: () => windowsOf(request),
	};
}

function* windowsOf(request: WindowRequest): Generator<CandidateWindow> {
	const workingDays = new Set(request.workingDays);
	const firstDay = toDayKey(request.windowStart, request.timezone);
	const lastDay = toDayKey(request.windowEnd, request.timezone);

	for (const day of iterateDays(firstDay, lastDay)) {
		if (!workingDays.has(dayOfWeekOf(day))) {
			continue;
		}
		yield* windowsOfDay(day, request);
	}
}

function* windowsOfDay(day: DayKey, request: WindowRequest): Generator<CandidateWindow> {
	const { timezone } = request;
	const rangeStart = max([request.windowStart, localDateTimeToUtc(day, request.workingHoursStart, timezone)]);
	const rangeEnd = min([request.windowEnd, localDateTimeToUtc(day, request.workingHoursEnd, timezone)]);
	if (rangeStart >= rangeEnd) {
		return;
	}

	// Align against local midnight so 15-minute steps land on :00/:15/:30/:45
	// in zones with a fractional-hour offset too.
	const stepMs = request.alignmentMinutes * 60_000;
	const midnight = localDateTimeToUtc(day, '00:00', timezone).getTime();
	const firstStep = Math.ceil((rangeStart.getTime() - midnight) / stepMs);

	for (let start = new Date(midnight + firstStep * stepMs); ; start = addMinutes(start, request.alignmentMinutes)) {
		const end = addMinutes(start, request.durationMinutes);
		if (end > rangeEnd) {
			return;
		}
		yield Object.freeze({ day, start, end });
	}
}
