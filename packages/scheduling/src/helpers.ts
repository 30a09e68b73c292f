/**
 * Adapters from calendar provider payloads to busy intervals.
 */

import { createInterval, mergeIntervals } from '@quorum/core';
import type { BusyIntervalsByParticipant, FreeBusyResponse, Interval } from './types.js';

/**
 * Status codes of a Graph `getSchedule` availability view.
 */
export const AvailabilityViewStatus = {
	Free: '0',
	Tentative: '1',
	Busy: '2',
	OutOfOffice: '3',
	WorkingElsewhere: '4',
} as const;

export interface AvailabilityViewOptions {
	/** Count tentative ("1") cells as busy; defaults to false */
	treatTentativeAsBusy?: boolean;
}

/**
 * Decodes an availability view string into merged busy intervals.
 *
 * Each character covers `intervalMinutes` starting at `start`. Busy ("2")
 * and out-of-office ("3") cells are busy; tentative ("1") cells are busy only
 * with `treatTentativeAsBusy`. Consecutive busy cells merge into one interval.
 *
 * @param view - The availabilityView string, e.g. "0022000"
 * @param start - Start of the first cell
 * @param intervalMinutes - Width of each cell
 *
 * @example
 * busyIntervalsFromAvailabilityView('0220', new Date('2025-01-06T09:00:00Z'));
 * // [{ start: 2025-01-06T09:15:00Z, end: 2025-01-06T09:45:00Z }]
 */
export function busyIntervalsFromAvailabilityView(
	view: string,
	start: Date,
	intervalMinutes = 15,
	options: AvailabilityViewOptions = {},
): Interval[] {
	const cellMs = intervalMinutes * 60_000;
	const busy: Interval[] = [];

	for (let i = 0; i < view.length; i++) {
		const status = view[i];
		const isBusy =
			status === AvailabilityViewStatus.Busy ||
			status === AvailabilityViewStatus.OutOfOffice ||
			(options.treatTentativeAsBusy === true && status === AvailabilityViewStatus.Tentative);
		if (isBusy) {
			const cellStart = start.getTime() + i * cellMs;
			busy.push(createInterval(new Date(cellStart), new Date(cellStart + cellMs)));
		}
	}

	return mergeIntervals(busy);
}

/**
 * Converts a free/busy response into busy intervals keyed by calendar id.
 *
 * @throws InvalidIntervalError when a busy period has start >= end
 *
 * @example
 * const busy = busyIntervalsFromFreeBusy({
 *   calendars: {
 *     'jane@company.com': {
 *       busy: [{ start: '2025-01-06T10:00:00Z', end: '2025-01-06T11:00:00Z' }],
 *     },
 *   },
 * });
 * // { 'jane@company.com': [{ start: 2025-01-06T10:00:00Z, end: 2025-01-06T11:00:00Z }] }
 */
export function busyIntervalsFromFreeBusy(freebusy: FreeBusyResponse): BusyIntervalsByParticipant {
	return Object.fromEntries(
		Object.entries(freebusy.calendars).map(([calendarId, calendar]): [string, Interval[]] => [
			calendarId,
			(calendar.busy ?? []).map((period) =>
				createInterval(
					period.start instanceof Date ? period.start : new Date(period.start),
					period.end instanceof Date ? period.end : new Date(period.end),
				),
			),
		]),
	);
}
