/**
 * In-process calendar sources for demos, tests and offline development.
 */

import { assertValidInterval, intervalsOverlap } from '@quorum/core';
import { CalendarSourceError } from './errors.js';
import { createSeededRandom } from './seed.js';
import type {
	BusyIntervalsByParticipant,
	BusyIntervalsQuery,
	CalendarSource,
	DayOfWeek,
	Interval,
	ParticipantId,
} from './types.js';
import { addDaysToKey, dayOfWeekOf, iterateDays, localDateTimeToUtc, toDayKey } from './zoned.js';

export interface StaticCalendarSourceOptions {
	/** Answer every participant in one call; defaults to true */
	batch?: boolean;
}

function requestedParticipants(query: BusyIntervalsQuery): ParticipantId[] {
	query.signal?.throwIfAborted();
	return query.participantIds;
}

/**
 * A source backed by a fixed record of busy intervals. Only intervals
 * overlapping the queried range are returned; unknown participants get none.
 *
 * @throws InvalidIntervalError when a stored interval is malformed
 *
 * @example
 * ```typescript
 * const source = createStaticCalendarSource({
 *   'jane@company.com': [
 *     { start: new Date('2025-01-06T10:00:00Z'), end: new Date('2025-01-06T11:00:00Z') },
 *   ],
 * });
 * ```
 */
export function createStaticCalendarSource(
	busyByParticipant: Readonly<Record<ParticipantId, readonly Interval[]>>,
	options: StaticCalendarSourceOptions = {},
): CalendarSource {
	for (const intervals of Object.values(busyByParticipant)) {
		intervals.forEach(assertValidInterval);
	}

	return {
		batch: options.batch ?? true,
		async getBusyIntervals(query) {
			const entries = requestedParticipants(query).map((participantId): [string, Interval[]] => {
				const busy = Object.hasOwn(busyByParticipant, participantId) ? busyByParticipant[participantId] : [];
				return [participantId, busy.filter((interval) => intervalsOverlap(interval, query.range))];
			});
			return Object.fromEntries(entries);
		},
	};
}

export interface MockCalendarSourceOptions {
	/** Share of the working day that is booked, clamped to [0.1, 0.9]; defaults to 0.5 */
	busyness?: number;
	/** Timezone the generated working days live in; defaults to "UTC" */
	timezone?: string;
	/** Days that get generated events; defaults to Monday through Friday */
	workingDays?: DayOfWeek[];
	/** Only the first `horizonDays` days of a queried range get events; defaults to 14 */
	horizonDays?: number;
	/** Participants whose lookups fail with CalendarSourceError */
	unavailableParticipants?: ParticipantId[];
	/** Answer every participant in one call; defaults to true */
	batch?: boolean;
}

const EVENT_DURATIONS_MINUTES = [30, 45, 60, 90, 120] as const;
const MAX_PLACEMENT_ATTEMPTS = 10;

function pick<T>(random: () => number, values: readonly T[]): T {
	return values[Math.floor(random() * values.length)];
}

/**
 * Generates the mock events of one participant on one local day.
 * Events start on a quarter hour between 09:00 and 16:45 and never overlap.
 */
export function generateMockDay(
	participantId: ParticipantId,
	day: string,
	busyness: number,
	timezone: string,
): Interval[] {
	const random = createSeededRandom(participantId, day);
	const eventsPerDay = Math.round(1 + 7 * busyness);
	const events: Interval[] = [];

	for (let i = 0; i < eventsPerDay; i++) {
		for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS; attempt++) {
			const hour = 9 + Math.floor(random() * 8);
			const minute = Math.floor(random() * 4) * 15;
			const durationMinutes = pick(random, EVENT_DURATIONS_MINUTES);

			const time = `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
			const start = localDateTimeToUtc(day, time, timezone);
			const candidate = { start, end: new Date(start.getTime() + durationMinutes * 60_000) };

			if (!events.some((event) => intervalsOverlap(event, candidate))) {
				events.push(Object.freeze(candidate));
				break;
			}
		}
	}

	return events.sort((a, b) => a.start.getTime() - b.start.getTime());
}

/**
 * A source that invents plausible, reproducible calendars.
 *
 * Events depend only on the participant id, the local day, busyness and
 * timezone, so the same query always returns the same intervals.
 *
 * @example
 * ```typescript
 * const scheduler = createScheduler({
 *   source: createMockCalendarSource({ busyness: 0.7, timezone: 'Europe/Berlin' }),
 * });
 * ```
 */
export function createMockCalendarSource(options: MockCalendarSourceOptions = {}): CalendarSource {
	const busyness = Math.max(0.1, Math.min(0.9, options.busyness ?? 0.5));
	const timezone = options.timezone ?? 'UTC';
	const workingDays = new Set<DayOfWeek>(
		options.workingDays ?? ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
	);
	const horizonDays = options.horizonDays ?? 14;
	const unavailable = new Set(options.unavailableParticipants ?? []);

	return {
		batch: options.batch ?? true,
		async getBusyIntervals(query) {
			const participantIds = requestedParticipants(query);
			const failed = participantIds.filter((participantId) => unavailable.has(participantId));
			if (failed.length > 0) {
				throw new CalendarSourceError(`mock calendar: lookup failed for ${failed.join(', ')}`, failed);
			}

			const firstDay = toDayKey(query.range.start, timezone);
			const lastDay = toDayKey(query.range.end, timezone);
			const horizonEnd = addDaysToKey(firstDay, horizonDays - 1);
			const days = [...iterateDays(firstDay, lastDay < horizonEnd ? lastDay : horizonEnd)].filter((day) =>
				workingDays.has(dayOfWeekOf(day)),
			);

			const busy: BusyIntervalsByParticipant = Object.fromEntries(
				participantIds.map((participantId): [string, Interval[]] => [
					participantId,
					days
						.flatMap((day) => generateMockDay(participantId, day, busyness, timezone))
						.filter((event) => intervalsOverlap(event, query.range)),
				]),
			);
			return busy;
		},
	};
}
