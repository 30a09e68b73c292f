/**
 * Timezone helpers. Wall-clock conversions go through date-fns-tz so DST
 * transitions resolve to the correct UTC instant.
 */

import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import type { DayKey, DayOfWeek, LocalTime } from './types.js';

/**
 * Maps JavaScript's getUTCDay() (0=Sunday) to our DayOfWeek type.
 */
export const DAY_INDEX_TO_NAME: readonly DayOfWeek[] = [
	'sunday',
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
];

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Wall-clock fields of an instant in a timezone.
 */
export interface LocalParts {
	day: DayKey;
	weekday: DayOfWeek;
	hour: number;
	minute: number;
	/** 1-12 */
	month: number;
}

/**
 * Returns true when `timezone` is an IANA zone Intl understands.
 */
export function isValidTimeZone(timezone: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: timezone });
		return true;
	} catch {
		return false;
	}
}

/**
 * Parses "HH:MM" into minutes after midnight, or null when malformed.
 */
export function parseLocalTime(time: LocalTime): number | null {
	const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(time);
	if (!match) {
		return null;
	}
	return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Local calendar day of an instant.
 */
export function toDayKey(date: Date, timezone: string): DayKey {
	return formatInTimeZone(date, timezone, 'yyyy-MM-dd');
}

/**
 * Reads the wall-clock fields of `date` in `timezone`.
 */
export function toLocalParts(date: Date, timezone: string): LocalParts {
	const [day, hour, minute, month] = formatInTimeZone(date, timezone, "yyyy-MM-dd'|'H'|'m'|'M").split(
		'|',
	);
	return {
		day,
		weekday: dayOfWeekOf(day),
		hour: Number(hour),
		minute: Number(minute),
		month: Number(month),
	};
}

/**
 * Converts a local date and time in a timezone to the UTC instant.
 *
 * @example
 * localDateTimeToUtc('2025-01-06', '09:00', 'Europe/Berlin');
 * // 2025-01-06T08:00:00.000Z
 */
export function localDateTimeToUtc(day: DayKey, time: LocalTime, timezone: string): Date {
	return fromZonedTime(`${day}T${time}:00`, timezone);
}

/**
 * Day of week of a calendar date. Independent of timezone: a date is a date.
 */
export function dayOfWeekOf(day: DayKey): DayOfWeek {
	return DAY_INDEX_TO_NAME[new Date(`${day}T12:00:00Z`).getUTCDay()];
}

/**
 * Adds whole days to a calendar date.
 */
export function addDaysToKey(day: DayKey, days: number): DayKey {
	const noon = new Date(`${day}T12:00:00Z`).getTime();
	return new Date(noon + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Iterates calendar dates from `first` to `last` inclusive.
 */
export function* iterateDays(first: DayKey, last: DayKey): Generator<DayKey> {
	for (let day = first; day <= last; day = addDaysToKey(day, 1)) {
		yield day;
	}
}
