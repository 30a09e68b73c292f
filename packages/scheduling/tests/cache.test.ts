import { describe, expect, test } from 'vitest';
import { createCachedCalendarSource } from '../src/cache.js';
import { CalendarSourceError } from '../src/errors.js';
import { createStaticCalendarSource } from '../src/sources.js';
import type { BusyIntervalsQuery, CalendarSource, Interval } from '../src/types.js';

const d = (iso: string) => new Date(iso);
const interval = (start: string, end: string): Interval => ({ start: d(start), end: d(end) });

const week = { start: d('2025-01-06T00:00:00Z'), end: d('2025-01-11T00:00:00Z') };
const nextWeek = { start: d('2025-01-13T00:00:00Z'), end: d('2025-01-18T00:00:00Z') };

const busy = {
	a: [interval('2025-01-06T10:00:00Z', '2025-01-06T11:00:00Z')],
	b: [interval('2025-01-07T14:00:00Z', '2025-01-07T15:00:00Z')],
	c: [],
};

/**
 * Static source that records the participants of each call.
 */
function recordingSource(failing: string[] = []): CalendarSource & { calls: string[][] } {
	const inner = createStaticCalendarSource(busy);
	const calls: string[][] = [];
	return {
		calls,
		async getBusyIntervals(query: BusyIntervalsQuery) {
			calls.push(query.participantIds);
			const failed = query.participantIds.filter((id) => failing.includes(id));
			if (failed.length > 0) {
				throw new CalendarSourceError('calendar offline', failed);
			}
			return inner.getBusyIntervals(query);
		},
	};
}

function manualClock(start = 0) {
	let current = start;
	return {
		now: () => current,
		advance: (ms: number) => {
			current += ms;
		},
	};
}

describe('createCachedCalendarSource', () => {
	test('answers repeated lookups from memory', async () => {
		const inner = recordingSource();
		const source = createCachedCalendarSource(inner);

		const first = await source.getBusyIntervals({ participantIds: ['a', 'b'], range: week });
		const second = await source.getBusyIntervals({ participantIds: ['a', 'b'], range: week });

		expect(inner.calls).toEqual([['a', 'b']]);
		expect(second).toEqual(first);
		expect(second).toEqual({ a: busy.a, b: busy.b });
		expect(source.size).toBe(2);
	});

	test('forwards only the participants it has not seen', async () => {
		const inner = recordingSource();
		const source = createCachedCalendarSource(inner);

		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		const result = await source.getBusyIntervals({ participantIds: ['a', 'b', 'c'], range: week });

		expect(inner.calls).toEqual([['a'], ['b', 'c']]);
		expect(result).toEqual({ a: busy.a, b: busy.b, c: [] });
	});

	test('keys entries on the queried range', async () => {
		const inner = recordingSource();
		const source = createCachedCalendarSource(inner);

		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		const later = await source.getBusyIntervals({ participantIds: ['a'], range: nextWeek });

		expect(inner.calls).toEqual([['a'], ['a']]);
		expect(later).toEqual({ a: [] });
	});

	test('refetches after the entry expires', async () => {
		const inner = recordingSource();
		const clock = manualClock();
		const source = createCachedCalendarSource(inner, { ttlMs: 1_000, now: clock.now });

		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		clock.advance(999);
		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		expect(inner.calls).toEqual([['a']]);

		clock.advance(1);
		expect(source.size).toBe(0);
		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		expect(inner.calls).toEqual([['a'], ['a']]);
	});

	test('defaults to a thirty minute lifetime', async () => {
		const inner = recordingSource();
		const clock = manualClock();
		const source = createCachedCalendarSource(inner, { now: clock.now });

		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		clock.advance(30 * 60_000 - 1);
		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		clock.advance(1);
		await source.getBusyIntervals({ participantIds: ['a'], range: week });

		expect(inner.calls).toEqual([['a'], ['a']]);
	});

	test('clears one participant across ranges', async () => {
		const inner = recordingSource();
		const source = createCachedCalendarSource(inner);

		await source.getBusyIntervals({ participantIds: ['a', 'b'], range: week });
		await source.getBusyIntervals({ participantIds: ['a'], range: nextWeek });
		source.clearParticipant('a');

		expect(source.size).toBe(1);
		await source.getBusyIntervals({ participantIds: ['a', 'b'], range: week });
		expect(inner.calls).toEqual([['a', 'b'], ['a'], ['a']]);
	});

	test('clears everything', async () => {
		const inner = recordingSource();
		const source = createCachedCalendarSource(inner);

		await source.getBusyIntervals({ participantIds: ['a', 'b'], range: week });
		source.clear();

		expect(source.size).toBe(0);
		await source.getBusyIntervals({ participantIds: ['a', 'b'], range: week });
		expect(inner.calls).toEqual([['a', 'b'], ['a', 'b']]);
	});

	test('does not cache failed lookups', async () => {
		const inner = recordingSource(['b']);
		const source = createCachedCalendarSource(inner);

		await expect(source.getBusyIntervals({ participantIds: ['b'], range: week })).rejects.toThrow(
			CalendarSourceError,
		);
		await expect(source.getBusyIntervals({ participantIds: ['b'], range: week })).rejects.toThrow(
			CalendarSourceError,
		);

		expect(inner.calls).toEqual([['b'], ['b']]);
		expect(source.size).toBe(0);
	});

	test('keeps the wrapped source batching mode', () => {
		const perAttendee = createStaticCalendarSource(busy, { batch: false });

		expect(createCachedCalendarSource(perAttendee).batch).toBe(false);
	});

	test('hands out copies of cached lists', async () => {
		const source = createCachedCalendarSource(recordingSource());

		await source.getBusyIntervals({ participantIds: ['a'], range: week });
		const cached = await source.getBusyIntervals({ participantIds: ['a'], range: week });
		cached.a.length = 0;

		expect(await source.getBusyIntervals({ participantIds: ['a'], range: week })).toEqual({ a: busy.a });
	});
});
