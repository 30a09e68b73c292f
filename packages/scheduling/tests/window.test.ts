import { describe, expect, test } from 'vitest';
import { generateCandidateWindows, type WindowRequest } from '../src/window.js';

const d = (iso: string) => new Date(iso);

function windowRequest(overrides: Partial<WindowRequest> = {}): WindowRequest {
	return {
		durationMinutes: 60,
		// Monday 2025-01-06
		windowStart: d('2025-01-06T00:00:00Z'),
		windowEnd: d('2025-01-07T00:00:00Z'),
		workingDays: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
		workingHoursStart: '09:00',
		workingHoursEnd: '17:00',
		timezone: 'UTC',
		alignmentMinutes: 15,
		...overrides,
	};
}

const starts = (request: WindowRequest) =>
	[...generateCandidateWindows(request)].map((window) => window.start.toISOString());

describe('generateCandidateWindows', () => {
	test('steps through working hours on alignment boundaries', () => {
		const windows = [...generateCandidateWindows(windowRequest())];

		expect(windows).toHaveLength(29);
		expect(windows[0].start.toISOString()).toBe('2025-01-06T09:00:00.000Z');
		expect(windows[0].end.toISOString()).toBe('2025-01-06T10:00:00.000Z');
		expect(windows[1].start.toISOString()).toBe('2025-01-06T09:15:00.000Z');
		expect(windows[28].start.toISOString()).toBe('2025-01-06T16:00:00.000Z');
		expect(windows[28].end.toISOString()).toBe('2025-01-06T17:00:00.000Z');
		expect(new Set(windows.map((window) => window.day))).toEqual(new Set(['2025-01-06']));
	});

	test('is restartable', () => {
		const windows = generateCandidateWindows(windowRequest());

		const first = [...windows].map((window) => window.start.getTime());
		const second = [...windows].map((window) => window.start.getTime());

		expect(second).toEqual(first);
		expect(first.length).toBeGreaterThan(0);
	});

	test('skips days outside the working days', () => {
		// Saturday 2025-01-11 through Sunday
		const request = windowRequest({
			windowStart: d('2025-01-11T00:00:00Z'),
			windowEnd: d('2025-01-13T00:00:00Z'),
		});

		expect(starts(request)).toEqual([]);
	});

	test('fits a full working day exactly once per day', () => {
		const request = windowRequest({
			durationMinutes: 480,
			windowEnd: d('2025-01-11T00:00:00Z'),
		});

		expect(starts(request)).toEqual([
			'2025-01-06T09:00:00.000Z',
			'2025-01-07T09:00:00.000Z',
			'2025-01-08T09:00:00.000Z',
			'2025-01-09T09:00:00.000Z',
			'2025-01-10T09:00:00.000Z',
		]);
	});

	test('yields nothing when the duration exceeds the working day', () => {
		expect(starts(windowRequest({ durationMinutes: 480, workingHoursEnd: '12:00' }))).toEqual([]);
	});

	test('clips to the request window and rounds the first start up to a boundary', () => {
		const request = windowRequest({
			windowStart: d('2025-01-06T10:07:00Z'),
			windowEnd: d('2025-01-06T12:00:00Z'),
		});

		expect(starts(request)).toEqual([
			'2025-01-06T10:15:00.000Z',
			'2025-01-06T10:30:00.000Z',
			'2025-01-06T10:45:00.000Z',
			'2025-01-06T11:00:00.000Z',
		]);
	});

	test('honours a coarser alignment', () => {
		const request = windowRequest({
			alignmentMinutes: 30,
			windowStart: d('2025-01-06T09:10:00Z'),
			windowEnd: d('2025-01-06T11:00:00Z'),
		});

		expect(starts(request)).toEqual(['2025-01-06T09:30:00.000Z', '2025-01-06T10:00:00.000Z']);
	});

	test('interprets working hours in the request timezone', () => {
		const windows = [...generateCandidateWindows(windowRequest({ timezone: 'Europe/Berlin' }))];

		expect(windows).toHaveLength(29);
		expect(windows[0].start.toISOString()).toBe('2025-01-06T08:00:00.000Z');
		expect(windows[28].end.toISOString()).toBe('2025-01-06T16:00:00.000Z');
	});

	test('follows daylight saving transitions', () => {
		// New York moves to EDT on Sunday 2025-03-09
		const windows = [
			...generateCandidateWindows(
				windowRequest({
					durationMinutes: 480,
					timezone: 'America/New_York',
					windowStart: d('2025-03-07T00:00:00Z'),
					windowEnd: d('2025-03-11T00:00:00Z'),
				}),
			),
		];

		expect(windows.map((window) => [window.day, window.start.toISOString()])).toEqual([
			['2025-03-07', '2025-03-07T14:00:00.000Z'],
			['2025-03-10', '2025-03-10T13:00:00.000Z'],
		]);
	});

	test('aligns to the local clock in half-hour offset zones', () => {
		const request = windowRequest({
			timezone: 'Asia/Kolkata',
			alignmentMinutes: 60,
			workingHoursEnd: '12:00',
		});

		expect(starts(request)).toEqual([
			'2025-01-06T03:30:00.000Z',
			'2025-01-06T04:30:00.000Z',
			'2025-01-06T05:30:00.000Z',
		]);
	});
});
