import { describe, expect, test } from 'vitest';
import { ValidationError } from '../src/errors.js';
import { deriveRequestSeed } from '../src/seed.js';
import type { SchedulingRequest } from '../src/types.js';
import { validateSchedulingRequest } from '../src/validation.js';

const d = (iso: string) => new Date(iso);

const baseRequest: SchedulingRequest = {
	attendees: ['a@x.com', 'b@x.com'],
	durationMinutes: 60,
	windowStart: d('2025-01-06T00:00:00Z'),
	windowEnd: d('2025-01-11T00:00:00Z'),
};

function issuesOf(input: unknown): { path: string; message: string }[] {
	try {
		validateSchedulingRequest(input);
	} catch (error) {
		if (error instanceof ValidationError) {
			return error.issues;
		}
		throw error;
	}
	throw new Error('expected a ValidationError');
}

describe('validateSchedulingRequest', () => {
	test('fills in defaults', () => {
		const resolved = validateSchedulingRequest(baseRequest);

		expect(resolved.workingDays).toEqual(['monday', 'tuesday', 'wednesday', 'thursday', 'friday']);
		expect(resolved.workingHoursStart).toBe('09:00');
		expect(resolved.workingHoursEnd).toBe('17:00');
		expect(resolved.timezone).toBe('UTC');
		expect(resolved.alignmentMinutes).toBe(15);
		expect(resolved.maxResults).toBe(20);
		expect(resolved.maxPerDay).toBe(5);
		expect(resolved.minParticipantsAvailable).toBe(2);
		expect(resolved.jitter).toBe(0);
	});

	test('derives the seed from attendees, window and duration', () => {
		const resolved = validateSchedulingRequest(baseRequest);

		expect(resolved.seed).toMatch(/^[0-9a-f]{8}$/);
		expect(resolved.seed).toBe(
			deriveRequestSeed({
				attendees: ['b@x.com', 'a@x.com'],
				windowStart: d('2025-01-06T00:00:00Z'),
				windowEnd: d('2025-01-11T00:00:00Z'),
				durationMinutes: 60,
			}),
		);
	});

	test('keeps an explicit seed', () => {
		expect(validateSchedulingRequest({ ...baseRequest, seed: 'fixed' }).seed).toBe('fixed');
	});

	test('trims attendees and collapses duplicates in first-seen order', () => {
		const resolved = validateSchedulingRequest({
			...baseRequest,
			attendees: [' b@x.com ', 'a@x.com', 'b@x.com'],
		});

		expect(resolved.attendees).toEqual(['b@x.com', 'a@x.com']);
		expect(resolved.minParticipantsAvailable).toBe(2);
	});

	test('copies the window dates', () => {
		const windowStart = d('2025-01-06T00:00:00Z');
		const resolved = validateSchedulingRequest({ ...baseRequest, windowStart });

		windowStart.setUTCDate(1);

		expect(resolved.windowStart.toISOString()).toBe('2025-01-06T00:00:00.000Z');
	});

	test('reports the failing field in the error message', () => {
		expect(() => validateSchedulingRequest({ ...baseRequest, durationMinutes: 10 })).toThrow(
			'Invalid scheduling request: durationMinutes: must be at least 15 minutes',
		);
	});

	test.each([
		[{ durationMinutes: 481 }, 'durationMinutes', 'must be at most 480 minutes (8 hours)'],
		[{ durationMinutes: 30.5 }, 'durationMinutes', 'must be a whole number of minutes'],
		[{ attendees: [] }, 'attendees', 'must list at least one attendee'],
		[{ attendees: ['a@x.com', '   '] }, 'attendees.1', 'must not be blank'],
		[{ windowStart: new Date('nope') }, 'windowStart', 'must be a valid Date'],
		[{ workingDays: [] }, 'workingDays', 'must include at least one day'],
		[{ workingHoursStart: '9:00' }, 'workingHoursStart', 'must be a 24-hour time in HH:MM format'],
		[{ timezone: 'Mars/Olympus_Mons' }, 'timezone', 'must be an IANA timezone'],
		[{ alignmentMinutes: 7 }, 'alignmentMinutes', 'must divide 60 evenly'],
		[{ minParticipantsAvailable: 0 }, 'minParticipantsAvailable', 'must be at least 1'],
	])('rejects %o', (override, path, message) => {
		expect(issuesOf({ ...baseRequest, ...override })).toContainEqual({ path, message });
	});

	test('rejects a window that ends before it starts', () => {
		expect(
			issuesOf({ ...baseRequest, windowStart: d('2025-01-07T00:00:00Z'), windowEnd: d('2025-01-07T00:00:00Z') }),
		).toEqual([{ path: 'windowEnd', message: 'must be after windowStart' }]);
	});

	test('rejects a window longer than 366 days', () => {
		expect(issuesOf({ ...baseRequest, windowEnd: d('2026-01-07T00:00:01Z') })).toEqual([
			{ path: 'windowEnd', message: 'must be within 366 days of windowStart' },
		]);
	});

	test('accepts a window of exactly 366 days', () => {
		expect(validateSchedulingRequest({ ...baseRequest, windowEnd: d('2026-01-07T00:00:00Z') }).windowEnd).toEqual(
			d('2026-01-07T00:00:00Z'),
		);
	});

	test('rejects working hours that end before they start', () => {
		expect(issuesOf({ ...baseRequest, workingHoursStart: '17:00', workingHoursEnd: '09:00' })).toEqual([
			{ path: 'workingHoursEnd', message: 'must be after workingHoursStart' },
		]);
	});

	test('rejects a participant threshold above the attendee count', () => {
		expect(issuesOf({ ...baseRequest, minParticipantsAvailable: 3 })).toEqual([
			{ path: 'minParticipantsAvailable', message: 'must not exceed the number of attendees (2)' },
		]);
	});

	test('reports every violated field at once', () => {
		const paths = issuesOf({ ...baseRequest, durationMinutes: 5, maxResults: 0 }).map((issue) => issue.path);

		expect(paths).toEqual(['durationMinutes', 'maxResults']);
	});

	test('rejects values that are not requests at all', () => {
		expect(() => validateSchedulingRequest(null)).toThrow(ValidationError);
	});
});
