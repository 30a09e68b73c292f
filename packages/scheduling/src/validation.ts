/**
 * SchedulingRequest validation.
 *
 * Requests are checked once, at entry to the engine. Anything that fails is
 * rejected whole with a ValidationError; nothing is partially processed.
 */

import { z } from 'zod';
import { DEFAULT_REQUEST_OPTIONS, REQUEST_LIMITS } from './config.js';
import { ValidationError } from './errors.js';
import { deriveRequestSeed } from './seed.js';
import type { ResolvedSchedulingRequest, ValidationIssue } from './types.js';
import { isValidTimeZone, parseLocalTime } from './zoned.js';

const dayOfWeekSchema = z.enum([
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
	'sunday',
]);

const localTimeSchema = z
	.string()
	.refine((value) => parseLocalTime(value) !== null, 'must be a 24-hour time in HH:MM format');

const validDate = z.date({ errorMap: () => ({ message: 'must be a valid Date' }) });

export const schedulingRequestSchema = z
	.object({
		attendees: z
			.array(z.string().trim().min(1, 'must not be blank'))
			.min(1, 'must list at least one attendee'),
		durationMinutes: z
			.number()
			.int('must be a whole number of minutes')
			.min(REQUEST_LIMITS.minDurationMinutes, 'must be at least 15 minutes')
			.max(REQUEST_LIMITS.maxDurationMinutes, 'must be at most 480 minutes (8 hours)'),
		windowStart: validDate,
		windowEnd: validDate,
		workingDays: z.array(dayOfWeekSchema).min(1, 'must include at least one day').optional(),
		workingHoursStart: localTimeSchema.optional(),
		workingHoursEnd: localTimeSchema.optional(),
		timezone: z.string().refine(isValidTimeZone, 'must be an IANA timezone').optional(),
		alignmentMinutes: z
			.number()
			.int('must be a whole number of minutes')
			.positive('must be positive')
			.refine((value) => 60 % value === 0, 'must divide 60 evenly')
			.optional(),
		maxResults: z.number().int().min(1).max(REQUEST_LIMITS.maxResults).optional(),
		maxPerDay: z.number().int().min(1).max(REQUEST_LIMITS.maxPerDay).optional(),
		minParticipantsAvailable: z.number().int().min(1, 'must be at least 1').optional(),
		jitter: z.number().min(0).max(REQUEST_LIMITS.maxJitter).optional(),
		seed: z.string().min(1).optional(),
	})
	.superRefine((request, ctx) => {
		if (request.windowStart >= request.windowEnd) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['windowEnd'],
				message: 'must be after windowStart',
			});
		} else if (
			request.windowEnd.getTime() - request.windowStart.getTime() >
			REQUEST_LIMITS.maxWindowDays * 86_400_000
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['windowEnd'],
				message: `must be within ${REQUEST_LIMITS.maxWindowDays} days of windowStart`,
			});
		}

		const hoursStart = parseLocalTime(
			request.workingHoursStart ?? DEFAULT_REQUEST_OPTIONS.workingHoursStart,
		);
		const hoursEnd = parseLocalTime(request.workingHoursEnd ?? DEFAULT_REQUEST_OPTIONS.workingHoursEnd);
		if (hoursStart !== null && hoursEnd !== null && hoursStart >= hoursEnd) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['workingHoursEnd'],
				message: 'must be after workingHoursStart',
			});
		}

		const attendeeCount = new Set(request.attendees).size;
		if (
			request.minParticipantsAvailable !== undefined &&
			request.minParticipantsAvailable > attendeeCount
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['minParticipantsAvailable'],
				message: `must not exceed the number of attendees (${attendeeCount})`,
			});
		}
	});

function toIssues(error: z.ZodError): ValidationIssue[] {
	return error.issues.map((issue) => ({
		path: issue.path.join('.'),
		message: issue.message,
	}));
}

/**
 * Validates a request and fills in every default.
 *
 * Attendee ids are trimmed and duplicates collapsed, keeping the first
 * occurrence, so the resolved list preserves the caller's order.
 *
 * @throws ValidationError listing every violated rule
 *
 * @example
 * ```typescript
 * const resolved = validateSchedulingRequest({
 *   attendees: ['a@x.com', 'b@x.com'],
 *   durationMinutes: 60,
 *   windowStart: new Date('2025-01-06T09:00:00Z'),
 *   windowEnd: new Date('2025-01-06T17:00:00Z'),
 * });
 * resolved.minParticipantsAvailable; // 2
 * ```
 */
export function validateSchedulingRequest(input: unknown): ResolvedSchedulingRequest {
	const parsed = schedulingRequestSchema.safeParse(input);
	if (!parsed.success) {
		throw new ValidationError(toIssues(parsed.error));
	}

	const request = parsed.data;
	const attendees = [...new Set(request.attendees)];
	const windowStart = new Date(request.windowStart.getTime());
	const windowEnd = new Date(request.windowEnd.getTime());

	return Object.freeze({
		attendees: Object.freeze(attendees),
		durationMinutes: request.durationMinutes,
		windowStart,
		windowEnd,
		workingDays: Object.freeze([...new Set(request.workingDays ?? DEFAULT_REQUEST_OPTIONS.workingDays)]),
		workingHoursStart: request.workingHoursStart ?? DEFAULT_REQUEST_OPTIONS.workingHoursStart,
		workingHoursEnd: request.workingHoursEnd ?? DEFAULT_REQUEST_OPTIONS.workingHoursEnd,
		timezone: request.timezone ?? DEFAULT_REQUEST_OPTIONS.timezone,
		alignmentMinutes: request.alignmentMinutes ?? DEFAULT_REQUEST_OPTIONS.alignmentMinutes,
		maxResults: request.maxResults ?? DEFAULT_REQUEST_OPTIONS.maxResults,
		maxPerDay: request.maxPerDay ?? DEFAULT_REQUEST_OPTIONS.maxPerDay,
		minParticipantsAvailable: request.minParticipantsAvailable ?? attendees.length,
		jitter: request.jitter ?? DEFAULT_REQUEST_OPTIONS.jitter,
		seed:
			request.seed ??
			deriveRequestSeed({
				attendees,
				windowStart,
				windowEnd,
				durationMinutes: request.durationMinutes,
			}),
	});
}
