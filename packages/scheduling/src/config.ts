/**
 * Engine defaults and scoring configuration.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { DayOfWeek, LocalTime, ScoringWeights } from './types.js';

export interface RequestDefaults {
	workingDays: readonly DayOfWeek[];
	workingHoursStart: LocalTime;
	workingHoursEnd: LocalTime;
	timezone: string;
	alignmentMinutes: number;
	maxResults: number;
	maxPerDay: number;
	jitter: number;
}

/**
 * Defaults applied to optional SchedulingRequest fields.
 */
export const DEFAULT_REQUEST_OPTIONS: Readonly<RequestDefaults> = Object.freeze({
	workingDays: Object.freeze<DayOfWeek[]>(['monday', 'tuesday', 'wednesday', 'thursday', 'friday']),
	workingHoursStart: '09:00',
	workingHoursEnd: '17:00',
	timezone: 'UTC',
	alignmentMinutes: 15,
	maxResults: 20,
	maxPerDay: 5,
	jitter: 0,
});

/**
 * Limits enforced during request validation.
 */
export const REQUEST_LIMITS = {
	minDurationMinutes: 15,
	maxDurationMinutes: 480,
	maxWindowDays: 366,
	maxResults: 100,
	maxPerDay: 48,
	maxJitter: 0.1,
} as const;

/**
 * Reference weighting: availability dominates, preferences break ties.
 */
export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
	availability: 0.7,
	preference: 0.3,
	timeOfDay: 0.6,
	dayOfWeek: 0.4,
	attendeePenalty: 0.05,
	maxAttendeePenalty: 0.25,
	seasonal: 1,
});

const weight = z.number().finite().min(0).max(1);

export const scoringWeightsSchema = z
	.object({
		availability: weight,
		preference: weight,
		timeOfDay: weight,
		dayOfWeek: weight,
		attendeePenalty: weight,
		maxAttendeePenalty: weight,
		seasonal: z.number().finite().min(0).max(5),
	})
	.partial()
	.strict();

/**
 * Merges partial weight overrides over the defaults.
 *
 * @throws ValidationError when an override is out of range or unknown
 */
export function resolveScoringWeights(overrides: Partial<ScoringWeights> = {}): ScoringWeights {
	const parsed = scoringWeightsSchema.safeParse(overrides);
	if (!parsed.success) {
		throw new ValidationError(
			parsed.error.issues.map((issue) => ({
				path: ['weights', ...issue.path].join('.'),
				message: issue.message,
			})),
		);
	}

	const data = parsed.data;
	return {
		availability: data.availability ?? DEFAULT_SCORING_WEIGHTS.availability,
		preference: data.preference ?? DEFAULT_SCORING_WEIGHTS.preference,
		timeOfDay: data.timeOfDay ?? DEFAULT_SCORING_WEIGHTS.timeOfDay,
		dayOfWeek: data.dayOfWeek ?? DEFAULT_SCORING_WEIGHTS.dayOfWeek,
		attendeePenalty: data.attendeePenalty ?? DEFAULT_SCORING_WEIGHTS.attendeePenalty,
		maxAttendeePenalty: data.maxAttendeePenalty ?? DEFAULT_SCORING_WEIGHTS.maxAttendeePenalty,
		seasonal: data.seasonal ?? DEFAULT_SCORING_WEIGHTS.seasonal,
	};
}
