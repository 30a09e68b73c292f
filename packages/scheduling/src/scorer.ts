/**
 * Slot scoring.
 *
 * A slot's score combines how many attendees can make it with soft
 * preferences for the time of day, day of week and season. Scores are a
 * desirability heuristic in [0, 1], not a probability of acceptance.
 */

import { DEFAULT_SCORING_WEIGHTS } from './config.js';
import { createSeededRandom } from './seed.js';
import type { CandidateSlot, DayOfWeek, ResolvedSchedulingRequest, ScoredSlot, ScoringWeights } from './types.js';
import { toLocalParts } from './zoned.js';

/**
 * The request fields the scorer reads.
 */
export type ScoreRequest = Pick<ResolvedSchedulingRequest, 'attendees' | 'timezone' | 'jitter' | 'seed'>;

// Local start hour → preference. Unlisted hours score the floor value.
const TIME_OF_DAY_PREFERENCE: ReadonlyMap<number, number> = new Map([
	[10, 1.0],
	[14, 0.9],
	[11, 0.8],
	[15, 0.7],
	[9, 0.6],
	[13, 0.5],
	[12, 0.4],
	[16, 0.3],
]);
const TIME_OF_DAY_FLOOR = 0.1;

const DAY_OF_WEEK_PREFERENCE: Readonly<Record<DayOfWeek, number>> = {
	monday: 0.6,
	tuesday: 1.0,
	wednesday: 1.0,
	thursday: 0.9,
	friday: 0.5,
	saturday: 0.2,
	sunday: 0.2,
};

/**
 * Preference for a meeting starting at the given local hour (0-23).
 */
export function timeOfDayPreference(hour: number): number {
	return TIME_OF_DAY_PREFERENCE.get(hour) ?? TIME_OF_DAY_FLOOR;
}

export function dayOfWeekPreference(day: DayOfWeek): number {
	return DAY_OF_WEEK_PREFERENCE[day];
}

/**
 * Seasonal adjustment for a local month (1-12): spring and autumn get a small
 * bonus, summer and winter a small penalty.
 */
export function seasonalAdjustment(month: number): number {
	if ((month >= 3 && month <= 5) || (month >= 9 && month <= 11)) {
		return 0.02;
	}
	return -0.01;
}

/**
 * Multiplier applied to the preference block; large meetings are harder to
 * move, so preferences count for less.
 */
export function attendeeFactor(attendeeCount: number, weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): number {
	const penalty = weights.attendeePenalty * Math.max(0, attendeeCount - 2);
	return 1 - Math.min(weights.maxAttendeePenalty, penalty);
}

function timeOfDayLabel(hour: number): string {
	if (hour < 9) return 'early morning';
	if (hour === 9) return 'morning';
	if (hour === 10) return 'mid-morning';
	if (hour === 11) return 'late morning';
	if (hour === 12) return 'midday';
	if (hour === 13) return 'after lunch';
	if (hour === 14) return 'early afternoon';
	if (hour === 15) return 'mid-afternoon';
	if (hour === 16) return 'late afternoon';
	return 'evening';
}

function capitalize(value: string): string {
	return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Short explanation of a slot built from the same inputs as its score.
 *
 * @example
 * describeSlot(slot, request);
 * // "2 of 3 participants available, early afternoon on Tuesday"
 */
export function describeSlot(slot: CandidateSlot, request: Pick<ScoreRequest, 'attendees' | 'timezone'>): string {
	const total = request.attendees.length;
	const available = slot.availableParticipants.length;
	const { hour, weekday } = toLocalParts(slot.start, request.timezone);

	let who: string;
	if (available < total) {
		who = `${available} of ${total} participants available`;
	} else if (total === 1) {
		who = 'Participant available';
	} else {
		who = `All ${total} participants available`;
	}

	return `${who}, ${timeOfDayLabel(hour)} on ${capitalize(weekday)}`;
}

/**
 * Scores one candidate slot. Pure: the same slot, request and weights always
 * give the same score, jitter included, since jitter is drawn from a
 * generator seeded with the request seed and the slot start.
 *
 * @example
 * ```typescript
 * // Both attendees free on Tuesday 10:00 UTC in January:
 * // 0.7 * 1 + 0.3 * (0.6 * 1.0 + 0.4 * 1.0) - 0.01 = 0.99
 * const scored = scoreSlot(slot, request);
 * ```
 */
export function scoreSlot(
	slot: CandidateSlot,
	request: ScoreRequest,
	weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS,
): ScoredSlot {
	const total = request.attendees.length;
	const { hour, weekday, month } = toLocalParts(slot.start, request.timezone);

	const availabilityRatio = total > 0 ? slot.availableParticipants.length / total : 0;
	const preference =
		weights.timeOfDay * timeOfDayPreference(hour) + weights.dayOfWeek * dayOfWeekPreference(weekday);

	let score =
		weights.availability * availabilityRatio +
		weights.preference * preference * attendeeFactor(total, weights) +
		weights.seasonal * seasonalAdjustment(month);

	if (request.jitter > 0) {
		const random = createSeededRandom(request.seed, slot.start.toISOString());
		score += (random() - 0.5) * request.jitter;
	}

	return Object.freeze({
		...slot,
		score: Math.min(1, Math.max(0, score)),
		isRecommended: false,
		reason: describeSlot(slot, request),
	});
}

export function scoreSlots(
	slots: readonly CandidateSlot[],
	request: ScoreRequest,
	weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS,
): ScoredSlot[] {
	return slots.map((slot) => scoreSlot(slot, request, weights));
}
