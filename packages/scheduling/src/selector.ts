/**
 * Slot selection: per-day caps, deduplication, ordering and recommendation.
 */

import { intervalsOverlap } from '@quorum/core';
import type { DayKey, ResolvedSchedulingRequest, ScoredSlot } from './types.js';

export type SelectRequest = Pick<ResolvedSchedulingRequest, 'maxResults' | 'maxPerDay'>;

/**
 * Ranking order within a day: score descending, then earliest start.
 */
export function compareByRank(a: ScoredSlot, b: ScoredSlot): number {
	if (b.score !== a.score) return b.score - a.score;
	return a.start.getTime() - b.start.getTime();
}

function groupByDay(slots: readonly ScoredSlot[]): Map<DayKey, ScoredSlot[]> {
	const byDay = new Map<DayKey, ScoredSlot[]>();
	for (const slot of slots) {
		const group = byDay.get(slot.day);
		if (group) {
			group.push(slot);
		} else {
			byDay.set(slot.day, [slot]);
		}
	}
	return byDay;
}

/**
 * Picks the slots to present.
 *
 * 1. Groups slots by local calendar day and ranks each day by score.
 * 2. Keeps up to `maxPerDay` of each day, skipping any slot that overlaps one
 *    already kept for that day.
 * 3. Orders everything by start time and truncates to `maxResults`.
 * 4. Marks the top-ranked returned slot of every day as recommended.
 *
 * Input slots are not mutated; returned slots are new objects.
 *
 * @example
 * ```typescript
 * const presented = selectSlots(scoreSlots(slots, request), { maxResults: 10, maxPerDay: 3 });
 * ```
 */
export function selectSlots(slots: readonly ScoredSlot[], request: SelectRequest): ScoredSlot[] {
	if (slots.length === 0) {
		return [];
	}

	const kept: ScoredSlot[] = [];
	for (const daySlots of groupByDay(slots).values()) {
		const chosen: ScoredSlot[] = [];
		for (const slot of [...daySlots].sort(compareByRank)) {
			if (chosen.length >= request.maxPerDay) break;
			if (chosen.some((other) => intervalsOverlap(other, slot))) continue;
			chosen.push(slot);
		}
		kept.push(...chosen);
	}

	const returned = kept
		.sort((a, b) => a.start.getTime() - b.start.getTime() || compareByRank(a, b))
		.slice(0, request.maxResults);

	const recommended = new Map<DayKey, ScoredSlot>();
	for (const slot of returned) {
		const best = recommended.get(slot.day);
		if (!best || compareByRank(slot, best) < 0) {
			recommended.set(slot.day, slot);
		}
	}

	return returned.map((slot) =>
		Object.freeze({ ...slot, isRecommended: recommended.get(slot.day) === slot }),
	);
}
