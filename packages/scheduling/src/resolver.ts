/**
 * Availability resolution: who is free for each candidate window.
 */

import { mergeIntervals, overlapsAny, subtractIntervals } from '@quorum/core';
import type {
	CandidateSlot,
	CandidateWindow,
	DateRange,
	Interval,
	ParticipantBusySet,
	ParticipantId,
} from './types.js';

/**
 * Builds one merged busy set per attendee, in attendee order.
 * Attendees absent from `busyByParticipant` get an empty busy set.
 *
 * @throws InvalidIntervalError when a busy interval has start >= end
 */
export function buildBusySets(
	attendees: readonly ParticipantId[],
	busyByParticipant: Readonly<Record<ParticipantId, readonly Interval[]>>,
): ParticipantBusySet[] {
	return attendees.map((participantId) => {
		const busy = Object.hasOwn(busyByParticipant, participantId) ? busyByParticipant[participantId] : [];
		return Object.freeze({
			participantId,
			busy: Object.freeze(mergeIntervals(busy)),
		});
	});
}

/**
 * Annotates candidates with participant availability and keeps those with
 * enough attendees free.
 *
 * A participant is available for a window when none of their busy intervals
 * overlaps it; touching endpoints do not conflict. Windows are kept when at
 * least `minParticipantsAvailable` (and at least one) participants are free.
 * Candidate order is preserved.
 *
 * `busySets` must come from buildBusySets so each list is merged.
 *
 * @example
 * ```typescript
 * const slots = resolveAvailability(
 *   generateCandidateWindows(request),
 *   buildBusySets(request.attendees, busy),
 *   request.minParticipantsAvailable,
 * );
 * ```
 */
export function resolveAvailability(
	candidates: Iterable<CandidateWindow>,
	busySets: readonly ParticipantBusySet[],
	minParticipantsAvailable: number,
): CandidateSlot[] {
	const threshold = Math.max(1, minParticipantsAvailable);
	const slots: CandidateSlot[] = [];

	for (const candidate of candidates) {
		const availableParticipants: ParticipantId[] = [];
		const unavailableParticipants: ParticipantId[] = [];

		for (const { participantId, busy } of busySets) {
			if (overlapsAny(busy, candidate)) {
				unavailableParticipants.push(participantId);
			} else {
				availableParticipants.push(participantId);
			}
		}

		if (availableParticipants.length >= threshold) {
			slots.push(
				Object.freeze({
					day: candidate.day,
					start: candidate.start,
					end: candidate.end,
					availableParticipants: Object.freeze(availableParticipants),
					unavailableParticipants: Object.freeze(unavailableParticipants),
				}),
			);
		}
	}

	return slots;
}

/**
 * Returns the maximal intervals inside `range` where every participant is free.
 *
 * @example
 * ```typescript
 * findCommonFreeIntervals(busySets, {
 *   start: new Date('2025-01-06T09:00:00Z'),
 *   end: new Date('2025-01-06T17:00:00Z'),
 * });
 * // [{ 09:00-10:00 }, { 11:00-17:00 }] when someone is busy 10:00-11:00
 * ```
 */
export function findCommonFreeIntervals(
	busySets: readonly ParticipantBusySet[],
	range: DateRange,
): Interval[] {
	return subtractIntervals(
		[range],
		busySets.flatMap((set) => set.busy),
	);
}
