/**
 * Scheduling Engine Type Definitions
 *
 * A stateless availability resolution engine for multi-participant meetings.
 * All intervals are half-open: [start, end)
 * All times are UTC internally; working hours and calendar days are
 * interpreted in the request's IANA timezone.
 */

import type { DateRange, Interval } from '@quorum/core';
import type { Logger } from './logger.js';

export type { DateRange, Interval };

/**
 * Opaque identifier for a participant, typically an email address.
 */
export type ParticipantId = string;

/**
 * Days of the week used for working-day rules.
 * Lowercase string literals for consistent parsing.
 */
export type DayOfWeek =
	| 'monday'
	| 'tuesday'
	| 'wednesday'
	| 'thursday'
	| 'friday'
	| 'saturday'
	| 'sunday';

/**
 * A local time string in HH:MM format (24-hour).
 *
 * @example "09:00", "17:30"
 */
export type LocalTime = string;

/**
 * A local calendar date in YYYY-MM-DD format.
 */
export type DayKey = string;

/**
 * A request to find meeting times, as built by the conversational layer.
 * Only the first four fields are required; everything else has a default.
 *
 * @example
 * const request: SchedulingRequest = {
 *   attendees: ['jane.smith@company.com', 'alex.wilson@company.com'],
 *   durationMinutes: 60,
 *   windowStart: new Date('2025-01-06T00:00:00Z'),
 *   windowEnd: new Date('2025-01-11T00:00:00Z'),
 *   timezone: 'Europe/Berlin',
 * };
 */
export interface SchedulingRequest {
	/** Participants whose calendars are checked */
	attendees: ParticipantId[];
	/** Meeting length, 15 to 480 minutes */
	durationMinutes: number;
	/** Start of the search window (inclusive) */
	windowStart: Date;
	/** End of the search window (exclusive) */
	windowEnd: Date;
	/** Days meetings may be placed on; defaults to Monday through Friday */
	workingDays?: DayOfWeek[];
	/** Start of the working day in local time; defaults to "09:00" */
	workingHoursStart?: LocalTime;
	/** End of the working day in local time; defaults to "17:00" */
	workingHoursEnd?: LocalTime;
	/** IANA timezone for working hours and day boundaries; defaults to "UTC" */
	timezone?: string;
	/** Candidate starts fall on multiples of this many minutes; defaults to 15 */
	alignmentMinutes?: number;
	/** Cap on the number of returned slots; defaults to 20 */
	maxResults?: number;
	/** Cap on returned slots per calendar day; defaults to 5 */
	maxPerDay?: number;
	/** How many attendees must be free; defaults to all of them */
	minParticipantsAvailable?: number;
	/** Amplitude of seeded score noise in [0, 0.1]; defaults to 0 */
	jitter?: number;
	/** Overrides the seed derived from attendees, window and duration */
	seed?: string;
}

/**
 * A validated request with every default filled in.
 */
export interface ResolvedSchedulingRequest {
	readonly attendees: readonly ParticipantId[];
	readonly durationMinutes: number;
	readonly windowStart: Date;
	readonly windowEnd: Date;
	readonly workingDays: readonly DayOfWeek[];
	readonly workingHoursStart: LocalTime;
	readonly workingHoursEnd: LocalTime;
	readonly timezone: string;
	readonly alignmentMinutes: number;
	readonly maxResults: number;
	readonly maxPerDay: number;
	readonly minParticipantsAvailable: number;
	readonly jitter: number;
	readonly seed: string;
}

/**
 * The merged busy time of one participant.
 * `busy` is sorted by start with no overlapping or adjacent members.
 */
export interface ParticipantBusySet {
	readonly participantId: ParticipantId;
	readonly busy: readonly Interval[];
}

/**
 * A start/end pair proposed by the working-window generator.
 */
export interface CandidateWindow extends Interval {
	/** Local calendar day the window starts on */
	readonly day: DayKey;
}

/**
 * A candidate window annotated with who can attend.
 * Participant lists keep the request's attendee order.
 */
export interface CandidateSlot extends CandidateWindow {
	readonly availableParticipants: readonly ParticipantId[];
	readonly unavailableParticipants: readonly ParticipantId[];
}

/**
 * A candidate slot with its desirability score.
 *
 * @example
 * const slot: ScoredSlot = {
 *   day: '2025-01-07',
 *   start: new Date('2025-01-07T10:00:00Z'),
 *   end: new Date('2025-01-07T11:00:00Z'),
 *   availableParticipants: ['a@x.com', 'b@x.com'],
 *   unavailableParticipants: [],
 *   score: 1,
 *   isRecommended: true,
 *   reason: 'All 2 participants available, mid-morning on Tuesday',
 * };
 */
export interface ScoredSlot extends CandidateSlot {
	/** Heuristic desirability in [0, 1]; not a probability */
	readonly score: number;
	/** True for the top-ranked returned slot of its calendar day */
	readonly isRecommended: boolean;
	/** Short explanation derived from the score inputs */
	readonly reason: string;
}

/**
 * Relative weights of the scoring heuristics.
 */
export interface ScoringWeights {
	/** Weight of the available/total attendee ratio */
	availability: number;
	/** Weight of the combined time-of-day and day-of-week preference */
	preference: number;
	/** Share of the preference block given to time of day */
	timeOfDay: number;
	/** Share of the preference block given to day of week */
	dayOfWeek: number;
	/** Preference penalty per attendee beyond two */
	attendeePenalty: number;
	/** Upper bound of the attendee penalty */
	maxAttendeePenalty: number;
	/** Scale applied to the seasonal adjustment (1 = reference values) */
	seasonal: number;
}

/**
 * Query passed to a calendar source.
 */
export interface BusyIntervalsQuery {
	participantIds: ParticipantId[];
	range: DateRange;
	signal?: AbortSignal;
}

/**
 * Busy intervals keyed by participant. Participants missing from the record
 * are treated as having no busy time.
 */
export type BusyIntervalsByParticipant = Record<ParticipantId, Interval[]>;

/**
 * Adapter for the external calendar provider.
 * Translating provider-specific responses into intervals is the adapter's job.
 *
 * @example
 * const source: CalendarSource = {
 *   async getBusyIntervals({ participantIds, range }) {
 *     const view = await graph.getSchedule(participantIds, range);
 *     return Object.fromEntries(
 *       participantIds.map((id, i) => [id, busyIntervalsFromAvailabilityView(view[i], range.start)]),
 *     );
 *   },
 * };
 */
export interface CalendarSource {
	/**
	 * Whether one call may carry every participant. Defaults to true; set
	 * false for providers that only answer one participant per call.
	 */
	batch?: boolean;
	getBusyIntervals(query: BusyIntervalsQuery): Promise<BusyIntervalsByParticipant>;
}

/**
 * A single busy period in a free/busy response.
 * Accepts both ISO strings and Date objects.
 */
export interface FreeBusyPeriod {
	start: string | Date;
	end: string | Date;
}

/**
 * Free/busy response in the Google Calendar shape.
 *
 * @example
 * const freebusy: FreeBusyResponse = {
 *   calendars: {
 *     'jane@company.com': {
 *       busy: [{ start: '2025-01-06T10:00:00Z', end: '2025-01-06T11:00:00Z' }],
 *     },
 *   },
 * };
 */
export interface FreeBusyResponse {
	/** Map of calendar ID to busy periods */
	calendars: Record<string, { busy?: FreeBusyPeriod[] }>;
}

/**
 * Error codes reported through SchedulingResult.
 */
export type SchedulingErrorCode = 'invalid_request' | 'source_unavailable';

/**
 * A validation problem with one request field.
 */
export interface ValidationIssue {
	path: string;
	message: string;
}

/**
 * Failure payload of a scheduling call.
 */
export interface SchedulingError {
	code: SchedulingErrorCode;
	message: string;
	issues?: ValidationIssue[];
	cause?: unknown;
}

/**
 * Outcome of findAvailableSlots. An empty result is a success with status
 * `no_availability`, never an error.
 */
export type SchedulingResult =
	| {
			ok: true;
			status: 'available' | 'no_availability';
			slots: ScoredSlot[];
			/** Attendees whose calendar lookup failed and were assumed free */
			degradedParticipants: ParticipantId[];
	  }
	| { ok: false; error: SchedulingError };

/**
 * Options for creating a scheduler.
 */
export interface CreateSchedulerOptions {
	source: CalendarSource;
	logger?: Logger;
	weights?: Partial<ScoringWeights>;
}

/**
 * Per-call options.
 */
export interface FindSlotsOptions {
	/** Aborts the calendar fetch; the pure stages are not interruptible */
	signal?: AbortSignal;
}

/**
 * A scheduler bound to a calendar source.
 */
export interface Scheduler {
	findAvailableSlots(request: SchedulingRequest, options?: FindSlotsOptions): Promise<SchedulingResult>;
}
