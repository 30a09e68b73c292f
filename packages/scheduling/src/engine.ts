/**
 * Scheduling engine: validates a request, loads busy time through a
 * CalendarSource and runs the pure resolution pipeline.
 */

import { resolveScoringWeights } from './config.js';
import { CalendarSourceError, ValidationError } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import { buildBusySets, resolveAvailability } from './resolver.js';
import { scoreSlots } from './scorer.js';
import { selectSlots } from './selector.js';
import type {
	BusyIntervalsByParticipant,
	CalendarSource,
	CreateSchedulerOptions,
	FindSlotsOptions,
	Interval,
	ParticipantId,
	ResolvedSchedulingRequest,
	Scheduler,
	SchedulingError,
	SchedulingRequest,
	SchedulingResult,
	ScoredSlot,
	ScoringWeights,
} from './types.js';
import { validateSchedulingRequest } from './validation.js';
import { generateCandidateWindows } from './window.js';

/**
 * Options for a one-off findAvailableSlots call.
 */
export interface FindAvailableSlotsOptions extends FindSlotsOptions {
	logger?: Logger;
	weights?: Partial<ScoringWeights>;
}

interface FetchOutcome {
	busy: Readonly<Record<ParticipantId, readonly Interval[]>>;
	degraded: ParticipantId[];
}

/**
 * Runs generation, resolution, scoring and selection over a busy snapshot.
 * Synchronous and deterministic: the same request and snapshot always give
 * the same slots in the same order.
 *
 * @throws InvalidIntervalError when the snapshot holds a malformed interval
 */
export function computeRankedSlots(
	request: ResolvedSchedulingRequest,
	busyByParticipant: Readonly<Record<ParticipantId, readonly Interval[]>>,
	weights: ScoringWeights = resolveScoringWeights(),
	logger: Logger = silentLogger,
): ScoredSlot[] {
	const busySets = buildBusySets(request.attendees, busyByParticipant);
	const candidates = resolveAvailability(
		generateCandidateWindows(request),
		busySets,
		request.minParticipantsAvailable,
	);
	logger.debug('resolved availability', { qualifying: candidates.length });

	const scored = scoreSlots(candidates, request, weights);
	const selected = selectSlots(scored, request);
	logger.debug('selected slots', { selected: selected.length });

	return selected;
}

function toSchedulingError(error: ValidationError | CalendarSourceError): SchedulingError {
	if (error instanceof ValidationError) {
		return { code: 'invalid_request', message: error.message, issues: error.issues };
	}
	return { code: 'source_unavailable', message: error.message, cause: error.cause };
}

function abortedError(request: ResolvedSchedulingRequest, signal: AbortSignal): CalendarSourceError {
	return new CalendarSourceError('Calendar lookup was aborted', [...request.attendees], {
		cause: signal.reason,
	});
}

async function fetchPerAttendee(
	source: CalendarSource,
	request: ResolvedSchedulingRequest,
	signal: AbortSignal | undefined,
	logger: Logger,
): Promise<FetchOutcome> {
	const range = { start: request.windowStart, end: request.windowEnd };
	const results = await Promise.allSettled(
		request.attendees.map((participantId) =>
			source.getBusyIntervals({ participantIds: [participantId], range, signal }),
		),
	);

	const entries: [ParticipantId, readonly Interval[]][] = [];
	const degraded: ParticipantId[] = [];
	const reasons: unknown[] = [];

	results.forEach((result, index) => {
		const participantId = request.attendees[index];
		if (result.status === 'fulfilled') {
			const busy = Object.hasOwn(result.value, participantId) ? result.value[participantId] : [];
			entries.push([participantId, busy]);
			return;
		}
		logger.warn('calendar lookup failed, treating participant as available', {
			participant: participantId,
			error: result.reason,
		});
		degraded.push(participantId);
		reasons.push(result.reason);
	});

	if (signal?.aborted) {
		throw abortedError(request, signal);
	}
	if (degraded.length === request.attendees.length) {
		throw new CalendarSourceError('Calendar lookup failed for every attendee', degraded, {
			cause: reasons[0],
		});
	}

	return { busy: Object.fromEntries(entries), degraded };
}

async function fetchBusyIntervals(
	source: CalendarSource,
	request: ResolvedSchedulingRequest,
	signal: AbortSignal | undefined,
	logger: Logger,
): Promise<FetchOutcome> {
	if (source.batch === false) {
		return fetchPerAttendee(source, request, signal, logger);
	}

	let busy: BusyIntervalsByParticipant;
	try {
		busy = await source.getBusyIntervals({
			participantIds: [...request.attendees],
			range: { start: request.windowStart, end: request.windowEnd },
			signal,
		});
	} catch (error) {
		if (signal?.aborted) {
			throw abortedError(request, signal);
		}
		logger.warn('batch calendar lookup failed, retrying per attendee', { error });
		return fetchPerAttendee(source, request, signal, logger);
	}

	return { busy, degraded: [] };
}

async function runPipeline(
	input: SchedulingRequest,
	source: CalendarSource,
	signal: AbortSignal | undefined,
	logger: Logger,
	resolveWeights: () => ScoringWeights,
): Promise<SchedulingResult> {
	let request: ResolvedSchedulingRequest;
	let weights: ScoringWeights;
	try {
		request = validateSchedulingRequest(input);
		weights = resolveWeights();
	} catch (error) {
		if (error instanceof ValidationError) {
			logger.info('rejected scheduling request', { issues: error.issues.length });
			return { ok: false, error: toSchedulingError(error) };
		}
		throw error;
	}
	logger.debug('validated request', {
		attendees: request.attendees.length,
		durationMinutes: request.durationMinutes,
		timezone: request.timezone,
		seed: request.seed,
	});

	let fetched: FetchOutcome;
	try {
		if (signal?.aborted) {
			throw abortedError(request, signal);
		}
		fetched = await fetchBusyIntervals(source, request, signal, logger);
		if (signal?.aborted) {
			throw abortedError(request, signal);
		}
	} catch (error) {
		if (error instanceof CalendarSourceError) {
			logger.error('calendar source unavailable', { error });
			return { ok: false, error: toSchedulingError(error) };
		}
		throw error;
	}
	logger.debug('fetched busy intervals', {
		participants: request.attendees.length,
		degraded: fetched.degraded.length,
	});

	const slots = computeRankedSlots(request, fetched.busy, weights, logger);
	const status = slots.length > 0 ? 'available' : 'no_availability';
	logger.info('scheduling complete', { status, slots: slots.length });

	return { ok: true, status, slots, degradedParticipants: fetched.degraded };
}

/**
 * Finds meeting slots for a request against a calendar source.
 *
 * Expected outcomes are returned, never thrown: an invalid request yields
 * `invalid_request`, a source that fails for everyone (or an aborted signal)
 * yields `source_unavailable`, and a window with no common free time is a
 * success with status `no_availability`.
 *
 * @throws InvalidIntervalError when the source returns a malformed interval
 *
 * @example
 * ```typescript
 * const result = await findAvailableSlots(
 *   {
 *     attendees: ['jane@company.com', 'alex@company.com'],
 *     durationMinutes: 30,
 *     windowStart: new Date('2025-01-06T00:00:00Z'),
 *     windowEnd: new Date('2025-01-10T00:00:00Z'),
 *   },
 *   createStaticCalendarSource({}),
 * );
 * if (result.ok) console.log(result.slots[0].reason);
 * ```
 */
export async function findAvailableSlots(
	request: SchedulingRequest,
	source: CalendarSource,
	options: FindAvailableSlotsOptions = {},
): Promise<SchedulingResult> {
	return runPipeline(request, source, options.signal, options.logger ?? silentLogger, () =>
		resolveScoringWeights(options.weights),
	);
}

/**
 * Creates a scheduler bound to a calendar source.
 * Weight overrides are validated here, once.
 *
 * @throws ValidationError when a weight override is out of range
 *
 * @example
 * ```typescript
 * const scheduler = createScheduler({
 *   source: createMockCalendarSource({ busyness: 0.4 }),
 *   logger: createConsoleLogger({ level: 'debug' }),
 * });
 * const result = await scheduler.findAvailableSlots(request);
 * ```
 */
export function createScheduler(options: CreateSchedulerOptions): Scheduler {
	const { source } = options;
	const logger = options.logger ?? silentLogger;
	const weights = resolveScoringWeights(options.weights);

	return {
		findAvailableSlots: (request, callOptions = {}) =>
			runPipeline(request, source, callOptions.signal, logger, () => weights),
	};
}
