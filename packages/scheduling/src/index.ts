/**
 * Quorum Scheduling
 *
 * A stateless engine that finds meeting slots where enough participants are
 * free, scores them and returns a deterministic, ranked selection.
 *
 * @packageDocumentation
 */

export type {
	BusyIntervalsByParticipant,
	BusyIntervalsQuery,
	CalendarSource,
	CandidateSlot,
	CandidateWindow,
	CreateSchedulerOptions,
	DateRange,
	DayKey,
	DayOfWeek,
	FindSlotsOptions,
	FreeBusyPeriod,
	FreeBusyResponse,
	Interval,
	LocalTime,
	ParticipantBusySet,
	ParticipantId,
	ResolvedSchedulingRequest,
	Scheduler,
	SchedulingError,
	SchedulingErrorCode,
	SchedulingRequest,
	SchedulingResult,
	ScoredSlot,
	ScoringWeights,
	ValidationIssue,
} from './types.js';

export {
	DEFAULT_REQUEST_OPTIONS,
	DEFAULT_SCORING_WEIGHTS,
	REQUEST_LIMITS,
	resolveScoringWeights,
	scoringWeightsSchema,
} from './config.js';
export type { RequestDefaults } from './config.js';

export { CalendarSourceError, ValidationError } from './errors.js';

export { createConsoleLogger, formatLogLine, silentLogger } from './logger.js';
export type { ConsoleLoggerOptions, LogContext, Logger, LogLevel } from './logger.js';

export { deriveRequestSeed, fnv1a32, mulberry32 } from './seed.js';

export { schedulingRequestSchema, validateSchedulingRequest } from './validation.js';

export { generateCandidateWindows } from './window.js';
export type { WindowRequest } from './window.js';

export { buildBusySets, findCommonFreeIntervals, resolveAvailability } from './resolver.js';

export {
	attendeeFactor,
	dayOfWeekPreference,
	describeSlot,
	scoreSlot,
	scoreSlots,
	seasonalAdjustment,
	timeOfDayPreference,
} from './scorer.js';
export type { ScoreRequest } from './scorer.js';

export { compareByRank, selectSlots } from './selector.js';
export type { SelectRequest } from './selector.js';

export { computeRankedSlots, createScheduler, findAvailableSlots } from './engine.js';
export type { FindAvailableSlotsOptions } from './engine.js';

export { AvailabilityViewStatus, busyIntervalsFromAvailabilityView, busyIntervalsFromFreeBusy } from './helpers.js';
export type { AvailabilityViewOptions } from './helpers.js';

export { createCachedCalendarSource, DEFAULT_CACHE_TTL_MS } from './cache.js';
export type { CachedCalendarSource, CachedCalendarSourceOptions } from './cache.js';

export { createMockCalendarSource, createStaticCalendarSource, generateMockDay } from './sources.js';
export type { MockCalendarSourceOptions, StaticCalendarSourceOptions } from './sources.js';

export { InvalidIntervalError, createInterval, mergeIntervals } from '@quorum/core';
