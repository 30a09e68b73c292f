/**
 * In-memory caching for calendar sources.
 */

import { type Logger, silentLogger } from './logger.js';
import type { BusyIntervalsByParticipant, CalendarSource, DateRange, Interval, ParticipantId } from './types.js';

export interface CachedCalendarSourceOptions {
	/** How long a participant's busy intervals stay fresh; defaults to 30 minutes */
	ttlMs?: number;
	/** Clock used for expiry; defaults to Date.now */
	now?: () => number;
	logger?: Logger;
}

/**
 * A CalendarSource that remembers busy intervals per participant and range.
 */
export interface CachedCalendarSource extends CalendarSource {
	/** Drops every cached entry. */
	clear(): void;
	/** Drops the cached entries of one participant, for every range. */
	clearParticipant(participantId: ParticipantId): void;
	/** Number of fresh entries currently held. */
	readonly size: number;
}

interface CacheEntry {
	participantId: ParticipantId;
	busy: Interval[];
	expiresAt: number;
}

export const DEFAULT_CACHE_TTL_MS = 30 * 60_000;

function cacheKey(participantId: ParticipantId, range: DateRange): string {
	return `${participantId}|${range.start.getTime()}|${range.end.getTime()}`;
}

/**
 * Wraps a source so repeated lookups of the same participant and range are
 * answered from memory until they expire. Only participants without a fresh
 * entry are forwarded, in a single call, and failed lookups are not cached.
 *
 * @example
 * ```typescript
 * const source = createCachedCalendarSource(graphSource, { ttlMs: 5 * 60_000 });
 * const scheduler = createScheduler({ source });
 *
 * // after a booking lands in jane's calendar
 * source.clearParticipant('jane@company.com');
 * ```
 */
export function createCachedCalendarSource(
	source: CalendarSource,
	options: CachedCalendarSourceOptions = {},
): CachedCalendarSource {
	const ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
	const now = options.now ?? Date.now;
	const logger = options.logger ?? silentLogger;
	const entries = new Map<string, CacheEntry>();

	function evictExpired(at: number): void {
		for (const [key, entry] of entries) {
			if (entry.expiresAt <= at) {
				entries.delete(key);
			}
		}
	}

	return {
		batch: source.batch,

		async getBusyIntervals(query) {
			query.signal?.throwIfAborted();
			evictExpired(now());

			const result: BusyIntervalsByParticipant = {};
			const misses: ParticipantId[] = [];
			for (const participantId of query.participantIds) {
				const entry = entries.get(cacheKey(participantId, query.range));
				if (entry) {
					result[participantId] = [...entry.busy];
				} else {
					misses.push(participantId);
				}
			}

			logger.debug('calendar cache lookup', {
				hits: query.participantIds.length - misses.length,
				misses: misses.length,
			});
			if (misses.length === 0) {
				return result;
			}

			const fetched = await source.getBusyIntervals({ ...query, participantIds: misses });
			const expiresAt = now() + ttlMs;
			for (const participantId of misses) {
				if (!Object.hasOwn(fetched, participantId)) {
					continue;
				}
				const busy = fetched[participantId];
				entries.set(cacheKey(participantId, query.range), { participantId, busy: [...busy], expiresAt });
				result[participantId] = busy;
			}
			return result;
		},

		clear() {
			logger.info('clearing calendar cache', { entries: entries.size });
			entries.clear();
		},

		clearParticipant(participantId) {
			logger.info('clearing calendar cache for participant', { participant: participantId });
			for (const [key, entry] of entries) {
				if (entry.participantId === participantId) {
					entries.delete(key);
				}
			}
		},

		get size() {
			evictExpired(now());
			return entries.size;
		},
	};
}
