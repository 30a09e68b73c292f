/**
 * Deterministic seeding.
 *
 * Seeds are derived with 32-bit FNV-1a over UTF-8 bytes and expanded with
 * mulberry32. Both are fully specified integer algorithms, so the same
 * inputs give the same numbers in every process and runtime version.
 */

import type { ParticipantId } from './types.js';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

/**
 * 32-bit FNV-1a hash of the UTF-8 encoding of `input`, as an unsigned integer.
 *
 * @example
 * fnv1a32('a'); // 0xe40c292c
 */
export function fnv1a32(input: string): number {
	let hash = FNV_OFFSET_BASIS;
	for (const byte of encoder.encode(input)) {
		hash ^= byte;
		hash = Math.imul(hash, FNV_PRIME);
	}
	return hash >>> 0;
}

/**
 * mulberry32 pseudo-random generator. Returns numbers in [0, 1).
 */
export function mulberry32(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Generator seeded from the `|`-joined parts.
 *
 * @example
 * const random = createSeededRandom('jane@company.com', '2025-01-06');
 * random(); // same value on every run
 */
export function createSeededRandom(...parts: string[]): () => number {
	return mulberry32(fnv1a32(parts.join('|')));
}

/**
 * Inputs that identify a scheduling request for seeding purposes.
 */
export interface SeedInput {
	attendees: readonly ParticipantId[];
	windowStart: Date;
	windowEnd: Date;
	durationMinutes: number;
}

/**
 * Derives the scoring seed of a request.
 *
 * The seed is the FNV-1a hash, as 8 lowercase hex digits, of
 * `sortedLowercaseAttendees.join(',') | windowStart ISO | windowEnd ISO | durationMinutes`.
 * Attendee order and email casing do not change the seed.
 */
export function deriveRequestSeed(input: SeedInput): string {
	const attendees = input.attendees.map((attendee) => attendee.trim().toLowerCase()).sort();
	const canonical = [
		attendees.join(','),
		input.windowStart.toISOString(),
		input.windowEnd.toISOString(),
		String(input.durationMinutes),
	].join('|');
	return fnv1a32(canonical).toString(16).padStart(8, '0');
}
