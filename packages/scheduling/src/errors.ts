/**
 * Errors raised by the scheduling engine.
 */

import { QuorumError } from '@quorum/core';
import type { ParticipantId, ValidationIssue } from './types.js';

/**
 * A malformed SchedulingRequest. Carries one issue per violated rule.
 */
export class ValidationError extends QuorumError {
	readonly issues: ValidationIssue[];

	constructor(issues: ValidationIssue[]) {
		super('invalid_request', `Invalid scheduling request: ${describeIssues(issues)}`);
		this.issues = issues;
	}
}

/**
 * A calendar lookup failure for one or more participants.
 * Calendar sources may throw this to say which participants were affected.
 */
export class CalendarSourceError extends QuorumError {
	readonly participantIds: ParticipantId[];

	constructor(message: string, participantIds: ParticipantId[], options?: { cause?: unknown }) {
		super('source_unavailable', message, options);
		this.participantIds = participantIds;
	}
}

function describeIssues(issues: ValidationIssue[]): string {
	return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}
