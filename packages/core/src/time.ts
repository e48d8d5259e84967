/**
 * Duration helpers and time unit constants.
 * Canonical bounds are integer seconds, so every constant here is in seconds.
 */

import { z } from 'zod';
import { parseOptions } from './options.js';

// ============================================================================
// Unit Constants
// ============================================================================

export const SECOND = 1;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;
export const WEEK = 7 * DAY;

// ============================================================================
// Duration Helpers
// ============================================================================

/**
 * Duration as seconds or a structured object.
 *
 * @example
 * const ttl: Duration = { minutes: 5 };
 * const gap: Duration = 90; // seconds
 */
export type Duration =
	| number
	| {
			seconds?: number;
			minutes?: number;
			hours?: number;
			days?: number;
			weeks?: number;
	  };

const unitSchema = z.number().finite();

export const durationSchema = z.union([
	unitSchema,
	z
		.object({
			seconds: unitSchema.optional(),
			minutes: unitSchema.optional(),
			hours: unitSchema.optional(),
			days: unitSchema.optional(),
			weeks: unitSchema.optional(),
		})
		.strict(),
]);

/**
 * Convert a Duration to seconds.
 *
 * @throws InvalidArgumentError when the value is not a Duration
 */
export function durationToSeconds(duration: Duration): number {
	const parsed = parseOptions(durationSchema, duration, 'duration');
	if (typeof parsed === 'number') {
		return parsed;
	}

	let seconds = 0;
	if (parsed.seconds) seconds += parsed.seconds * SECOND;
	if (parsed.minutes) seconds += parsed.minutes * MINUTE;
	if (parsed.hours) seconds += parsed.hours * HOUR;
	if (parsed.days) seconds += parsed.days * DAY;
	if (parsed.weeks) seconds += parsed.weeks * WEEK;

	return seconds;
}

/**
 * Convert a Duration to milliseconds, for comparisons against Date clocks.
 */
export function durationToMs(duration: Duration): number {
	return durationToSeconds(duration) * 1000;
}
