/**
 * The interval primitive and its comparison, clipping and overlap helpers.
 * All intervals are half-open: [start, end)
 */

import { ValidationError } from './errors.js';

/**
 * A canonical bound: integer seconds since the Unix epoch, or `null` for an
 * unbounded side (−∞ as a start, +∞ as an end).
 */
export type Bound = number | null;

/**
 * A half-open interval [start, end).
 *
 * Domain-specific intervals extend this interface with their own fields;
 * operators clone those fields whenever they produce a clipped copy.
 *
 * @example
 * interface Meeting extends Interval {
 *   readonly title: string;
 * }
 * const standup: Meeting = { start: 1_700_000_000, end: 1_700_000_900, title: 'Standup' };
 */
export interface Interval {
	/** Inclusive start, or null when unbounded in the past */
	readonly start: Bound;
	/** Exclusive end, or null when unbounded in the future */
	readonly end: Bound;
}

/** Numeric stand-in for an unbounded start. Never equal to a finite bound. */
export const MIN_BOUND = Number.MIN_SAFE_INTEGER;

/** Numeric stand-in for an unbounded end. Never equal to a finite bound. */
export const MAX_BOUND = Number.MAX_SAFE_INTEGER;

function isFiniteBound(value: number): boolean {
	return Number.isSafeInteger(value) && value > MIN_BOUND && value < MAX_BOUND;
}

function describeBound(bound: Bound): string {
	return bound === null ? 'unbounded' : String(bound);
}

/**
 * Checks the interval invariants and throws if one is broken.
 *
 * @throws ValidationError when a finite bound is not a safe integer, or when
 * both bounds are finite and start > end
 */
export function validateInterval(value: Interval): void {
	const { start, end } = value;
	if (start !== null && !isFiniteBound(start)) {
		throw new ValidationError(`Interval start must be an integer number of seconds, got ${start}`);
	}
	if (end !== null && !isFiniteBound(end)) {
		throw new ValidationError(`Interval end must be an integer number of seconds, got ${end}`);
	}
	if (start !== null && end !== null && start > end) {
		throw new ValidationError(
			`Interval start must not be after its end, got [${describeBound(start)}, ${describeBound(end)})`,
		);
	}
}

/**
 * Creates a plain (mask) interval.
 *
 * @example
 * interval(0, 10);      // [0, 10)
 * interval(null, 10);   // (−∞, 10)
 * interval(10, 0);      // throws ValidationError
 */
export function interval(start: Bound, end: Bound): Interval {
	const value: Interval = { start, end };
	validateInterval(value);
	return value;
}

/**
 * Validates an interval that carries metadata and returns it unchanged.
 */
export function createInterval<T extends Interval>(value: T): T {
	validateInterval(value);
	return value;
}

/**
 * The start as a number, with an unbounded start mapped to MIN_BOUND.
 */
export function finiteStart(value: Interval): number {
	return value.start ?? MIN_BOUND;
}

/**
 * The end as a number, with an unbounded end mapped to MAX_BOUND.
 */
export function finiteEnd(value: Interval): number {
	return value.end ?? MAX_BOUND;
}

/**
 * Maps a finite-mapped number back to a bound, turning the sentinels into null.
 */
export function toBound(value: number): Bound {
	return value <= MIN_BOUND || value >= MAX_BOUND ? null : value;
}

/**
 * Length in seconds, or undefined when either side is unbounded.
 */
export function duration(value: Interval): number | undefined {
	if (value.start === null || value.end === null) {
		return undefined;
	}
	return value.end - value.start;
}

/**
 * True when the interval covers no time at all.
 */
export function isEmpty(value: Interval): boolean {
	return finiteStart(value) >= finiteEnd(value);
}

/**
 * Orders intervals by start, then by end. Unbounded starts sort first and
 * unbounded ends sort last.
 */
export function compareIntervals(a: Interval, b: Interval): number {
	const aStart = finiteStart(a);
	const bStart = finiteStart(b);
	if (aStart !== bStart) return aStart < bStart ? -1 : 1;

	const aEnd = finiteEnd(a);
	const bEnd = finiteEnd(b);
	if (aEnd !== bEnd) return aEnd < bEnd ? -1 : 1;

	return 0;
}

/**
 * Checks if two intervals strictly overlap (share some time, not just an endpoint).
 * For half-open intervals [start, end), sharing only an endpoint means no overlap.
 */
export function overlaps(a: Interval, b: Interval): boolean {
	return Math.max(finiteStart(a), finiteStart(b)) < Math.min(finiteEnd(a), finiteEnd(b));
}

/**
 * Copies an interval with new bounds, keeping every other field.
 */
export function withBounds<T extends Interval>(value: T, start: Bound, end: Bound): T {
	return { ...value, start, end };
}

/**
 * Returns the part of `value` that lies within `range`, or undefined when
 * nothing is left. The input is never modified.
 *
 * @example
 * clip({ start: 0, end: 10, title: 'a' }, interval(5, 20));
 * // { start: 5, end: 10, title: 'a' }
 */
export function clip<T extends Interval>(value: T, range: Interval): T | undefined {
	const start = Math.max(finiteStart(value), finiteStart(range));
	const end = Math.min(finiteEnd(value), finiteEnd(range));
	if (start >= end) {
		return undefined;
	}
	if (start === finiteStart(value) && end === finiteEnd(value)) {
		return value;
	}
	return withBounds(value, toBound(start), toBound(end));
}
