/**
 * Bound coercion: turning caller-facing bound values into canonical bounds.
 *
 * A source is constructed with a BoundCoercer; the query entry point runs
 * both query bounds through it before any operator sees them.
 */

import { getDate, getMonth, getUnixTime, getYear, isValid, parse, parseISO } from 'date-fns';
import { ValidationError } from './errors.js';
import { MAX_BOUND, MIN_BOUND, type Bound } from './interval.js';

/**
 * Values accepted as a query bound.
 *
 * - `number`: Unix seconds
 * - `Date`: an instant
 * - `string`: an ISO 8601 instant with offset, or a `YYYY-MM-DD` day
 * - `null` / `undefined`: unbounded
 */
export type BoundInput = number | Date | string | null | undefined;

/**
 * Which side of the query a bound sits on. Day-precision values cover the
 * whole day, so they resolve differently on each side.
 */
export type BoundEdge = 'start' | 'end';

/**
 * Strategy converting a BoundInput into a canonical bound.
 */
export type BoundCoercer = (value: BoundInput, edge: BoundEdge) => Bound;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Checks that a number of seconds is usable as a finite bound.
 */
export function assertFiniteBound(value: number, edge: BoundEdge): number {
	if (!Number.isSafeInteger(value) || value <= MIN_BOUND || value >= MAX_BOUND) {
		throw new ValidationError(`Query ${edge} must be an integer number of seconds, got ${value}`);
	}
	return value;
}

/**
 * Converts an instant to Unix seconds.
 */
export function dateToBound(date: Date, edge: BoundEdge): number {
	if (!isValid(date)) {
		throw new ValidationError(`Query ${edge} is an invalid Date`);
	}
	return assertFiniteBound(getUnixTime(date), edge);
}

/**
 * Parses a `YYYY-MM-DD` string into its numeric parts, or undefined when the
 * string has another shape.
 *
 * @throws ValidationError when the string has the shape but names no calendar day
 */
export function parseDay(value: string): { year: number; month: number; day: number } | undefined {
	if (!DATE_ONLY.test(value)) {
		return undefined;
	}
	const date = parse(value, 'yyyy-MM-dd', new Date(0));
	if (!isValid(date)) {
		throw new ValidationError(`"${value}" is not a calendar day`);
	}
	return { year: getYear(date), month: getMonth(date) + 1, day: getDate(date) };
}

/**
 * True when an ISO string pins an instant (ends in `Z` or a UTC offset).
 */
export function hasUtcOffset(value: string): boolean {
	return HAS_OFFSET.test(value);
}

/**
 * The default coercer. Offset-less date-times are rejected because their
 * instant depends on a timezone; use a zoned coercer for those.
 *
 * @example
 * coerceBound(1_700_000_000, 'start');          // 1700000000
 * coerceBound('2024-01-15', 'start');           // 1705276800 (00:00 UTC)
 * coerceBound('2024-01-15', 'end');             // 1705363200 (next day 00:00 UTC)
 * coerceBound('2024-01-15T09:00:00Z', 'start'); // 1705309200
 * coerceBound('2024-01-15T09:00:00', 'start');  // throws ValidationError
 */
export const coerceBound: BoundCoercer = (value, edge) => {
	if (value === null || value === undefined) {
		return null;
	}

	if (typeof value === 'number') {
		return assertFiniteBound(value, edge);
	}

	if (value instanceof Date) {
		return dateToBound(value, edge);
	}

	const day = parseDay(value);
	if (day) {
		const offset = edge === 'start' ? 0 : 1;
		const ms = Date.UTC(day.year, day.month - 1, day.day + offset);
		return dateToBound(new Date(ms), edge);
	}

	if (!hasUtcOffset(value)) {
		throw new ValidationError(
			`Query ${edge} "${value}" has no UTC offset; append "Z" or an offset, or query through a zoned coercer`,
		);
	}

	return dateToBound(parseISO(value), edge);
};
