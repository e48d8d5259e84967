/**
 * The query entry point: bound coercion, range validation, clipping and ordering.
 */

import {
	InvalidArgumentError,
	clip,
	coerceBound as defaultCoerceBound,
	interval,
	parseOptions,
	type BoundInput,
	type Interval,
} from '@spanset/core';
import { z } from 'zod';
import type { QueryOptions, Source } from './types.js';

const queryOptionsSchema = z
	.object({
		direction: z.enum(['asc', 'desc']).default('asc'),
	})
	.strict();

/**
 * Coerces caller bounds through the source's coercer and returns the query
 * range as an interval.
 *
 * @throws InvalidArgumentError when both bounds are finite and start > end
 * @throws ValidationError when a bound cannot be coerced
 */
export function resolveRange(source: Source<Interval>, start?: BoundInput, end?: BoundInput): Interval {
	const coerce = source.coerceBound ?? defaultCoerceBound;
	const lower = coerce(start, 'start');
	const upper = coerce(end, 'end');

	if (lower !== null && upper !== null && lower > upper) {
		throw new InvalidArgumentError(`Query start (${lower}) is after query end (${upper})`, 'start');
	}

	return interval(lower, upper);
}

function* clipped<T extends Interval>(source: Source<T>, range: Interval): Generator<T> {
	for (const value of source.fetch(range.start, range.end)) {
		const part = clip(value, range);
		if (part) {
			yield part;
		}
	}
}

/**
 * Lazily yields the intervals of `source` within [start, end), clipped to the
 * range, in ascending order. Fragments that clip to nothing are dropped.
 * Bounds are checked immediately; nothing is fetched until iteration starts.
 *
 * @example
 * for (const meeting of stream(meetings, '2024-01-15', '2024-01-16')) {
 *   console.log(meeting.title);
 * }
 */
export function stream<T extends Interval>(
	source: Source<T>,
	start?: BoundInput,
	end?: BoundInput,
): Generator<T> {
	return clipped(source, resolveRange(source, start, end));
}

/**
 * Runs a query and collects the result. `desc` returns the ascending result
 * reversed.
 *
 * @example
 * query(busy, 0, 30);                          // ascending
 * query(busy, 0, 30, { direction: 'desc' });   // latest first
 * query(busy);                                 // whole timeline
 */
export function query<T extends Interval>(
	source: Source<T>,
	start?: BoundInput,
	end?: BoundInput,
	options: QueryOptions = {},
): T[] {
	const { direction } = parseOptions(queryOptionsSchema, options, 'query');
	const results = [...stream(source, start, end)];
	return direction === 'desc' ? results.reverse() : results;
}
